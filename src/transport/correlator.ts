/**
 * Request id issuance and response correlation.
 */

import type { JsonRpcResponse } from "./jsonrpc";
import { log } from "../util/logger";

export interface IdSequence {
  next(): string;
}

/** Ids are decimal strings, strictly increasing from `start`, never reused. */
export function createIdSequence(start: number = 1): IdSequence {
  let current = start - 1;
  return {
    next(): string {
      current += 1;
      return String(current);
    },
  };
}

interface PendingRequest {
  resolve: (response: JsonRpcResponse) => void;
  reject: (error: Error) => void;
}

export class RequestCorrelator {
  private sequence: IdSequence;
  private pending = new Map<string, PendingRequest>();

  constructor(sequence: IdSequence = createIdSequence()) {
    this.sequence = sequence;
  }

  nextId(): string {
    return this.sequence.next();
  }

  /** Register an outgoing request and get a promise for its response. */
  track(id: string): Promise<JsonRpcResponse> {
    return new Promise<JsonRpcResponse>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
    });
  }

  /**
   * Deliver a response to whoever is waiting on its id. Returns false for
   * unknown ids; those are protocol noise and are dropped.
   */
  resolve(response: JsonRpcResponse): boolean {
    const id = response.id === undefined || response.id === null
      ? this.oldestId()
      : String(response.id);
    const entry = id === undefined ? undefined : this.pending.get(id);
    if (id === undefined || !entry) {
      log(`Discarding response with unmatched id ${String(response.id)}`);
      return false;
    }
    this.pending.delete(id);
    entry.resolve(response);
    return true;
  }

  reject(id: string, error: Error): boolean {
    const entry = this.pending.get(id);
    if (!entry) return false;
    this.pending.delete(id);
    entry.reject(error);
    return true;
  }

  /** Fail the longest-waiting request, for errors that carry no id. */
  rejectOldest(error: Error): boolean {
    const id = this.oldestId();
    return id === undefined ? false : this.reject(id, error);
  }

  rejectAll(error: Error): void {
    const entries = [...this.pending.values()];
    this.pending.clear();
    for (const entry of entries) {
      entry.reject(error);
    }
  }

  get size(): number {
    return this.pending.size;
  }

  private oldestId(): string | undefined {
    for (const id of this.pending.keys()) {
      return id;
    }
    return undefined;
  }
}
