/**
 * HTTP transport: one POST per JSON-RPC message. The server may answer with a
 * single JSON envelope or with a text/event-stream carrying the envelope.
 */

import { errorMessage, SwitchboardError, TransportError } from "../multiplexer/errors";
import { log, warn } from "../util/logger";
import { type IdSequence, RequestCorrelator } from "./correlator";
import { DONE_SENTINEL, readEventData } from "./event-stream";
import {
  answersRequest,
  buildNotification,
  buildRequest,
  type JsonRpcParams,
  type JsonRpcResponse,
  parseResponseText,
  toResponse,
  truncate,
} from "./jsonrpc";
import type { Transport } from "./types";

export interface HttpTransportOptions {
  url: string;
  headers?: Record<string, string>;
  /** Per-request timeout, covering the whole response body. */
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const SESSION_HEADER = "mcp-session-id";

interface InFlight {
  controller: AbortController;
  timedOut: boolean;
}

export class HttpTransport implements Transport {
  readonly kind = "http" as const;
  private serverName: string;
  private options: HttpTransportOptions;
  private correlator: RequestCorrelator;
  private inFlight = new Set<InFlight>();
  private sessionId?: string;
  private _closed = false;

  constructor(
    serverName: string,
    options: HttpTransportOptions,
    sequence?: IdSequence,
  ) {
    this.serverName = serverName;
    this.options = options;
    this.correlator = new RequestCorrelator(sequence);
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Session id issued by the server on initialize, if any. */
  get mcpSessionId(): string | undefined {
    return this.sessionId;
  }

  async start(): Promise<void> {
    this.assertOpen();
    log(`HTTP transport ready for ${this.serverName}: ${this.options.url}`);
  }

  async send(
    method: string,
    params?: JsonRpcParams,
  ): Promise<JsonRpcResponse> {
    this.assertOpen();
    const id = this.correlator.nextId();

    return this.withRequest(async signal => {
      const res = await this.post(buildRequest(id, method, params), signal);
      await this.assertOk(res);
      this.captureSession(res);

      const contentType = res.headers.get("content-type")?.toLowerCase() ?? "";
      if (contentType.includes("text/event-stream")) {
        return this.readEventStream(res, id);
      }
      return parseResponseText(await res.text(), this.serverName);
    });
  }

  async notify(method: string, params?: JsonRpcParams): Promise<void> {
    this.assertOpen();
    await this.withRequest(async signal => {
      const res = await this.post(buildNotification(method, params), signal);
      await this.assertOk(res);
      this.captureSession(res);
      await res.body?.cancel();
    });
  }

  private async readEventStream(
    res: Response,
    id: string,
  ): Promise<JsonRpcResponse> {
    if (!res.body) {
      throw this.failure("Empty event stream");
    }

    for await (const data of readEventData(res.body)) {
      if (data === DONE_SENTINEL) break;
      if (!data) continue;

      let payload: unknown;
      try {
        payload = JSON.parse(data);
      } catch {
        log(`[${this.serverName}] skipping non-JSON event: ${truncate(data)}`);
        continue;
      }

      const response = toResponse(payload);
      if (response && answersRequest(response, id)) {
        return response;
      }
    }

    throw this.failure("No valid JSON-RPC response found in event stream");
  }

  private post(message: object, signal: AbortSignal): Promise<Response> {
    const headers: Record<string, string> = {
      ...this.options.headers,
      "Content-Type": "application/json",
      Accept: "application/json, text/event-stream",
    };
    if (this.sessionId) {
      headers["Mcp-Session-Id"] = this.sessionId;
    }

    return fetch(this.options.url, {
      method: "POST",
      headers,
      body: JSON.stringify(message),
      signal,
    });
  }

  private async assertOk(res: Response): Promise<void> {
    if (res.ok) return;
    let body = "";
    try {
      body = await res.text();
    } catch (err) {
      body = `<unreadable body: ${errorMessage(err)}>`;
    }
    throw this.failure(`HTTP ${res.status}: ${truncate(body)}`);
  }

  private captureSession(res: Response): void {
    const sessionId = res.headers.get(SESSION_HEADER);
    if (sessionId) this.sessionId = sessionId;
  }

  /**
   * Run one exchange under its own abort controller. The timeout covers the
   * body as well as the headers; close() aborts every exchange in flight.
   */
  private async withRequest<T>(
    exchange: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const entry: InFlight = { controller: new AbortController(), timedOut: false };
    const timeoutMs = this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const timer = setTimeout(() => {
      entry.timedOut = true;
      entry.controller.abort();
    }, timeoutMs);
    this.inFlight.add(entry);

    try {
      return await exchange(entry.controller.signal);
    } catch (err) {
      if (entry.timedOut) {
        throw this.failure(`Request timed out after ${timeoutMs}ms`);
      }
      if (this._closed) {
        throw this.failure(`Connection to ${this.serverName} closed`);
      }
      if (err instanceof SwitchboardError) throw err;
      throw this.failure(`HTTP request failed: ${errorMessage(err)}`);
    } finally {
      clearTimeout(timer);
      this.inFlight.delete(entry);
    }
  }

  private failure(message: string): TransportError {
    return new TransportError(message, { serverName: this.serverName });
  }

  private assertOpen(): void {
    if (this._closed) {
      throw this.failure(`Connection to ${this.serverName} is closed`);
    }
  }

  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;

    for (const entry of this.inFlight) {
      entry.controller.abort();
    }
    this.inFlight.clear();

    if (this.sessionId) {
      try {
        await fetch(this.options.url, {
          method: "DELETE",
          headers: { ...this.options.headers, "Mcp-Session-Id": this.sessionId },
          signal: AbortSignal.timeout(this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
        });
      } catch (err) {
        warn(`Failed to end HTTP session for ${this.serverName}: ${errorMessage(err)}`);
      }
    }
    log(`Closed HTTP transport: ${this.serverName}`);
  }
}
