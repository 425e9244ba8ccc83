/**
 * A Transport owns one channel to one MCP server.
 */

import type { TransportKind } from "../config/types";
import type { JsonRpcParams, JsonRpcResponse } from "./jsonrpc";

export interface Transport {
  readonly kind: TransportKind;
  readonly closed: boolean;

  /** Spawn the process or prepare the HTTP session. */
  start(): Promise<void>;

  /**
   * Send one request and resolve with its response envelope. Rejects with a
   * TransportError; JSON-RPC `error` responses resolve normally.
   */
  send(method: string, params?: JsonRpcParams): Promise<JsonRpcResponse>;

  /** Send a notification. No response is expected. */
  notify(method: string, params?: JsonRpcParams): Promise<void>;

  /** Release the process or connection. Pending requests reject. */
  close(): Promise<void>;
}
