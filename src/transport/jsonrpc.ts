/**
 * JSON-RPC 2.0 envelopes exchanged with MCP servers.
 */

import { z } from "zod";
import { TransportError } from "../multiplexer/errors";

export type JsonRpcParams = Record<string, unknown>;

export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id: string;
  method: string;
  params?: JsonRpcParams;
}

export interface JsonRpcNotification {
  jsonrpc: "2.0";
  method: string;
  params?: JsonRpcParams;
}

const jsonRpcErrorSchema = z
  .object({
    code: z.number().optional(),
    message: z.string().optional(),
    data: z.unknown().optional(),
  })
  .passthrough();

export const jsonRpcResponseSchema = z
  .object({
    jsonrpc: z.string().optional(),
    id: z.union([z.string(), z.number(), z.null()]).optional(),
    result: z.unknown().optional(),
    error: jsonRpcErrorSchema.optional(),
  })
  .refine(
    message => message.result !== undefined || message.error !== undefined,
    "response carries neither result nor error",
  );

export type JsonRpcResponse = z.infer<typeof jsonRpcResponseSchema>;
export type JsonRpcErrorObject = z.infer<typeof jsonRpcErrorSchema>;

/** Diagnostic snippets are cut to this many characters. */
export const SNIPPET_LENGTH = 100;

export function truncate(text: string, length: number = SNIPPET_LENGTH): string {
  return text.length > length ? text.slice(0, length) : text;
}

export function buildRequest(
  id: string,
  method: string,
  params?: JsonRpcParams,
): JsonRpcRequest {
  return params === undefined
    ? { jsonrpc: "2.0", id, method }
    : { jsonrpc: "2.0", id, method, params };
}

export function buildNotification(
  method: string,
  params?: JsonRpcParams,
): JsonRpcNotification {
  return params === undefined
    ? { jsonrpc: "2.0", method }
    : { jsonrpc: "2.0", method, params };
}

/** Server-initiated requests and notifications carry a method name. */
export function isServerMessage(payload: unknown): boolean {
  return typeof payload === "object"
    && payload !== null
    && "method" in payload
    && typeof payload.method === "string";
}

export function toResponse(payload: unknown): JsonRpcResponse | null {
  const parsed = jsonRpcResponseSchema.safeParse(payload);
  return parsed.success ? parsed.data : null;
}

/**
 * Parse a complete response body. Malformed JSON, or JSON that is not a
 * response envelope, becomes a TransportError.
 */
export function parseResponseText(
  text: string,
  serverName?: string,
): JsonRpcResponse {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (err) {
    throw new TransportError(
      `Invalid JSON response: ${err instanceof Error ? err.message : String(err)}. `
        + `Response: ${truncate(text)}`,
      { serverName },
    );
  }

  const response = toResponse(payload);
  if (!response) {
    throw new TransportError(
      `Malformed JSON-RPC response: ${truncate(text)}`,
      { serverName },
    );
  }
  return response;
}

/**
 * A response answers a request when it echoes the request id. Responses with
 * no id are accepted, since some servers omit it on single-shot replies.
 */
export function answersRequest(response: JsonRpcResponse, id: string): boolean {
  return response.id === undefined
    || response.id === null
    || String(response.id) === id;
}
