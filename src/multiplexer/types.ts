/**
 * Shared types for the multiplexer layer.
 */

import type { TransportKind } from "../config/types";

export type SessionState = "disconnected" | "handshaking" | "ready" | "closed";

export type SchemaType =
  | "string"
  | "integer"
  | "number"
  | "boolean"
  | "object"
  | "array";

export interface ToolParameter {
  type?: SchemaType | string;
  description?: string;
  [key: string]: unknown;
}

export interface ToolInputSchema {
  type?: string;
  properties?: Record<string, ToolParameter>;
  required?: string[];
  [key: string]: unknown;
}

/** A tool as advertised by one server. Replaced wholesale, never mutated. */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  readonly serverName: string;
}

export interface QualifiedToolName {
  serverName: string;
  toolName: string;
}

export interface RegisteredTool extends ToolDescriptor {
  /** "<server>:<tool>" */
  readonly qualifiedName: string;
}

export interface ServerInfo {
  name?: string;
  version?: string;
  protocolVersion?: string;
}

export interface TextContent {
  type: "text";
  text: string;
}

export interface ResourceContent {
  type: "resource";
  uri?: string;
  resource: Record<string, unknown>;
}

/** Any other content item (image, audio, embedded data), kept as sent. */
export interface StructuredContent {
  type: "structured";
  contentType: string;
  payload: Record<string, unknown>;
}

export type ContentItem = TextContent | ResourceContent | StructuredContent;

export interface ToolResult {
  content: ContentItem[];
  isError: boolean;
}

export interface ServerStatus {
  name: string;
  transport: TransportKind;
  description?: string;
  toolCount: number;
  state: SessionState;
  connected: boolean;
}
