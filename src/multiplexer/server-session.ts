/**
 * One upstream MCP server: its transport, handshake state and tool catalog.
 *
 * disconnected → handshaking → ready → closed
 *
 * Requests are serialized: a session never has more than one request in
 * flight, since a stdio pipe pair cannot interleave them safely.
 */

import { z } from "zod";
import type { ServerConfig } from "../config/types";
import { createTransport } from "../transport";
import type { JsonRpcParams, JsonRpcResponse } from "../transport/jsonrpc";
import type { Transport } from "../transport/types";
import { Mutex } from "../util/mutex";
import { log, warn } from "../util/logger";
import {
  errorMessage,
  ProtocolError,
  TransportError,
  UsageError,
} from "./errors";
import { normalizeToolResult } from "./result";
import type {
  ServerInfo,
  SessionState,
  ToolDescriptor,
  ToolInputSchema,
  ToolResult,
} from "./types";

export const PROTOCOL_VERSION = "2024-11-05";
export const CLIENT_INFO = { name: "mcp-switchboard", version: "0.1.0" } as const;

export type TransportFactory = (config: ServerConfig) => Transport;

const initializeResultSchema = z
  .object({
    protocolVersion: z.string().optional(),
    serverInfo: z
      .object({ name: z.string().optional(), version: z.string().optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

const parameterSchema = z
  .object({
    type: z.string().optional(),
    description: z.string().optional(),
  })
  .passthrough();

// Schemas that do not fit this shape fall back to an empty object schema.
const inputSchemaSchema = z
  .object({
    type: z.string().optional(),
    properties: z.record(z.string(), parameterSchema).optional(),
    required: z.array(z.string()).optional(),
  })
  .passthrough()
  .optional()
  .catch(undefined);

const toolListSchema = z
  .object({
    tools: z
      .array(
        z
          .object({
            name: z.string().min(1),
            description: z.string().optional(),
            inputSchema: inputSchemaSchema,
          })
          .passthrough(),
      )
      .default([]),
  })
  .passthrough();

const EMPTY_INPUT_SCHEMA: ToolInputSchema = { type: "object", properties: {} };

export class ServerSession {
  readonly name: string;
  readonly config: Readonly<ServerConfig>;
  private createTransport: TransportFactory;
  private transport?: Transport;
  private tools: readonly ToolDescriptor[] = [];
  private _state: SessionState = "disconnected";
  private _serverInfo?: ServerInfo;
  private mutex = new Mutex();

  constructor(
    config: ServerConfig,
    createTransportFn: TransportFactory = createTransport,
  ) {
    this.config = Object.freeze({ ...config });
    this.name = config.name;
    this.createTransport = createTransportFn;
  }

  get state(): SessionState {
    return this._state;
  }

  get serverInfo(): ServerInfo | undefined {
    return this._serverInfo;
  }

  getTools(): readonly ToolDescriptor[] {
    return this.tools;
  }

  /**
   * Start the transport, run the initialize handshake and load the catalog.
   * On any failure the transport is released, the session ends up closed and
   * the error is rethrown.
   */
  async connect(): Promise<void> {
    if (this._state !== "disconnected") {
      throw new UsageError(
        `Session for ${this.name} has already been started (state: ${this._state})`,
        { serverName: this.name },
      );
    }

    log(`Connecting to server: ${this.name}`);
    const transport = this.createTransport(this.config);
    this.transport = transport;
    this._state = "handshaking";

    try {
      await this.mutex.runExclusive(async () => {
        await transport.start();

        const init = initializeResultSchema.safeParse(
          await this.request("initialize", {
            protocolVersion: PROTOCOL_VERSION,
            capabilities: { tools: {} },
            clientInfo: CLIENT_INFO,
          }),
        );
        if (!init.success) {
          throw new ProtocolError(
            "initialize",
            `initialize on '${this.name}' returned a malformed result`,
            { serverName: this.name },
          );
        }
        this._serverInfo = {
          name: init.data.serverInfo?.name,
          version: init.data.serverInfo?.version,
          protocolVersion: init.data.protocolVersion,
        };

        await transport.notify("notifications/initialized");
        this.tools = await this.fetchTools();
      });
    } catch (err) {
      await this.release();
      throw err;
    }

    // close() may have run while the handshake was in flight
    if (this._state !== "handshaking") {
      throw new UsageError(`Session for ${this.name} was closed during handshake`, {
        serverName: this.name,
      });
    }
    this._state = "ready";

    if (this.tools.length === 0) {
      warn(`${this.name}: connected but advertised 0 tools`);
    }
    log(`Connected to ${this.name}: ${this.tools.length} tools`);
  }

  async callTool(
    toolName: string,
    args: Record<string, unknown>,
  ): Promise<ToolResult> {
    this.assertReady(toolName);

    return this.mutex.runExclusive(async () => {
      this.assertReady(toolName);
      log(`Calling ${this.name}:${toolName}`);

      try {
        const result = await this.request(
          "tools/call",
          { name: toolName, arguments: args },
          toolName,
        );
        return normalizeToolResult(result);
      } catch (err) {
        if (err instanceof TransportError) {
          warn(`Transport failure on ${this.name}, closing session`);
          await this.release();
        }
        throw err;
      }
    });
  }

  /** Re-query tools/list and replace the catalog wholesale. */
  async refreshTools(): Promise<readonly ToolDescriptor[]> {
    this.assertReady();
    return this.mutex.runExclusive(async () => {
      this.assertReady();
      this.tools = await this.fetchTools();
      return this.tools;
    });
  }

  private async fetchTools(): Promise<ToolDescriptor[]> {
    const parsed = toolListSchema.safeParse(await this.request("tools/list"));
    if (!parsed.success) {
      throw new ProtocolError(
        "tools/list",
        `tools/list on '${this.name}' returned a malformed catalog: ${
          parsed.error.issues[0]?.message ?? "invalid shape"
        }`,
        { serverName: this.name },
      );
    }

    return parsed.data.tools.map(tool =>
      Object.freeze({
        name: tool.name,
        description: tool.description ?? "No description",
        inputSchema: tool.inputSchema ?? EMPTY_INPUT_SCHEMA,
        serverName: this.name,
      })
    );
  }

  /**
   * Send one request and unwrap its result. Transport failures and JSON-RPC
   * errors are rethrown with the server (and tool) named in the message.
   */
  private async request(
    method: string,
    params?: JsonRpcParams,
    toolName?: string,
  ): Promise<unknown> {
    const transport = this.transport;
    const where = toolName ? `${this.name}:${toolName}` : this.name;
    if (!transport) {
      throw new UsageError(`Session for ${this.name} has no transport`, {
        serverName: this.name,
        toolName,
      });
    }

    let response: JsonRpcResponse;
    try {
      response = await transport.send(method, params);
    } catch (err) {
      throw new TransportError(`${method} on '${where}' failed: ${errorMessage(err)}`, {
        serverName: this.name,
        toolName,
      });
    }

    if (response.error) {
      throw new ProtocolError(
        method,
        `${method} on '${where}' failed: ${response.error.message ?? "Unknown error"}`,
        {
          serverName: this.name,
          toolName,
          code: response.error.code,
          data: response.error.data,
        },
      );
    }
    return response.result ?? {};
  }

  private assertReady(toolName?: string): void {
    if (this._state !== "ready") {
      throw new UsageError(
        `Server ${this.name} is not ready (state: ${this._state})`,
        { serverName: this.name, toolName },
      );
    }
  }

  private async release(): Promise<void> {
    this._state = "closed";
    const transport = this.transport;
    if (!transport || transport.closed) return;
    try {
      await transport.close();
    } catch (err) {
      warn(`Error closing ${this.name}: ${errorMessage(err)}`);
    }
  }

  /** Idempotent. A request in flight rejects once the transport is gone. */
  async close(): Promise<void> {
    if (this._state === "closed") return;
    await this.release();
    log(`Closed session: ${this.name}`);
  }
}
