/**
 * Owns every server session and the unified tool namespace.
 * Error isolation: one server failing to connect or crashing doesn't affect
 * the others, and nothing here throws at the caller.
 */

import { validateServerConfig } from "../config/schema";
import type { ServerConfig, ServerConfigInput } from "../config/types";
import { createTransport } from "../transport";
import { createIdSequence, type IdSequence } from "../transport/correlator";
import { error as logError, log, warn } from "../util/logger";
import { Mutex } from "../util/mutex";
import { err, ok, type Result } from "../util/result";
import {
  ResolutionError,
  type SwitchboardError,
  toSwitchboardError,
  UsageError,
} from "./errors";
import { isQualifiedName, qualifyToolName } from "./namespace";
import { ServerSession, type TransportFactory } from "./server-session";
import type {
  QualifiedToolName,
  RegisteredTool,
  ServerStatus,
  ToolDescriptor,
  ToolResult,
} from "./types";

export type ToolCallOutcome = Result<ToolResult, SwitchboardError>;

export interface ConnectSummary {
  connected: string[];
  failed: Array<{ name: string; error: string; }>;
}

export interface ToolRegistryOptions {
  /** Override transport construction (tests, custom channels). */
  createTransport?: TransportFactory;
}

interface IndexedTool extends QualifiedToolName {
  descriptor: ToolDescriptor;
}

/**
 * Immutable snapshot of the namespace. Mutations build a new one and swap it
 * in, so readers never see a half-applied change.
 */
interface RegistryIndex {
  sessions: ReadonlyMap<string, ServerSession>;
  tools: ReadonlyMap<string, IndexedTool>;
}

const EMPTY_INDEX: RegistryIndex = { sessions: new Map(), tools: new Map() };

function buildIndex(sessions: ReadonlyMap<string, ServerSession>): RegistryIndex {
  const tools = new Map<string, IndexedTool>();
  for (const [serverName, session] of sessions) {
    for (const descriptor of session.getTools()) {
      tools.set(qualifyToolName(serverName, descriptor.name), {
        serverName,
        toolName: descriptor.name,
        descriptor,
      });
    }
  }
  return { sessions, tools };
}

export class ToolRegistry {
  private index: RegistryIndex = EMPTY_INDEX;
  private connecting = new Set<ServerSession>();
  private mutations = new Mutex();
  private sequence: IdSequence = createIdSequence();
  private createTransport: TransportFactory;

  constructor(options: ToolRegistryOptions = {}) {
    this.createTransport = options.createTransport
      ?? (config => createTransport(config, this.sequence));
  }

  /**
   * Connect one server and merge its tools. Returns false (after releasing
   * everything the attempt acquired) when validation, the handshake or the
   * catalog query fails.
   */
  async addServer(config: ServerConfigInput): Promise<boolean> {
    const outcome = await this.connectServer(config);
    return outcome.ok;
  }

  /** Like addServer, but reports why a connection failed. */
  async connectServer(
    input: ServerConfigInput,
  ): Promise<Result<ServerSession, SwitchboardError>> {
    let config: ServerConfig;
    try {
      config = validateServerConfig(input);
    } catch (e) {
      const error = toSwitchboardError(e, { serverName: input.name });
      logError(error.message);
      return err(error);
    }

    // A server re-added under an existing name replaces the old session, which
    // is closed before the new one is spawned.
    await this.detach(config.name);

    const session = new ServerSession(config, this.createTransport);
    this.connecting.add(session);
    try {
      await session.connect();
    } catch (e) {
      const error = toSwitchboardError(e, { serverName: config.name });
      logError(`Failed to connect to ${config.name}: ${error.message}`);
      return err(error);
    } finally {
      this.connecting.delete(session);
    }

    const committed = await this.mutations.runExclusive(async () => {
      // close() may have run between the handshake and this commit
      if (session.state !== "ready") return false;
      const displaced = this.index.sessions.get(config.name);
      const sessions = new Map(this.index.sessions);
      sessions.set(config.name, session);
      this.index = buildIndex(sessions);
      if (displaced && displaced !== session) {
        await displaced.close();
      }
      return true;
    });
    if (!committed) {
      return err(
        new UsageError(`Session for ${config.name} was closed before registration`, {
          serverName: config.name,
        }),
      );
    }

    log(`Registered ${config.name} (${session.getTools().length} tools)`);
    return ok(session);
  }

  /**
   * Connect every config concurrently. Failures are isolated and reported in
   * the summary.
   */
  async connectAll(configs: ServerConfigInput[]): Promise<ConnectSummary> {
    log(`Connecting to ${configs.length} servers...`);
    const outcomes = await Promise.all(
      configs.map(async config => ({
        name: config.name,
        outcome: await this.connectServer(config),
      })),
    );

    const summary: ConnectSummary = { connected: [], failed: [] };
    for (const { name, outcome } of outcomes) {
      if (outcome.ok) summary.connected.push(name);
      else summary.failed.push({ name, error: outcome.error.message });
    }

    log(
      `Connected to ${summary.connected.length}/${configs.length} servers: ${
        summary.connected.join(", ")
      }`,
    );
    return summary;
  }

  /** Close one server and drop its tools. */
  async removeServer(serverName: string): Promise<boolean> {
    const removed = await this.detach(serverName);
    if (removed) log(`Removed server: ${serverName}`);
    return removed;
  }

  private async detach(serverName: string): Promise<boolean> {
    return this.mutations.runExclusive(async () => {
      const session = this.index.sessions.get(serverName);
      if (!session) return false;
      const sessions = new Map(this.index.sessions);
      sessions.delete(serverName);
      this.index = buildIndex(sessions);
      await session.close();
      return true;
    });
  }

  /**
   * Map a tool name to its owning server. Qualified names are looked up
   * directly; bare names must match exactly one server. Never mutates.
   */
  resolve(name: string): Result<QualifiedToolName, ResolutionError> {
    const { tools } = this.index;

    if (isQualifiedName(name)) {
      const entry = tools.get(name);
      return entry
        ? ok({ serverName: entry.serverName, toolName: entry.toolName })
        : err(ResolutionError.notFound(name));
    }

    const matches = [...tools.values()].filter(tool => tool.toolName === name);
    const [only] = matches;
    if (!only) return err(ResolutionError.notFound(name));
    if (matches.length > 1) {
      return err(ResolutionError.ambiguous(name, matches.map(m => m.serverName)));
    }
    return ok({ serverName: only.serverName, toolName: only.toolName });
  }

  /** Resolve a name and return the descriptor it points at. */
  getTool(name: string): RegisteredTool | undefined {
    const resolved = this.resolve(name);
    if (!resolved.ok) return undefined;
    const { serverName, toolName } = resolved.value;
    const qualifiedName = qualifyToolName(serverName, toolName);
    const entry = this.index.tools.get(qualifiedName);
    return entry ? { ...entry.descriptor, qualifiedName } : undefined;
  }

  /**
   * Dispatch a tools/call. Every failure comes back as a typed error in the
   * outcome; this never rejects.
   */
  async callTool(
    name: string,
    args: Record<string, unknown> = {},
  ): Promise<ToolCallOutcome> {
    const resolved = this.resolve(name);
    if (!resolved.ok) {
      warn(resolved.error.message);
      return err(resolved.error);
    }

    const { serverName, toolName } = resolved.value;
    const session = this.index.sessions.get(serverName);
    if (!session) {
      return err(
        new UsageError(`Server not connected: ${serverName}`, { serverName, toolName }),
      );
    }

    try {
      return ok(await session.callTool(toolName, args));
    } catch (e) {
      const error = toSwitchboardError(e, { serverName, toolName });
      logError(
        `Tool call failed: ${qualifyToolName(serverName, toolName)} — ${error.message}`,
      );
      return err(error);
    }
  }

  /** Re-query one server's catalog and re-index it. */
  async refreshServer(
    serverName: string,
  ): Promise<Result<number, SwitchboardError>> {
    const session = this.index.sessions.get(serverName);
    if (!session) {
      return err(new UsageError(`Server not connected: ${serverName}`, { serverName }));
    }
    try {
      const tools = await session.refreshTools();
      await this.mutations.runExclusive(async () => {
        this.index = buildIndex(this.index.sessions);
      });
      return ok(tools.length);
    } catch (e) {
      return err(toSwitchboardError(e, { serverName }));
    }
  }

  listTools(): RegisteredTool[] {
    return [...this.index.tools.entries()].map(([qualifiedName, entry]) => ({
      ...entry.descriptor,
      qualifiedName,
    }));
  }

  getServerNames(): string[] {
    return [...this.index.sessions.keys()];
  }

  getServerTools(serverName: string): readonly ToolDescriptor[] {
    return this.index.sessions.get(serverName)?.getTools() ?? [];
  }

  isConnected(serverName: string): boolean {
    return this.index.sessions.get(serverName)?.state === "ready";
  }

  getStatus(): ServerStatus[] {
    return [...this.index.sessions.values()].map(session => ({
      name: session.name,
      transport: session.config.transport,
      description: session.config.description,
      toolCount: session.getTools().length,
      state: session.state,
      connected: session.state === "ready",
    }));
  }

  /**
   * Close every session, including ones still handshaking. A failure on one
   * session is logged and does not stop the rest.
   */
  async close(): Promise<void> {
    log("Shutting down all server sessions...");
    const sessions = await this.mutations.runExclusive(async () => {
      const all = [...this.index.sessions.values(), ...this.connecting];
      this.index = EMPTY_INDEX;
      return all;
    });

    const results = await Promise.allSettled(sessions.map(session => session.close()));
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        const name = sessions[i]?.name ?? "<unknown>";
        logError(
          `Error closing ${name}: ${
            result.reason instanceof Error ? result.reason.message : String(result.reason)
          }`,
        );
      }
    });
  }
}
