/**
 * Local-process transport: newline-delimited JSON-RPC over a child's stdio.
 *
 * There is no request timeout here. A child that never answers keeps its
 * caller waiting until the session is closed.
 */

import { type ChildProcessWithoutNullStreams, spawn } from "node:child_process";
import { createInterface, type Interface } from "node:readline";
import { errorMessage, TransportError } from "../multiplexer/errors";
import { log, scoped, type ScopedLogger } from "../util/logger";
import { type IdSequence, RequestCorrelator } from "./correlator";
import {
  buildNotification,
  buildRequest,
  isServerMessage,
  type JsonRpcParams,
  type JsonRpcResponse,
  toResponse,
  truncate,
} from "./jsonrpc";
import type { Transport } from "./types";

export interface StdioTransportOptions {
  command: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
  /** How long close() waits after SIGTERM before sending SIGKILL. */
  killGraceMs?: number;
}

const DEFAULT_KILL_GRACE_MS = 2000;

export class StdioTransport implements Transport {
  readonly kind = "stdio" as const;
  private serverName: string;
  private logger: ScopedLogger;
  private options: StdioTransportOptions;
  private correlator: RequestCorrelator;
  private child?: ChildProcessWithoutNullStreams;
  private lines?: Interface;
  private exited?: Promise<void>;
  private streamEnded = false;
  private _closed = false;

  constructor(
    serverName: string,
    options: StdioTransportOptions,
    sequence?: IdSequence,
  ) {
    this.serverName = serverName;
    this.logger = scoped(serverName);
    this.options = options;
    this.correlator = new RequestCorrelator(sequence);
  }

  get closed(): boolean {
    return this._closed;
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  async start(): Promise<void> {
    if (this._closed) {
      throw new TransportError(`Transport for ${this.serverName} is closed`, {
        serverName: this.serverName,
      });
    }
    if (this.child) return;

    const { command, args = [], env, cwd } = this.options;
    log(`Spawning ${this.serverName}: ${[command, ...args].join(" ")}`);

    const child = spawn(command, args, {
      cwd,
      env: env ? { ...process.env, ...env } : process.env,
    });
    this.child = child;

    // EPIPE after the child dies surfaces here; the pending request is failed
    // by handleStreamEnd once stdout closes.
    child.stdin.on("error", err => {
      this.logger.log(`stdin error: ${err.message}`);
    });
    this.exited = new Promise<void>(resolve => {
      child.once("exit", () => resolve());
      child.once("error", () => resolve());
    });

    await new Promise<void>((resolve, reject) => {
      child.once("spawn", () => resolve());
      child.once("error", err => {
        reject(
          new TransportError(
            `Failed to start '${command}': ${err.message}`,
            { serverName: this.serverName },
          ),
        );
      });
    });

    this.attach(child);
  }

  private attach(child: ChildProcessWithoutNullStreams): void {
    const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
    this.lines = lines;
    lines.on("line", line => this.handleLine(line));
    lines.on("close", () => this.handleStreamEnd());

    child.stderr.on("data", (chunk: Buffer) => {
      this.logger.log(`stderr: ${chunk.toString().trim()}`);
    });

    child.on("error", err => {
      this.logger.warn(`process error: ${err.message}`);
      this.handleStreamEnd();
    });

    child.on("exit", (code, signal) => {
      this.logger.log(`exited with code ${code}, signal ${signal}`);
    });
  }

  private handleLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) return;

    let payload: unknown;
    try {
      payload = JSON.parse(trimmed);
    } catch (err) {
      const failure = new TransportError(
        `Invalid JSON response: ${errorMessage(err)}. Response: ${truncate(trimmed)}`,
        { serverName: this.serverName },
      );
      if (!this.correlator.rejectOldest(failure)) {
        this.logger.log(`ignoring non-JSON output: ${truncate(trimmed)}`);
      }
      return;
    }

    if (isServerMessage(payload)) {
      this.logger.log(`ignoring server-initiated message`);
      return;
    }

    const response = toResponse(payload);
    if (!response) {
      this.correlator.rejectOldest(
        new TransportError(
          `Malformed JSON-RPC response: ${truncate(trimmed)}`,
          { serverName: this.serverName },
        ),
      );
      return;
    }
    this.correlator.resolve(response);
  }

  private handleStreamEnd(): void {
    if (this.streamEnded) return;
    this.streamEnded = true;
    this.correlator.rejectAll(
      new TransportError("No response from server", {
        serverName: this.serverName,
      }),
    );
  }

  async send(
    method: string,
    params?: JsonRpcParams,
  ): Promise<JsonRpcResponse> {
    const child = this.requireChild();
    const id = this.correlator.nextId();
    const response = this.correlator.track(id);

    try {
      await this.write(child, buildRequest(id, method, params));
    } catch (err) {
      this.correlator.reject(
        id,
        new TransportError(`Failed to write request: ${errorMessage(err)}`, {
          serverName: this.serverName,
        }),
      );
    }
    return response;
  }

  async notify(method: string, params?: JsonRpcParams): Promise<void> {
    const child = this.requireChild();
    try {
      await this.write(child, buildNotification(method, params));
    } catch (err) {
      throw new TransportError(
        `Failed to write notification: ${errorMessage(err)}`,
        { serverName: this.serverName },
      );
    }
  }

  private requireChild(): ChildProcessWithoutNullStreams {
    if (this._closed) {
      throw new TransportError(`Connection to ${this.serverName} is closed`, {
        serverName: this.serverName,
      });
    }
    if (!this.child) {
      throw new TransportError(`Transport for ${this.serverName} was not started`, {
        serverName: this.serverName,
      });
    }
    if (this.streamEnded) {
      throw new TransportError("No response from server", {
        serverName: this.serverName,
      });
    }
    return this.child;
  }

  private write(
    child: ChildProcessWithoutNullStreams,
    message: object,
  ): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      child.stdin.write(`${JSON.stringify(message)}\n`, err => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;

    this.correlator.rejectAll(
      new TransportError(`Connection to ${this.serverName} closed`, {
        serverName: this.serverName,
      }),
    );

    const child = this.child;
    if (!child) return;

    this.lines?.close();
    child.stdin.end();

    if (child.exitCode === null && child.signalCode === null) {
      child.kill("SIGTERM");
      const grace = this.options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
      const timer = setTimeout(() => {
        this.logger.warn("did not exit after SIGTERM, sending SIGKILL");
        child.kill("SIGKILL");
      }, grace);
      try {
        await this.exited;
      } finally {
        clearTimeout(timer);
      }
    }
    log(`Closed stdio transport: ${this.serverName}`);
  }
}
