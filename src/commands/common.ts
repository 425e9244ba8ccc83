/**
 * Argument-parsing helpers shared by every command that connects servers.
 */

import type { Command } from "commander";
import { discoverConfig, type InlineServer, type InlineUrl } from "../config/discovery";
import type { ResolvedConfig } from "../config/types";
import { errorMessage, UsageError } from "../multiplexer/errors";
import { type ConnectSummary, ToolRegistry } from "../multiplexer/tool-registry";
import { error as logError, warn } from "../util/logger";

/**
 * Commander collect helper: appends each flag value into an array.
 * Pass as the third argument to `.option()` with `[]` as the default.
 */
export function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

function splitAssignment(
  item: string,
  flag: string,
  valueLabel: string,
): { name: string; value: string; } {
  const eq = item.indexOf("=");
  if (eq === -1) {
    throw new UsageError(`Invalid ${flag} format: "${item}". Use name=${valueLabel}`);
  }
  const name = item.slice(0, eq).trim();
  const value = item.slice(eq + 1).trim();
  if (!name) {
    throw new UsageError(`Invalid ${flag} format: "${item}". Server name must not be empty`);
  }
  if (!value) {
    throw new UsageError(
      `Invalid ${flag} format: "${item}". Server ${valueLabel} must not be empty`,
    );
  }
  return { name, value };
}

/** Parse `--server name=command args...` inline definitions. */
export function parseInlineServers(items: string[]): InlineServer[] {
  return items.map(item => {
    const { name, value } = splitAssignment(item, "--server", "command");
    return { name, command: value };
  });
}

/** Parse `--server-url name=url` inline definitions. */
export function parseInlineUrls(items: string[]): InlineUrl[] {
  return items.map(item => {
    const { name, value } = splitAssignment(item, "--server-url", "url");
    return { name, url: value };
  });
}

/** Options every server-connecting command inherits from the root program. */
export interface GlobalOptions {
  config?: string;
  server: string[];
  serverUrl: string[];
  verbose?: boolean;
}

export function readGlobalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  const strings = (value: unknown): string[] =>
    Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
  return {
    config: typeof opts.config === "string" ? opts.config : undefined,
    server: strings(opts.server),
    serverUrl: strings(opts.serverUrl),
    verbose: opts.verbose === true,
  };
}

export function resolveConfig(options: GlobalOptions): Promise<ResolvedConfig> {
  return discoverConfig({
    configPath: options.config,
    inlineServers: parseInlineServers(options.server),
    inlineUrls: parseInlineUrls(options.serverUrl),
  });
}

export interface OpenedRegistry {
  registry: ToolRegistry;
  config: ResolvedConfig;
  summary: ConnectSummary;
}

/**
 * Discover config and connect every server into a fresh registry. The caller
 * owns the registry and must close it.
 */
export async function openRegistry(options: GlobalOptions): Promise<OpenedRegistry> {
  const config = await resolveConfig(options);
  if (config.servers.length === 0) {
    warn(
      "No servers configured. Add a switchboard.json or pass --server / --server-url.",
    );
  }
  const registry = new ToolRegistry();
  const summary = await registry.connectAll(config.servers);
  return { registry, config, summary };
}

/** Print a command failure and flag the process exit code. */
export function reportFailure(command: string, err: unknown): void {
  logError(`${command} failed: ${errorMessage(err)}`);
  process.exitCode = 1;
}
