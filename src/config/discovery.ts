/**
 * Discover and merge server config files.
 *
 * Precedence (later wins on the same server name):
 * 1. $XDG_CONFIG_HOME/mcp-switchboard/config.json (global)
 * 2. --config <path>, or ./switchboard.json in CWD (project-level)
 * 3. --server / --server-url flags (additive)
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join, resolve } from "node:path";
import { homedir } from "node:os";
import { ConfigurationError, errorMessage } from "../multiplexer/errors";
import { expandEnvRecord } from "../util/env";
import { log, warn } from "../util/logger";
import { validateConfig, validateServerConfig } from "./schema";
import type { ResolvedConfig, ServerConfig, ServerConfigInput } from "./types";

export const CONFIG_DIR_NAME = "mcp-switchboard";
export const PROJECT_CONFIG_FILE = "switchboard.json";

export interface InlineServer {
  name: string;
  command: string;
}

export interface InlineUrl {
  name: string;
  url: string;
}

export interface DiscoveryOptions {
  configPath?: string;
  inlineServers?: InlineServer[];
  inlineUrls?: InlineUrl[];
}

export function globalConfigPath(
  env: Record<string, string | undefined> = process.env,
): string {
  const base = env.XDG_CONFIG_HOME || join(homedir(), ".config");
  return join(base, CONFIG_DIR_NAME, "config.json");
}

async function loadConfigFile(path: string): Promise<ServerConfig[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf-8"));
  } catch (err) {
    warn(`Skipping config ${path}: ${errorMessage(err)}`);
    return [];
  }

  try {
    const servers = validateConfig(parsed);
    log(`Loaded config from ${path} (${servers.length} servers)`);
    return servers;
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    warn(`Skipping config ${path}: ${err.message}`);
    return [];
  }
}

function inlineEntries(options: DiscoveryOptions): ServerConfigInput[] {
  const entries: ServerConfigInput[] = [];
  for (const { name, command } of options.inlineServers ?? []) {
    const [executable = "", ...args] = command.trim().split(/\s+/);
    entries.push({ name, transport: "stdio", command: executable, args });
  }
  for (const { name, url } of options.inlineUrls ?? []) {
    entries.push({ name, transport: "http", url });
  }
  return entries;
}

function expandConfig(config: ServerConfig): ServerConfig {
  const owner = `server '${config.name}'`;
  if (config.transport === "stdio") {
    return config.env
      ? { ...config, env: expandEnvRecord(config.env, process.env, owner) }
      : config;
  }
  return config.headers
    ? { ...config, headers: expandEnvRecord(config.headers, process.env, owner) }
    : config;
}

export async function discoverConfig(
  options: DiscoveryOptions = {},
): Promise<ResolvedConfig> {
  const servers = new Map<string, ServerConfig>();
  const configSources: string[] = [];

  const merge = (configs: ServerConfig[]): void => {
    for (const config of configs) {
      if (servers.has(config.name)) {
        log(`Overriding server '${config.name}' from a later source`);
      }
      servers.set(config.name, config);
    }
  };

  // 1. Global config
  const globalPath = globalConfigPath();
  if (existsSync(globalPath)) {
    const loaded = await loadConfigFile(globalPath);
    if (loaded.length > 0) configSources.push(globalPath);
    merge(loaded);
  }

  // 2. Project-level or explicit config (relative paths resolve from CWD)
  const projectPath = options.configPath
    ? resolve(process.cwd(), options.configPath)
    : join(process.cwd(), PROJECT_CONFIG_FILE);
  if (existsSync(projectPath)) {
    const loaded = await loadConfigFile(projectPath);
    if (loaded.length > 0) configSources.push(projectPath);
    merge(loaded);
  } else if (options.configPath) {
    warn(`Config file not found: ${projectPath}`);
  }

  // 3. Inline flags
  const inline: ServerConfig[] = [];
  for (const entry of inlineEntries(options)) {
    try {
      inline.push(validateServerConfig(entry));
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      warn(err.message);
    }
  }
  merge(inline);

  const resolved = [...servers.values()].map(expandConfig);
  log(`Resolved ${resolved.length} total servers`);
  return { servers: resolved, configSources };
}
