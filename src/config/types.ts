/**
 * Configuration types for upstream MCP server definitions.
 */

export type TransportKind = "stdio" | "http";

export const DEFAULT_TIMEOUT_SECONDS = 30;

interface BaseServerConfig {
  /** Unique within a registry. Must not contain ":". */
  name: string;
  description?: string;
  /** Per-request timeout in seconds. Only enforced by the http transport. */
  timeout?: number;
}

export interface StdioServerConfig extends BaseServerConfig {
  transport: "stdio";
  command: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
}

export interface HttpServerConfig extends BaseServerConfig {
  transport: "http";
  url: string;
  headers?: Record<string, string>;
}

export type ServerConfig = StdioServerConfig | HttpServerConfig;

/**
 * Loosely-typed server entry as it arrives from a config file or a caller.
 * Checked by `validateServerConfig` before any I/O happens.
 */
export interface ServerConfigInput {
  name: string;
  transport?: string;
  command?: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
  url?: string;
  headers?: Record<string, string>;
  description?: string;
  timeout?: number;
}

export interface ConfigFile {
  servers: ServerConfigInput[];
}

export interface ResolvedConfig {
  servers: ServerConfig[];
  /** Config file paths that were successfully loaded (for diagnostics). */
  configSources?: string[];
}

export function isStdioConfig(
  config: ServerConfig,
): config is StdioServerConfig {
  return config.transport === "stdio";
}

export function timeoutMs(config: ServerConfig): number {
  return (config.timeout ?? DEFAULT_TIMEOUT_SECONDS) * 1000;
}
