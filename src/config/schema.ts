/**
 * Zod schemas for validating server configuration entries.
 */

import { z } from "zod";
import { ConfigurationError } from "../multiplexer/errors";
import { warn } from "../util/logger";
import type { ServerConfig } from "./types";

const stringRecord = z.record(z.string(), z.string());

export const serverEntrySchema = z.object({
  name: z
    .string()
    .min(1, "server name must not be empty")
    .refine(name => !name.includes(":"), "server name must not contain ':'"),
  transport: z
    .enum(["stdio", "http"], {
      errorMap: () => ({ message: "Unsupported transport (expected stdio or http)" }),
    })
    .default("stdio"),
  command: z.string().optional(),
  args: z.array(z.string()).optional(),
  env: stringRecord.optional(),
  cwd: z.string().optional(),
  url: z.string().optional(),
  headers: stringRecord.optional(),
  description: z.string().optional(),
  timeout: z.number().positive().optional(),
});

export const configFileSchema = z.object({
  servers: z.array(z.unknown()).default([]),
});

function entryName(data: unknown): string | undefined {
  if (typeof data === "object" && data !== null && "name" in data) {
    const { name } = data;
    return typeof name === "string" && name ? name : undefined;
  }
  return undefined;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message)
    .join("; ");
}

/**
 * Validate one server entry and narrow it to the transport-specific shape.
 * Throws ConfigurationError before any process is spawned or socket opened.
 */
export function validateServerConfig(data: unknown): ServerConfig {
  const parsed = serverEntrySchema.safeParse(data);
  const label = entryName(data) ?? "<unnamed>";
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid config for server '${label}': ${formatIssues(parsed.error)}`,
      { serverName: entryName(data) },
    );
  }

  const entry = parsed.data;
  const base = {
    name: entry.name,
    description: entry.description,
    timeout: entry.timeout,
  };

  if (entry.transport === "stdio") {
    if (!entry.command) {
      throw new ConfigurationError(
        `Invalid config for server '${entry.name}': stdio servers require a command`,
        { serverName: entry.name },
      );
    }
    return {
      ...base,
      transport: "stdio",
      command: entry.command,
      args: entry.args,
      env: entry.env,
      cwd: entry.cwd,
    };
  }

  if (!entry.url) {
    throw new ConfigurationError(
      `Invalid config for server '${entry.name}': HTTP servers require a URL`,
      { serverName: entry.name },
    );
  }
  try {
    new URL(entry.url);
  } catch {
    throw new ConfigurationError(
      `Invalid config for server '${entry.name}': '${entry.url}' is not a valid URL`,
      { serverName: entry.name },
    );
  }
  return {
    ...base,
    transport: "http",
    url: entry.url,
    headers: entry.headers,
  };
}

/**
 * Validate a whole config file. Invalid entries are skipped with a warning.
 */
export function validateConfig(data: unknown): ServerConfig[] {
  const file = configFileSchema.safeParse(data);
  if (!file.success) {
    throw new ConfigurationError(`Invalid config file: ${formatIssues(file.error)}`);
  }

  const servers: ServerConfig[] = [];
  for (const entry of file.data.servers) {
    try {
      servers.push(validateServerConfig(entry));
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      warn(err.message);
    }
  }
  return servers;
}
