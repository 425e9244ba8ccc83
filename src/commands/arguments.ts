/**
 * Turns `key=value` command-line pairs into tool arguments, coerced by the
 * tool's input schema.
 */

import { UsageError } from "../multiplexer/errors";
import type { ToolDescriptor, ToolParameter } from "../multiplexer/types";

const TRUTHY = new Set(["true", "yes", "y", "1"]);
const INTEGER_RE = /^[+-]?\d+$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function coerceValue(
  key: string,
  raw: string,
  param: ToolParameter | undefined,
): unknown {
  switch (param?.type) {
    case "integer": {
      if (!INTEGER_RE.test(raw)) {
        throw new UsageError(`Invalid integer value for ${key}: '${raw}'`);
      }
      return Number.parseInt(raw, 10);
    }
    case "number": {
      const value = Number(raw);
      if (Number.isNaN(value)) {
        throw new UsageError(`Invalid number value for ${key}: '${raw}'`);
      }
      return value;
    }
    case "boolean":
      return TRUTHY.has(raw.toLowerCase());
    case "object":
    case "array":
      try {
        return JSON.parse(raw);
      } catch {
        throw new UsageError(`Invalid JSON value for ${key}: '${raw}'`);
      }
    default:
      return raw;
  }
}

function parseJsonArguments(json: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    throw new UsageError(`--json must be a JSON object, got: ${json}`);
  }
  if (!isRecord(parsed)) {
    throw new UsageError(`--json must be a JSON object, got: ${json}`);
  }
  return parsed;
}

/**
 * Build the argument object for a tool call. `--json` supplies a base object;
 * `key=value` pairs override it. Empty values are left out.
 */
export function parseToolArguments(
  tool: ToolDescriptor,
  pairs: string[],
  json?: string,
): Record<string, unknown> {
  const args = json ? parseJsonArguments(json) : {};
  const properties = tool.inputSchema.properties ?? {};

  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq === -1) {
      throw new UsageError(`Invalid argument "${pair}". Use key=value`);
    }
    const key = pair.slice(0, eq).replace(/^--/, "").trim();
    const raw = pair.slice(eq + 1).trim();
    if (!key) {
      throw new UsageError(`Invalid argument "${pair}". Key must not be empty`);
    }
    if (!raw) continue;
    args[key] = coerceValue(key, raw, properties[key]);
  }

  const missing = (tool.inputSchema.required ?? []).filter(name => !(name in args));
  if (missing.length > 0) {
    throw new UsageError(`Missing required parameter(s): ${missing.join(", ")}`, {
      serverName: tool.serverName,
      toolName: tool.name,
    });
  }
  return args;
}
