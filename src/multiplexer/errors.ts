/**
 * Typed error taxonomy. Every failure carries a `kind` so callers can branch
 * on the category instead of matching message strings.
 */

export type ErrorKind =
  | "transport"
  | "protocol"
  | "resolution"
  | "configuration"
  | "usage";

export interface ErrorContext {
  serverName?: string;
  toolName?: string;
}

export abstract class SwitchboardError extends Error {
  abstract readonly kind: ErrorKind;
  readonly serverName?: string;
  readonly toolName?: string;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.serverName = context.serverName;
    this.toolName = context.toolName;
  }
}

/** Spawn failure, closed pipe, malformed JSON, non-2xx HTTP, timeout. */
export class TransportError extends SwitchboardError {
  readonly kind = "transport" as const;
}

/** The server answered with a JSON-RPC `error` object. */
export class ProtocolError extends SwitchboardError {
  readonly kind = "protocol" as const;
  readonly method: string;
  readonly code?: number;
  readonly data?: unknown;

  constructor(
    method: string,
    message: string,
    details: ErrorContext & { code?: number; data?: unknown; } = {},
  ) {
    super(message, details);
    this.method = method;
    this.code = details.code;
    this.data = details.data;
  }
}

export type ResolutionReason = "not_found" | "ambiguous";

export class ResolutionError extends SwitchboardError {
  readonly kind = "resolution" as const;
  readonly reason: ResolutionReason;
  /** Servers exposing the requested tool name (ambiguous case). */
  readonly candidates: string[];

  private constructor(
    reason: ResolutionReason,
    message: string,
    toolName: string,
    candidates: string[],
  ) {
    super(message, { toolName });
    this.reason = reason;
    this.candidates = candidates;
  }

  static notFound(toolName: string): ResolutionError {
    return new ResolutionError(
      "not_found",
      `Tool '${toolName}' not found`,
      toolName,
      [],
    );
  }

  static ambiguous(toolName: string, servers: string[]): ResolutionError {
    return new ResolutionError(
      "ambiguous",
      `Tool '${toolName}' found on multiple servers: ${servers.join(", ")}. `
        + `Use format 'server:tool' to specify.`,
      toolName,
      [...servers],
    );
  }
}

/** A required field for the chosen transport is missing or invalid. */
export class ConfigurationError extends SwitchboardError {
  readonly kind = "configuration" as const;
}

/** The operation is not valid in the current state (e.g. calling a closed session). */
export class UsageError extends SwitchboardError {
  readonly kind = "usage" as const;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Normalize any thrown value into a SwitchboardError. Unknown throwables are
 * treated as transport failures, since they originate below the protocol layer.
 */
export function toSwitchboardError(
  err: unknown,
  context: ErrorContext = {},
): SwitchboardError {
  if (err instanceof SwitchboardError) return err;
  return new TransportError(errorMessage(err), context);
}
