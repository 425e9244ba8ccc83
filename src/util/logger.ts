/**
 * Simple stderr logger with verbosity control.
 * stdout is reserved for command output and, under `serve`, for JSON-RPC.
 * Per-server lines go through `scoped`.
 */

let verbose = false;

export function setVerbose(v: boolean): void {
  verbose = v;
}

export function isVerbose(): boolean {
  return verbose;
}

export function log(message: string, ...args: unknown[]): void {
  if (verbose) {
    console.error(`[switchboard] ${message}`, ...args);
  }
}

export function warn(message: string, ...args: unknown[]): void {
  console.error(`[switchboard WARN] ${message}`, ...args);
}

export function error(message: string, ...args: unknown[]): void {
  console.error(`[switchboard ERROR] ${message}`, ...args);
}

export interface ScopedLogger {
  log(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
}

/** Logger whose lines carry the name of one upstream server. */
export function scoped(scope: string): ScopedLogger {
  return {
    log: (message, ...args) => log(`[${scope}] ${message}`, ...args),
    warn: (message, ...args) => warn(`[${scope}] ${message}`, ...args),
  };
}
