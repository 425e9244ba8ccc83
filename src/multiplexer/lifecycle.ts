/**
 * Process-level shutdown: close every session on SIGINT/SIGTERM, then exit.
 */

import { error as logError, log } from "../util/logger";
import type { ToolRegistry } from "./tool-registry";

export interface ShutdownOptions {
  signals?: NodeJS.Signals[];
  /** Runs before the registry is closed (e.g. stop a gateway server). */
  beforeClose?: () => Promise<void>;
  exit?: (code: number) => void;
}

/**
 * Register signal handlers that tear the registry down once. Returns a
 * function that removes the handlers again.
 */
export function installShutdownHandlers(
  registry: ToolRegistry,
  options: ShutdownOptions = {},
): () => void {
  const signals = options.signals ?? ["SIGINT", "SIGTERM"];
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log(`Received ${signal}, shutting down...`);

    let code = 0;
    try {
      await options.beforeClose?.();
    } catch (err) {
      code = 1;
      logError(`Shutdown hook failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    await registry.close();
    exit(code);
  };

  const handlers = signals.map(signal => {
    const handler = (): void => {
      void shutdown(signal);
    };
    process.on(signal, handler);
    return { signal, handler };
  });

  return () => {
    for (const { signal, handler } of handlers) {
      process.off(signal, handler);
    }
  };
}

/**
 * Run `work` against the registry and close the registry afterwards, whether
 * or not the work succeeded.
 */
export async function withRegistry<T>(
  registry: ToolRegistry,
  work: (registry: ToolRegistry) => Promise<T>,
): Promise<T> {
  try {
    return await work(registry);
  } finally {
    await registry.close();
  }
}
