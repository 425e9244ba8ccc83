/**
 * Builds the transport matching a validated server config.
 */

import type { ServerConfig } from "../config/types";
import { isStdioConfig, timeoutMs } from "../config/types";
import type { IdSequence } from "./correlator";
import { HttpTransport } from "./http-transport";
import { StdioTransport } from "./stdio-transport";
import type { Transport } from "./types";

export function createTransport(
  config: ServerConfig,
  sequence?: IdSequence,
): Transport {
  if (isStdioConfig(config)) {
    return new StdioTransport(
      config.name,
      {
        command: config.command,
        args: config.args,
        env: config.env,
        cwd: config.cwd,
      },
      sequence,
    );
  }

  return new HttpTransport(
    config.name,
    {
      url: config.url,
      headers: config.headers,
      timeoutMs: timeoutMs(config),
    },
    sequence,
  );
}

export type { Transport } from "./types";
export { HttpTransport, type HttpTransportOptions } from "./http-transport";
export { StdioTransport, type StdioTransportOptions } from "./stdio-transport";
export { createIdSequence, type IdSequence, RequestCorrelator } from "./correlator";
