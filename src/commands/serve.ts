/**
 * `switchboard serve`: re-publish every connected server's tools as one MCP
 * server on stdio.
 */

import type { Command } from "commander";
import { GatewayServer } from "../multiplexer/gateway-server";
import { installShutdownHandlers } from "../multiplexer/lifecycle";
import { error as logError, log } from "../util/logger";
import { openRegistry, readGlobalOptions, reportFailure } from "./common";

export function registerServeCommand(program: Command): void {
  program
    .command("serve")
    .description("Serve all connected tools as a single MCP server over stdio")
    .action(async (_options: unknown, command: Command) => {
      try {
        const { registry, summary } = await openRegistry(readGlobalOptions(command));

        if (summary.connected.length === 0) {
          logError("No MCP servers connected. Use --config, --server, or create switchboard.json");
          await registry.close();
          process.exitCode = 1;
          return;
        }

        const gateway = new GatewayServer(registry);
        installShutdownHandlers(registry, {
          beforeClose: () => gateway.close(),
        });

        await gateway.serve();
        log(`Serving ${registry.listTools().length} tools`);
      } catch (err) {
        reportFailure("serve", err);
      }
    });
}
