#!/usr/bin/env node
/**
 * switchboard: connect several MCP servers and use their tools as one set.
 *
 * Usage:
 *   switchboard status [--json]             Connect all servers, show status
 *   switchboard tools                       List every tool
 *   switchboard tool-help <tool>            Show a tool's parameters
 *   switchboard call <tool> [key=value...]  Call a tool
 *   switchboard serve                       Serve all tools over stdio
 */

import { config } from "dotenv";
import { program } from "commander";
import { registerCallCommand } from "./commands/call";
import { collect } from "./commands/common";
import { registerServeCommand } from "./commands/serve";
import { registerStatusCommand } from "./commands/status";
import { registerToolsCommands } from "./commands/tools";
import { CLIENT_INFO } from "./multiplexer/server-session";
import { setVerbose } from "./util/logger";

// Load environment variables from .env.local and .env
config({ path: ".env.local", quiet: true });
config({ path: ".env", quiet: true });

async function main(): Promise<void> {
  program
    .name("switchboard")
    .description("MCP client multiplexer: aggregate tools from many MCP servers")
    .version(CLIENT_INFO.version)
    .option("--verbose", "Verbose logging to stderr")
    .option("--config <path>", "Path to a switchboard.json config file")
    .option(
      "--server <name=command>",
      "Add a stdio server inline (repeatable)",
      collect,
      [],
    )
    .option(
      "--server-url <name=url>",
      "Add an HTTP server inline (repeatable)",
      collect,
      [],
    )
    .hook("preAction", thisCommand => {
      const opts = thisCommand.opts();
      if (opts.verbose) {
        setVerbose(true);
      }
    });

  registerStatusCommand(program);
  registerToolsCommands(program);
  registerCallCommand(program);
  registerServeCommand(program);

  await program.parseAsync();
}

main().catch(err => {
  console.error(`switchboard: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
