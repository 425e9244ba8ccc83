/**
 * `switchboard tools` and `switchboard tool-help <tool>`.
 */

import type { Command } from "commander";
import { ResolutionError } from "../multiplexer/errors";
import { withRegistry } from "../multiplexer/lifecycle";
import type { ToolRegistry } from "../multiplexer/tool-registry";
import { err, ok, type Result } from "../util/result";
import { dim, formatError, formatToolHelp, formatToolList } from "../util/formatter";
import { openRegistry, readGlobalOptions, reportFailure } from "./common";

export function describeTools(registry: ToolRegistry): string {
  const tools = registry.listTools();
  const header = `${tools.length} tools from ${registry.getServerNames().length} servers`;
  return [
    header,
    "",
    formatToolList(tools),
    "",
    dim("Use 'switchboard tool-help <tool>' to see a tool's parameters"),
  ].join("\n");
}

export function describeTool(
  registry: ToolRegistry,
  name: string,
): Result<string, ResolutionError> {
  const resolved = registry.resolve(name);
  if (!resolved.ok) return err(resolved.error);
  const tool = registry.getTool(name);
  if (!tool) return err(ResolutionError.notFound(name));
  return ok(formatToolHelp(tool));
}

export function registerToolsCommands(program: Command): void {
  program
    .command("tools")
    .description("List every tool exposed by the connected servers")
    .action(async (_options: unknown, command: Command) => {
      try {
        const { registry } = await openRegistry(readGlobalOptions(command));
        const output = await withRegistry(registry, async r => describeTools(r));
        console.log(output);
      } catch (e) {
        reportFailure("tools", e);
      }
    });

  program
    .command("tool-help")
    .description("Show the parameters of one tool")
    .argument("<tool>", "Tool name, bare or as server:tool")
    .action(async (name: string, _options: unknown, command: Command) => {
      try {
        const { registry } = await openRegistry(readGlobalOptions(command));
        const help = await withRegistry(registry, async r => describeTool(r, name));
        if (help.ok) {
          console.log(help.value);
        } else {
          console.error(formatError(help.error.message));
          process.exitCode = 1;
        }
      } catch (e) {
        reportFailure("tool-help", e);
      }
    });
}
