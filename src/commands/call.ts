/**
 * `switchboard call <tool> [key=value...]`: invoke one tool and print its
 * result.
 */

import type { Command } from "commander";
import { errorMessage } from "../multiplexer/errors";
import { withRegistry } from "../multiplexer/lifecycle";
import { qualifyToolName } from "../multiplexer/namespace";
import type { ToolRegistry } from "../multiplexer/tool-registry";
import { cyan, dim, formatError, formatJson, formatToolResult } from "../util/formatter";
import { log } from "../util/logger";
import { parseToolArguments } from "./arguments";
import { openRegistry, readGlobalOptions, reportFailure } from "./common";

export interface CallOptions {
  /** Server to take the tool from when the bare name is ambiguous. */
  on?: string;
  /** JSON object of arguments, merged under the key=value pairs. */
  json?: string;
  /** Print the normalized result as JSON. */
  raw?: boolean;
}

export interface CallOutcome {
  output: string;
  exitCode: number;
}

export async function executeCall(
  registry: ToolRegistry,
  name: string,
  pairs: string[],
  options: CallOptions = {},
): Promise<CallOutcome> {
  const target = options.on ? qualifyToolName(options.on, name) : name;

  const resolved = registry.resolve(target);
  if (!resolved.ok) {
    const lines = [formatError(resolved.error.message)];
    const available = registry.listTools().map(t => t.qualifiedName);
    if (resolved.error.reason === "not_found" && available.length > 0) {
      lines.push(dim(`Available tools: ${available.join(", ")}`));
    }
    return { output: lines.join("\n"), exitCode: 1 };
  }

  const tool = registry.getTool(target);
  if (!tool) {
    return { output: formatError(`Tool '${target}' not found`), exitCode: 1 };
  }

  let args: Record<string, unknown>;
  try {
    args = parseToolArguments(tool, pairs, options.json);
  } catch (err) {
    return { output: formatError(errorMessage(err)), exitCode: 1 };
  }

  log(`Calling ${tool.qualifiedName} with ${JSON.stringify(args)}`);
  const outcome = await registry.callTool(tool.qualifiedName, args);
  if (!outcome.ok) {
    return { output: formatError(outcome.error.message), exitCode: 1 };
  }

  const result = outcome.value;
  return {
    output: options.raw ? formatJson(result) : formatToolResult(result),
    exitCode: result.isError ? 1 : 0,
  };
}

export function registerCallCommand(program: Command): void {
  program
    .command("call")
    .description("Call a tool with key=value arguments")
    .argument("<tool>", "Tool name, bare or as server:tool")
    .argument("[args...]", "Arguments as key=value, coerced by the tool schema")
    .option("--on <server>", "Take the tool from this server")
    .option("--json <object>", "Arguments as a JSON object")
    .option("--raw", "Print the result as JSON")
    .action(
      async (name: string, pairs: string[], options: CallOptions, command: Command) => {
        try {
          const { registry } = await openRegistry(readGlobalOptions(command));
          const outcome = await withRegistry(registry, async r => {
            console.error(cyan(`Calling tool: ${name}`));
            return executeCall(r, name, pairs, options);
          });
          console.log(outcome.output);
          process.exitCode = outcome.exitCode;
        } catch (err) {
          reportFailure("call", err);
        }
      },
    );
}
