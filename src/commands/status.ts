/**
 * `switchboard status`: connect every configured server and report which
 * ones came up.
 */

import type { Command } from "commander";
import { withRegistry } from "../multiplexer/lifecycle";
import type { ServerStatus } from "../multiplexer/types";
import { bold, dim, formatJson, formatStatusTable, red } from "../util/formatter";
import { log } from "../util/logger";
import { type GlobalOptions, openRegistry, readGlobalOptions, reportFailure } from "./common";

export interface StatusReport {
  servers: ServerStatus[];
  failed: Array<{ name: string; error: string; }>;
  configSources: string[];
}

export async function collectStatus(options: GlobalOptions): Promise<StatusReport> {
  const { registry, config, summary } = await openRegistry(options);
  return withRegistry(registry, async r => ({
    servers: r.getStatus(),
    failed: summary.failed,
    configSources: config.configSources ?? [],
  }));
}

export function formatStatus(report: StatusReport): string {
  const lines: string[] = [bold("MCP Switchboard status"), ""];

  if (report.configSources.length === 0) {
    lines.push(`  Config: ${dim("none (inline servers only)")}`);
  } else {
    lines.push("  Config:");
    for (const source of report.configSources) {
      lines.push(`    ${source}`);
    }
  }
  lines.push("");

  lines.push(formatStatusTable(report.servers));

  if (report.failed.length > 0) {
    lines.push("");
    lines.push("  Failed:");
    for (const { name, error } of report.failed) {
      lines.push(`    ${red(name)}: ${error}`);
    }
  }
  return lines.join("\n");
}

/** 0 when at least one server is connected. */
export function statusExitCode(report: StatusReport): number {
  return report.servers.some(s => s.connected) ? 0 : 1;
}

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Connect all configured servers and show their status")
    .option("--json", "Output as JSON")
    .action(async (options: { json?: boolean; }, command: Command) => {
      try {
        log("Running status check...");
        const report = await collectStatus(readGlobalOptions(command));
        console.log(options.json ? formatJson(report) : formatStatus(report));
        process.exitCode = statusExitCode(report);
      } catch (err) {
        reportFailure("status", err);
      }
    });
}
