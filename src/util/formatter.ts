/**
 * ANSI pretty-printing for command output.
 */

import type { ContentItem, RegisteredTool, ServerStatus, ToolResult } from "../multiplexer/types";

const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";
const RED = "\x1b[31m";

export function bold(text: string): string {
  return `${BOLD}${text}${RESET}`;
}

export function dim(text: string): string {
  return `${DIM}${text}${RESET}`;
}

export function green(text: string): string {
  return `${GREEN}${text}${RESET}`;
}

export function yellow(text: string): string {
  return `${YELLOW}${text}${RESET}`;
}

export function cyan(text: string): string {
  return `${CYAN}${text}${RESET}`;
}

export function red(text: string): string {
  return `${RED}${text}${RESET}`;
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export function formatError(message: string): string {
  return `${red("Error:")} ${message}`;
}

export function formatToolList(tools: readonly RegisteredTool[]): string {
  if (tools.length === 0) return dim("  (no tools)");

  const maxNameLen = Math.max(...tools.map(t => t.qualifiedName.length));
  return tools
    .map(t => {
      const padded = t.qualifiedName.padEnd(maxNameLen + 2);
      return `  ${cyan(padded)}${dim(t.description)}`;
    })
    .join("\n");
}

/** `  --<param> (<type>) (required|optional): <description>` per parameter. */
export function formatParameters(tool: RegisteredTool): string[] {
  const properties = tool.inputSchema.properties ?? {};
  const required = new Set(tool.inputSchema.required ?? []);
  return Object.entries(properties).map(([param, info]) => {
    const type = info.type ?? "any";
    const presence = required.has(param) ? "required" : "optional";
    return `  --${param} (${type}) (${presence}): ${info.description ?? "No description"}`;
  });
}

export function formatToolHelp(tool: RegisteredTool): string {
  const lines = [bold(tool.qualifiedName), `  ${tool.description}`, "", "Parameters:"];
  const params = formatParameters(tool);
  lines.push(...(params.length > 0 ? params : [dim("  (no parameters)")]));
  return lines.join("\n");
}

function stateLabel(status: ServerStatus): string {
  switch (status.state) {
    case "ready":
      return green("ready");
    case "handshaking":
    case "disconnected":
      return yellow(status.state);
    case "closed":
      return red("closed");
  }
}

export function formatStatusTable(statuses: readonly ServerStatus[]): string {
  if (statuses.length === 0) return dim("  (no servers connected)");

  const nameWidth = Math.max(...statuses.map(s => s.name.length)) + 2;
  const lines = statuses.map(s => {
    const tools = `${s.toolCount} tools`;
    const description = s.description ? `  ${dim(s.description)}` : "";
    return `  ${s.name.padEnd(nameWidth)}${s.transport.padEnd(7)}${tools.padEnd(10)}${
      stateLabel(s)
    }${description}`;
  });

  const connected = statuses.filter(s => s.connected).length;
  const totalTools = statuses.reduce((sum, s) => sum + s.toolCount, 0);
  lines.push("");
  lines.push(`  Summary: ${connected}/${statuses.length} servers, ${totalTools} tools`);
  return lines.join("\n");
}

function formatContentItem(item: ContentItem): string {
  switch (item.type) {
    case "text":
      return item.text;
    case "resource":
      return `Resource: ${item.uri ?? formatJson(item.resource)}`;
    case "structured":
      return formatJson(item.payload);
  }
}

export function formatToolResult(result: ToolResult): string {
  const body = result.content.length > 0
    ? result.content.map(formatContentItem).join("\n")
    : dim("(empty result)");
  return result.isError ? formatError(body) : body;
}
