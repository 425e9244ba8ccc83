/**
 * Qualified tool names: the owning server's name and the tool name joined
 * by a colon. E.g., "github" + "search" → "github:search"
 */

import type { QualifiedToolName } from "./types";

export const SEPARATOR = ":";

export function qualifyToolName(serverName: string, toolName: string): string {
  return `${serverName}${SEPARATOR}${toolName}`;
}

export function isQualifiedName(name: string): boolean {
  return name.includes(SEPARATOR);
}

/**
 * Split on the first separator. Server names cannot contain one, so anything
 * after it belongs to the tool name.
 */
export function parseQualifiedName(name: string): QualifiedToolName | null {
  const index = name.indexOf(SEPARATOR);
  if (index <= 0 || index === name.length - 1) return null;
  return {
    serverName: name.slice(0, index),
    toolName: name.slice(index + SEPARATOR.length),
  };
}
