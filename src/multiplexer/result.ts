/**
 * Normalization of `tools/call` results into typed content items, and back
 * into wire shape for re-publishing.
 */

import type { ContentItem, ToolResult } from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function normalizeContentItem(item: unknown): ContentItem {
  if (!isRecord(item)) {
    return { type: "structured", contentType: "unknown", payload: { value: item } };
  }

  if (item.type === "text") {
    return {
      type: "text",
      text: typeof item.text === "string" ? item.text : String(item.text ?? ""),
    };
  }

  if (item.type === "resource") {
    const resource = isRecord(item.resource) ? item.resource : {};
    return {
      type: "resource",
      uri: typeof resource.uri === "string" ? resource.uri : undefined,
      resource,
    };
  }

  return {
    type: "structured",
    contentType: typeof item.type === "string" ? item.type : "unknown",
    payload: item,
  };
}

export function normalizeToolResult(result: unknown): ToolResult {
  const record = isRecord(result) ? result : {};
  const content = Array.isArray(record.content) ? record.content : [];
  return {
    content: content.map(normalizeContentItem),
    isError: record.isError === true,
  };
}

/** Inverse of normalizeContentItem, for answering MCP clients. */
export function toWireContent(item: ContentItem): Record<string, unknown> {
  switch (item.type) {
    case "text":
      return { type: "text", text: item.text };
    case "resource":
      return { type: "resource", resource: item.resource };
    case "structured":
      return item.payload;
  }
}

/** Concatenated text of every text item. */
export function resultText(result: ToolResult): string {
  return result.content
    .flatMap(item => item.type === "text" ? [item.text] : [])
    .join("\n");
}
