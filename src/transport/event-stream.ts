/**
 * Minimal text/event-stream reader. Yields the payload of every `data:` line;
 * the consumer decides what to do with `[DONE]`.
 */

import { log } from "../util/logger";

export const DONE_SENTINEL = "[DONE]";

export function parseDataLine(line: string): string | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith("data:")) return null;
  return trimmed.slice("data:".length).trimStart();
}

/**
 * Iterate `data:` payloads. Breaking out of the loop cancels the underlying
 * stream, which is how an answered request abandons the rest of it.
 */
export async function* readEventData(
  body: ReadableStream<Uint8Array>,
): AsyncGenerator<string, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let finished = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      buffer += decoder.decode(value, { stream: true });

      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        const data = parseDataLine(line);
        if (data !== null) yield data;
      }
    }

    buffer += decoder.decode();
    const tail = parseDataLine(buffer);
    if (tail !== null) yield tail;
    finished = true;
  } finally {
    if (!finished) {
      try {
        await reader.cancel();
      } catch (err) {
        log(`Event stream cancel failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    reader.releaseLock();
  }
}
