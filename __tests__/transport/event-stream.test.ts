import { describe, expect, it } from "vitest";
import { parseDataLine, readEventData } from "../../src/transport/event-stream.js";

function streamOf(chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
      controller.close();
    },
  });
}

async function collectAll(body: ReadableStream<Uint8Array>): Promise<string[]> {
  const out: string[] = [];
  for await (const data of readEventData(body)) out.push(data);
  return out;
}

describe("parseDataLine", () => {
  it("returns the payload of data lines only", () => {
    expect(parseDataLine("data: {\"a\":1}")).toBe("{\"a\":1}");
    expect(parseDataLine("data:[DONE]")).toBe("[DONE]");
    expect(parseDataLine("event: message")).toBeNull();
    expect(parseDataLine(": keep-alive")).toBeNull();
  });
});

describe("readEventData", () => {
  it("yields data payloads across chunk boundaries", async () => {
    const body = streamOf(["event: message\ndata: {\"id\"", ":1}\n\n", "data: second\n"]);
    expect(await collectAll(body)).toEqual(["{\"id\":1}", "second"]);
  });

  it("yields a trailing data line without a newline", async () => {
    expect(await collectAll(streamOf(["data: last"]))).toEqual(["last"]);
  });

  it("handles CRLF line endings", async () => {
    expect(await collectAll(streamOf(["data: one\r\ndata: two\r\n"]))).toEqual(["one", "two"]);
  });

  it("reads a chunk holding many small events", async () => {
    const progress = Array.from({ length: 20_000 }, (_, i) =>
      `data: {"jsonrpc":"2.0","method":"notifications/progress","params":{"progress":${i}}}\n\n`
    ).join("");
    const answer = "data: {\"jsonrpc\":\"2.0\",\"id\":\"1\",\"result\":{}}\n\n";
    expect(progress.length).toBeGreaterThan(1024 * 1024);

    const events = await collectAll(streamOf([progress + answer]));

    expect(events).toHaveLength(20_001);
    expect(events[20_000]).toBe("{\"jsonrpc\":\"2.0\",\"id\":\"1\",\"result\":{}}");
  });

  it("reads a single event larger than a megabyte", async () => {
    const text = "x".repeat(1200 * 1024);
    const payload = JSON.stringify({ jsonrpc: "2.0", id: "1", result: { text } });

    const events = await collectAll(
      streamOf([`data: ${payload.slice(0, 500_000)}`, `${payload.slice(500_000)}\n\n`]),
    );

    expect(events).toEqual([payload]);
  });

  it("cancels the stream when the consumer stops early", async () => {
    let cancelled = false;
    const encoder = new TextEncoder();
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode("data: first\n"));
      },
      cancel() {
        cancelled = true;
      },
    });

    for await (const data of readEventData(body)) {
      expect(data).toBe("first");
      break;
    }
    expect(cancelled).toBe(true);
  });
});
