import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TransportError } from "../../src/multiplexer/errors.js";
import { StdioTransport } from "../../src/transport/stdio-transport.js";

const FIXTURE = fileURLToPath(new URL("../fixtures/fake-server.mjs", import.meta.url));

function fixture(mode = "normal"): StdioTransport {
  return new StdioTransport("fake", {
    command: process.execPath,
    args: [FIXTURE, mode],
    killGraceMs: 500,
  });
}

async function started(mode?: string): Promise<StdioTransport> {
  const transport = fixture(mode);
  await transport.start();
  return transport;
}

describe("StdioTransport", () => {
  const open: StdioTransport[] = [];

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    await Promise.all(open.splice(0).map(t => t.close()));
    vi.restoreAllMocks();
  });

  async function track(mode?: string): Promise<StdioTransport> {
    const transport = await started(mode);
    open.push(transport);
    return transport;
  }

  it("exchanges line-delimited requests with the child", async () => {
    const transport = await track();
    expect(transport.pid).toEqual(expect.any(Number));

    const init = await transport.send("initialize", { protocolVersion: "2024-11-05" });
    expect(init.result).toMatchObject({ serverInfo: { name: "fake-server" } });

    await transport.notify("notifications/initialized");
    const list = await transport.send("tools/list");
    expect(list.result).toMatchObject({ tools: expect.any(Array) });
  });

  it("skips server-initiated messages while waiting for a response", async () => {
    const transport = await track();
    const response = await transport.send("tools/call", {
      name: "pong",
      arguments: { message: "hi" },
    });
    expect(response.result).toEqual({ content: [{ type: "text", text: "pong: hi" }] });
  });

  it("fails the pending request on a line that is not JSON", async () => {
    const transport = await track();
    await expect(transport.send("tools/call", { name: "garbage" })).rejects.toThrow(
      /^Invalid JSON response: .*Response: this is not json$/,
    );
  });

  it("fails the pending request when the child exits", async () => {
    const transport = await track();
    await expect(transport.send("tools/call", { name: "crash" })).rejects.toThrow(
      "No response from server",
    );
  });

  it("rejects the request in flight on close and stops the child", async () => {
    const transport = await started();
    const pending = transport.send("tools/call", { name: "hang" });
    const rejection = expect(pending).rejects.toThrow("Connection to fake closed");

    await transport.close();

    await rejection;
    expect(transport.closed).toBe(true);
    await transport.close();
    await expect(transport.send("ping")).rejects.toThrow("Connection to fake is closed");
  });

  it("reports a command that cannot be spawned", async () => {
    const transport = new StdioTransport("missing", {
      command: "/nonexistent/switchboard-test-binary",
    });
    await expect(transport.start()).rejects.toThrow(
      /^Failed to start '\/nonexistent\/switchboard-test-binary': /,
    );
    await transport.close();
  });

  it("fails requests to a child that already exited", async () => {
    const transport = await track("exit");
    await expect(transport.send("initialize")).rejects.toBeInstanceOf(TransportError);
  });

  it("refuses to send before start", async () => {
    await expect(fixture().send("ping")).rejects.toThrow("Transport for fake was not started");
  });
});
