import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ServerConfigInput } from "../../src/config/types.js";
import { resultText } from "../../src/multiplexer/result.js";
import { ToolRegistry } from "../../src/multiplexer/tool-registry.js";

const FIXTURE = fileURLToPath(new URL("../fixtures/fake-server.mjs", import.meta.url));

function fakeServer(name: string, mode = "normal"): ServerConfigInput {
  return { name, transport: "stdio", command: process.execPath, args: [FIXTURE, mode] };
}

describe("ToolRegistry over real stdio servers", () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    registry = new ToolRegistry();
  });

  afterEach(async () => {
    await registry.close();
    vi.restoreAllMocks();
  });

  it("connects, lists and calls tools end to end", async () => {
    expect(await registry.addServer(fakeServer("echo"))).toBe(true);
    expect(registry.getServerTools("echo").map(t => t.name)).toEqual([
      "pong",
      "hang",
      "crash",
      "garbage",
      "fail",
    ]);

    const outcome = await registry.callTool("echo:pong", { message: "hi" });
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(resultText(outcome.value)).toBe("pong: hi");
  });

  it("reports ambiguity across two copies of the same server", async () => {
    await registry.connectAll([fakeServer("one"), fakeServer("two")]);
    const outcome = await registry.callTool("pong", { message: "x" });
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe("resolution");
    expect(outcome.error.message).toMatch(/^Tool 'pong' found on multiple servers: /);
  });

  it("surfaces JSON-RPC errors from a tool", async () => {
    await registry.addServer(fakeServer("echo"));
    const outcome = await registry.callTool("fail");
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.message).toBe("tools/call on 'echo:fail' failed: tool exploded");
    expect(registry.isConnected("echo")).toBe(true);
  });

  it("does not register a server whose handshake is not JSON", async () => {
    expect(await registry.addServer(fakeServer("broken", "bad-init"))).toBe(false);
    expect(registry.listTools()).toEqual([]);
  });

  it("does not register a server that exits at once", async () => {
    expect(await registry.addServer(fakeServer("gone", "exit"))).toBe(false);
    expect(registry.getServerNames()).toEqual([]);
  });

  it("fails a call whose server crashes and marks it disconnected", async () => {
    await registry.addServer(fakeServer("echo"));
    const outcome = await registry.callTool("crash");
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.message).toBe("tools/call on 'echo:crash' failed: No response from server");
    expect(registry.isConnected("echo")).toBe(false);
  });

  it("unblocks a hanging call when the registry closes", async () => {
    await registry.addServer(fakeServer("echo"));
    const pending = registry.callTool("hang");
    await new Promise(resolve => setTimeout(resolve, 50));

    await registry.close();

    const outcome = await pending;
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.message).toBe("tools/call on 'echo:hang' failed: Connection to echo closed");
  });
});
