import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  ProtocolError,
  ResolutionError,
  TransportError,
  UsageError,
} from "../../src/multiplexer/errors.js";
import { ToolRegistry } from "../../src/multiplexer/tool-registry.js";
import {
  fakeFactory,
  type FakeTool,
  mcpServer,
  never,
  stdioConfig,
} from "../helpers/fake-transport.js";

const SEARCH: FakeTool = {
  name: "search",
  description: "Search things",
  inputSchema: { type: "object", properties: { query: { type: "string" } } },
};

function twoServers() {
  const factory = fakeFactory({
    serverA: mcpServer("serverA", [SEARCH, { name: "only_a", description: "A only" }]),
    serverB: mcpServer("serverB", [SEARCH, { name: "pong", description: "Echo" }]),
  });
  const registry = new ToolRegistry({ createTransport: factory.create });
  return { registry, factory };
}

async function addBoth(registry: ToolRegistry): Promise<void> {
  await registry.addServer(stdioConfig("serverA"));
  await registry.addServer(stdioConfig("serverB"));
}

describe("ToolRegistry", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  describe("addServer", () => {
    it("merges each server's tools under qualified names", async () => {
      const { registry } = twoServers();
      expect(await registry.addServer(stdioConfig("serverA"))).toBe(true);
      expect(await registry.addServer(stdioConfig("serverB"))).toBe(true);

      expect(registry.listTools().map(t => t.qualifiedName)).toEqual([
        "serverA:search",
        "serverA:only_a",
        "serverB:search",
        "serverB:pong",
      ]);
      expect(registry.getServerNames()).toEqual(["serverA", "serverB"]);
      expect(registry.getServerTools("serverB").map(t => t.name)).toEqual(["search", "pong"]);
      expect(registry.isConnected("serverA")).toBe(true);
    });

    it("returns false and registers nothing when the handshake is malformed", async () => {
      const factory = fakeFactory({
        broken: () => ({ jsonrpc: "2.0", id: "1", result: "not an initialize result" }),
      });
      const registry = new ToolRegistry({ createTransport: factory.create });

      expect(await registry.addServer(stdioConfig("broken"))).toBe(false);
      expect(registry.listTools()).toEqual([]);
      expect(registry.getServerNames()).toEqual([]);
      expect(factory.built[0]?.closed).toBe(true);
    });

    it("rejects invalid configs before building a transport", async () => {
      const { registry, factory } = twoServers();

      expect(await registry.addServer({ name: "nocmd", transport: "stdio" })).toBe(false);
      expect(await registry.addServer({ name: "nourl", transport: "http" })).toBe(false);
      expect(await registry.addServer({ name: "a:b", command: "x" })).toBe(false);
      expect(await registry.addServer({ name: "sock", transport: "websocket", command: "x" }))
        .toBe(false);
      expect(factory.built).toHaveLength(0);
    });

    it("explains the failure through connectServer", async () => {
      const { registry } = twoServers();
      const outcome = await registry.connectServer({ name: "nocmd" });
      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error.kind).toBe("configuration");
      expect(outcome.error.message).toBe(
        "Invalid config for server 'nocmd': stdio servers require a command",
      );
    });

    it("replaces a server re-added under the same name", async () => {
      let version = 1;
      const factory = fakeFactory({
        alpha: (method, params) =>
          mcpServer("alpha", [{ name: `tool_v${version}` }])(method, params),
      });
      const registry = new ToolRegistry({ createTransport: factory.create });

      await registry.addServer(stdioConfig("alpha"));
      version = 2;
      await registry.addServer(stdioConfig("alpha"));

      expect(factory.built).toHaveLength(2);
      expect(factory.built[0]?.closed).toBe(true);
      expect(factory.built[1]?.closed).toBe(false);
      expect(registry.listTools().map(t => t.qualifiedName)).toEqual(["alpha:tool_v2"]);
      expect(registry.getServerNames()).toEqual(["alpha"]);
    });
  });

  describe("connectAll", () => {
    it("connects concurrently and isolates failures", async () => {
      const factory = fakeFactory({
        good: mcpServer("good", [{ name: "ok" }]),
        bad: () => ({ jsonrpc: "2.0", id: "1", error: { code: -1, message: "denied" } }),
      });
      const registry = new ToolRegistry({ createTransport: factory.create });

      const summary = await registry.connectAll([stdioConfig("good"), stdioConfig("bad")]);

      expect(summary).toEqual({
        connected: ["good"],
        failed: [{ name: "bad", error: "initialize on 'bad' failed: denied" }],
      });
      expect(registry.listTools().map(t => t.qualifiedName)).toEqual(["good:ok"]);
    });
  });

  describe("resolve", () => {
    it("reports a bare name exposed by two servers as ambiguous", async () => {
      const { registry } = twoServers();
      await addBoth(registry);

      const resolved = registry.resolve("search");
      expect(resolved.ok).toBe(false);
      if (resolved.ok) return;
      expect(resolved.error).toBeInstanceOf(ResolutionError);
      expect(resolved.error.reason).toBe("ambiguous");
      expect(resolved.error.candidates).toEqual(["serverA", "serverB"]);
      expect(resolved.error.message).toBe(
        "Tool 'search' found on multiple servers: serverA, serverB. Use format 'server:tool' to specify.",
      );
    });

    it("resolves qualified names and unique bare names", async () => {
      const { registry } = twoServers();
      await addBoth(registry);

      expect(registry.resolve("serverB:search")).toEqual({
        ok: true,
        value: { serverName: "serverB", toolName: "search" },
      });
      expect(registry.resolve("pong")).toEqual({
        ok: true,
        value: { serverName: "serverB", toolName: "pong" },
      });
    });

    it("reports unknown names as not found", async () => {
      const { registry } = twoServers();
      await registry.addServer(stdioConfig("serverA"));

      for (const name of ["missing", "serverA:missing", "ghost:search"]) {
        const resolved = registry.resolve(name);
        expect(resolved.ok).toBe(false);
        if (resolved.ok) continue;
        expect(resolved.error.reason).toBe("not_found");
        expect(resolved.error.message).toBe(`Tool '${name}' not found`);
      }
    });

    it("returns the same answer every time without touching the index", async () => {
      const { registry } = twoServers();
      await addBoth(registry);
      const before = registry.listTools();

      const first = registry.resolve("only_a");
      const second = registry.resolve("only_a");

      expect(second).toEqual(first);
      expect(registry.listTools()).toEqual(before);
    });

    it("looks up descriptors with getTool", async () => {
      const { registry } = twoServers();
      await registry.addServer(stdioConfig("serverA"));
      expect(registry.getTool("search")).toMatchObject({
        name: "search",
        serverName: "serverA",
        qualifiedName: "serverA:search",
        description: "Search things",
      });
      expect(registry.getTool("missing")).toBeUndefined();
    });
  });

  describe("callTool", () => {
    it("routes a call to the owning server", async () => {
      const { registry, factory } = twoServers();
      await addBoth(registry);

      const outcome = await registry.callTool("pong", { message: "hello" });

      expect(outcome).toEqual({
        ok: true,
        value: {
          content: [{ type: "text", text: "serverB:pong {\"message\":\"hello\"}" }],
          isError: false,
        },
      });
      const calls = factory.built.flatMap(t => t.sent.filter(s => s.method === "tools/call"));
      expect(calls).toEqual([
        { method: "tools/call", params: { name: "pong", arguments: { message: "hello" } } },
      ]);
    });

    it("does not dispatch an ambiguous or unknown name", async () => {
      const { registry, factory } = twoServers();
      await addBoth(registry);

      const ambiguous = await registry.callTool("search");
      const missing = await registry.callTool("nope");

      expect(ambiguous.ok || ambiguous.error.kind).toBe("resolution");
      expect(missing.ok || missing.error.message).toBe("Tool 'nope' not found");
      expect(factory.built.some(t => t.sent.some(s => s.method === "tools/call"))).toBe(false);
    });

    it("returns a protocol error and keeps the server connected", async () => {
      const factory = fakeFactory({
        alpha: mcpServer("alpha", [{ name: "fail" }], () => ({
          jsonrpc: "2.0",
          id: "3",
          error: { code: -32000, message: "tool exploded" },
        })),
      });
      const registry = new ToolRegistry({ createTransport: factory.create });
      await registry.addServer(stdioConfig("alpha"));

      const outcome = await registry.callTool("alpha:fail");

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error).toBeInstanceOf(ProtocolError);
      expect(outcome.error.message).toBe("tools/call on 'alpha:fail' failed: tool exploded");
      expect(registry.isConnected("alpha")).toBe(true);
    });

    it("marks the server disconnected after a transport failure", async () => {
      const factory = fakeFactory({
        alpha: mcpServer("alpha", [{ name: "crash" }], () => {
          throw new TransportError("No response from server");
        }),
      });
      const registry = new ToolRegistry({ createTransport: factory.create });
      await registry.addServer(stdioConfig("alpha"));

      const outcome = await registry.callTool("crash");

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error).toBeInstanceOf(TransportError);
      expect(outcome.error.serverName).toBe("alpha");
      expect(registry.isConnected("alpha")).toBe(false);
      expect(registry.getStatus()[0]?.state).toBe("closed");
      expect(registry.listTools().map(t => t.qualifiedName)).toEqual(["alpha:crash"]);

      const again = await registry.callTool("crash");
      expect(again.ok || again.error).toBeInstanceOf(UsageError);
    });
  });

  describe("refreshServer", () => {
    it("re-indexes a server's new catalog", async () => {
      let tools: FakeTool[] = [{ name: "old" }];
      const factory = fakeFactory({
        alpha: (method, params) => mcpServer("alpha", tools)(method, params),
      });
      const registry = new ToolRegistry({ createTransport: factory.create });
      await registry.addServer(stdioConfig("alpha"));

      tools = [{ name: "new_a" }, { name: "new_b" }];
      expect(await registry.refreshServer("alpha")).toEqual({ ok: true, value: 2 });
      expect(registry.listTools().map(t => t.qualifiedName)).toEqual(["alpha:new_a", "alpha:new_b"]);

      const unknown = await registry.refreshServer("ghost");
      expect(unknown.ok || unknown.error.message).toBe("Server not connected: ghost");
    });
  });

  describe("getStatus", () => {
    it("summarizes each session", async () => {
      const factory = fakeFactory({ alpha: mcpServer("alpha", [{ name: "a" }, { name: "b" }]) });
      const registry = new ToolRegistry({ createTransport: factory.create });
      await registry.addServer({ ...stdioConfig("alpha"), description: "Alpha server" });

      expect(registry.getStatus()).toEqual([
        {
          name: "alpha",
          transport: "stdio",
          description: "Alpha server",
          toolCount: 2,
          state: "ready",
          connected: true,
        },
      ]);
    });
  });

  describe("removeServer and close", () => {
    it("removes one server and its tools", async () => {
      const { registry, factory } = twoServers();
      await addBoth(registry);

      expect(await registry.removeServer("serverA")).toBe(true);
      expect(await registry.removeServer("serverA")).toBe(false);
      expect(registry.getServerNames()).toEqual(["serverB"]);
      expect(registry.resolve("search")).toEqual({
        ok: true,
        value: { serverName: "serverB", toolName: "search" },
      });
      expect(factory.built.filter(t => t.closed)).toHaveLength(1);
    });

    it("closes every session and empties the namespace", async () => {
      const { registry, factory } = twoServers();
      await addBoth(registry);

      await registry.close();

      expect(factory.built.every(t => t.closed)).toBe(true);
      expect(registry.listTools()).toEqual([]);
      expect(registry.getStatus()).toEqual([]);
    });

    it("rejects a call in flight when the registry closes", async () => {
      const factory = fakeFactory({ alpha: mcpServer("alpha", [{ name: "slow" }], never) });
      const registry = new ToolRegistry({ createTransport: factory.create });
      await registry.addServer(stdioConfig("alpha"));

      const pending = registry.callTool("slow");
      await new Promise(resolve => setTimeout(resolve, 0));
      await registry.close();

      const outcome = await pending;
      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error.message).toBe("tools/call on 'alpha:slow' failed: Connection closed");
    });

    it("closes a session that is still handshaking", async () => {
      const factory = fakeFactory({ slow: never });
      const registry = new ToolRegistry({ createTransport: factory.create });

      const adding = registry.addServer(stdioConfig("slow"));
      await vi.waitFor(() => expect(factory.built).toHaveLength(1));
      await registry.close();

      expect(await adding).toBe(false);
      expect(factory.built[0]?.closed).toBe(true);
      expect(registry.getServerNames()).toEqual([]);
    });
  });
});
