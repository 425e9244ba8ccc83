/**
 * MCP server that re-publishes every registered tool under its qualified
 * name. Uses the low-level Server API since the tool set is dynamic.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { CLIENT_INFO } from "./server-session";
import type { ToolRegistry } from "./tool-registry";
import { toWireContent } from "./result";
import { error as logError, log } from "../util/logger";

export class GatewayServer {
  private server: Server;
  private registry: ToolRegistry;

  constructor(registry: ToolRegistry) {
    this.registry = registry;

    this.server = new Server(
      { name: `${CLIENT_INFO.name}-gateway`, version: CLIENT_INFO.version },
      { capabilities: { tools: {} } },
    );

    this.registerHandlers();
  }

  private registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      const tools = this.registry.listTools();
      return {
        tools: tools.map(t => ({
          name: t.qualifiedName,
          description: `[${t.serverName}] ${t.description}`,
          inputSchema: { ...t.inputSchema, type: "object" as const },
        })),
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async request => {
      const { name, arguments: args } = request.params;
      log(`Routing tool call: ${name}`);

      const outcome = await this.registry.callTool(name, args ?? {});
      if (!outcome.ok) {
        logError(`Tool call failed: ${name} — ${outcome.error.message}`);
        return {
          content: [{ type: "text" as const, text: `Error: ${outcome.error.message}` }],
          isError: true,
        };
      }

      // Upstream content is relayed as received, whatever its item types.
      const result: Record<string, unknown> = {
        content: outcome.value.content.map(toWireContent),
        isError: outcome.value.isError,
      };
      return result;
    });
  }

  async serve(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    log("GatewayServer listening on stdio");
  }

  async close(): Promise<void> {
    await this.server.close();
  }
}
