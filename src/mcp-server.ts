/**
 * MCP server exposing the device tools and, when credentials are set,
 * the Confluence tools to any MCP client over stdio.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";
import type { AdbClient } from "./adb.js";
import type { ConfluenceClient } from "./confluence/client.js";
import { CONFLUENCE_TOOLS } from "./confluence/tools.js";
import { parseToolResult } from "./executor.js";
import { TOOLS } from "./tools/registry.js";

export interface ToolServerOptions {
  adb: AdbClient;
  /** Confluence tools are registered only when a client is given. */
  confluence?: ConfluenceClient;
  version?: string;
}

function textResult(text: string, isError: boolean): CallToolResult {
  return { content: [{ type: "text", text }], isError };
}

export function createToolServer(options: ToolServerOptions): McpServer {
  const server = new McpServer({ name: "vla-android", version: options.version ?? "0.1.0" });

  for (const tool of TOOLS) {
    const inputSchema: z.ZodRawShape = tool.schema.shape;
    server.registerTool(tool.name, { description: tool.description, inputSchema }, async (args) => {
      const envelope = await tool.invoke(options.adb, args);
      return textResult(envelope, !parseToolResult(envelope).success);
    });
  }

  const { confluence } = options;
  if (confluence) {
    for (const tool of CONFLUENCE_TOOLS) {
      const inputSchema: z.ZodRawShape = tool.schema.shape;
      server.registerTool(tool.name, { description: tool.description, inputSchema }, async (args) => {
        const reply = await tool.invoke(confluence, args);
        return textResult(reply.text, reply.isError);
      });
    }
  }

  return server;
}

/** Serves until stdin closes. */
export async function serveStdio(server: McpServer): Promise<void> {
  await server.connect(new StdioServerTransport());
}
