import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { afterEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { ConfluenceClient } from "./confluence/client.js";
import { CONFLUENCE_TOOLS } from "./confluence/tools.js";
import { createToolServer } from "./mcp-server.js";
import { createFakeAdb, createFakeFetch } from "./test-utils.js";
import { TOOLS } from "./tools/registry.js";

const callResultSchema = z.object({
  content: z.array(z.object({ type: z.literal("text"), text: z.string() })),
  isError: z.boolean().optional(),
});

const clients: Client[] = [];

async function connect(server: McpServer): Promise<Client> {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  const client = new Client({ name: "test-client", version: "1.0.0" });
  await client.connect(clientTransport);
  clients.push(client);
  return client;
}

afterEach(async () => {
  await Promise.all(clients.splice(0).map((client) => client.close()));
});

describe("createToolServer", () => {
  it("lists the device tools when Confluence is not configured", async () => {
    const client = await connect(createToolServer({ adb: createFakeAdb().adb }));

    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual(TOOLS.map((tool) => tool.name));
  });

  it("adds the Confluence tools when a client is given", async () => {
    const confluence = new ConfluenceClient({
      baseUrl: "https://wiki.example.com",
      username: "bot",
      password: "test-secret",
      fetch: createFakeFetch().fetch,
    });
    const client = await connect(createToolServer({ adb: createFakeAdb().adb, confluence }));

    const { tools } = await client.listTools();

    expect(tools).toHaveLength(TOOLS.length + CONFLUENCE_TOOLS.length);
    expect(tools.find((tool) => tool.name === "confluence_search")?.description).toBe("Search Confluence pages by text");
  });

  it("returns the device envelope as text", async () => {
    const { adb, calls } = createFakeAdb();
    const client = await connect(createToolServer({ adb }));

    const result = callResultSchema.parse(
      await client.callTool({ name: "tap", arguments: { x: 10, y: 20, deviceSerial: "abc" } })
    );

    expect(result.isError).toBe(false);
    expect(JSON.parse(result.content[0]?.text ?? "")).toEqual({ success: true, action: "tap", x: 10, y: 20, device: "abc" });
    expect(calls).toEqual([["-s", "abc", "shell", "input", "tap", "10", "20"]]);
  });

  it("flags failure envelopes as errors", async () => {
    const { adb } = createFakeAdb([["devices", { stdout: "List of devices attached\n" }]]);
    const client = await connect(createToolServer({ adb }));

    const result = callResultSchema.parse(await client.callTool({ name: "tap", arguments: { x: 10, y: 20 } }));

    expect(result).toEqual({
      content: [{ type: "text", text: JSON.stringify({ success: false, error: "No devices connected" }) }],
      isError: true,
    });
  });

  it("runs Confluence tools against the given client", async () => {
    const { fetch, calls } = createFakeFetch([
      ["GET", "/rest/api/space", { json: { results: [{ key: "DEV", name: "Development", type: "global" }] } }],
    ]);
    const confluence = new ConfluenceClient({ baseUrl: "https://wiki.example.com", username: "bot", password: "test-secret", fetch });
    const client = await connect(createToolServer({ adb: createFakeAdb().adb, confluence }));

    const result = callResultSchema.parse(await client.callTool({ name: "confluence_list_spaces", arguments: { limit: 5 } }));

    expect(result.content[0]?.text).toBe("## Available Spaces\n\n- **Development** (`DEV`) - global");
    expect(calls[0]?.path).toBe("/rest/api/space?limit=5");
  });
});
