import { describe, expect, it } from "vitest";
import { createFakeFetch, type FetchRule } from "../test-utils.js";
import { ConfluenceClient } from "./client.js";
import { CONFLUENCE_TOOLS, findConfluenceTool, formatTable } from "./tools.js";

function run(name: string, args: unknown, rules: FetchRule[] = []) {
  const fake = createFakeFetch(rules);
  const client = new ConfluenceClient({
    baseUrl: "https://wiki.example.com",
    username: "bot",
    password: "test-secret",
    fetch: fake.fetch,
  });
  const tool = findConfluenceTool(name);
  if (!tool) throw new Error(`no tool ${name}`);
  return tool.invoke(client, args);
}

const TABLE_PAGE: FetchRule = [
  "GET",
  "/rest/api/content/101",
  {
    json: {
      id: "101",
      title: "Environments",
      body: {
        storage: {
          value:
            "<table><tbody><tr><th>Env</th><th>Status</th></tr><tr><td>staging</td></tr><tr><td>prod</td><td>green</td></tr></tbody></table>",
        },
      },
    },
  },
];

describe("CONFLUENCE_TOOLS", () => {
  it("registers each tool once", () => {
    const names = CONFLUENCE_TOOLS.map((tool) => tool.name);
    expect(names).toHaveLength(11);
    expect(new Set(names).size).toBe(11);
  });
});

describe("confluence_search", () => {
  it("renders hits as markdown", async () => {
    const reply = await run("confluence_search", { query: "  deploy  ", limit: 1 }, [
      [
        "GET",
        "/rest/api/search",
        {
          json: {
            results: [
              {
                content: {
                  id: "101",
                  title: "Deploy guide",
                  space: { key: "DEV", name: "Development" },
                  _links: { webui: "/spaces/DEV/pages/101" },
                },
                excerpt: "How to deploy",
              },
            ],
            totalSize: 2,
          },
        },
      ],
    ]);

    expect(reply).toEqual({
      isError: false,
      text: [
        "## Search Results (2 total)\n",
        "### Deploy guide",
        "- **Space:** Development (DEV)",
        "- **URL:** https://wiki.example.com/wiki/spaces/DEV/pages/101",
        "- **ID:** 101",
        "- **Excerpt:** How to deploy...",
        "",
        "*Showing 1 of 2 results. Use start to see more.*",
      ].join("\n"),
    });
  });

  it("rejects an empty query", async () => {
    const reply = await run("confluence_search", { query: "   " });

    expect(reply.isError).toBe(true);
    expect(reply.text).toBe("Invalid arguments for confluence_search: query: String must contain at least 1 character(s)");
  });

  it("turns client errors into error replies", async () => {
    const reply = await run("confluence_search", { query: "deploy" }, [
      ["GET", "/rest/api/search", { status: 401, text: "Unauthorized" }],
    ]);

    expect(reply).toEqual({ isError: true, text: "Error: Confluence API error (401): Unauthorized" });
  });
});

describe("confluence_get_table", () => {
  it("renders the table with short rows padded", async () => {
    const reply = await run("confluence_get_table", { pageId: "101" }, [TABLE_PAGE]);

    expect(reply.text).toBe(
      ["*Table 1 of 1*", "", "| Env | Status |", "| --- | --- |", "| staging |  |", "| prod | green |"].join("\n")
    );
  });

  it("returns rows as JSON", async () => {
    const reply = await run("confluence_get_table", { pageId: "101", responseFormat: "json" }, [TABLE_PAGE]);

    expect(JSON.parse(reply.text)).toEqual({
      pageId: "101",
      tableIndex: 0,
      totalTables: 1,
      rows: [["Env", "Status"], ["staging"], ["prod", "green"]],
    });
  });

  it("names the table count when the index is out of range", async () => {
    const reply = await run("confluence_get_table", { pageId: "101", tableIndex: 2 }, [TABLE_PAGE]);

    expect(reply).toEqual({ isError: false, text: "Table index 2 out of range. Page has 1 table(s)." });
  });
});

describe("confluence_get_children", () => {
  it("says when a page has no children", async () => {
    const reply = await run("confluence_get_children", { pageId: "101" }, [
      ["GET", "/rest/api/content/101/child/page", { json: { results: [] } }],
    ]);

    expect(reply.text).toBe("No child pages found.");
  });
});

describe("confluence_list_spaces", () => {
  it("lists spaces as markdown", async () => {
    const reply = await run("confluence_list_spaces", {}, [
      ["GET", "/rest/api/space", { json: { results: [{ key: "DEV", name: "Development", type: "global" }] } }],
    ]);

    expect(reply.text).toBe("## Available Spaces\n\n- **Development** (`DEV`) - global");
  });
});

describe("formatTable", () => {
  it("cuts rows wider than the header", () => {
    expect(formatTable([["A"], ["1", "2"]])).toBe("| A |\n| --- |\n| 1 |");
  });

  it("marks an empty table", () => {
    expect(formatTable([])).toBe("*(Empty table)*");
  });
});
