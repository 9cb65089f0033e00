/**
 * Confluence tools: name, description and argument schema for each
 * client operation, with markdown or JSON rendering of the results.
 */

import { z } from "zod";
import { errorMessage } from "../errors.js";
import type { ConfluenceClient, PageContent, SearchResults, SpaceSummary } from "./client.js";
import type { Table } from "./storage.js";

export interface ToolReply {
  text: string;
  isError: boolean;
}

export interface ConfluenceTool {
  name: string;
  description: string;
  schema: z.AnyZodObject;
  /** Validates raw arguments, then runs the tool. Client errors become error replies. */
  invoke(client: ConfluenceClient, rawArgs: unknown): Promise<ToolReply>;
}

function defineTool<S extends z.AnyZodObject>(
  name: string,
  description: string,
  schema: S,
  run: (client: ConfluenceClient, args: z.output<S>) => Promise<string>
): ConfluenceTool {
  return {
    name,
    description,
    schema,
    async invoke(client, rawArgs) {
      const parsed = schema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues.map(
          (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
        );
        return { text: `Invalid arguments for ${name}: ${issues.join("; ")}`, isError: true };
      }
      try {
        return { text: await run(client, parsed.data), isError: false };
      } catch (err) {
        return { text: `Error: ${errorMessage(err)}`, isError: true };
      }
    },
  };
}

// ===========================================
// Arguments
// ===========================================

const responseFormat = z
  .enum(["markdown", "json"])
  .default("markdown")
  .describe("'markdown' for reading or 'json' for structured output");

type ResponseFormat = z.infer<typeof responseFormat>;

const pageLocator = {
  pageId: z.string().trim().optional().describe("Page ID. Use this or spaceKey with title."),
  spaceKey: z.string().trim().optional().describe("Space key, e.g. 'DEV'. Required with title."),
  title: z.string().trim().optional().describe("Page title. Required with spaceKey."),
};

const pageId = z.string().trim().min(1).describe("Page ID");

export const searchArgs = z.object({
  query: z.string().trim().min(1).max(500).describe("Search text, e.g. 'deployment guide'"),
  spaceKey: z.string().trim().optional().describe("Limit the search to one space"),
  limit: z.number().int().min(1).max(100).default(20),
  start: z.number().int().min(0).default(0).describe("Offset of the first result"),
  responseFormat,
});

export const getPageArgs = z.object({ ...pageLocator, responseFormat });
export const getPageTextArgs = z.object(pageLocator);
export const pageIdArgs = z.object({ pageId });

export const getTableArgs = z.object({
  pageId,
  tableIndex: z.number().int().min(0).default(0).describe("Which table, counting from 0"),
  responseFormat,
});

export const updateTableCellArgs = z.object({
  pageId,
  tableIndex: z.number().int().min(0).default(0),
  rowIndex: z.number().int().min(0),
  colIndex: z.number().int().min(0),
  newValue: z.string(),
});

export const createPageArgs = z.object({
  spaceKey: z.string().trim().min(1),
  title: z.string().trim().min(1).max(255),
  body: z.string().describe("Page content in storage format (XHTML) or plain text"),
  parentId: z.string().trim().optional().describe("Parent page to nest under"),
});

export const updatePageArgs = z.object({
  pageId,
  title: z.string().trim().min(1).describe("Page title, may be unchanged"),
  body: z.string().describe("New page content in storage format (XHTML)"),
});

export const childrenArgs = z.object({ pageId, limit: z.number().int().min(1).max(100).default(25) });
export const listSpacesArgs = z.object({ limit: z.number().int().min(1).max(200).default(50), responseFormat });
const noArgs = z.object({});

// ===========================================
// Rendering
// ===========================================

const toJson = (value: unknown): string => JSON.stringify(value, null, 2);

export function formatSearchResults(results: SearchResults, format: ResponseFormat): string {
  if (format === "json") return toJson(results);

  const lines = [`## Search Results (${results.total} total)\n`];
  for (const hit of results.results) {
    lines.push(`### ${hit.title}`);
    lines.push(`- **Space:** ${hit.spaceName} (${hit.spaceKey})`);
    lines.push(`- **URL:** ${hit.url}`);
    lines.push(`- **ID:** ${hit.pageId}`);
    if (hit.excerpt) lines.push(`- **Excerpt:** ${hit.excerpt.slice(0, 200)}...`);
    lines.push("");
  }
  if (results.hasMore) {
    lines.push(`*Showing ${results.results.length} of ${results.total} results. Use start to see more.*`);
  }
  return lines.join("\n");
}

export function formatPage(page: PageContent, format: ResponseFormat): string {
  if (format === "json") return toJson(page);

  return [
    `# ${page.title}`,
    "",
    `**Space:** ${page.spaceKey}`,
    `**URL:** ${page.url}`,
    `**Page ID:** ${page.pageId}`,
    `**Version:** ${page.version}`,
    `**Last Modified:** ${page.lastModified} by ${page.lastModifier}`,
    `**Has Images:** ${page.hasImages ? `Yes (${page.imageUrls.length})` : "No"}`,
    "",
    "---",
    "",
    page.bodyText,
  ].join("\n");
}

/** First row is the header; shorter rows are padded and longer rows cut to its width. */
export function formatTable(table: Table): string {
  const [header, ...rows] = table;
  if (!header) return "*(Empty table)*";

  const line = (cells: string[]): string => `| ${cells.join(" | ")} |`;
  const lines = [line(header), line(header.map(() => "---"))];
  for (const row of rows) {
    lines.push(line(header.map((_, i) => row[i] ?? "")));
  }
  return lines.join("\n");
}

export function formatSpaces(spaces: SpaceSummary[], format: ResponseFormat): string {
  if (format === "json") return toJson(spaces);
  return ["## Available Spaces\n", ...spaces.map((s) => `- **${s.name}** (\`${s.key}\`) - ${s.type}`)].join("\n");
}

// ===========================================
// Tools
// ===========================================

export const CONFLUENCE_TOOLS: readonly ConfluenceTool[] = [
  defineTool(
    "confluence_search",
    "Search Confluence pages by text",
    searchArgs,
    async (client, { query, spaceKey, limit, start, responseFormat }) =>
      formatSearchResults(await client.search(query, { spaceKey, limit, start }), responseFormat)
  ),
  defineTool(
    "confluence_get_page",
    "Get a page's text and metadata by ID or by space and title. Use confluence_get_page_images for its diagrams.",
    getPageArgs,
    async (client, { responseFormat, ...locator }) => formatPage(await client.getPage(locator), responseFormat)
  ),
  defineTool(
    "confluence_get_page_text",
    "Get a page as plain text only",
    getPageTextArgs,
    (client, locator) => client.getPageText(locator)
  ),
  defineTool(
    "confluence_get_page_images",
    "Get a page's images as base64 for a vision model",
    pageIdArgs,
    async (client, args) => {
      const images = await client.getPageImages(args.pageId);
      return toJson({ pageId: args.pageId, imageCount: images.length, images });
    }
  ),
  defineTool(
    "confluence_get_table",
    "Read one table from a page",
    getTableArgs,
    async (client, { pageId, tableIndex, responseFormat }) => {
      const tables = await client.getTables(pageId);
      if (tables.length === 0) return "No tables found on this page.";
      const table = tables[tableIndex];
      if (!table) return `Table index ${tableIndex} out of range. Page has ${tables.length} table(s).`;

      if (responseFormat === "json") {
        return toJson({ pageId, tableIndex, totalTables: tables.length, rows: table });
      }
      return `*Table ${tableIndex + 1} of ${tables.length}*\n\n${formatTable(table)}`;
    }
  ),
  defineTool(
    "confluence_update_table_cell",
    "Set the text of one table cell",
    updateTableCellArgs,
    async (client, args) =>
      toJson(await client.updateTableCell(args.pageId, args.tableIndex, args.rowIndex, args.colIndex, args.newValue))
  ),
  defineTool(
    "confluence_create_page",
    "Create a page, optionally under a parent page",
    createPageArgs,
    async (client, args) => toJson(await client.createPage(args.spaceKey, args.title, args.body, args.parentId))
  ),
  defineTool(
    "confluence_update_page",
    "Replace a page's title and content",
    updatePageArgs,
    async (client, args) => toJson(await client.updatePage(args.pageId, args.title, args.body))
  ),
  defineTool(
    "confluence_get_children",
    "List a page's child pages",
    childrenArgs,
    async (client, { pageId, limit }) => {
      const children = await client.getChildPages(pageId, limit);
      if (children.length === 0) return "No child pages found.";
      const lines = ["## Child Pages\n"];
      for (const child of children) {
        lines.push(`- **${child.title}** (ID: ${child.pageId})`);
        lines.push(`  ${child.url}`);
      }
      return lines.join("\n");
    }
  ),
  defineTool(
    "confluence_list_spaces",
    "List the spaces the account can see",
    listSpacesArgs,
    async (client, { limit, responseFormat }) => formatSpaces(await client.listSpaces(limit), responseFormat)
  ),
  defineTool(
    "confluence_test_connection",
    "Check that the Confluence credentials work",
    noArgs,
    async (client) => toJson(await client.testConnection())
  ),
];

export function findConfluenceTool(name: string): ConfluenceTool | undefined {
  return CONFLUENCE_TOOLS.find((tool) => tool.name === name);
}
