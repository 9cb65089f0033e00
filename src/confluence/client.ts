/**
 * Confluence REST client over fetch, authenticated with a username and
 * password (or API token) as HTTP Basic credentials.
 *
 * One instance is built at startup and passed to whatever needs it.
 */

import { z } from "zod";
import { errorMessage } from "../errors.js";
import { extractImageUrls, parseStorage, readTables, serializeStorage, setTableCell, storageToText, type Table } from "./storage.js";

export interface ConfluenceClientOptions {
  baseUrl: string;
  username: string;
  password: string;
  timeoutMs?: number;
  /** Replaced in tests with an in-process stand-in. */
  fetch?: typeof fetch;
}

export interface SearchHit {
  pageId: string;
  title: string;
  spaceKey: string;
  spaceName: string;
  url: string;
  excerpt: string;
  lastModified: string;
}

export interface SearchResults {
  results: SearchHit[];
  total: number;
  start: number;
  limit: number;
  hasMore: boolean;
}

export interface SpaceSummary {
  key: string;
  name: string;
  type: string;
  url: string;
}

export interface PageContent {
  pageId: string;
  title: string;
  spaceKey: string;
  bodyText: string;
  bodyHtml: string;
  url: string;
  version: number;
  lastModified: string;
  lastModifier: string;
  imageUrls: string[];
  hasImages: boolean;
}

export interface PageRef {
  pageId: string;
  title: string;
  url: string;
}

export interface PageWriteResult extends PageRef {
  version?: number;
  message: string;
}

export type PageImage =
  | { url: string; base64: string; mediaType: string }
  | { url: string; error: string; base64: null; mediaType: null };

export interface ConnectionStatus {
  success: boolean;
  message: string;
  baseUrl: string;
  spacesAccessible?: boolean;
}

/** Either a page id, or a space key together with a title. */
export interface PageLocator {
  pageId?: string;
  spaceKey?: string;
  title?: string;
}

// ===========================================
// Response shapes (only the fields read here)
// ===========================================

const contentSchema = z.object({
  id: z.coerce.string().default(""),
  title: z.string().default(""),
  space: z.object({ key: z.string().default(""), name: z.string().default("") }).nullish().catch(null),
  version: z
    .object({
      number: z.number().default(1),
      when: z.string().default(""),
      by: z.object({ displayName: z.string().default("") }).nullish().catch(null),
    })
    .nullish()
    .catch(null),
  body: z
    .object({ storage: z.object({ value: z.string().default("") }).nullish().catch(null) })
    .nullish()
    .catch(null),
  _links: z.object({ webui: z.string().default("") }).nullish().catch(null),
});

type Content = z.infer<typeof contentSchema>;

const searchSchema = z.object({
  results: z.array(z.object({ content: z.unknown().optional(), excerpt: z.string().default("") }).passthrough()).default([]),
  totalSize: z.number().optional(),
});

const spacesSchema = z.object({
  results: z.array(z.object({ key: z.string().default(""), name: z.string().default(""), type: z.string().default("") })).default([]),
});

const contentListSchema = z.object({ results: z.array(contentSchema).default([]) });

const PAGE_EXPAND = "body.storage,version,space";

export class ConfluenceClient {
  readonly baseUrl: string;
  private readonly authorization: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ConfluenceClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.authorization = `Basic ${Buffer.from(`${options.username}:${options.password}`).toString("base64")}`;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  // ===========================================
  // Search and spaces
  // ===========================================

  async search(query: string, options: { spaceKey?: string; limit?: number; start?: number } = {}): Promise<SearchResults> {
    const limit = options.limit ?? 20;
    const start = options.start ?? 0;
    let cql = `text ~ ${cqlString(query)}`;
    if (options.spaceKey) {
      cql = `space = ${cqlString(options.spaceKey)} AND ${cql}`;
    }

    const data = searchSchema.parse(
      await this.request("GET", "/rest/api/search", { query: { cql, limit, start } })
    );
    const results = data.results.map((item): SearchHit => {
      const content = contentSchema.parse(item.content ?? item);
      return {
        pageId: content.id,
        title: content.title,
        spaceKey: content.space?.key ?? "",
        spaceName: content.space?.name ?? "",
        url: this.pageUrl(content),
        excerpt: item.excerpt,
        lastModified: content.version?.when ?? "",
      };
    });
    const total = data.totalSize ?? results.length;
    return { results, total, start, limit, hasMore: start + results.length < total };
  }

  async listSpaces(limit = 50): Promise<SpaceSummary[]> {
    const data = spacesSchema.parse(await this.request("GET", "/rest/api/space", { query: { limit } }));
    return data.results.map((space) => ({
      key: space.key,
      name: space.name,
      type: space.type,
      url: `${this.baseUrl}/wiki/spaces/${space.key}`,
    }));
  }

  // ===========================================
  // Pages
  // ===========================================

  async getPage(locator: PageLocator): Promise<PageContent> {
    const page = await this.fetchPage(locator);
    const bodyHtml = page.body?.storage?.value ?? "";
    const nodes = parseStorage(bodyHtml);
    const imageUrls = extractImageUrls(nodes, page.id);
    return {
      pageId: page.id,
      title: page.title,
      spaceKey: page.space?.key ?? "",
      bodyText: storageToText(nodes),
      bodyHtml,
      url: this.pageUrl(page),
      version: page.version?.number ?? 1,
      lastModified: page.version?.when ?? "",
      lastModifier: page.version?.by?.displayName ?? "",
      imageUrls,
      hasImages: imageUrls.length > 0,
    };
  }

  async getPageText(locator: PageLocator): Promise<string> {
    return (await this.getPage(locator)).bodyText;
  }

  async getChildPages(pageId: string, limit = 25): Promise<PageRef[]> {
    const data = contentListSchema.parse(
      await this.request("GET", `/rest/api/content/${encodeURIComponent(pageId)}/child/page`, { query: { limit } })
    );
    return data.results.map((child) => ({ pageId: child.id, title: child.title, url: this.pageUrl(child) }));
  }

  async createPage(spaceKey: string, title: string, body: string, parentId?: string): Promise<PageWriteResult> {
    const created = contentSchema.parse(
      await this.request("POST", "/rest/api/content", {
        body: {
          type: "page",
          title,
          space: { key: spaceKey },
          body: { storage: { value: body, representation: "storage" } },
          ...(parentId ? { ancestors: [{ id: parentId }] } : {}),
        },
      })
    );
    return {
      pageId: created.id,
      title: created.title,
      url: this.pageUrl(created),
      message: `Page '${title}' created successfully`,
    };
  }

  /** Replaces a page's title and body, bumping its version. */
  async updatePage(pageId: string, title: string, body: string): Promise<PageWriteResult> {
    const path = `/rest/api/content/${encodeURIComponent(pageId)}`;
    const current = contentSchema.parse(await this.request("GET", path, { query: { expand: "version" } }));
    const updated = contentSchema.parse(
      await this.request("PUT", path, {
        body: {
          id: pageId,
          type: "page",
          title,
          body: { storage: { value: body, representation: "storage" } },
          version: { number: (current.version?.number ?? 1) + 1 },
        },
      })
    );
    return {
      pageId: updated.id,
      title: updated.title,
      url: this.pageUrl(updated),
      version: updated.version?.number ?? 0,
      message: `Page '${title}' updated successfully`,
    };
  }

  // ===========================================
  // Tables
  // ===========================================

  async getTables(pageId: string): Promise<Table[]> {
    const page = await this.getPage({ pageId });
    return readTables(parseStorage(page.bodyHtml));
  }

  async updateTableCell(
    pageId: string,
    tableIndex: number,
    rowIndex: number,
    colIndex: number,
    value: string
  ): Promise<PageWriteResult> {
    const page = await this.getPage({ pageId });
    const nodes = parseStorage(page.bodyHtml);
    setTableCell(nodes, tableIndex, rowIndex, colIndex, value);
    return this.updatePage(pageId, page.title, serializeStorage(nodes));
  }

  // ===========================================
  // Images
  // ===========================================

  /** Downloads every image on a page. A failed download is reported in its entry. */
  async getPageImages(pageId: string): Promise<PageImage[]> {
    const page = await this.getPage({ pageId });
    const images: PageImage[] = [];
    for (const url of page.imageUrls) {
      try {
        images.push(await this.downloadImage(url));
      } catch (err) {
        images.push({ url, error: errorMessage(err), base64: null, mediaType: null });
      }
    }
    return images;
  }

  async testConnection(): Promise<ConnectionStatus> {
    try {
      const data = spacesSchema.parse(await this.request("GET", "/rest/api/space", { query: { limit: 1 } }));
      return {
        success: true,
        message: "Connected to Confluence successfully",
        baseUrl: this.baseUrl,
        spacesAccessible: data.results.length > 0,
      };
    } catch (err) {
      return { success: false, message: `Connection failed: ${errorMessage(err)}`, baseUrl: this.baseUrl };
    }
  }

  // ===========================================
  // Internals
  // ===========================================

  private async fetchPage(locator: PageLocator): Promise<Content> {
    const { pageId, spaceKey, title } = locator;
    if (pageId) {
      const path = `/rest/api/content/${encodeURIComponent(pageId)}`;
      const data = await this.request("GET", path, { query: { expand: PAGE_EXPAND }, notFound: `Page not found: ${pageId}` });
      return contentSchema.parse(data);
    }
    if (spaceKey && title) {
      const data = contentListSchema.parse(
        await this.request("GET", "/rest/api/content", { query: { spaceKey, title, expand: PAGE_EXPAND } })
      );
      const [page] = data.results;
      if (!page) throw new Error(`Page not found: ${spaceKey}/${title}`);
      return page;
    }
    throw new Error("Must provide pageId, or spaceKey and title");
  }

  private pageUrl(content: Content): string {
    return `${this.baseUrl}/wiki${content._links?.webui ?? ""}`;
  }

  private async downloadImage(url: string): Promise<PageImage> {
    const response = await this.send("GET", url.startsWith("/") ? `${this.baseUrl}${url}` : url);
    if (!response.ok) {
      throw new Error(`Image download failed (${response.status})`);
    }
    const contentType = response.headers.get("content-type") ?? "image/png";
    const data = Buffer.from(await response.arrayBuffer());
    return { url, base64: data.toString("base64"), mediaType: contentType.split(";")[0]?.trim() || "image/png" };
  }

  private async request(
    method: "GET" | "POST" | "PUT",
    path: string,
    options: { query?: Record<string, string | number>; body?: unknown; notFound?: string } = {}
  ): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, String(value));
    }

    const response =
      options.body === undefined
        ? await this.send(method, url.toString(), { Accept: "application/json" })
        : await this.send(
            method,
            url.toString(),
            { Accept: "application/json", "Content-Type": "application/json" },
            JSON.stringify(options.body)
          );

    if (response.status === 404 && options.notFound) {
      throw new Error(options.notFound);
    }
    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Confluence API error (${response.status}): ${error}`);
    }
    const data: unknown = await response.json();
    return data;
  }

  private send(method: string, url: string, headers: Record<string, string> = {}, body?: string): Promise<Response> {
    return this.fetchImpl(url, {
      method,
      headers: { ...headers, Authorization: this.authorization },
      body,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }
}

/** A double-quoted CQL string literal. */
function cqlString(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

export interface ConfluenceSettings {
  CONFLUENCE_BASE_URL: string;
  CONFLUENCE_USERNAME: string;
  CONFLUENCE_PASSWORD: string;
}

/** Builds a client from settings, or throws naming the variables to set. */
export function createConfluenceClient(settings: ConfluenceSettings, fetchImpl?: typeof fetch): ConfluenceClient {
  const { CONFLUENCE_BASE_URL: baseUrl, CONFLUENCE_USERNAME: username, CONFLUENCE_PASSWORD: password } = settings;
  if (!baseUrl || !username || !password) {
    throw new Error(
      "Missing Confluence credentials. Set CONFLUENCE_BASE_URL, CONFLUENCE_USERNAME, CONFLUENCE_PASSWORD in .env"
    );
  }
  return new ConfluenceClient({ baseUrl, username, password, fetch: fetchImpl });
}
