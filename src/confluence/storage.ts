/**
 * Confluence storage format (XHTML with ac:/ri: macros) as a small typed
 * tree: text extraction, image references, tables and cell edits.
 */

import { XMLBuilder, XMLParser } from "fast-xml-parser";

export interface StorageElement {
  kind: "element";
  name: string;
  attributes: Record<string, string>;
  children: StorageNode[];
}

export interface StorageText {
  kind: "text";
  text: string;
}

export type StorageNode = StorageElement | StorageText;

const ATTRIBUTE_PREFIX = "@_";
// CDATA sections (code macro bodies) survive a round trip as "#cdata" elements
const CDATA = "#cdata";

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  cdataPropName: CDATA,
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
  htmlEntities: true,
});

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  cdataPropName: CDATA,
  suppressEmptyNode: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(value)) return attributes;
  for (const [key, attrValue] of Object.entries(value)) {
    if (key.startsWith(ATTRIBUTE_PREFIX)) {
      attributes[key.slice(ATTRIBUTE_PREFIX.length)] = String(attrValue);
    }
  }
  return attributes;
}

function fromOrdered(value: unknown): StorageNode[] {
  if (!Array.isArray(value)) return [];
  const items: unknown[] = value;
  const nodes: StorageNode[] = [];
  for (const item of items) {
    if (!isRecord(item)) continue;
    for (const [key, content] of Object.entries(item)) {
      if (key === ":@") continue;
      if (key === "#text") {
        nodes.push({ kind: "text", text: String(content) });
      } else {
        nodes.push({ kind: "element", name: key, attributes: readAttributes(item[":@"]), children: fromOrdered(content) });
      }
    }
  }
  return nodes;
}

function toOrdered(nodes: readonly StorageNode[]): Record<string, unknown>[] {
  return nodes.map((node) => {
    if (node.kind === "text") return { "#text": node.text };
    const ordered: Record<string, unknown> = { [node.name]: toOrdered(node.children) };
    const names = Object.keys(node.attributes);
    if (names.length > 0) {
      ordered[":@"] = Object.fromEntries(names.map((name) => [`${ATTRIBUTE_PREFIX}${name}`, node.attributes[name]]));
    }
    return ordered;
  });
}

/** Parses a page body. Throws when the markup is not well formed. */
export function parseStorage(body: string): StorageNode[] {
  const parsed: unknown = parser.parse(`<storage-root>${body}</storage-root>`);
  for (const node of fromOrdered(parsed)) {
    if (node.kind === "element" && node.name === "storage-root") return node.children;
  }
  return [];
}

export function serializeStorage(nodes: readonly StorageNode[]): string {
  return String(builder.build(toOrdered(nodes)));
}

/** Every element named `name` under `nodes`, in document order. */
export function findAll(nodes: readonly StorageNode[], ...names: string[]): StorageElement[] {
  const found: StorageElement[] = [];
  const visit = (node: StorageNode): void => {
    if (node.kind !== "element") return;
    if (names.includes(node.name)) found.push(node);
    node.children.forEach(visit);
  };
  nodes.forEach(visit);
  return found;
}

function textFragments(nodes: readonly StorageNode[], skip: readonly string[] = []): string[] {
  const fragments: string[] = [];
  const visit = (node: StorageNode): void => {
    if (node.kind === "text") {
      const text = node.text.trim();
      if (text) fragments.push(text);
    } else if (!skip.includes(node.name)) {
      node.children.forEach(visit);
    }
  };
  nodes.forEach(visit);
  return fragments;
}

/** Readable text of a body, one fragment per line. Scripts and styles are dropped. */
export function storageToText(nodes: readonly StorageNode[]): string {
  return textFragments(nodes, ["script", "style"]).join("\n");
}

/**
 * Image sources: `<img src>` first, then attachments referenced by
 * `<ac:image>` macros as download paths relative to the site.
 */
export function extractImageUrls(nodes: readonly StorageNode[], pageId: string): string[] {
  const urls = findAll(nodes, "img")
    .map((img) => img.attributes.src ?? "")
    .filter((src) => src !== "");

  for (const image of findAll(nodes, "ac:image")) {
    const [attachment] = findAll(image.children, "ri:attachment");
    const filename = attachment?.attributes["ri:filename"];
    if (filename) {
      urls.push(`/wiki/download/attachments/${pageId}/${filename}`);
    }
  }
  return urls;
}

export type Table = string[][];

/** Tables as rows of cell text. Rows without cells and tables without rows are left out. */
export function readTables(nodes: readonly StorageNode[]): Table[] {
  const tables: Table[] = [];
  for (const table of findAll(nodes, "table")) {
    const rows = findAll(table.children, "tr")
      .map((tr) => findAll(tr.children, "td", "th").map((cell) => textFragments(cell.children).join("")))
      .filter((cells) => cells.length > 0);
    if (rows.length > 0) tables.push(rows);
  }
  return tables;
}

/**
 * Replaces the content of one cell with plain text. Indexes count every
 * table, row and cell in the markup. Throws when one is out of range.
 */
export function setTableCell(
  nodes: readonly StorageNode[],
  tableIndex: number,
  rowIndex: number,
  colIndex: number,
  value: string
): void {
  const tables = findAll(nodes, "table");
  const table = tables[tableIndex];
  if (!table) {
    throw new Error(`Table index ${tableIndex} out of range (found ${tables.length} tables)`);
  }
  const rows = findAll(table.children, "tr");
  const row = rows[rowIndex];
  if (!row) {
    throw new Error(`Row index ${rowIndex} out of range (found ${rows.length} rows)`);
  }
  const cells = findAll(row.children, "td", "th");
  const cell = cells[colIndex];
  if (!cell) {
    throw new Error(`Column index ${colIndex} out of range (found ${cells.length} columns)`);
  }
  cell.children = [{ kind: "text", text: value }];
}
