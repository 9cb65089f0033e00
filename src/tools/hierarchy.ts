/**
 * Reads a uiautomator XML dump into the list of elements worth acting on.
 */

import { XMLParser } from "fast-xml-parser";

export interface HierarchyElement {
  /** resource-id, empty when the view has none */
  id: string;
  /** Visible text, or the content description when there is no text */
  text: string;
  /** Short class name, e.g. "Button" */
  type: string;
  center: [number, number];
  clickable: boolean;
  editable: boolean;
  enabled: boolean;
}

type XmlNode = Record<string, unknown>;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "",
  isArray: (name) => name === "node",
});

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function attr(node: XmlNode, name: string): string {
  const value = node[name];
  return typeof value === "string" ? value : "";
}

/** "[x1,y1][x2,y2]" → [x1, y1, x2, y2], or null when malformed. */
export function parseBounds(bounds: string): [number, number, number, number] | null {
  const match = bounds.match(/^\[(-?\d+),(-?\d+)\]\[(-?\d+),(-?\d+)\]$/);
  if (!match) return null;
  return [Number(match[1]), Number(match[2]), Number(match[3]), Number(match[4])];
}

function toElement(node: XmlNode): HierarchyElement | null {
  const className = attr(node, "class");
  const clickable = attr(node, "clickable") === "true";
  const editable = className.endsWith("EditText") || className.endsWith("AutoCompleteTextView");
  const label = attr(node, "text") || attr(node, "content-desc");
  const actionable =
    clickable || editable || attr(node, "long-clickable") === "true" || attr(node, "scrollable") === "true";
  if (!actionable && !label) return null;

  const coords = parseBounds(attr(node, "bounds"));
  if (!coords) return null;
  const [x1, y1, x2, y2] = coords;
  if (x2 <= x1 || y2 <= y1) return null;

  return {
    id: attr(node, "resource-id"),
    text: label,
    type: className.split(".").pop() ?? "",
    center: [Math.floor((x1 + x2) / 2), Math.floor((y1 + y2) / 2)],
    clickable,
    editable,
    enabled: attr(node, "enabled") !== "false",
  };
}

/**
 * Returns clickable, editable, scrollable or labelled views with a visible
 * size, in document order. Children of skipped views are still visited.
 */
export function getInteractiveElements(xmlContent: string): HierarchyElement[] {
  let parsed: unknown;
  try {
    parsed = parser.parse(xmlContent);
  } catch {
    // Dumps taken mid-transition can be truncated
    return [];
  }

  const elements: HierarchyElement[] = [];
  const visit = (node: unknown): void => {
    if (!isNode(node)) return;
    const element = toElement(node);
    if (element) elements.push(element);
    if (Array.isArray(node.node)) node.node.forEach(visit);
  };

  if (isNode(parsed) && isNode(parsed.hierarchy)) {
    const roots = parsed.hierarchy.node;
    if (Array.isArray(roots)) roots.forEach(visit);
  }
  return elements;
}
