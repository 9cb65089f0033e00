/**
 * Parsing for JSON that comes back from a model: fenced, unfenced,
 * or buried in prose.
 */

import type { z } from "zod";

export type ParseOutcome<T> = { ok: true; value: T } | { ok: false; reason: string };

/**
 * Removes markdown code fences. Prefers a ```json block when present,
 * otherwise takes the first fenced block.
 */
export function stripCodeFences(text: string): string {
  let content = text.trim();
  const tagged = content.indexOf("```json");
  const fence = tagged !== -1 ? tagged : content.indexOf("```");
  if (fence === -1) return content;

  const start = fence + (tagged !== -1 ? "```json".length : "```".length);
  const end = content.indexOf("```", start);
  content = end === -1 ? content.slice(start) : content.slice(start, end);
  return content.trim();
}

function sanitizeJsonText(raw: string): string {
  return raw.replace(/\n/g, " ").replace(/\r/g, " ");
}

/**
 * Decodes model output into a JSON value. Handles:
 * - Clean JSON
 * - Markdown-wrapped code blocks (```json ... ```)
 * - Mixed text with embedded JSON
 *
 * Returns undefined on parse failure.
 */
export function parseJsonValue(raw: string): unknown {
  const text = stripCodeFences(raw);

  // Try direct parse
  try {
    return JSON.parse(text);
  } catch {
    // continue
  }

  // Try with sanitized newlines
  try {
    return JSON.parse(sanitizeJsonText(text));
  } catch {
    // continue
  }

  // Try extracting the outermost object from mixed text
  const match = text.match(/\{[\s\S]*\}/);
  if (match) {
    try {
      return JSON.parse(sanitizeJsonText(match[0]));
    } catch {
      // fall through
    }
  }

  return undefined;
}

/**
 * Strict stage of model-output parsing: decode, then validate against `schema`.
 */
export function parseModelJson<S extends z.ZodTypeAny>(
  raw: string,
  schema: S
): ParseOutcome<z.output<S>> {
  const value = parseJsonValue(raw);
  if (value === undefined) {
    return { ok: false, reason: "Response is not valid JSON" };
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    return { ok: false, reason: issues.join("; ") };
  }
  return { ok: true, value: result.data };
}
