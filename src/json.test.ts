import { describe, expect, it } from "vitest";
import { z } from "zod";
import { parseJsonValue, parseModelJson, stripCodeFences } from "./json.js";

describe("stripCodeFences", () => {
  it("extracts a json-tagged block", () => {
    expect(stripCodeFences('Here you go:\n```json\n{"a": 1}\n```\nDone.')).toBe('{"a": 1}');
  });

  it("extracts an untagged block", () => {
    expect(stripCodeFences('```\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it("handles an unterminated fence", () => {
    expect(stripCodeFences('```json\n{"a": 1}')).toBe('{"a": 1}');
  });

  it("leaves unfenced text alone apart from trimming", () => {
    expect(stripCodeFences('  {"a": 1}\n')).toBe('{"a": 1}');
  });
});

describe("parseJsonValue", () => {
  it("parses fenced and unfenced JSON identically", () => {
    const plain = '{"action": "tap", "params": {"x": 540, "y": 1200}}';
    const fenced = "```json\n" + plain + "\n```";

    expect(parseJsonValue(fenced)).toEqual(parseJsonValue(plain));
    expect(parseJsonValue(plain)).toEqual({ action: "tap", params: { x: 540, y: 1200 } });
  });

  it("tolerates raw newlines inside strings", () => {
    expect(parseJsonValue('{"reasoning": "line one\nline two"}')).toEqual({
      reasoning: "line one line two",
    });
  });

  it("pulls an object out of surrounding prose", () => {
    expect(parseJsonValue('I will tap the button. {"action": "tap"} Hope that helps.')).toEqual({
      action: "tap",
    });
  });

  it("returns undefined for text without JSON", () => {
    expect(parseJsonValue("The task is complete.")).toBeUndefined();
  });
});

describe("parseModelJson", () => {
  const schema = z.object({ action: z.string(), confidence: z.number().default(0) });

  it("applies schema defaults", () => {
    expect(parseModelJson('{"action": "wait"}', schema)).toEqual({
      ok: true,
      value: { action: "wait", confidence: 0 },
    });
  });

  it("reports a schema violation with its path", () => {
    expect(parseModelJson('{"action": 3}', schema)).toEqual({
      ok: false,
      reason: "action: Expected string, received number",
    });
  });

  it("reports undecodable text", () => {
    expect(parseModelJson("not json", schema)).toEqual({
      ok: false,
      reason: "Response is not valid JSON",
    });
  });
});
