import { describe, expect, it } from "vitest";
import {
  ACTION_SYNONYMS,
  ACTION_TYPES,
  actionFromLabel,
  describeAction,
  normalizeLabel,
  resolveActionType,
  resolveKeyCode,
  toActionRecord,
} from "./actions.js";

describe("normalizeLabel", () => {
  it("lower-cases, trims and joins words with underscores", () => {
    expect(normalizeLabel("  Go Back ")).toBe("go_back");
    expect(normalizeLabel("TASK COMPLETE")).toBe("task_complete");
  });
});

describe("resolveActionType", () => {
  it("maps every kind to itself", () => {
    for (const type of ACTION_TYPES) {
      expect(ACTION_SYNONYMS.get(type)).toBe(type);
    }
  });

  it.each([
    ["back", "go_back"],
    ["Home", "go_home"],
    ["done", "task_complete"],
    ["complete", "task_complete"],
    ["type", "input_text"],
    ["keypress", "press_key"],
    ["launch app", "open_app"],
    ["failed", "task_failed"],
  ])("resolves %s to %s", (label, type) => {
    expect(resolveActionType(label)).toEqual({ ok: true, type });
  });

  it("returns the normalized label for unknown input", () => {
    expect(resolveActionType("Frobnicate Now")).toEqual({ ok: false, label: "frobnicate_now" });
  });
});

describe("actionFromLabel", () => {
  it("turns an unknown label into a parameterless wait", () => {
    const action = actionFromLabel("frobnicate", { x: 10 }, "no idea");

    expect(action).toEqual({ type: "wait", reasoning: "no idea", fallback: "unrecognized_label" });
    expect(toActionRecord(action).params).toEqual({});
  });

  it("yields the same variant for the same label", () => {
    expect(actionFromLabel("Back").type).toBe(actionFromLabel("Back").type);
    expect(actionFromLabel("frobnicate").type).toBe(actionFromLabel("frobnicate").type);
  });

  it("builds a tap from numeric strings", () => {
    expect(actionFromLabel("tap", { x: "540", y: 1200 }, "tap search")).toEqual({
      type: "tap",
      x: 540,
      y: 1200,
      reasoning: "tap search",
    });
  });

  it("defaults missing coordinates to zero", () => {
    expect(actionFromLabel("tap", { y: 5 })).toEqual({ type: "tap", x: 0, y: 5, reasoning: "" });
  });

  it("accepts alternate swipe keys and the default duration", () => {
    expect(actionFromLabel("swipe", { x1: 100, y1: 1500, x2: 100, y2: 400 })).toEqual({
      type: "swipe",
      startX: 100,
      startY: 1500,
      endX: 100,
      endY: 400,
      durationMs: 300,
      reasoning: "",
    });
  });

  it("gives drags the longer default duration", () => {
    const action = actionFromLabel("drag", { start_x: 1, start_y: 2, end_x: 3, end_y: 4 });

    expect(action).toMatchObject({ type: "drag", startX: 1, endY: 4, durationMs: 1000 });
  });

  it("reads the key from keycode", () => {
    expect(actionFromLabel("press_key", { keycode: "enter" })).toEqual({
      type: "press_key",
      key: "enter",
      reasoning: "",
    });
  });

  it("reads wait seconds from duration and leaves them unset otherwise", () => {
    expect(actionFromLabel("wait", { duration: 3 })).toEqual({ type: "wait", seconds: 3, reasoning: "" });
    expect(actionFromLabel("wait")).toEqual({ type: "wait", reasoning: "" });
  });

  it("keeps only the scroll coordinates that were given", () => {
    expect(actionFromLabel("scroll_down", { start_y: 800 })).toEqual({
      type: "scroll_down",
      startY: 800,
      reasoning: "",
    });
  });

  it("reads the package from app", () => {
    expect(actionFromLabel("launch_app", { app: "com.android.settings" })).toEqual({
      type: "open_app",
      packageName: "com.android.settings",
      reasoning: "",
    });
  });
});

describe("resolveKeyCode", () => {
  it("maps known names and passes others through", () => {
    expect(resolveKeyCode("back")).toBe("KEYCODE_BACK");
    expect(resolveKeyCode("Volume Up")).toBe("KEYCODE_VOLUME_UP");
    expect(resolveKeyCode("delete")).toBe("KEYCODE_DEL");
    expect(resolveKeyCode("KEYCODE_CAMERA")).toBe("KEYCODE_CAMERA");
  });
});

describe("toActionRecord", () => {
  it("flattens variant fields into params", () => {
    expect(toActionRecord(actionFromLabel("tap", { x: 540, y: 1200 }, "open search"))).toEqual({
      type: "tap",
      params: { x: 540, y: 1200 },
      reasoning: "open search",
    });
  });

  it("carries the fallback marker", () => {
    expect(toActionRecord(actionFromLabel("nonsense"))).toEqual({
      type: "wait",
      params: {},
      reasoning: "",
      fallback: "unrecognized_label",
    });
  });
});

describe("describeAction", () => {
  it("renders coordinates and text", () => {
    expect(describeAction(actionFromLabel("tap", { x: 1, y: 2 }))).toBe("tap (1, 2)");
    expect(describeAction(actionFromLabel("type", { text: "hello" }))).toBe('input_text "hello"');
    expect(describeAction(actionFromLabel("back"))).toBe("go_back");
  });
});
