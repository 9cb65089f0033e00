import { describe, expect, it, vi } from "vitest";
import type { Action } from "./actions.js";
import { Executor, parseToolResult } from "./executor.js";
import { createDeviceToolset } from "./tools/registry.js";
import { createFakeAdb, type AdbRule } from "./test-utils.js";

function executor(rules: AdbRule[] = []) {
  const fake = createFakeAdb(rules);
  const sleep = vi.fn(async (_ms: number) => undefined);
  const exec = new Executor({ tools: createDeviceToolset(fake.adb), deviceSerial: "abc", sleep });
  return { exec, sleep, ...fake };
}

describe("parseToolResult", () => {
  it("reads success envelopes", () => {
    expect(parseToolResult('{"success": true, "device": "abc"}')).toEqual({ success: true, message: "OK" });
  });

  it("takes the error text from failures", () => {
    expect(parseToolResult('{"success": false, "error": "No devices connected"}')).toEqual({
      success: false,
      message: "No devices connected",
    });
  });

  it("counts JSON without a success field as a failure", () => {
    expect(parseToolResult('{"error": "device offline"}')).toEqual({ success: false, message: "device offline" });
    expect(parseToolResult('{"device": "abc"}')).toEqual({ success: false, message: "OK" });
    expect(parseToolResult("42")).toEqual({ success: false, message: "OK" });
  });

  it("treats plain text as success", () => {
    expect(parseToolResult("Events injected: 1")).toEqual({ success: true, message: "Events injected: 1" });
  });
});

describe("Executor.execute", () => {
  it("taps at the planned coordinates", async () => {
    const { exec, calls } = executor();
    const action: Action = { type: "tap", x: 540, y: 1200, reasoning: "" };

    const result = await exec.execute(action);

    expect(calls).toEqual([["-s", "abc", "shell", "input", "tap", "540", "1200"]]);
    expect(result).toMatchObject({ success: true, message: "OK", action });
    expect(result.error).toBeUndefined();
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("reports device failures without throwing", async () => {
    const { exec } = executor([[/^shell input tap/, { exitCode: 1, stderr: "device offline" }]]);

    const result = await exec.execute({ type: "tap", x: 1, y: 2, reasoning: "" });

    expect(result).toMatchObject({ success: false, message: "Tap failed: device offline", error: "Tap failed: device offline" });
  });

  it("resolves key names", async () => {
    const { exec, commands } = executor();

    await exec.execute({ type: "press_key", key: "enter", reasoning: "" });

    expect(commands()).toEqual(["shell input keyevent KEYCODE_ENTER"]);
  });

  it("scrolls with default coordinates", async () => {
    const { exec, commands } = executor();

    await exec.execute({ type: "scroll_up", reasoning: "" });
    await exec.execute({ type: "scroll_down", x: 200, reasoning: "" });

    expect(commands()).toEqual([
      "shell input swipe 540 1500 540 500 300",
      "shell input swipe 200 500 200 1500 300",
    ]);
  });

  it("maps back and home to key presses", async () => {
    const { exec, commands } = executor();

    await exec.execute({ type: "go_back", reasoning: "" });
    await exec.execute({ type: "go_home", reasoning: "" });

    expect(commands()).toEqual(["shell input keyevent KEYCODE_BACK", "shell input keyevent KEYCODE_HOME"]);
  });

  it("drags through draganddrop", async () => {
    const { exec, commands } = executor();

    await exec.execute({ type: "drag", startX: 10, startY: 20, endX: 30, endY: 40, durationMs: 1000, reasoning: "" });

    expect(commands()).toEqual(["shell input draganddrop 10 20 30 40 1000"]);
  });

  it("launches apps", async () => {
    const { exec, commands } = executor([
      [/^shell monkey/, { stdout: "Events injected: 1" }],
    ]);

    const result = await exec.execute({ type: "open_app", packageName: "com.example.notes", reasoning: "" });

    expect(result.success).toBe(true);
    expect(commands()).toEqual(["shell monkey -p com.example.notes -c android.intent.category.LAUNCHER 1"]);
  });

  it("waits without touching the device", async () => {
    const { exec, calls, sleep } = executor();

    const result = await exec.execute({ type: "wait", seconds: 2, reasoning: "" });
    await exec.execute({ type: "wait", reasoning: "" });

    expect(calls).toHaveLength(0);
    expect(sleep.mock.calls).toEqual([[2000], [1000]]);
    expect(result.message).toBe("Waited 2 seconds");
  });

  it("treats terminal actions as no-ops", async () => {
    const { exec, calls } = executor();

    const done = await exec.execute({ type: "task_complete", reasoning: "" });
    const failed = await exec.execute({ type: "task_failed", reasoning: "" });

    expect(calls).toHaveLength(0);
    expect(done).toMatchObject({ success: true, message: "Task marked as complete" });
    expect(failed).toMatchObject({ success: true, message: "Task marked as failed" });
  });

  it("turns exceptions into a failed result", async () => {
    const { adb } = createFakeAdb();
    const tools = { ...createDeviceToolset(adb), tap: vi.fn().mockRejectedValue(new Error("socket closed")) };
    const exec = new Executor({ tools });

    const result = await exec.execute({ type: "tap", x: 1, y: 1, reasoning: "" });

    expect(result).toMatchObject({ success: false, message: "Execution failed", error: "socket closed" });
  });
});
