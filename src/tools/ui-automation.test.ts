import { describe, expect, it } from "vitest";
import { createFakeAdb, ONE_DEVICE } from "../test-utils.js";
import { drag, escapeInputText, getUiHierarchy, inputText, pressKey, tap } from "./ui-automation.js";

const DUMP = `<?xml version='1.0' encoding='UTF-8' standalone='yes' ?>
<hierarchy rotation="0">
  <node index="0" text="OK" resource-id="android:id/button1" class="android.widget.Button" content-desc="" clickable="true" enabled="true" scrollable="false" long-clickable="false" bounds="[600,1400][900,1500]" />
</hierarchy>`;

describe("tap", () => {
  it("taps on the first online device", async () => {
    const { adb, calls } = createFakeAdb([ONE_DEVICE]);

    const envelope = JSON.parse(await tap(adb, { x: 540, y: 1200 }));

    expect(envelope).toEqual({
      success: true,
      action: "tap",
      x: 540,
      y: 1200,
      device: "emulator-5554",
    });
    expect(calls[1]).toEqual(["-s", "emulator-5554", "shell", "input", "tap", "540", "1200"]);
  });

  it("fails without a device", async () => {
    const { adb } = createFakeAdb([["devices", { stdout: "List of devices attached\n" }]]);

    expect(JSON.parse(await tap(adb, { x: 1, y: 2 }))).toEqual({
      success: false,
      error: "No devices connected",
    });
  });

  it("reports adb errors", async () => {
    const { adb } = createFakeAdb([[/^shell input tap/, { exitCode: 1, stderr: "error: closed" }]]);

    expect(JSON.parse(await tap(adb, { x: 1, y: 2, deviceSerial: "abc" }))).toEqual({
      success: false,
      error: "Tap failed: error: closed",
    });
  });
});

describe("inputText", () => {
  it("encodes spaces and escapes shell metacharacters", () => {
    expect(escapeInputText("Hello world & co's")).toBe("Hello%sworld%s\\&%sco\\'s");
    expect(escapeInputText("a(b)<c>")).toBe("a\\(b\\)\\<c\\>");
  });

  it("sends the escaped text and echoes the original", async () => {
    const { adb, commands } = createFakeAdb();

    const envelope = JSON.parse(await inputText(adb, { text: "pizza near me", deviceSerial: "abc" }));

    expect(commands()).toEqual(["shell input text pizza%snear%sme"]);
    expect(envelope).toEqual({
      success: true,
      action: "input_text",
      text: "pizza near me",
      device: "abc",
    });
  });
});

describe("drag", () => {
  it("falls back to a swipe when draganddrop is unsupported", async () => {
    const { adb, commands } = createFakeAdb([
      [/^shell input draganddrop/, { exitCode: 255, stderr: "Error: Unknown command: draganddrop" }],
    ]);

    const envelope = JSON.parse(
      await drag(adb, {
        startX: 100,
        startY: 200,
        endX: 300,
        endY: 400,
        durationMs: 1000,
        deviceSerial: "abc",
      })
    );

    expect(commands()).toEqual([
      "shell input draganddrop 100 200 300 400 1000",
      "shell input swipe 100 200 300 400 1000",
    ]);
    expect(envelope).toEqual({
      success: true,
      action: "drag",
      start: { x: 100, y: 200 },
      end: { x: 300, y: 400 },
      durationMs: 1000,
      device: "abc",
    });
  });
});

describe("pressKey", () => {
  it("adds --longpress when asked", async () => {
    const { adb, commands } = createFakeAdb();

    await pressKey(adb, { keycode: "KEYCODE_POWER", longpress: true, deviceSerial: "abc" });

    expect(commands()).toEqual(["shell input keyevent --longpress KEYCODE_POWER"]);
  });
});

describe("getUiHierarchy", () => {
  it("dumps, reads, cleans up and parses the hierarchy", async () => {
    const { adb, commands } = createFakeAdb([["shell cat /sdcard/ui_dump.xml", { stdout: DUMP }]]);

    const envelope = JSON.parse(await getUiHierarchy(adb, { deviceSerial: "abc" }));

    expect(commands()).toEqual([
      "shell uiautomator dump /sdcard/ui_dump.xml",
      "shell cat /sdcard/ui_dump.xml",
      "shell rm /sdcard/ui_dump.xml",
    ]);
    expect(envelope.success).toBe(true);
    expect(envelope.elementCount).toBe(1);
    expect(envelope.elements[0]).toEqual({
      id: "android:id/button1",
      text: "OK",
      type: "Button",
      center: [750, 1450],
      clickable: true,
      editable: false,
      enabled: true,
    });
  });

  it("fails when the dump fails", async () => {
    const { adb } = createFakeAdb([
      [/^shell uiautomator/, { exitCode: 1, stderr: "ERROR: null root node returned by UiTestAutomationBridge." }],
    ]);

    expect(JSON.parse(await getUiHierarchy(adb, { deviceSerial: "abc" }))).toEqual({
      success: false,
      error: "UI dump failed: ERROR: null root node returned by UiTestAutomationBridge.",
    });
  });
});
