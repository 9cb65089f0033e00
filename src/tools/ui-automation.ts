/**
 * UI automation tools: taps, gestures, text entry, key presses
 * and the accessibility hierarchy.
 */

import { z } from "zod";
import type { AdbClient } from "../adb.js";
import {
  DEVICE_DUMP_PATH,
  DRAG_DURATION_MS,
  LONG_PRESS_DURATION_MS,
  SWIPE_DURATION_MS,
} from "../constants.js";
import { deviceArgs, failure, success, withDevice } from "./envelope.js";
import { getInteractiveElements } from "./hierarchy.js";

// ===========================================
// Argument schemas
// ===========================================

export const tapArgs = z.object({
  x: z.number(),
  y: z.number(),
  ...deviceArgs,
});

export const longPressArgs = z.object({
  x: z.number(),
  y: z.number(),
  durationMs: z.number().int().positive().default(LONG_PRESS_DURATION_MS),
  ...deviceArgs,
});

const gesture = {
  startX: z.number(),
  startY: z.number(),
  endX: z.number(),
  endY: z.number(),
};

export const swipeArgs = z.object({
  ...gesture,
  durationMs: z.number().int().positive().default(SWIPE_DURATION_MS),
  ...deviceArgs,
});

export const dragArgs = z.object({
  ...gesture,
  durationMs: z.number().int().positive().default(DRAG_DURATION_MS),
  ...deviceArgs,
});

export const inputTextArgs = z.object({
  text: z.string(),
  ...deviceArgs,
});

export const pressKeyArgs = z.object({
  keycode: z.string().min(1),
  longpress: z.boolean().default(false),
  ...deviceArgs,
});

export const uiHierarchyArgs = z.object({ ...deviceArgs });

export type TapArgs = z.infer<typeof tapArgs>;
export type LongPressArgs = z.infer<typeof longPressArgs>;
export type SwipeArgs = z.infer<typeof swipeArgs>;
export type InputTextArgs = z.infer<typeof inputTextArgs>;
export type PressKeyArgs = z.infer<typeof pressKeyArgs>;
export type UiHierarchyArgs = z.infer<typeof uiHierarchyArgs>;

// ===========================================
// Helpers
// ===========================================

const px = (value: number): string => String(Math.round(value));

const SHELL_SPECIAL_CHARS = ["'", '"', "\\", "&", "|", ";", "$", "`", "(", ")", "<", ">"];

/**
 * Encodes text for `input text`: spaces become %s and shell
 * metacharacters are backslash-escaped.
 */
export function escapeInputText(text: string): string {
  let escaped = "";
  for (const char of text) {
    if (char === " ") escaped += "%s";
    else if (SHELL_SPECIAL_CHARS.includes(char)) escaped += `\\${char}`;
    else escaped += char;
  }
  return escaped;
}

// ===========================================
// Tools
// ===========================================

export function tap(adb: AdbClient, args: TapArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const result = await device.run(["shell", "input", "tap", px(args.x), px(args.y)]);
    if (!result.success) {
      return failure(`Tap failed: ${result.stderr}`);
    }
    return success({ action: "tap", x: args.x, y: args.y, device: serial });
  });
}

/** A long press is a swipe that starts and ends on the same point. */
export function longPress(adb: AdbClient, args: LongPressArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const { x, y, durationMs } = args;
    const result = await device.run([
      "shell", "input", "swipe", px(x), px(y), px(x), px(y), String(durationMs),
    ]);
    if (!result.success) {
      return failure(`Long press failed: ${result.stderr}`);
    }
    return success({ action: "long_press", x, y, durationMs, device: serial });
  });
}

export function swipe(adb: AdbClient, args: SwipeArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const result = await device.run([
      "shell", "input", "swipe",
      px(args.startX), px(args.startY), px(args.endX), px(args.endY), String(args.durationMs),
    ]);
    if (!result.success) {
      return failure(`Swipe failed: ${result.stderr}`);
    }
    return success({
      action: "swipe",
      start: { x: args.startX, y: args.startY },
      end: { x: args.endX, y: args.endY },
      durationMs: args.durationMs,
      device: serial,
    });
  });
}

/**
 * Drag-and-drop. Falls back to a slow swipe on devices whose `input`
 * has no draganddrop command.
 */
export function drag(adb: AdbClient, args: SwipeArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const points = [px(args.startX), px(args.startY), px(args.endX), px(args.endY)];
    let result = await device.run(["shell", "input", "draganddrop", ...points, String(args.durationMs)]);
    if (!result.success) {
      result = await device.run(["shell", "input", "swipe", ...points, String(args.durationMs)]);
    }
    if (!result.success) {
      return failure(`Drag failed: ${result.stderr}`);
    }
    return success({
      action: "drag",
      start: { x: args.startX, y: args.startY },
      end: { x: args.endX, y: args.endY },
      durationMs: args.durationMs,
      device: serial,
    });
  });
}

export function inputText(adb: AdbClient, args: InputTextArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const result = await device.run(["shell", "input", "text", escapeInputText(args.text)]);
    if (!result.success) {
      return failure(`Input text failed: ${result.stderr}`);
    }
    return success({ action: "input_text", text: args.text, device: serial });
  });
}

/** Accepts key names ("KEYCODE_HOME") or numbers ("3"). */
export function pressKey(adb: AdbClient, args: PressKeyArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const command = ["shell", "input", "keyevent"];
    if (args.longpress) command.push("--longpress");
    command.push(args.keycode);

    const result = await device.run(command);
    if (!result.success) {
      return failure(`Key press failed: ${result.stderr}`);
    }
    return success({
      action: "press_key",
      keycode: args.keycode,
      longpress: args.longpress,
      device: serial,
    });
  });
}

export function getUiHierarchy(adb: AdbClient, args: UiHierarchyArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const dump = await device.run(["shell", "uiautomator", "dump", DEVICE_DUMP_PATH]);
    if (!dump.success) {
      return failure(`UI dump failed: ${dump.stderr}`);
    }

    const read = await device.run(["shell", "cat", DEVICE_DUMP_PATH]);
    if (!read.success) {
      return failure(`Failed to read UI dump: ${read.stderr}`);
    }

    await device.run(["shell", "rm", DEVICE_DUMP_PATH]);

    const elements = getInteractiveElements(read.stdout);
    return success({
      hierarchy: read.stdout,
      elements,
      elementCount: elements.length,
      device: serial,
    });
  });
}
