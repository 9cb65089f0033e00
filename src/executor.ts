/**
 * Executor: performs one Action through the device tools and normalizes
 * the outcome into an ActionResult.
 */

import { setTimeout as sleep } from "timers/promises";
import { resolveKeyCode, type Action } from "./actions.js";
import {
  KEYCODE_BACK,
  KEYCODE_HOME,
  SCREEN_CENTER_X,
  SCROLL_DOWN_END_Y,
  SCROLL_DOWN_START_Y,
  SCROLL_DURATION_MS,
  SCROLL_UP_END_Y,
  SCROLL_UP_START_Y,
} from "./constants.js";
import { errorMessage } from "./errors.js";
import type { DeviceToolset } from "./tools/registry.js";

export interface ActionResult {
  success: boolean;
  action: Action;
  message: string;
  error?: string;
  durationMs: number;
}

export interface ToolOutcome {
  success: boolean;
  message: string;
}

/**
 * Reads a tool envelope. A JSON value counts as success only when its
 * `success` field is truthy; output that is not JSON at all counts as
 * success, with the raw text as the message.
 */
export function parseToolResult(output: string): ToolOutcome {
  let data: unknown;
  try {
    data = JSON.parse(output);
  } catch {
    return { success: true, message: output };
  }

  if (typeof data !== "object" || data === null) {
    return { success: false, message: "OK" };
  }
  if ("success" in data && Boolean(data.success)) {
    return { success: true, message: "OK" };
  }
  const error = "error" in data && typeof data.error === "string" ? data.error : "OK";
  return { success: false, message: error };
}

export interface ExecutorOptions {
  tools: DeviceToolset;
  deviceSerial?: string;
  /** Injected in tests so waits return at once. */
  sleep?: (ms: number) => Promise<unknown>;
}

export class Executor {
  private readonly tools: DeviceToolset;
  private readonly deviceSerial?: string;
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(options: ExecutorOptions) {
    this.tools = options.tools;
    this.deviceSerial = options.deviceSerial;
    this.sleep = options.sleep ?? ((ms) => sleep(ms));
  }

  /** Never throws; a failure inside dispatch becomes a failed result. */
  async execute(action: Action): Promise<ActionResult> {
    const start = performance.now();
    try {
      const outcome = await this.dispatch(action);
      const result: ActionResult = {
        success: outcome.success,
        action,
        message: outcome.message,
        durationMs: Math.round(performance.now() - start),
      };
      if (!outcome.success) result.error = outcome.message;
      return result;
    } catch (err) {
      return {
        success: false,
        action,
        message: "Execution failed",
        error: errorMessage(err),
        durationMs: Math.round(performance.now() - start),
      };
    }
  }

  private async dispatch(action: Action): Promise<ToolOutcome> {
    const deviceSerial = this.deviceSerial;

    switch (action.type) {
      case "tap":
        return parseToolResult(await this.tools.tap({ x: action.x, y: action.y, deviceSerial }));

      case "long_press":
        return parseToolResult(
          await this.tools.longPress({ x: action.x, y: action.y, durationMs: action.durationMs, deviceSerial })
        );

      case "swipe":
      case "drag": {
        const gesture = {
          startX: action.startX,
          startY: action.startY,
          endX: action.endX,
          endY: action.endY,
          durationMs: action.durationMs,
          deviceSerial,
        };
        const output = action.type === "drag" ? await this.tools.drag(gesture) : await this.tools.swipe(gesture);
        return parseToolResult(output);
      }

      case "input_text":
        return parseToolResult(await this.tools.inputText({ text: action.text, deviceSerial }));

      case "press_key":
        return parseToolResult(
          await this.tools.pressKey({ keycode: resolveKeyCode(action.key), longpress: false, deviceSerial })
        );

      case "wait": {
        const seconds = action.seconds ?? 1;
        await this.sleep(seconds * 1000);
        return { success: true, message: `Waited ${seconds} seconds` };
      }

      case "scroll_up":
      case "scroll_down": {
        const up = action.type === "scroll_up";
        const x = action.x ?? SCREEN_CENTER_X;
        return parseToolResult(
          await this.tools.swipe({
            startX: x,
            startY: action.startY ?? (up ? SCROLL_UP_START_Y : SCROLL_DOWN_START_Y),
            endX: x,
            endY: action.endY ?? (up ? SCROLL_UP_END_Y : SCROLL_DOWN_END_Y),
            durationMs: SCROLL_DURATION_MS,
            deviceSerial,
          })
        );
      }

      case "go_back":
        return parseToolResult(await this.tools.pressKey({ keycode: KEYCODE_BACK, longpress: false, deviceSerial }));

      case "go_home":
        return parseToolResult(await this.tools.pressKey({ keycode: KEYCODE_HOME, longpress: false, deviceSerial }));

      case "open_app":
        return parseToolResult(await this.tools.startApp({ packageName: action.packageName, deviceSerial }));

      // Terminal actions are settled by the agent loop
      case "task_complete":
        return { success: true, message: "Task marked as complete" };
      case "task_failed":
        return { success: true, message: "Task marked as failed" };
    }
  }
}
