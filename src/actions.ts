/**
 * Action vocabulary for the VLA agent.
 *
 * Every action kind carries its own typed fields. Free-form planner output
 * is turned into one of these through a synonym table and loose parameter
 * coercion; nothing in this module touches the device.
 *
 * Supported actions:
 *   tap, long_press, swipe, drag, input_text, press_key, wait,
 *   scroll_up, scroll_down, go_back, go_home, open_app,
 *   task_complete, task_failed
 */

import {
  KEYCODE_BACK,
  KEYCODE_HOME,
  KEYCODE_ENTER,
  KEYCODE_DEL,
  KEYCODE_TAB,
  KEYCODE_MENU,
  KEYCODE_SEARCH,
  KEYCODE_POWER,
  KEYCODE_VOLUME_UP,
  KEYCODE_VOLUME_DOWN,
  SWIPE_DURATION_MS,
  DRAG_DURATION_MS,
  LONG_PRESS_DURATION_MS,
} from "./constants.js";

export const ACTION_TYPES = [
  "tap",
  "long_press",
  "swipe",
  "drag",
  "input_text",
  "press_key",
  "wait",
  "scroll_up",
  "scroll_down",
  "go_back",
  "go_home",
  "open_app",
  "task_complete",
  "task_failed",
] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

/**
 * Marks an action that was not produced from a well-formed planner response.
 */
export type ActionFallback = "unrecognized_label" | "unparsed_response" | "model_timeout";

// ===========================================
// Action variants
// ===========================================

interface ActionBase {
  reasoning: string;
  fallback?: ActionFallback;
}

export interface TapAction extends ActionBase {
  type: "tap";
  x: number;
  y: number;
}

export interface LongPressAction extends ActionBase {
  type: "long_press";
  x: number;
  y: number;
  durationMs: number;
}

export interface SwipeAction extends ActionBase {
  type: "swipe" | "drag";
  startX: number;
  startY: number;
  endX: number;
  endY: number;
  durationMs: number;
}

export interface InputTextAction extends ActionBase {
  type: "input_text";
  text: string;
}

export interface PressKeyAction extends ActionBase {
  type: "press_key";
  key: string;
}

export interface WaitAction extends ActionBase {
  type: "wait";
  seconds?: number;
}

/** Scroll coordinates left unset fall back to the executor's screen defaults. */
export interface ScrollAction extends ActionBase {
  type: "scroll_up" | "scroll_down";
  x?: number;
  startY?: number;
  endY?: number;
}

export interface OpenAppAction extends ActionBase {
  type: "open_app";
  packageName: string;
}

export interface SimpleAction extends ActionBase {
  type: "go_back" | "go_home" | "task_complete" | "task_failed";
}

export type Action =
  | TapAction
  | LongPressAction
  | SwipeAction
  | InputTextAction
  | PressKeyAction
  | WaitAction
  | ScrollAction
  | OpenAppAction
  | SimpleAction;

/** The plain form of an action stored in step records and logs. */
export interface ActionRecord {
  type: ActionType;
  params: Record<string, string | number>;
  reasoning: string;
  fallback?: ActionFallback;
}

// ===========================================
// Label resolution
// ===========================================

const EXTRA_SYNONYMS: Record<string, ActionType> = {
  input: "input_text",
  type: "input_text",
  keypress: "press_key",
  back: "go_back",
  home: "go_home",
  launch_app: "open_app",
  done: "task_complete",
  complete: "task_complete",
  fail: "task_failed",
  failed: "task_failed",
};

/** Normalized label → action kind. Every kind maps from its own name. */
export const ACTION_SYNONYMS: ReadonlyMap<string, ActionType> = new Map<string, ActionType>([
  ...ACTION_TYPES.map((type) => [type, type] as const),
  ...Object.entries(EXTRA_SYNONYMS),
]);

export function normalizeLabel(label: string): string {
  return label.trim().toLowerCase().replace(/\s+/g, "_");
}

export type ResolvedActionType = { ok: true; type: ActionType } | { ok: false; label: string };

export function resolveActionType(label: string): ResolvedActionType {
  const normalized = normalizeLabel(label);
  const type = ACTION_SYNONYMS.get(normalized);
  return type ? { ok: true, type } : { ok: false, label: normalized };
}

// ===========================================
// Key codes
// ===========================================

export const KEY_CODES: Readonly<Record<string, string>> = {
  back: KEYCODE_BACK,
  home: KEYCODE_HOME,
  enter: KEYCODE_ENTER,
  delete: KEYCODE_DEL,
  tab: KEYCODE_TAB,
  menu: KEYCODE_MENU,
  search: KEYCODE_SEARCH,
  power: KEYCODE_POWER,
  volume_up: KEYCODE_VOLUME_UP,
  volume_down: KEYCODE_VOLUME_DOWN,
};

/**
 * Maps a key name to its Android key code. Unknown names pass through,
 * so raw codes such as "KEYCODE_CAMERA" or "27" still work.
 */
export function resolveKeyCode(name: string): string {
  return KEY_CODES[normalizeLabel(name)] ?? name;
}

// ===========================================
// Loose parameter coercion
// ===========================================

export type LooseParams = Record<string, unknown>;

function toNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return undefined;
}

/** First key (in order) whose value reads as a number. */
function optionalNumber(params: LooseParams, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const value = toNumber(params[key]);
    if (value !== undefined) return value;
  }
  return undefined;
}

function numberParam(params: LooseParams, fallback: number, ...keys: string[]): number {
  return optionalNumber(params, ...keys) ?? fallback;
}

function stringParam(params: LooseParams, ...keys: string[]): string {
  for (const key of keys) {
    const value = params[key];
    if (typeof value === "string") return value;
    if (typeof value === "number") return String(value);
  }
  return "";
}

function buildAction(type: ActionType, params: LooseParams, reasoning: string): Action {
  switch (type) {
    case "tap":
      return {
        type,
        x: numberParam(params, 0, "x"),
        y: numberParam(params, 0, "y"),
        reasoning,
      };
    case "long_press":
      return {
        type,
        x: numberParam(params, 0, "x"),
        y: numberParam(params, 0, "y"),
        durationMs: numberParam(params, LONG_PRESS_DURATION_MS, "duration_ms", "durationMs"),
        reasoning,
      };
    case "swipe":
    case "drag":
      return {
        type,
        startX: numberParam(params, 0, "start_x", "x1", "startX"),
        startY: numberParam(params, 0, "start_y", "y1", "startY"),
        endX: numberParam(params, 0, "end_x", "x2", "endX"),
        endY: numberParam(params, 0, "end_y", "y2", "endY"),
        durationMs: numberParam(
          params,
          type === "drag" ? DRAG_DURATION_MS : SWIPE_DURATION_MS,
          "duration_ms",
          "durationMs"
        ),
        reasoning,
      };
    case "input_text":
      return { type, text: stringParam(params, "text"), reasoning };
    case "press_key":
      return { type, key: stringParam(params, "key", "keycode"), reasoning };
    case "wait": {
      const seconds = optionalNumber(params, "seconds", "duration");
      return seconds === undefined ? { type, reasoning } : { type, seconds, reasoning };
    }
    case "scroll_up":
    case "scroll_down": {
      const action: ScrollAction = { type, reasoning };
      const x = optionalNumber(params, "x");
      const startY = optionalNumber(params, "start_y", "y1", "startY");
      const endY = optionalNumber(params, "end_y", "y2", "endY");
      if (x !== undefined) action.x = x;
      if (startY !== undefined) action.startY = startY;
      if (endY !== undefined) action.endY = endY;
      return action;
    }
    case "open_app":
      return {
        type,
        packageName: stringParam(params, "package", "app", "package_name", "packageName"),
        reasoning,
      };
    case "go_back":
    case "go_home":
    case "task_complete":
    case "task_failed":
      return { type, reasoning };
  }
}

/**
 * Builds an action from a free-form label and loosely typed parameters.
 * An unrecognized label becomes a parameterless wait marked
 * `unrecognized_label`, so a malformed plan stalls one step instead of
 * ending the run.
 */
export function actionFromLabel(label: string, params: LooseParams = {}, reasoning = ""): Action {
  const resolved = resolveActionType(label);
  if (!resolved.ok) {
    return { type: "wait", reasoning, fallback: "unrecognized_label" };
  }
  return buildAction(resolved.type, params, reasoning);
}

export function isTerminalAction(action: Action): boolean {
  return action.type === "task_complete" || action.type === "task_failed";
}

export function toActionRecord(action: Action): ActionRecord {
  const { type, reasoning, fallback, ...fields } = action;
  const params: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (typeof value === "number" || typeof value === "string") {
      params[key] = value;
    }
  }
  const record: ActionRecord = { type, params, reasoning };
  if (fallback) record.fallback = fallback;
  return record;
}

/** Short human-readable form, e.g. `tap (540, 1200)`. */
export function describeAction(action: Action): string {
  switch (action.type) {
    case "tap":
      return `tap (${action.x}, ${action.y})`;
    case "long_press":
      return `long_press (${action.x}, ${action.y}) ${action.durationMs}ms`;
    case "swipe":
    case "drag":
      return `${action.type} (${action.startX}, ${action.startY}) -> (${action.endX}, ${action.endY})`;
    case "input_text":
      return `input_text "${action.text}"`;
    case "press_key":
      return `press_key ${action.key}`;
    case "wait":
      return action.seconds === undefined ? "wait" : `wait ${action.seconds}s`;
    case "open_app":
      return `open_app ${action.packageName}`;
    default:
      return action.type;
  }
}
