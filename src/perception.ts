/**
 * Perception: turns a device screenshot into a structured UIState by
 * asking the vision model to describe it.
 */

import { mkdirSync, readFileSync } from "fs";
import { join } from "path";
import sharp from "sharp";
import { z } from "zod";
import type { AdbClient } from "./adb.js";
import { DEVICE_SCREENSHOT_PATH, UNPARSED_DESCRIPTION_LIMIT } from "./constants.js";
import { errorMessage } from "./errors.js";
import { parseJsonValue } from "./json.js";
import { ModelTimeoutError, type ChatCompleter } from "./model-client.js";

// ===========================================
// UI State Types
// ===========================================

export interface UIElement {
  elementType: string;
  text: string;
  x: number;
  y: number;
  width?: number;
  height?: number;
  clickable: boolean;
  description?: string;
}

/** Why an analysis is degraded; null when the model answered as asked. */
export type PerceptionDegradation = "timeout" | "request_failed" | "unparsed_response";

export interface UIState {
  appName: string;
  screenDescription: string;
  elements: UIElement[];
  errorMessage: string | null;
  popupVisible: boolean;
  availableActions: string[];
  rawResponse: string | null;
  degraded: PerceptionDegradation | null;
}

// ===========================================
// Response schema
// ===========================================

// Decoded replies are read leniently: a field of the wrong type falls back
// to its default, and only elements that cannot be read at all are dropped.

const text = (fallback: string) => z.preprocess((v) => v ?? fallback, z.coerce.string());
const coordinate = z.preprocess((v) => v ?? 0, z.coerce.number().finite());
const size = z.coerce.number().finite().nullish().catch(null);
const flag = (fallback: boolean) =>
  z.boolean().nullish().transform((v) => v ?? fallback).catch(fallback);

const elementSchema = z.object({
  type: text("unknown"),
  text: text(""),
  x: coordinate,
  y: coordinate,
  width: size,
  height: size,
  clickable: flag(true),
  description: z.string().nullish().catch(null),
});

const analysisSchema = z.object({
  app_name: text("Unknown"),
  screen_description: text(""),
  elements: z.array(z.unknown()).nullish().catch(null),
  error_message: z.string().nullish().catch(null),
  popup_visible: flag(false),
  available_actions: z.array(z.unknown()).nullish().catch(null),
});

function readElements(items: unknown[]): UIElement[] {
  const elements: UIElement[] = [];
  for (const item of items) {
    const parsed = elementSchema.safeParse(item);
    if (!parsed.success) continue;
    const e = parsed.data;
    elements.push({
      elementType: e.type,
      text: e.text,
      x: e.x,
      y: e.y,
      width: e.width ?? undefined,
      height: e.height ?? undefined,
      clickable: e.clickable,
      description: e.description ?? undefined,
    });
  }
  return elements;
}

export const ANALYSIS_PROMPT = `Analyze this Android screenshot and provide a structured analysis.

## Instructions
1. Identify the current app/screen name
2. Describe what is displayed on the screen
3. List ALL interactive UI elements you can see with their:
   - Type (button, input_field, checkbox, text, icon, link, etc.)
   - Visible text or label
   - Approximate center coordinates (x, y) based on screen position
   - Whether it appears clickable
4. Note any error messages or popups
5. List possible actions a user could take

## Response Format (JSON)
\`\`\`json
{
    "app_name": "Name of the app or screen",
    "screen_description": "Brief description of what's shown",
    "elements": [
        {
            "type": "button",
            "text": "Install",
            "x": 540,
            "y": 1800,
            "clickable": true
        }
    ],
    "error_message": null,
    "popup_visible": false,
    "available_actions": ["tap Install button", "scroll down", "go back"]
}
\`\`\`

Respond ONLY with valid JSON, no additional text.`;

/**
 * Builds a UIState from the vision model's reply. Replies that do not
 * decode to a JSON object become a degraded state carrying the first 500
 * characters as the description.
 */
export function parseAnalysis(response: string): UIState {
  const value = parseJsonValue(response);
  const parsed = value === undefined ? null : analysisSchema.safeParse(value);
  if (parsed === null || !parsed.success) {
    return {
      appName: "Unknown",
      screenDescription: response.slice(0, UNPARSED_DESCRIPTION_LIMIT),
      elements: [],
      errorMessage: "Failed to parse structured response",
      popupVisible: false,
      availableActions: [],
      rawResponse: response,
      degraded: "unparsed_response",
    };
  }

  const data = parsed.data;
  return {
    appName: data.app_name,
    screenDescription: data.screen_description,
    elements: readElements(data.elements ?? []),
    errorMessage: data.error_message ?? null,
    popupVisible: data.popup_visible,
    availableActions: (data.available_actions ?? []).filter((a): a is string => typeof a === "string"),
    rawResponse: response,
    degraded: null,
  };
}

function degradedState(
  screenDescription: string,
  errorMessage: string,
  degraded: PerceptionDegradation
): UIState {
  return {
    appName: "Unknown",
    screenDescription,
    elements: [],
    errorMessage,
    popupVisible: false,
    availableActions: [],
    rawResponse: null,
    degraded,
  };
}

// ===========================================
// Perception
// ===========================================

export interface PerceptionOptions {
  adb: AdbClient;
  chat: ChatCompleter;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  screenshotDir: string;
  /** Screenshots larger than this box are scaled down to fit; 0 disables. */
  imageMaxWidth: number;
  imageMaxHeight: number;
  deviceSerial?: string;
}

export class Perception {
  constructor(private readonly options: PerceptionOptions) {}

  /**
   * Captures the screen to `<screenshotDir>/screen_<ms>.png`.
   * Throws when the capture or the pull fails.
   */
  async captureScreenshot(deviceSerial?: string): Promise<string> {
    const device = this.options.adb.forDevice(deviceSerial ?? this.options.deviceSerial);
    mkdirSync(this.options.screenshotDir, { recursive: true });
    const outputPath = join(this.options.screenshotDir, `screen_${Date.now()}.png`);

    const capture = await device.run(["shell", "screencap", "-p", DEVICE_SCREENSHOT_PATH]);
    if (!capture.success) {
      throw new Error(`Screenshot capture failed: ${capture.stderr}`);
    }

    const pull = await device.run(["pull", DEVICE_SCREENSHOT_PATH, outputPath]);
    if (!pull.success) {
      throw new Error(`Screenshot pull failed: ${pull.stderr}`);
    }

    // Best-effort cleanup
    await device.run(["shell", "rm", DEVICE_SCREENSHOT_PATH]);
    return outputPath;
  }

  /** Reads the PNG, downsampling it to fit the configured box. */
  async encodeImage(path: string): Promise<string> {
    const { imageMaxWidth, imageMaxHeight } = this.options;
    if (imageMaxWidth <= 0 || imageMaxHeight <= 0) {
      return readFileSync(path).toString("base64");
    }

    const image = sharp(path);
    const { width = 0, height = 0 } = await image.metadata();
    if (width <= imageMaxWidth && height <= imageMaxHeight) {
      return readFileSync(path).toString("base64");
    }

    const resized = await image
      .resize({ width: imageMaxWidth, height: imageMaxHeight, fit: "inside", withoutEnlargement: true })
      .png()
      .toBuffer();
    return resized.toString("base64");
  }

  /**
   * One vision-model call for one screenshot. Model failures come back
   * in-band as a degraded UIState; an unreadable image file throws.
   */
  async analyzeScreenshot(path: string, promptOverride?: string): Promise<UIState> {
    const base64 = await this.encodeImage(path);

    let content: string;
    try {
      content = await this.options.chat.complete({
        model: this.options.model,
        messages: [
          {
            role: "user",
            content: [
              { type: "image", base64, mimeType: "image/png" },
              { type: "text", text: promptOverride ?? ANALYSIS_PROMPT },
            ],
          },
        ],
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens,
        timeoutMs: this.options.timeoutMs,
      });
    } catch (err) {
      if (err instanceof ModelTimeoutError) {
        return degradedState(
          "VLM analysis timed out",
          "Analysis timeout - screen may be complex",
          "timeout"
        );
      }
      const message = errorMessage(err);
      return degradedState(`VLM analysis failed: ${message}`, message, "request_failed");
    }

    return parseAnalysis(content);
  }

  async captureAndAnalyze(deviceSerial?: string): Promise<UIState> {
    const path = await this.captureScreenshot(deviceSerial);
    return this.analyzeScreenshot(path);
  }
}

// ===========================================
// Queries
// ===========================================

export function findElementByText(state: UIState, text: string, partial = true): UIElement | null {
  const needle = text.toLowerCase();
  for (const element of state.elements) {
    const label = element.text.toLowerCase();
    if (partial ? label.includes(needle) : label === needle) {
      return element;
    }
  }
  return null;
}

export function findElementsByType(state: UIState, elementType: string): UIElement[] {
  const wanted = elementType.toLowerCase();
  return state.elements.filter((e) => e.elementType.toLowerCase() === wanted);
}

/** Short form kept in step history. */
export function summarizeUiState(state: UIState): string {
  return `${state.appName}: ${state.screenDescription.slice(0, 100)}`;
}

/** The state as the planner sees it, without the raw model reply. */
export function uiStateToJson(state: UIState): string {
  return JSON.stringify(
    {
      app_name: state.appName,
      screen_description: state.screenDescription,
      elements: state.elements.map((e) => ({
        type: e.elementType,
        text: e.text,
        x: e.x,
        y: e.y,
        clickable: e.clickable,
      })),
      error_message: state.errorMessage,
      popup_visible: state.popupVisible,
      available_actions: state.availableActions,
    },
    null,
    2
  );
}
