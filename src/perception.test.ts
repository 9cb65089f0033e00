import { mkdtempSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import sharp from "sharp";
import { beforeAll, describe, expect, it } from "vitest";
import { ModelRequestError, ModelTimeoutError } from "./model-client.js";
import {
  findElementByText,
  findElementsByType,
  parseAnalysis,
  Perception,
  summarizeUiState,
  uiStateToJson,
  type PerceptionOptions,
} from "./perception.js";
import { createFakeAdb, ScriptedChat } from "./test-utils.js";

const ANALYSIS = JSON.stringify({
  app_name: "Settings",
  screen_description: "Main settings list",
  elements: [
    { type: "button", text: "Network & internet", x: 540, y: 400 },
    { type: "input_field", text: "Search settings", x: 540, y: 180, clickable: true },
    { type: "text", text: "Battery", x: 300, y: 900, clickable: false, width: 200 },
  ],
  error_message: null,
  popup_visible: false,
  available_actions: ["tap Network & internet", "scroll down"],
});

const workDir = mkdtempSync(join(tmpdir(), "perception-"));
const screenshot = join(workDir, "screen.png");

beforeAll(async () => {
  await sharp({ create: { width: 20, height: 40, channels: 3, background: "#336699" } })
    .png()
    .toFile(screenshot);
});

function perception(chat: ScriptedChat, overrides: Partial<PerceptionOptions> = {}): Perception {
  return new Perception({
    adb: createFakeAdb().adb,
    chat,
    model: "test-vlm",
    temperature: 0.1,
    maxTokens: 4000,
    timeoutMs: 120_000,
    screenshotDir: workDir,
    imageMaxWidth: 0,
    imageMaxHeight: 0,
    ...overrides,
  });
}

describe("parseAnalysis", () => {
  it("maps the model's JSON onto a UIState", () => {
    const state = parseAnalysis(ANALYSIS);

    expect(state.appName).toBe("Settings");
    expect(state.degraded).toBeNull();
    expect(state.errorMessage).toBeNull();
    expect(state.elements).toHaveLength(3);
    expect(state.elements[0]).toEqual({
      elementType: "button",
      text: "Network & internet",
      x: 540,
      y: 400,
      width: undefined,
      height: undefined,
      clickable: true,
      description: undefined,
    });
    expect(state.elements[2]).toMatchObject({ clickable: false, width: 200 });
    expect(state.availableActions).toEqual(["tap Network & internet", "scroll down"]);
  });

  it("reads fenced replies the same as bare JSON", () => {
    const fenced = parseAnalysis("Here you go:\n```json\n" + ANALYSIS + "\n```");

    expect(fenced.elements).toEqual(parseAnalysis(ANALYSIS).elements);
    expect(fenced.appName).toBe("Settings");
  });

  it("fills element defaults", () => {
    const state = parseAnalysis('{"elements": [{}]}');

    expect(state.appName).toBe("Unknown");
    expect(state.elements[0]).toMatchObject({ elementType: "unknown", text: "", x: 0, y: 0, clickable: true });
  });

  it("falls back to defaults for null fields", () => {
    const state = parseAnalysis(
      JSON.stringify({
        app_name: null,
        screen_description: "Settings list",
        elements: [{ type: "button", text: null, x: 540, y: 400 }],
        popup_visible: null,
        available_actions: null,
      })
    );

    expect(state.degraded).toBeNull();
    expect(state.appName).toBe("Unknown");
    expect(state.screenDescription).toBe("Settings list");
    expect(state.popupVisible).toBe(false);
    expect(state.availableActions).toEqual([]);
    expect(state.elements).toEqual([
      {
        elementType: "button",
        text: "",
        x: 540,
        y: 400,
        width: undefined,
        height: undefined,
        clickable: true,
        description: undefined,
      },
    ]);
  });

  it("reads numeric strings as coordinates and drops unreadable elements", () => {
    const state = parseAnalysis(
      JSON.stringify({
        app_name: "Settings",
        elements: [
          { type: "button", text: "Wi-Fi", x: "540", y: "400" },
          { type: "button", text: "Broken", x: "left", y: 10 },
          "not an element",
          { type: "text", text: "Battery", x: 300, y: 900, width: "wide" },
        ],
        available_actions: ["tap Wi-Fi", 7],
      })
    );

    expect(state.degraded).toBeNull();
    expect(state.elements.map((e) => [e.text, e.x, e.y, e.width])).toEqual([
      ["Wi-Fi", 540, 400, undefined],
      ["Battery", 300, 900, undefined],
    ]);
    expect(state.availableActions).toEqual(["tap Wi-Fi"]);
  });

  it("degrades when the JSON is not an object", () => {
    expect(parseAnalysis("[1, 2, 3]").degraded).toBe("unparsed_response");
  });

  it("degrades on prose", () => {
    const reply = "I see a settings screen. ".repeat(40);
    const state = parseAnalysis(reply);

    expect(state.degraded).toBe("unparsed_response");
    expect(state.errorMessage).toBe("Failed to parse structured response");
    expect(state.screenDescription).toBe(reply.slice(0, 500));
    expect(state.rawResponse).toBe(reply);
  });
});

describe("Perception.analyzeScreenshot", () => {
  it("sends the image and prompt in one user message", async () => {
    const chat = new ScriptedChat(ANALYSIS);

    const state = await perception(chat).analyzeScreenshot(screenshot);

    expect(state.appName).toBe("Settings");
    expect(chat.requests).toHaveLength(1);
    const [request] = chat.requests;
    expect(request?.model).toBe("test-vlm");
    expect(request?.timeoutMs).toBe(120_000);
    const content = request?.messages[0]?.content;
    expect(Array.isArray(content) && content.map((part) => part.type)).toEqual(["image", "text"]);
  });

  it("uses the prompt override", async () => {
    const chat = new ScriptedChat(ANALYSIS);

    await perception(chat).analyzeScreenshot(screenshot, "Only list buttons.");

    const content = chat.requests[0]?.messages[0]?.content;
    expect(Array.isArray(content) && content[1]).toEqual({ type: "text", text: "Only list buttons." });
  });

  it("returns a timeout state instead of throwing", async () => {
    const chat = new ScriptedChat(new ModelTimeoutError(120_000));

    const state = await perception(chat).analyzeScreenshot(screenshot);

    expect(state).toEqual({
      appName: "Unknown",
      screenDescription: "VLM analysis timed out",
      elements: [],
      errorMessage: "Analysis timeout - screen may be complex",
      popupVisible: false,
      availableActions: [],
      rawResponse: null,
      degraded: "timeout",
    });
  });

  it("carries other failures in the state", async () => {
    const chat = new ScriptedChat(new ModelRequestError("503 Service Unavailable"));

    const state = await perception(chat).analyzeScreenshot(screenshot);

    expect(state.screenDescription).toBe("VLM analysis failed: 503 Service Unavailable");
    expect(state.errorMessage).toBe("503 Service Unavailable");
    expect(state.degraded).toBe("request_failed");
  });
});

describe("Perception.encodeImage", () => {
  it("scales large screenshots to fit the box", async () => {
    const encoded = await perception(new ScriptedChat(ANALYSIS), {
      imageMaxWidth: 10,
      imageMaxHeight: 10,
    }).encodeImage(screenshot);

    const { width, height } = await sharp(Buffer.from(encoded, "base64")).metadata();
    expect([width, height]).toEqual([5, 10]);
  });

  it("leaves screenshots inside the box untouched", async () => {
    const encoded = await perception(new ScriptedChat(ANALYSIS), {
      imageMaxWidth: 100,
      imageMaxHeight: 100,
    }).encodeImage(screenshot);

    const { width, height } = await sharp(Buffer.from(encoded, "base64")).metadata();
    expect([width, height]).toEqual([20, 40]);
  });
});

describe("Perception.captureScreenshot", () => {
  it("captures, pulls and cleans up", async () => {
    const { adb, commands } = createFakeAdb();
    const eyes = new Perception({
      adb,
      chat: new ScriptedChat(ANALYSIS),
      model: "test-vlm",
      temperature: 0.1,
      maxTokens: 4000,
      timeoutMs: 120_000,
      screenshotDir: workDir,
      imageMaxWidth: 0,
      imageMaxHeight: 0,
      deviceSerial: "abc",
    });

    const path = await eyes.captureScreenshot();

    expect(path).toMatch(/screen_\d+\.png$/);
    expect(commands()).toEqual([
      "shell screencap -p /sdcard/vla_screenshot.png",
      `pull /sdcard/vla_screenshot.png ${path}`,
      "shell rm /sdcard/vla_screenshot.png",
    ]);
  });

  it("throws when the pull fails", async () => {
    const { adb } = createFakeAdb([[/^pull /, { exitCode: 1, stderr: "device offline" }]]);

    await expect(perception(new ScriptedChat(ANALYSIS), { adb }).captureScreenshot()).rejects.toThrow(
      "Screenshot pull failed: device offline"
    );
  });
});

describe("queries", () => {
  const state = parseAnalysis(ANALYSIS);

  it("finds elements by partial or exact text", () => {
    expect(findElementByText(state, "network")?.y).toBe(400);
    expect(findElementByText(state, "network", false)).toBeNull();
    expect(findElementByText(state, "battery", false)?.x).toBe(300);
  });

  it("finds elements by type", () => {
    expect(findElementsByType(state, "INPUT_FIELD").map((e) => e.text)).toEqual(["Search settings"]);
  });

  it("summarizes and serializes", () => {
    expect(summarizeUiState(state)).toBe("Settings: Main settings list");
    expect(JSON.parse(uiStateToJson(state)).elements[2]).toEqual({
      type: "text",
      text: "Battery",
      x: 300,
      y: 900,
      clickable: false,
    });
  });
});
