/**
 * Configuration management for the VLA Android agent.
 * Values come from the environment; the CLI loads .env through dotenv
 * before this module is evaluated.
 */

import {
  DEFAULT_ADB_TIMEOUT,
  DEFAULT_VLLM_BASE_URL,
  DEFAULT_VLM_MODEL,
  DEFAULT_LLM_MODEL,
  DEFAULT_VLM_TEMPERATURE,
  DEFAULT_VLM_MAX_TOKENS,
  DEFAULT_VLM_TIMEOUT,
  DEFAULT_LLM_TEMPERATURE,
  DEFAULT_LLM_MAX_TOKENS,
  DEFAULT_LLM_TIMEOUT,
  DEFAULT_MAX_STEPS,
  DEFAULT_STEP_DELAY,
  DEFAULT_SCREENSHOT_DELAY,
  DEFAULT_HISTORY_LENGTH,
  DEFAULT_IMAGE_MAX_WIDTH,
  DEFAULT_IMAGE_MAX_HEIGHT,
  DEFAULT_SCREENSHOT_DIR,
  DEFAULT_LOG_DIR,
  DEFAULT_COMPLETION_CONFIDENCE,
} from "./constants.js";

function env(key: string, fallback = ""): string {
  return process.env[key] ?? fallback;
}

export const Config = {
  // ADB Configuration
  ADB_PATH: env("ADB_PATH", "adb"),
  ADB_TIMEOUT: parseInt(env("ADB_TIMEOUT", String(DEFAULT_ADB_TIMEOUT)), 10),

  // Model server (OpenAI-compatible, e.g. vLLM)
  VLLM_BASE_URL: env("VLLM_BASE_URL", DEFAULT_VLLM_BASE_URL),
  VLLM_API_KEY: env("VLLM_API_KEY"),

  // Vision model (screenshot analysis)
  VLM_MODEL: env("VLM_MODEL", DEFAULT_VLM_MODEL),
  VLM_TEMPERATURE: parseFloat(env("VLM_TEMPERATURE", String(DEFAULT_VLM_TEMPERATURE))),
  VLM_MAX_TOKENS: parseInt(env("VLM_MAX_TOKENS", String(DEFAULT_VLM_MAX_TOKENS)), 10),
  VLM_TIMEOUT: parseFloat(env("VLM_TIMEOUT", String(DEFAULT_VLM_TIMEOUT))),

  // Language model (planning)
  LLM_MODEL: env("LLM_MODEL", DEFAULT_LLM_MODEL),
  LLM_TEMPERATURE: parseFloat(env("LLM_TEMPERATURE", String(DEFAULT_LLM_TEMPERATURE))),
  LLM_MAX_TOKENS: parseInt(env("LLM_MAX_TOKENS", String(DEFAULT_LLM_MAX_TOKENS)), 10),
  LLM_TIMEOUT: parseFloat(env("LLM_TIMEOUT", String(DEFAULT_LLM_TIMEOUT))),

  // Agent Configuration
  MAX_STEPS: parseInt(env("MAX_STEPS", String(DEFAULT_MAX_STEPS)), 10),
  STEP_DELAY: parseFloat(env("STEP_DELAY", String(DEFAULT_STEP_DELAY))),
  SCREENSHOT_DELAY: parseFloat(env("SCREENSHOT_DELAY", String(DEFAULT_SCREENSHOT_DELAY))),
  HISTORY_LENGTH: parseInt(env("HISTORY_LENGTH", String(DEFAULT_HISTORY_LENGTH)), 10),

  // Screenshots are downsampled to fit this box before upload
  IMAGE_MAX_WIDTH: parseInt(env("IMAGE_MAX_WIDTH", String(DEFAULT_IMAGE_MAX_WIDTH)), 10),
  IMAGE_MAX_HEIGHT: parseInt(env("IMAGE_MAX_HEIGHT", String(DEFAULT_IMAGE_MAX_HEIGHT)), 10),

  // Output locations
  SCREENSHOT_DIR: env("SCREENSHOT_DIR", DEFAULT_SCREENSHOT_DIR),
  LOG_DIR: env("LOG_DIR", DEFAULT_LOG_DIR),

  // evaluateCompletion verdicts count only above this confidence
  COMPLETION_CONFIDENCE: parseFloat(
    env("COMPLETION_CONFIDENCE", String(DEFAULT_COMPLETION_CONFIDENCE))
  ),

  // Confluence (optional; enables the confluence_* tools)
  CONFLUENCE_BASE_URL: env("CONFLUENCE_BASE_URL"),
  CONFLUENCE_USERNAME: env("CONFLUENCE_USERNAME"),
  CONFLUENCE_PASSWORD: env("CONFLUENCE_PASSWORD"),

  validate(): void {
    if (!Config.VLLM_BASE_URL) {
      throw new Error("VLLM_BASE_URL is required");
    }
    if (!Config.VLLM_API_KEY) {
      throw new Error("VLLM_API_KEY is required (any placeholder works for an unauthenticated vLLM server)");
    }
  },
};
