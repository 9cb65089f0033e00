/**
 * Constants for the VLA Android agent.
 * All magic strings, paths, and fixed values in one place.
 */

// ===========================================
// Model Server
// ===========================================
export const DEFAULT_VLLM_BASE_URL = "http://localhost:8000/v1";
export const DEFAULT_VLM_MODEL = "Qwen/Qwen2.5-VL-7B-Instruct";
export const DEFAULT_LLM_MODEL = "Qwen/Qwen2.5-Coder-7B-Instruct";

// Vision analysis is slower than planning, so it gets the longer budget.
export const DEFAULT_VLM_TEMPERATURE = 0.1;
export const DEFAULT_VLM_MAX_TOKENS = 4000;
export const DEFAULT_VLM_TIMEOUT = 120;
export const DEFAULT_LLM_TEMPERATURE = 0.1;
export const DEFAULT_LLM_MAX_TOKENS = 2000;
export const DEFAULT_LLM_TIMEOUT = 60;

// Completion evaluation uses its own short, fixed budget
export const EVALUATION_TEMPERATURE = 0.1;
export const EVALUATION_MAX_TOKENS = 500;
export const EVALUATION_TIMEOUT_MS = 30_000;

// ===========================================
// ADB Key Codes
// ===========================================
export const KEYCODE_BACK = "KEYCODE_BACK";
export const KEYCODE_HOME = "KEYCODE_HOME";
export const KEYCODE_ENTER = "KEYCODE_ENTER";
export const KEYCODE_DEL = "KEYCODE_DEL";
export const KEYCODE_TAB = "KEYCODE_TAB";
export const KEYCODE_MENU = "KEYCODE_MENU";
export const KEYCODE_SEARCH = "KEYCODE_SEARCH";
export const KEYCODE_POWER = "KEYCODE_POWER";
export const KEYCODE_VOLUME_UP = "KEYCODE_VOLUME_UP";
export const KEYCODE_VOLUME_DOWN = "KEYCODE_VOLUME_DOWN";

// ===========================================
// Default Screen Coordinates (for scroll actions)
// Adjust based on target device resolution
// ===========================================
export const SCREEN_CENTER_X = 540;
export const SCROLL_UP_START_Y = 1500;
export const SCROLL_UP_END_Y = 500;
export const SCROLL_DOWN_START_Y = 500;
export const SCROLL_DOWN_END_Y = 1500;
export const SCROLL_DURATION_MS = 300;

export const SWIPE_DURATION_MS = 300;
export const DRAG_DURATION_MS = 1000;
export const LONG_PRESS_DURATION_MS = 1000;

// ===========================================
// File Paths
// ===========================================
export const DEVICE_SCREENSHOT_PATH = "/sdcard/vla_screenshot.png";
export const DEVICE_TOOL_SCREENSHOT_PATH = "/sdcard/screenshot_temp.png";
export const DEVICE_DUMP_PATH = "/sdcard/ui_dump.xml";
export const DEFAULT_SCREENSHOT_DIR = "vla_screenshots";
export const DEFAULT_LOG_DIR = "logs";

// ===========================================
// ADB Timeouts (seconds)
// ===========================================
export const DEFAULT_ADB_TIMEOUT = 30;
export const INSTALL_TIMEOUT = 120;
export const UNINSTALL_TIMEOUT = 60;
export const FILE_TRANSFER_TIMEOUT = 300;

// ===========================================
// Agent Defaults
// ===========================================
export const DEFAULT_MAX_STEPS = 30;
export const DEFAULT_STEP_DELAY = 1.5;
export const DEFAULT_SCREENSHOT_DELAY = 0.5;
export const DEFAULT_HISTORY_LENGTH = 10;
export const DEFAULT_COMPLETION_CONFIDENCE = 0.7;

// ===========================================
// Image Limits (0 disables resizing)
// ===========================================
export const DEFAULT_IMAGE_MAX_WIDTH = 1080;
export const DEFAULT_IMAGE_MAX_HEIGHT = 2400;

// ===========================================
// Prompt Limits
// ===========================================
export const MAX_PROMPT_ELEMENTS = 20;
export const MAX_PROMPT_SUGGESTIONS = 10;
export const UNPARSED_DESCRIPTION_LIMIT = 500;
