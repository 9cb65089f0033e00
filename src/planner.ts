/**
 * Planner: asks the language model for the single next action, given the
 * task, the analyzed screen and a window of recent history.
 */

import { z } from "zod";
import { actionFromLabel, type Action, type ActionRecord } from "./actions.js";
import {
  EVALUATION_MAX_TOKENS,
  EVALUATION_TEMPERATURE,
  EVALUATION_TIMEOUT_MS,
  MAX_PROMPT_ELEMENTS,
  MAX_PROMPT_SUGGESTIONS,
} from "./constants.js";
import { errorMessage } from "./errors.js";
import { parseModelJson } from "./json.js";
import { ModelTimeoutError, type ChatCompleter } from "./model-client.js";
import type { UIState } from "./perception.js";

export interface PlannerHistoryEntry {
  action: ActionRecord;
  success: boolean;
  screenSummary: string;
}

export interface PlannerContext {
  task: string;
  uiState: UIState;
  history: PlannerHistoryEntry[];
  stepNumber: number;
  maxSteps: number;
}

export interface CompletionVerdict {
  complete: boolean;
  confidence: number;
  reason: string;
}

export interface PlannerOptions {
  chat: ChatCompleter;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  /** How many trailing history entries the prompt shows. */
  historyWindow: number;
}

// ===========================================
// Prompts
// ===========================================

export const PLANNER_SYSTEM_PROMPT = `You are an Android automation agent. Your job is to analyze the current screen state and decide the next action to accomplish the given task.

## Available Actions

- TAP(x, y) - Tap at screen coordinates
- LONG_PRESS(x, y, duration_ms) - Long press at coordinates
- SWIPE(start_x, start_y, end_x, end_y) - Swipe gesture
- DRAG(start_x, start_y, end_x, end_y) - Slow drag, e.g. to move an item
- INPUT_TEXT(text) - Type text (screen must have focused input field)
- PRESS_KEY(key) - Press key: back, home, enter, delete, tab, menu, search, power, volume_up, volume_down
- WAIT(seconds) - Wait for UI to update
- SCROLL_UP() - Scroll the screen up
- SCROLL_DOWN() - Scroll the screen down
- GO_BACK() - Press back button
- GO_HOME() - Press home button
- OPEN_APP(package) - Launch app by package name
- TASK_COMPLETE() - Task is finished successfully
- TASK_FAILED() - Task cannot be completed

## Response Format

You MUST respond with valid JSON only:
\`\`\`json
{
    "action": "TAP",
    "params": {
        "x": 540,
        "y": 1200
    },
    "reasoning": "Tapping the Install button to begin app installation"
}
\`\`\`

## Guidelines

1. Always check if the task is already complete before taking action
2. If you see an error or unexpected popup, handle it first
3. Use exact coordinates from the UI elements when tapping
4. After typing text, you may need to tap a button or press enter
5. If stuck, try scrolling to find the needed element
6. If task seems impossible, return TASK_FAILED with explanation
7. Be patient - some actions take time (install, download, etc.)
8. Maximum steps allowed - if running out, prioritize completion

## Common Patterns

- To search: tap search field -> input text -> tap search button or press enter
- To install app: tap Install -> wait -> tap Open (or handle permissions)
- To login: input username -> tap next -> input password -> tap login
- To scroll: use SCROLL_DOWN to see more content
- To dismiss popup: tap outside, tap X, or press back`;

const EVALUATION_SYSTEM_PROMPT =
  "You evaluate if Android automation tasks are complete. Respond with JSON only.";

function formatElements(state: UIState): string {
  if (state.elements.length === 0) {
    return "No interactive elements detected";
  }

  const lines = state.elements
    .slice(0, MAX_PROMPT_ELEMENTS)
    .map((e) => `- [${e.elementType}] "${e.text}" at (${e.x}, ${e.y})${e.clickable ? " (clickable)" : ""}`);
  if (state.elements.length > MAX_PROMPT_ELEMENTS) {
    lines.push(`... and ${state.elements.length - MAX_PROMPT_ELEMENTS} more elements`);
  }
  return lines.join("\n");
}

function formatSuggestions(state: UIState): string {
  if (state.availableActions.length === 0) {
    return "No specific actions suggested";
  }
  return state.availableActions
    .slice(0, MAX_PROMPT_SUGGESTIONS)
    .map((a) => `- ${a}`)
    .join("\n");
}

function formatHistory(history: PlannerHistoryEntry[], window: number): string {
  const recent = window > 0 ? history.slice(-window) : [];
  if (recent.length === 0) return "";

  const lines = ["## Recent Action History"];
  recent.forEach((entry, i) => {
    lines.push(`${i + 1}. Action: ${entry.action.type} ${JSON.stringify(entry.action.params)}`);
    lines.push(`   Result: ${entry.success ? "success" : "failed"}`);
    lines.push(`   Screen after: ${entry.screenSummary}`);
  });
  return lines.join("\n");
}

/** Renders the user message for one planning call. */
export function buildPlannerPrompt(context: PlannerContext, historyWindow: number): string {
  const { uiState } = context;
  return `## Task
${context.task}

## Current Step
Step ${context.stepNumber} of ${context.maxSteps}

## Current Screen State
App/Screen: ${uiState.appName}
Description: ${uiState.screenDescription}

### UI Elements on Screen
${formatElements(uiState)}

### Error/Popup Status
- Error visible: ${uiState.errorMessage || "None"}
- Popup visible: ${uiState.popupVisible}

### Suggested Actions from Vision
${formatSuggestions(uiState)}

${formatHistory(context.history, historyWindow)}`.trimEnd();
}

// ===========================================
// Response parsing
// ===========================================

const plannerResponseSchema = z.object({
  action: z.string(),
  params: z.record(z.unknown()).nullish(),
  reasoning: z.string().nullish(),
});

const verdictSchema = z.object({
  complete: z.boolean().default(false),
  confidence: z.number().default(0),
  reason: z.string().default(""),
});

/**
 * Two stages: the reply as the requested JSON, then a plain-text reading
 * that only recognizes completion and failure. Anything produced by the
 * second stage is marked `unparsed_response`.
 */
export function parsePlannerResponse(text: string): Action {
  const parsed = parseModelJson(text, plannerResponseSchema);
  if (parsed.ok) {
    const { action, params, reasoning } = parsed.value;
    return actionFromLabel(action, params ?? {}, reasoning ?? "");
  }

  const lower = text.toLowerCase();
  if (lower.includes("task_complete") || lower.includes("task is complete")) {
    return { type: "task_complete", reasoning: text.slice(0, 200), fallback: "unparsed_response" };
  }
  if (lower.includes("task_failed") || lower.includes("cannot complete")) {
    return { type: "task_failed", reasoning: text.slice(0, 200), fallback: "unparsed_response" };
  }
  return {
    type: "wait",
    seconds: 1,
    reasoning: `Could not parse response: ${text.slice(0, 100)}`,
    fallback: "unparsed_response",
  };
}

/** A verdict counts only when it is complete and above the threshold. */
export function isCompletionConfident(verdict: CompletionVerdict, threshold: number): boolean {
  return verdict.complete && verdict.confidence > threshold;
}

// ===========================================
// Planner
// ===========================================

const NEXT_ACTION_REQUEST = `## Your Task
Based on the current screen state and task goal, what is the single next action to take?

Remember:
- Respond with JSON only
- Use exact coordinates from the UI elements list
- If task is complete, use TASK_COMPLETE
- If task is impossible, use TASK_FAILED with explanation`;

export class Planner {
  constructor(private readonly options: PlannerOptions) {}

  /**
   * Never throws. A model timeout becomes a 2 second wait so the loop
   * retries on the next screen; any other model failure ends the run.
   */
  async planNextAction(context: PlannerContext): Promise<Action> {
    let content: string;
    try {
      content = await this.options.chat.complete({
        model: this.options.model,
        messages: [
          { role: "system", content: PLANNER_SYSTEM_PROMPT },
          {
            role: "user",
            content: `${buildPlannerPrompt(context, this.options.historyWindow)}\n\n${NEXT_ACTION_REQUEST}`,
          },
        ],
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens,
        timeoutMs: this.options.timeoutMs,
      });
    } catch (err) {
      if (err instanceof ModelTimeoutError) {
        return {
          type: "wait",
          seconds: 2,
          reasoning: "LLM timeout - waiting before retry",
          fallback: "model_timeout",
        };
      }
      return { type: "task_failed", reasoning: `Planner error: ${errorMessage(err)}` };
    }

    return parsePlannerResponse(content);
  }

  /** Asks the model whether the task already looks done on this screen. */
  async evaluateCompletion(
    task: string,
    uiState: UIState,
    history: readonly unknown[]
  ): Promise<CompletionVerdict> {
    const userMessage = `## Task
${task}

## Current Screen
App: ${uiState.appName}
Description: ${uiState.screenDescription}

## Action History
${history.length} actions taken

## Question
Is this task complete? Evaluate the current screen against the task goal.

Respond with JSON:
\`\`\`json
{
    "complete": true/false,
    "confidence": 0.0-1.0,
    "reason": "explanation"
}
\`\`\``;

    try {
      const content = await this.options.chat.complete({
        model: this.options.model,
        messages: [
          { role: "system", content: EVALUATION_SYSTEM_PROMPT },
          { role: "user", content: userMessage },
        ],
        temperature: EVALUATION_TEMPERATURE,
        maxTokens: EVALUATION_MAX_TOKENS,
        timeoutMs: EVALUATION_TIMEOUT_MS,
      });
      const parsed = parseModelJson(content, verdictSchema);
      if (!parsed.ok) {
        return { complete: false, confidence: 0, reason: `Evaluation error: ${parsed.reason}` };
      }
      return parsed.value;
    } catch (err) {
      return { complete: false, confidence: 0, reason: `Evaluation error: ${errorMessage(err)}` };
    }
  }
}
