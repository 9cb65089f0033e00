/**
 * Agent loop: perceive -> plan -> execute until the planner ends the
 * task or the step budget runs out.
 *
 * Cancellation is cooperative. stop() sets a flag that is read at the
 * top of each step, so a step that has started always finishes.
 */

import { setTimeout as sleep } from "timers/promises";
import { describeAction, isTerminalAction, toActionRecord, type Action, type ActionRecord } from "./actions.js";
import { errorMessage } from "./errors.js";
import type { ActionResult, Executor } from "./executor.js";
import type { SessionLogger } from "./logger.js";
import { summarizeUiState, type Perception } from "./perception.js";
import type { Planner, PlannerHistoryEntry } from "./planner.js";

export type AgentStatus = "idle" | "running" | "completed" | "failed" | "stopped";

export interface StepRecord {
  stepNumber: number;
  timestamp: string;
  uiStateSummary: string;
  action: ActionRecord;
  result: { success: boolean; message: string; error: string | null };
  screenshotPath: string | null;
  durationMs: number;
}

export interface AgentResultDict {
  success: boolean;
  status: AgentStatus;
  task: string;
  totalSteps: number;
  totalDurationMs: number;
  finalScreen: string | null;
  error: string | null;
  history: Array<{ step: number; action: ActionRecord; result: StepRecord["result"] }>;
}

export interface AgentResultFields {
  success: boolean;
  status: AgentStatus;
  task: string;
  totalSteps: number;
  totalDurationMs: number;
  finalScreen: string | null;
  error: string | null;
  history: readonly StepRecord[];
}

export class AgentResult implements AgentResultFields {
  readonly success: boolean;
  readonly status: AgentStatus;
  readonly task: string;
  readonly totalSteps: number;
  readonly totalDurationMs: number;
  readonly finalScreen: string | null;
  readonly error: string | null;
  readonly history: readonly StepRecord[];

  constructor(fields: AgentResultFields) {
    this.success = fields.success;
    this.status = fields.status;
    this.task = fields.task;
    this.totalSteps = fields.totalSteps;
    this.totalDurationMs = fields.totalDurationMs;
    this.finalScreen = fields.finalScreen;
    this.error = fields.error;
    this.history = fields.history;
  }

  toDict(): AgentResultDict {
    return {
      success: this.success,
      status: this.status,
      task: this.task,
      totalSteps: this.totalSteps,
      totalDurationMs: this.totalDurationMs,
      finalScreen: this.finalScreen,
      error: this.error,
      history: this.history.map((h) => ({ step: h.stepNumber, action: h.action, result: h.result })),
    };
  }

  toJson(): string {
    return JSON.stringify(this.toDict(), null, 2);
  }
}

export interface AgentStatusReport {
  status: AgentStatus;
  currentStep: number;
  maxSteps: number;
  task: string;
  device: string | null;
  historyLength: number;
}

export interface VlaAgentOptions {
  task: string;
  perception: Perception;
  planner: Planner;
  executor: Executor;
  deviceSerial?: string;
  maxSteps: number;
  /** Pause after each non-terminal step. */
  stepDelayMs: number;
  /** Pause before each screenshot so animations settle. */
  screenshotDelayMs: number;
  historyWindow: number;
  onStep?: (record: StepRecord) => void;
  verbose?: boolean;
  logger?: SessionLogger;
  sleep?: (ms: number) => Promise<unknown>;
  write?: (line: string) => void;
}

function clock(): string {
  return new Date().toTimeString().slice(0, 8);
}

export class VlaAgent {
  private readonly options: VlaAgentOptions;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private readonly write: (line: string) => void;

  private status: AgentStatus = "idle";
  private history: StepRecord[] = [];
  private currentStep = 0;
  private stopRequested = false;

  constructor(options: VlaAgentOptions) {
    this.options = options;
    this.sleep = options.sleep ?? ((ms) => sleep(ms));
    this.write = options.write ?? ((line) => console.log(line));
  }

  private log(message: string): void {
    if (this.options.verbose ?? true) {
      this.write(`[${clock()}] ${message}`);
    }
  }

  /** Asks the loop to stop before its next step. */
  stop(): void {
    this.stopRequested = true;
    this.log("Stop requested - will stop after current step");
  }

  getStatus(): AgentStatusReport {
    return {
      status: this.status,
      currentStep: this.currentStep,
      maxSteps: this.options.maxSteps,
      task: this.options.task,
      device: this.options.deviceSerial ?? null,
      historyLength: this.history.length,
    };
  }

  async run(): Promise<AgentResult> {
    const start = Date.now();
    const { task, maxSteps } = this.options;
    this.status = "running";
    this.history = [];
    this.currentStep = 0;
    this.stopRequested = false;

    this.log("Starting VLA Agent");
    this.log(`Task: ${task}`);
    this.log(`Device: ${this.options.deviceSerial ?? "default"}`);
    this.log(`Max steps: ${maxSteps}`);
    this.log("-".repeat(50));

    try {
      for (let step = 1; step <= maxSteps; step++) {
        this.currentStep = step;

        if (this.stopRequested) {
          this.status = "stopped";
          return this.finish(start, false, "Agent stopped by user");
        }

        const action = await this.executeStep(step);

        if (action.type === "task_complete") {
          this.status = "completed";
          this.log("Task completed successfully");
          return this.finish(start, true, null);
        }
        if (action.type === "task_failed") {
          this.status = "failed";
          const reason = action.reasoning || "Task failed";
          this.log(`Task failed: ${reason}`);
          return this.finish(start, false, reason);
        }

        await this.sleep(this.options.stepDelayMs);
      }

      this.status = "failed";
      this.log(`Max steps (${maxSteps}) reached without completing task`);
      return this.finish(start, false, `Max steps (${maxSteps}) reached`);
    } catch (err) {
      this.status = "failed";
      const message = errorMessage(err);
      this.log(`Agent error: ${message}`);
      if ((this.options.verbose ?? true) && err instanceof Error && err.stack) {
        this.write(err.stack);
      }
      return this.finish(start, false, message);
    }
  }

  private async executeStep(stepNumber: number): Promise<Action> {
    const { perception, planner, executor } = this.options;
    const stepStart = Date.now();

    this.log(`Step ${stepNumber}: Capturing screen...`);
    await this.sleep(this.options.screenshotDelayMs);

    const screenshotPath = await perception.captureScreenshot(this.options.deviceSerial);
    const uiState = await perception.analyzeScreenshot(screenshotPath);
    this.log(`  Screen: ${uiState.appName}`);
    this.log(`  Elements: ${uiState.elements.length} found`);
    if (uiState.degraded) {
      this.log(`  Perception degraded (${uiState.degraded}): ${uiState.errorMessage ?? ""}`);
    }

    this.log("  Planning next action...");
    const history: PlannerHistoryEntry[] = this.history
      .slice(-this.options.historyWindow)
      .map((h) => ({ action: h.action, success: h.result.success, screenSummary: h.uiStateSummary }));
    const action = await planner.planNextAction({
      task: this.options.task,
      uiState,
      history,
      stepNumber,
      maxSteps: this.options.maxSteps,
    });
    this.log(`  Action: ${describeAction(action)}`);
    this.log(`  Reason: ${action.reasoning.slice(0, 80)}`);

    let result: ActionResult;
    if (isTerminalAction(action)) {
      result = { success: true, action, message: action.reasoning, durationMs: 0 };
    } else {
      this.log("  Executing...");
      result = await executor.execute(action);
      this.log(`  Result: ${result.success ? "OK" : "FAIL"} ${result.message}`);
    }

    const record: StepRecord = {
      stepNumber,
      timestamp: new Date().toISOString(),
      uiStateSummary: summarizeUiState(uiState),
      action: toActionRecord(action),
      result: { success: result.success, message: result.message, error: result.error ?? null },
      screenshotPath,
      durationMs: Date.now() - stepStart,
    };
    this.history.push(record);
    this.writeSessionLog((logger) => logger.logStep(record));
    this.options.onStep?.(record);

    this.log(
      `Step ${stepNumber}/${this.options.maxSteps}: ${action.type} -> ${
        result.success ? "OK" : `FAIL: ${result.error ?? result.message}`
      }`
    );
    return action;
  }

  private finish(start: number, success: boolean, error: string | null): AgentResult {
    const last = this.history[this.history.length - 1];
    const result = new AgentResult({
      success,
      status: this.status,
      task: this.options.task,
      totalSteps: this.history.length,
      totalDurationMs: Date.now() - start,
      finalScreen: last ? last.screenshotPath : null,
      error,
      history: [...this.history],
    });

    this.writeSessionLog((logger) => {
      const path = logger.finalize(result);
      this.log(`Session log saved: ${path}`);
    });
    return result;
  }

  /** Session log writes never change the outcome of a run. */
  private writeSessionLog(write: (logger: SessionLogger) => void): void {
    const { logger } = this.options;
    if (!logger) return;
    try {
      write(logger);
    } catch (err) {
      this.log(`Warning: session log write failed: ${errorMessage(err)}`);
    }
  }
}
