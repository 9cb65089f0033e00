/**
 * Session logging for agent runs.
 * Writes incremental .partial.json after each step (crash-safe),
 * and a final .json summary at session end.
 */

import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import type { AgentResult, AgentResultDict, StepRecord } from "./agent.js";

export interface SessionSummary {
  sessionId: string;
  task: string;
  device: string | null;
  vlmModel: string;
  llmModel: string;
  startTime: string;
  endTime: string;
  totalSteps: number;
  successCount: number;
  failCount: number;
  completed: boolean;
  steps: StepRecord[];
  result: AgentResultDict | null;
}

export interface SessionInfo {
  task: string;
  device?: string;
  vlmModel: string;
  llmModel: string;
}

export class SessionLogger {
  readonly sessionId: string;
  private readonly logDir: string;
  private readonly info: SessionInfo;
  private readonly startTime: string;
  private steps: StepRecord[] = [];

  constructor(logDir: string, info: SessionInfo) {
    this.sessionId = `${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
    this.logDir = logDir;
    this.info = info;
    this.startTime = new Date().toISOString();

    mkdirSync(this.logDir, { recursive: true });
  }

  get partialPath(): string {
    return join(this.logDir, `${this.sessionId}.partial.json`);
  }

  get finalPath(): string {
    return join(this.logDir, `${this.sessionId}.json`);
  }

  logStep(record: StepRecord): void {
    this.steps.push(record);

    // Write partial file after each step (crash-safe)
    writeFileSync(this.partialPath, JSON.stringify(this.buildSummary(null), null, 2));
  }

  /** Writes the final summary and returns its path. */
  finalize(result: AgentResult): string {
    writeFileSync(this.finalPath, JSON.stringify(this.buildSummary(result), null, 2));
    return this.finalPath;
  }

  private buildSummary(result: AgentResult | null): SessionSummary {
    return {
      sessionId: this.sessionId,
      task: this.info.task,
      device: this.info.device ?? null,
      vlmModel: this.info.vlmModel,
      llmModel: this.info.llmModel,
      startTime: this.startTime,
      endTime: new Date().toISOString(),
      totalSteps: this.steps.length,
      successCount: this.steps.filter((s) => s.result.success).length,
      failCount: this.steps.filter((s) => !s.result.success).length,
      completed: result?.success ?? false,
      steps: this.steps,
      result: result ? result.toDict() : null,
    };
  }
}
