export { AdbClient, execFileRunner } from "./adb.js";
export type { AdbClientOptions, AdbDevice, AdbResult, CommandOutput, CommandRunner } from "./adb.js";

export { ACTION_TYPES, actionFromLabel, describeAction, isTerminalAction, resolveKeyCode, toActionRecord } from "./actions.js";
export type { Action, ActionFallback, ActionRecord, ActionType } from "./actions.js";

export { AgentResult, VlaAgent } from "./agent.js";
export type { AgentResultDict, AgentStatus, AgentStatusReport, StepRecord, VlaAgentOptions } from "./agent.js";

export { Config } from "./config.js";

export { ConfluenceClient, createConfluenceClient } from "./confluence/client.js";
export type {
  ConfluenceClientOptions,
  ConnectionStatus,
  PageContent,
  PageImage,
  PageLocator,
  SearchResults,
  SpaceSummary,
} from "./confluence/client.js";
export { CONFLUENCE_TOOLS, findConfluenceTool } from "./confluence/tools.js";
export type { ConfluenceTool, ToolReply } from "./confluence/tools.js";
export { createToolServer, serveStdio } from "./mcp-server.js";
export type { ToolServerOptions } from "./mcp-server.js";

export { Executor, parseToolResult } from "./executor.js";
export type { ActionResult, ExecutorOptions } from "./executor.js";
export { SessionLogger } from "./logger.js";
export type { SessionInfo, SessionSummary } from "./logger.js";

export { createChatClient, ModelRequestError, ModelTimeoutError, OpenAIChatClient } from "./model-client.js";
export type { ChatCompleter, ChatMessage, ChatRequest, ContentPart } from "./model-client.js";

export { findElementByText, findElementsByType, parseAnalysis, Perception, summarizeUiState, uiStateToJson } from "./perception.js";
export type { PerceptionDegradation, PerceptionOptions, UIElement, UIState } from "./perception.js";

export { buildPlannerPrompt, isCompletionConfident, parsePlannerResponse, Planner } from "./planner.js";
export type { CompletionVerdict, PlannerContext, PlannerHistoryEntry, PlannerOptions } from "./planner.js";

export { createDeviceToolset, findTool, runTool, TOOLS } from "./tools/registry.js";
export type { DeviceTool, DeviceToolset } from "./tools/registry.js";
