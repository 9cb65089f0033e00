/**
 * Command-line surface. This is the one place that maps Config onto
 * the adb client, model client and agent components.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { Command } from "commander";
import { AdbClient } from "./adb.js";
import { VlaAgent, type AgentResult } from "./agent.js";
import { Config } from "./config.js";
import { createConfluenceClient, type ConfluenceClient } from "./confluence/client.js";
import { CONFLUENCE_TOOLS, findConfluenceTool } from "./confluence/tools.js";
import { errorMessage } from "./errors.js";
import { Executor } from "./executor.js";
import { SessionLogger } from "./logger.js";
import { createToolServer, serveStdio } from "./mcp-server.js";
import { createChatClient, type ChatCompleter } from "./model-client.js";
import { Perception, uiStateToJson } from "./perception.js";
import { isCompletionConfident, Planner } from "./planner.js";
import { createDeviceToolset, runTool, TOOLS } from "./tools/registry.js";

export interface CliContext {
  adb?: AdbClient;
  chat?: ChatCompleter;
  out?: (text: string) => void;
  err?: (text: string) => void;
  setExitCode?: (code: number) => void;
  /** HTTP client for Confluence calls. */
  fetch?: typeof fetch;
  /** Runs the MCP server; stdio by default. */
  serve?: (server: McpServer) => Promise<void>;
}

interface Components {
  perception: Perception;
  planner: Planner;
  executor: Executor;
}

function buildComponents(adb: AdbClient, chat: ChatCompleter, deviceSerial: string): Components {
  return {
    perception: new Perception({
      adb,
      chat,
      model: Config.VLM_MODEL,
      temperature: Config.VLM_TEMPERATURE,
      maxTokens: Config.VLM_MAX_TOKENS,
      timeoutMs: Config.VLM_TIMEOUT * 1000,
      screenshotDir: Config.SCREENSHOT_DIR,
      imageMaxWidth: Config.IMAGE_MAX_WIDTH,
      imageMaxHeight: Config.IMAGE_MAX_HEIGHT,
      deviceSerial,
    }),
    planner: new Planner({
      chat,
      model: Config.LLM_MODEL,
      temperature: Config.LLM_TEMPERATURE,
      maxTokens: Config.LLM_MAX_TOKENS,
      timeoutMs: Config.LLM_TIMEOUT * 1000,
      historyWindow: Config.HISTORY_LENGTH,
    }),
    executor: new Executor({ tools: createDeviceToolset(adb), deviceSerial }),
  };
}

export function formatResult(result: AgentResult): string {
  const lines = [
    "=".repeat(50),
    `RESULT: ${result.success ? "SUCCESS" : "FAILED"}`,
    `Steps: ${result.totalSteps}`,
    `Duration: ${(result.totalDurationMs / 1000).toFixed(1)}s`,
  ];
  if (result.error) lines.push(`Error: ${result.error}`);
  lines.push("=".repeat(50));
  return lines.join("\n");
}

function parseToolArgs(json: string | undefined): Record<string, unknown> | null {
  if (json === undefined) return {};
  try {
    const value: unknown = JSON.parse(json);
    if (typeof value !== "object" || value === null || Array.isArray(value)) return null;
    return Object.fromEntries(Object.entries(value));
  } catch {
    return null;
  }
}

export function createProgram(context: CliContext = {}): Command {
  const out = context.out ?? ((text: string) => console.log(text));
  const err = context.err ?? ((text: string) => console.error(text));
  const setExitCode =
    context.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });
  const adb = (): AdbClient =>
    context.adb ?? new AdbClient({ adbPath: Config.ADB_PATH, timeoutMs: Config.ADB_TIMEOUT * 1000 });

  /** Validates model settings; prints and returns null on failure. */
  function modelClient(): ChatCompleter | null {
    try {
      Config.validate();
    } catch (e) {
      err(`Configuration Error: ${errorMessage(e)}`);
      setExitCode(1);
      return null;
    }
    return context.chat ?? createChatClient({ baseUrl: Config.VLLM_BASE_URL, apiKey: Config.VLLM_API_KEY });
  }

  /** Null when no Confluence settings are present; throws when they are incomplete. */
  function confluenceClient(): ConfluenceClient | null {
    if (!Config.CONFLUENCE_BASE_URL && !Config.CONFLUENCE_USERNAME && !Config.CONFLUENCE_PASSWORD) {
      return null;
    }
    return createConfluenceClient(Config, context.fetch);
  }

  async function targetDevice(client: AdbClient, requested?: string): Promise<string | null> {
    const serial = await client.resolveDevice(requested);
    if (!serial) {
      err("No Android device connected");
      setExitCode(1);
    }
    return serial;
  }

  const program = new Command();

  program
    .name("vla-android")
    .description("Vision-language-action agent for Android devices")
    .version("0.1.0");

  program
    .command("run", { isDefault: true })
    .description("Carry out a natural-language task on the device")
    .argument("<task>", "Task to accomplish")
    .option("-d, --device <serial>", "Device serial")
    .option("-s, --steps <n>", "Max steps", String(Config.MAX_STEPS))
    .option("-q, --quiet", "Quiet mode", false)
    .action(async (task: string, options: { device?: string; steps: string; quiet: boolean }) => {
      const chat = modelClient();
      if (!chat) return;
      const client = adb();
      const serial = await targetDevice(client, options.device);
      if (!serial) return;

      const maxSteps = Number.parseInt(options.steps, 10);
      if (!Number.isInteger(maxSteps) || maxSteps < 1) {
        err(`Invalid step count: ${options.steps}`);
        setExitCode(1);
        return;
      }

      const agent = new VlaAgent({
        task,
        ...buildComponents(client, chat, serial),
        deviceSerial: serial,
        maxSteps,
        stepDelayMs: Config.STEP_DELAY * 1000,
        screenshotDelayMs: Config.SCREENSHOT_DELAY * 1000,
        historyWindow: Config.HISTORY_LENGTH,
        verbose: !options.quiet,
        logger: new SessionLogger(Config.LOG_DIR, {
          task,
          device: serial,
          vlmModel: Config.VLM_MODEL,
          llmModel: Config.LLM_MODEL,
        }),
        write: out,
      });

      const onInterrupt = (): void => agent.stop();
      process.once("SIGINT", onInterrupt);
      let result: AgentResult;
      try {
        result = await agent.run();
      } finally {
        process.removeListener("SIGINT", onInterrupt);
      }

      out(`\n${formatResult(result)}`);
      setExitCode(result.success ? 0 : 1);
    });

  program
    .command("devices")
    .description("List connected devices")
    .action(async () => {
      const envelope = await runTool(adb(), "list_android_devices", {});
      out(envelope);
    });

  program
    .command("tool")
    .description("Run one device tool and print its JSON result")
    .argument("[name]", "Tool name")
    .argument("[json]", "Arguments as a JSON object")
    .option("-l, --list", "List available tools", false)
    .action(async (name: string | undefined, json: string | undefined, options: { list: boolean }) => {
      if (options.list || !name) {
        for (const tool of TOOLS) {
          out(`${tool.name.padEnd(26)}${tool.description}`);
        }
        return;
      }

      const args = parseToolArgs(json);
      if (!args) {
        err("Arguments must be a JSON object");
        setExitCode(1);
        return;
      }

      const envelope = await runTool(adb(), name, args);
      out(envelope);
      const parsed: unknown = JSON.parse(envelope);
      const ok = typeof parsed === "object" && parsed !== null && "success" in parsed && parsed.success === true;
      setExitCode(ok ? 0 : 1);
    });

  program
    .command("screen")
    .description("Capture and analyze the current screen")
    .option("-d, --device <serial>", "Device serial")
    .action(async (options: { device?: string }) => {
      const chat = modelClient();
      if (!chat) return;
      const client = adb();
      const serial = await targetDevice(client, options.device);
      if (!serial) return;

      const { perception } = buildComponents(client, chat, serial);
      const state = await perception.captureAndAnalyze();
      out(uiStateToJson(state));
    });

  program
    .command("verify")
    .description("Ask the language model whether a task looks complete on screen")
    .argument("<task>", "Task to check")
    .option("-d, --device <serial>", "Device serial")
    .action(async (task: string, options: { device?: string }) => {
      const chat = modelClient();
      if (!chat) return;
      const client = adb();
      const serial = await targetDevice(client, options.device);
      if (!serial) return;

      const { perception, planner } = buildComponents(client, chat, serial);
      const state = await perception.captureAndAnalyze();
      const verdict = await planner.evaluateCompletion(task, state, []);
      out(JSON.stringify(verdict, null, 2));
      setExitCode(isCompletionConfident(verdict, Config.COMPLETION_CONFIDENCE) ? 0 : 1);
    });

  program
    .command("confluence")
    .description("Run one Confluence tool and print its output")
    .argument("[name]", "Tool name")
    .argument("[json]", "Arguments as a JSON object")
    .option("-l, --list", "List available tools", false)
    .action(async (name: string | undefined, json: string | undefined, options: { list: boolean }) => {
      if (options.list || !name) {
        for (const tool of CONFLUENCE_TOOLS) {
          out(`${tool.name.padEnd(30)}${tool.description}`);
        }
        return;
      }

      const tool = findConfluenceTool(name);
      if (!tool) {
        err(`Unknown tool: ${name}`);
        setExitCode(1);
        return;
      }
      const args = parseToolArgs(json);
      if (!args) {
        err("Arguments must be a JSON object");
        setExitCode(1);
        return;
      }

      let client: ConfluenceClient | null;
      try {
        client = confluenceClient();
      } catch (e) {
        err(`Configuration Error: ${errorMessage(e)}`);
        setExitCode(1);
        return;
      }
      if (!client) {
        err("Configuration Error: CONFLUENCE_BASE_URL is not set");
        setExitCode(1);
        return;
      }

      const reply = await tool.invoke(client, args);
      (reply.isError ? err : out)(reply.text);
      setExitCode(reply.isError ? 1 : 0);
    });

  program
    .command("mcp")
    .description("Serve the device tools, and the Confluence tools when configured, over MCP on stdio")
    .action(async () => {
      let confluence: ConfluenceClient | null;
      try {
        confluence = confluenceClient();
      } catch (e) {
        err(`Configuration Error: ${errorMessage(e)}`);
        setExitCode(1);
        return;
      }

      const server = createToolServer({ adb: adb(), confluence: confluence ?? undefined });
      const count = TOOLS.length + (confluence ? CONFLUENCE_TOOLS.length : 0);
      // stdout carries the protocol
      err(`MCP server on stdio with ${count} tools${confluence ? "" : " (Confluence not configured)"}`);
      await (context.serve ?? serveStdio)(server);
    });

  return program;
}
