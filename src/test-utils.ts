/**
 * In-process stand-ins for the adb binary and the model server, shared by tests.
 */

import { AdbClient, type CommandOutput, type CommandRunner } from "./adb.js";
import type { ChatCompleter, ChatRequest } from "./model-client.js";

export type AdbReply = Partial<CommandOutput> | Error | ((command: string) => Partial<CommandOutput>);

export type AdbRule = [pattern: string | RegExp, reply: AdbReply];

export interface FakeAdb {
  adb: AdbClient;
  /** Full argument lists, including any `-s <serial>` prefix. */
  calls: string[][];
  /** Argument lists with the `-s <serial>` prefix removed, joined by spaces. */
  commands: () => string[];
}

function stripSerial(args: string[]): string[] {
  return args[0] === "-s" ? args.slice(2) : args;
}

/**
 * Builds an AdbClient whose runner answers from `rules`. The first rule whose
 * pattern matches the command (exact string or regex) wins; unmatched commands
 * succeed with empty output. Commands are matched without the `-s <serial>`
 * prefix, arguments joined by spaces.
 */
export function createFakeAdb(rules: AdbRule[] = [], serial?: string): FakeAdb {
  const calls: string[][] = [];
  const runner: CommandRunner = async (_file, args) => {
    calls.push(args);
    const command = stripSerial(args).join(" ");
    for (const [pattern, reply] of rules) {
      const matched = typeof pattern === "string" ? pattern === command : pattern.test(command);
      if (!matched) continue;
      if (reply instanceof Error) throw reply;
      const output = typeof reply === "function" ? reply(command) : reply;
      return { exitCode: 0, stdout: "", stderr: "", timedOut: false, ...output };
    }
    return { exitCode: 0, stdout: "", stderr: "", timedOut: false };
  };

  return {
    adb: new AdbClient({ adbPath: "adb", serial, timeoutMs: 30_000, runner }),
    calls,
    commands: () => calls.map((args) => stripSerial(args).join(" ")),
  };
}

/** A devices listing with one online emulator. */
export const ONE_DEVICE: AdbRule = [
  "devices",
  { stdout: "List of devices attached\nemulator-5554\tdevice\n" },
];

export type ChatReply = string | Error | ((request: ChatRequest) => string);

/**
 * Chat client that replays scripted replies in order and records every request.
 * The last reply repeats once the script runs out.
 */
export class ScriptedChat implements ChatCompleter {
  readonly requests: ChatRequest[] = [];
  private readonly replies: ChatReply[];

  constructor(...replies: ChatReply[]) {
    this.replies = replies;
  }

  async complete(request: ChatRequest): Promise<string> {
    this.requests.push(request);
    const index = Math.min(this.requests.length - 1, this.replies.length - 1);
    const reply = this.replies[index];
    if (reply === undefined) throw new Error("ScriptedChat has no replies");
    if (reply instanceof Error) throw reply;
    return typeof reply === "function" ? reply(request) : reply;
  }
}

export interface FetchCall {
  method: string;
  /** Path with query string, without the origin. */
  path: string;
  headers: Record<string, string>;
  body: unknown;
}

export type FetchReply =
  | { status?: number; json?: unknown; text?: string; headers?: Record<string, string> }
  | ((call: FetchCall) => { status?: number; json?: unknown; text?: string; headers?: Record<string, string> });

export type FetchRule = [method: string, pattern: string | RegExp, reply: FetchReply];

export interface FakeFetch {
  fetch: typeof fetch;
  calls: FetchCall[];
}

/**
 * A fetch that answers from `rules`. Patterns match the request path
 * (without the query string); unmatched requests get a 404.
 */
export function createFakeFetch(rules: FetchRule[] = []): FakeFetch {
  const calls: FetchCall[] = [];
  const fakeFetch: typeof fetch = async (input, init) => {
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
    const body = init?.body;
    const call: FetchCall = {
      method: init?.method ?? "GET",
      path: `${url.pathname}${url.search}`,
      headers: Object.fromEntries(new Headers(init?.headers).entries()),
      body: typeof body === "string" ? JSON.parse(body) : undefined,
    };
    calls.push(call);

    for (const [method, pattern, reply] of rules) {
      const matched = typeof pattern === "string" ? pattern === url.pathname : pattern.test(url.pathname);
      if (method !== call.method || !matched) continue;
      const output = typeof reply === "function" ? reply(call) : reply;
      if (output.json !== undefined) {
        return new Response(JSON.stringify(output.json), {
          status: output.status ?? 200,
          headers: { "content-type": "application/json", ...output.headers },
        });
      }
      return new Response(output.text ?? "", { status: output.status ?? 200, headers: output.headers });
    }
    return new Response("Not Found", { status: 404 });
  };
  return { fetch: fakeFetch, calls };
}
