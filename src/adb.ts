/**
 * Device command channel: thin wrapper around the adb binary.
 *
 * Every call resolves to a { success, stdout, stderr } triple. Nothing here
 * throws; callers decide how a failed command surfaces.
 */

import { execFile } from "child_process";
import { errorMessage } from "./errors.js";

export interface AdbResult {
  success: boolean;
  stdout: string;
  stderr: string;
}

export interface AdbDevice {
  serial: string;
  status: string;
}

export interface CommandOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/** Spawns a process and collects its output. Rejects only when it cannot be started. */
export type CommandRunner = (
  file: string,
  args: string[],
  timeoutMs: number
) => Promise<CommandOutput>;

export interface AdbClientOptions {
  adbPath: string;
  serial?: string;
  timeoutMs: number;
  runner?: CommandRunner;
}

const MAX_OUTPUT_BYTES = 32 * 1024 * 1024;

export const execFileRunner: CommandRunner = (file, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { timeout: timeoutMs, maxBuffer: MAX_OUTPUT_BYTES, encoding: "utf-8" },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }
        // A string code (ENOENT, EACCES) means the process never ran
        if (typeof error.code === "string") {
          reject(error);
          return;
        }
        resolve({
          exitCode: typeof error.code === "number" ? error.code : 1,
          stdout,
          stderr,
          timedOut: error.killed === true && error.signal === "SIGTERM",
        });
      }
    );
  });

export class AdbClient {
  readonly serial: string | undefined;
  private readonly adbPath: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(options: AdbClientOptions) {
    this.adbPath = options.adbPath;
    this.serial = options.serial;
    this.timeoutMs = options.timeoutMs;
    this.runner = options.runner ?? execFileRunner;
  }

  /** Returns a client bound to `serial` that shares this client's settings. */
  forDevice(serial: string | undefined): AdbClient {
    if (serial === this.serial) return this;
    return new AdbClient({
      adbPath: this.adbPath,
      serial,
      timeoutMs: this.timeoutMs,
      runner: this.runner,
    });
  }

  async run(args: string[], options: { timeoutMs?: number } = {}): Promise<AdbResult> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const fullArgs = this.serial ? ["-s", this.serial, ...args] : args;

    try {
      const output = await this.runner(this.adbPath, fullArgs, timeoutMs);
      if (output.timedOut) {
        return {
          success: false,
          stdout: output.stdout.trim(),
          stderr: `Command timed out after ${Math.round(timeoutMs / 1000)}s`,
        };
      }
      return {
        success: output.exitCode === 0,
        stdout: output.stdout.trim(),
        stderr: output.stderr.trim(),
      };
    } catch (err) {
      return { success: false, stdout: "", stderr: errorMessage(err) };
    }
  }

  shell(command: string, options: { timeoutMs?: number } = {}): Promise<AdbResult> {
    return this.run(["shell", command], options);
  }

  /**
   * Lists attached devices from `adb devices`. Empty on failure.
   */
  async listDevices(): Promise<AdbDevice[]> {
    // Device selection must not be scoped to a serial
    const unbound = this.forDevice(undefined);
    const { success, stdout } = await unbound.run(["devices"]);
    if (!success) return [];

    const devices: AdbDevice[] = [];
    // First line is the "List of devices attached" header
    for (const line of stdout.split("\n").slice(1)) {
      const parts = line.trim().split(/\s+/);
      if (parts.length >= 2 && parts[0]) {
        devices.push({ serial: parts[0], status: parts[1] });
      }
    }
    return devices;
  }

  /**
   * Picks the serial to talk to: the explicit one, the bound one,
   * or the first device that is online.
   */
  async resolveDevice(serial?: string): Promise<string | null> {
    if (serial) return serial;
    if (this.serial) return this.serial;
    const devices = await this.listDevices();
    const online = devices.find((d) => d.status === "device");
    return online?.serial ?? null;
  }
}
