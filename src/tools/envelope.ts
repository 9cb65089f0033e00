/**
 * JSON response envelopes shared by every device tool.
 *
 *   { "success": true, ...payload, "device": "<serial>" }
 *   { "success": false, "error": "<text>" }
 */

import { homedir } from "os";
import { join } from "path";
import { z } from "zod";
import type { AdbClient } from "../adb.js";
import { errorMessage } from "../errors.js";

export function success(payload: Record<string, unknown> = {}): string {
  return JSON.stringify({ success: true, ...payload });
}

export function failure(error: string, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({ success: false, error, ...extra });
}

/** Every tool accepts an optional target device. */
export const deviceArgs = {
  deviceSerial: z.string().optional(),
};

/**
 * Resolves the target device and runs `fn` against a client bound to it.
 * Anything `fn` throws becomes a failure envelope.
 */
export async function withDevice(
  adb: AdbClient,
  deviceSerial: string | undefined,
  fn: (device: AdbClient, serial: string) => Promise<string>
): Promise<string> {
  const serial = await adb.resolveDevice(deviceSerial);
  if (!serial) {
    return failure("No devices connected");
  }
  try {
    return await fn(adb.forDevice(serial), serial);
  } catch (err) {
    return failure(errorMessage(err));
  }
}

/** Wraps a value in single quotes for the device shell. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function formatSize(bytes: number): string {
  if (bytes >= 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  if (bytes >= 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${bytes} B`;
}

/** Expands a leading `~` to the user's home directory. */
export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}
