/**
 * Diagnostics tools.
 */

import { mkdirSync } from "fs";
import { dirname, join } from "path";
import { z } from "zod";
import type { AdbClient } from "../adb.js";
import { DEFAULT_SCREENSHOT_DIR, DEVICE_TOOL_SCREENSHOT_PATH } from "../constants.js";
import { deviceArgs, expandHome, failure, success, withDevice } from "./envelope.js";

export const takeScreenshotArgs = z.object({
  outputPath: z.string().optional(),
  ...deviceArgs,
});

export type TakeScreenshotArgs = z.infer<typeof takeScreenshotArgs>;

/**
 * Captures the screen to a device temp file, pulls it to `outputPath`
 * (default `vla_screenshots/screenshot_<ms>.png`) and removes the temp file.
 */
export function takeScreenshot(adb: AdbClient, args: TakeScreenshotArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const outputPath = args.outputPath
      ? expandHome(args.outputPath)
      : join(DEFAULT_SCREENSHOT_DIR, `screenshot_${Date.now()}.png`);
    mkdirSync(dirname(outputPath), { recursive: true });

    const capture = await device.run(["shell", "screencap", "-p", DEVICE_TOOL_SCREENSHOT_PATH]);
    if (!capture.success) {
      return failure(`Failed to capture: ${capture.stderr}`);
    }

    const pull = await device.run(["pull", DEVICE_TOOL_SCREENSHOT_PATH, outputPath]);
    if (!pull.success) {
      return failure(`Failed to pull: ${pull.stderr}`);
    }

    await device.run(["shell", "rm", DEVICE_TOOL_SCREENSHOT_PATH]);

    return success({ path: outputPath, device: serial });
  });
}
