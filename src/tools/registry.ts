/**
 * Tool registry: every device tool with its name, description and
 * argument schema, plus the subset the executor drives.
 */

import type { z } from "zod";
import type { AdbClient } from "../adb.js";
import { failure } from "./envelope.js";
import * as apps from "./app-control.js";
import * as devices from "./device-manager.js";
import * as diagnostics from "./diagnostics.js";
import * as files from "./file-ops.js";
import * as ui from "./ui-automation.js";

export interface DeviceTool {
  name: string;
  description: string;
  schema: z.AnyZodObject;
  /** Validates raw arguments, then runs the tool. Always resolves to an envelope. */
  invoke(adb: AdbClient, rawArgs: unknown): Promise<string>;
}

function defineTool<S extends z.AnyZodObject>(
  name: string,
  description: string,
  schema: S,
  run: (adb: AdbClient, args: z.output<S>) => Promise<string>
): DeviceTool {
  return {
    name,
    description,
    schema,
    async invoke(adb, rawArgs) {
      const parsed = schema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues.map(
          (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
        );
        return failure(`Invalid arguments for ${name}: ${issues.join("; ")}`);
      }
      return run(adb, parsed.data);
    },
  };
}

export const TOOLS: readonly DeviceTool[] = [
  // UI automation
  defineTool("tap", "Tap on screen coordinates", ui.tapArgs, ui.tap),
  defineTool("long_press", "Long press on screen coordinates", ui.longPressArgs, ui.longPress),
  defineTool("swipe", "Swipe from one point to another", ui.swipeArgs, ui.swipe),
  defineTool("drag", "Drag from one point to another (slow swipe for drag-and-drop)", ui.dragArgs, ui.drag),
  defineTool("input_text", "Type text into the focused field", ui.inputTextArgs, ui.inputText),
  defineTool("press_key", "Press a key by name (KEYCODE_HOME) or number (3)", ui.pressKeyArgs, ui.pressKey),
  defineTool("get_ui_hierarchy", "Dump the accessibility hierarchy of the current screen", ui.uiHierarchyArgs, ui.getUiHierarchy),

  // Diagnostics
  defineTool("take_screenshot", "Capture a screenshot to a local PNG", diagnostics.takeScreenshotArgs, diagnostics.takeScreenshot),

  // App control
  defineTool("list_installed_packages", "List installed packages (all, system, 3rdparty, enabled, disabled)", apps.listPackagesArgs, apps.listInstalledPackages),
  defineTool("get_app_info", "Version and install details of a package", apps.packageArgs, apps.getAppInfo),
  defineTool("install_apk", "Install a local APK file", apps.installApkArgs, apps.installApk),
  defineTool("uninstall_app", "Uninstall a package", apps.packageArgs, apps.uninstallApp),
  defineTool("start_app", "Launch a package's launcher activity", apps.packageArgs, apps.startApp),
  defineTool("stop_app", "Force stop a package", apps.packageArgs, apps.stopApp),
  defineTool("clear_app_data", "Clear a package's data and cache", apps.packageArgs, apps.clearAppData),

  // Device manager
  defineTool("list_android_devices", "List connected devices with model and Android version", devices.noArgs, (adb) => devices.listAndroidDevices(adb)),
  defineTool("get_device_info", "Device properties and current status", devices.deviceOnlyArgs, devices.getDeviceInfo),
  defineTool("get_device_battery_info", "Battery level, status and health", devices.deviceOnlyArgs, devices.getDeviceBatteryInfo),
  defineTool("get_device_screen_info", "Screen resolution, density, state and orientation", devices.deviceOnlyArgs, devices.getDeviceScreenInfo),
  defineTool("reboot_device", "Reboot to normal, recovery or bootloader mode", devices.rebootArgs, devices.rebootDevice),

  // File operations
  defineTool("list_files", "List a directory on the device", files.pathArgs, files.listFiles),
  defineTool("pull_file", "Copy a file from the device", files.pullFileArgs, files.pullFile),
  defineTool("push_file", "Copy a file to the device", files.pushFileArgs, files.pushFile),
  defineTool("delete_file", "Delete a file or directory on the device", files.pathArgs, files.deleteFile),
  defineTool("create_directory", "Create a directory (with parents) on the device", files.pathArgs, files.createDirectory),
  defineTool("file_exists", "Check whether a path exists and its type", files.pathArgs, files.fileExists),
  defineTool("read_file", "Read a text file up to maxSize bytes", files.readFileArgs, files.readFile),
  defineTool("write_file", "Write text to a file, creating parent directories", files.writeFileArgs, files.writeFile),
  defineTool("file_stats", "Permissions, owner, size and counts for a path", files.pathArgs, files.fileStats),

  // App databases (debuggable apps or rooted devices)
  defineTool("list_app_databases", "List an app's database files", files.appDatabasesArgs, files.listAppDatabases),
  defineTool("pull_app_database", "Copy an app's SQLite database and its journals to a local directory", files.pullAppDatabaseArgs, files.pullAppDatabase),
];

export function findTool(name: string): DeviceTool | undefined {
  return TOOLS.find((tool) => tool.name === name);
}

/** Runs a tool by name. Unknown names and invalid arguments become failure envelopes. */
export function runTool(adb: AdbClient, name: string, rawArgs: unknown): Promise<string> {
  const tool = findTool(name);
  if (!tool) {
    return Promise.resolve(failure(`Unknown tool: ${name}`));
  }
  return tool.invoke(adb, rawArgs);
}

// ===========================================
// Executor-facing toolset
// ===========================================

/** The device operations the executor dispatches actions to. */
export interface DeviceToolset {
  tap(args: ui.TapArgs): Promise<string>;
  longPress(args: ui.LongPressArgs): Promise<string>;
  swipe(args: ui.SwipeArgs): Promise<string>;
  drag(args: ui.SwipeArgs): Promise<string>;
  inputText(args: ui.InputTextArgs): Promise<string>;
  pressKey(args: ui.PressKeyArgs): Promise<string>;
  startApp(args: apps.PackageArgs): Promise<string>;
}

export function createDeviceToolset(adb: AdbClient): DeviceToolset {
  return {
    tap: (args) => ui.tap(adb, args),
    longPress: (args) => ui.longPress(adb, args),
    swipe: (args) => ui.swipe(adb, args),
    drag: (args) => ui.drag(adb, args),
    inputText: (args) => ui.inputText(adb, args),
    pressKey: (args) => ui.pressKey(adb, args),
    startApp: (args) => apps.startApp(adb, args),
  };
}
