/**
 * App control tools: listing, inspecting, installing, launching and
 * stopping packages.
 */

import { existsSync } from "fs";
import { basename } from "path";
import { z } from "zod";
import type { AdbClient } from "../adb.js";
import { INSTALL_TIMEOUT, UNINSTALL_TIMEOUT } from "../constants.js";
import { deviceArgs, expandHome, failure, success, withDevice } from "./envelope.js";

const PACKAGE_NAME = /^[A-Za-z0-9_]+(\.[A-Za-z0-9_]+)*$/;

const PACKAGE_FILTER_FLAGS = {
  all: "",
  system: "-s",
  "3rdparty": "-3",
  enabled: "-e",
  disabled: "-d",
} as const;

// ===========================================
// Argument schemas
// ===========================================

export const listPackagesArgs = z.object({
  filter: z.enum(["all", "system", "3rdparty", "enabled", "disabled"]).default("all"),
  ...deviceArgs,
});

export const packageArgs = z.object({
  packageName: z.string().min(1),
  ...deviceArgs,
});

export const installApkArgs = z.object({
  apkPath: z.string().min(1),
  ...deviceArgs,
});

export type ListPackagesArgs = z.infer<typeof listPackagesArgs>;
export type PackageArgs = z.infer<typeof packageArgs>;
export type InstallApkArgs = z.infer<typeof installApkArgs>;

// ===========================================
// Helpers
// ===========================================

/** Package names from `pm list packages` output ("package:com.example.app"). */
export function parsePackageList(output: string): string[] {
  const packages: string[] = [];
  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    if (trimmed.startsWith("package:")) {
      const name = trimmed.slice("package:".length).trim();
      if (name) packages.push(name);
    }
  }
  return packages;
}

async function isInstalled(device: AdbClient, packageName: string): Promise<boolean> {
  const { stdout } = await device.shell(`pm list packages ${packageName}`);
  return parsePackageList(stdout).includes(packageName);
}

/** A failure envelope for a malformed package name, or null. */
export function invalidPackage(packageName: string): string | null {
  return PACKAGE_NAME.test(packageName) ? null : failure(`Invalid package name: ${packageName}`);
}

export interface AppInfo {
  packageName: string;
  versionName?: string;
  versionCode?: string;
  firstInstallTime?: string;
  lastUpdateTime?: string;
  installer?: string;
}

/** Picks the fields of interest out of `dumpsys package <name>`. First occurrence wins. */
export function parseAppInfo(packageName: string, output: string): AppInfo {
  const info: AppInfo = { packageName };
  const token = (line: string, key: string): string => line.split(key)[1]?.trim().split(/\s+/)[0] ?? "";
  const rest = (line: string, key: string): string => line.split(key)[1]?.trim() ?? "";

  for (const raw of output.split("\n")) {
    const line = raw.trim();
    if (line.includes("versionName=")) info.versionName ??= token(line, "versionName=");
    if (line.includes("versionCode=")) info.versionCode ??= token(line, "versionCode=");
    if (line.includes("firstInstallTime=")) info.firstInstallTime ??= rest(line, "firstInstallTime=");
    if (line.includes("lastUpdateTime=")) info.lastUpdateTime ??= rest(line, "lastUpdateTime=");
    if (line.includes("installerPackageName=")) info.installer ??= rest(line, "installerPackageName=");
  }
  return info;
}

// ===========================================
// Tools
// ===========================================

export function listInstalledPackages(adb: AdbClient, args: ListPackagesArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const command = `pm list packages ${PACKAGE_FILTER_FLAGS[args.filter]}`.trim();
    const result = await device.shell(command);
    if (!result.success || !result.stdout) {
      return failure(result.stderr || "Failed to list packages");
    }

    const packages = parsePackageList(result.stdout);
    return success({ filter: args.filter, count: packages.length, packages, device: serial });
  });
}

export function getAppInfo(adb: AdbClient, args: PackageArgs): Promise<string> {
  const invalid = invalidPackage(args.packageName);
  if (invalid) return Promise.resolve(invalid);

  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const result = await device.shell(`dumpsys package ${args.packageName}`);
    if (!result.success || !result.stdout || result.stdout.includes("Unable to find package")) {
      return failure(`Package '${args.packageName}' not found on device`);
    }
    return success({ appInfo: parseAppInfo(args.packageName, result.stdout), device: serial });
  });
}

export function installApk(adb: AdbClient, args: InstallApkArgs): Promise<string> {
  const apkPath = expandHome(args.apkPath);
  if (!existsSync(apkPath)) {
    return Promise.resolve(failure(`APK file not found: ${apkPath}`));
  }
  if (!apkPath.endsWith(".apk")) {
    return Promise.resolve(failure("File must be an APK (.apk extension)"));
  }

  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const result = await device.run(["install", "-r", apkPath], {
      timeoutMs: INSTALL_TIMEOUT * 1000,
    });
    if (result.success && result.stdout.includes("Success")) {
      return success({ message: `Successfully installed ${basename(apkPath)}`, device: serial });
    }
    return failure(result.stderr || result.stdout || "Unknown installation error", { device: serial });
  });
}

export function uninstallApp(adb: AdbClient, args: PackageArgs): Promise<string> {
  const invalid = invalidPackage(args.packageName);
  if (invalid) return Promise.resolve(invalid);

  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    if (!(await isInstalled(device, args.packageName))) {
      return failure(`Package not found: ${args.packageName}`);
    }

    const result = await device.run(["uninstall", args.packageName], {
      timeoutMs: UNINSTALL_TIMEOUT * 1000,
    });
    if (result.success && result.stdout.includes("Success")) {
      return success({ message: `Successfully uninstalled ${args.packageName}`, device: serial });
    }
    return failure(result.stderr || result.stdout || "Unknown uninstallation error", {
      device: serial,
    });
  });
}

/**
 * Launches the package's launcher activity through monkey, which needs
 * no activity name.
 */
export function startApp(adb: AdbClient, args: PackageArgs): Promise<string> {
  const invalid = invalidPackage(args.packageName);
  if (invalid) return Promise.resolve(invalid);

  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const result = await device.shell(
      `monkey -p ${args.packageName} -c android.intent.category.LAUNCHER 1`
    );
    if (result.stdout.includes("Events injected: 1")) {
      return success({ message: `Successfully launched ${args.packageName}`, device: serial });
    }

    if (!(await isInstalled(device, args.packageName))) {
      return failure(`Package not found: ${args.packageName}`);
    }
    return failure(result.stdout || result.stderr || "Failed to launch app", { device: serial });
  });
}

export function stopApp(adb: AdbClient, args: PackageArgs): Promise<string> {
  const invalid = invalidPackage(args.packageName);
  if (invalid) return Promise.resolve(invalid);

  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    if (!(await isInstalled(device, args.packageName))) {
      return failure(`Package not found: ${args.packageName}`);
    }

    const result = await device.shell(`am force-stop ${args.packageName}`);
    if (!result.success) {
      return failure(result.stderr || "Failed to stop app", { device: serial });
    }
    return success({ message: `Successfully stopped ${args.packageName}`, device: serial });
  });
}

export function clearAppData(adb: AdbClient, args: PackageArgs): Promise<string> {
  const invalid = invalidPackage(args.packageName);
  if (invalid) return Promise.resolve(invalid);

  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    if (!(await isInstalled(device, args.packageName))) {
      return failure(`Package not found: ${args.packageName}`);
    }

    const result = await device.shell(`pm clear ${args.packageName}`);
    if (result.stdout.includes("Success")) {
      return success({
        message: `Successfully cleared data for ${args.packageName}`,
        device: serial,
      });
    }
    return failure(result.stdout || result.stderr || "Failed to clear app data", {
      device: serial,
    });
  });
}
