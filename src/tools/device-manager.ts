/**
 * Device discovery and status tools.
 */

import { z } from "zod";
import type { AdbClient } from "../adb.js";
import { deviceArgs, failure, success, withDevice } from "./envelope.js";

const DEVICE_PROPERTIES = {
  manufacturer: "ro.product.manufacturer",
  model: "ro.product.model",
  brand: "ro.product.brand",
  device: "ro.product.device",
  androidVersion: "ro.build.version.release",
  sdkVersion: "ro.build.version.sdk",
  buildId: "ro.build.id",
  serial: "ro.serialno",
} as const;

export type DeviceProperties = Record<keyof typeof DEVICE_PROPERTIES, string>;

export interface DeviceStatus {
  batteryLevel?: string;
  batteryStatus?: string;
  screenOn: "ON" | "OFF";
  wifiEnabled: boolean;
}

// ===========================================
// Argument schemas
// ===========================================

export const noArgs = z.object({});
export const deviceOnlyArgs = z.object({ ...deviceArgs });
export const rebootArgs = z.object({
  mode: z.enum(["normal", "recovery", "bootloader"]).default("normal"),
  ...deviceArgs,
});

export type DeviceOnlyArgs = z.infer<typeof deviceOnlyArgs>;
export type RebootArgs = z.infer<typeof rebootArgs>;

// ===========================================
// Helpers
// ===========================================

async function getprop(device: AdbClient, property: string): Promise<string> {
  const { success: ok, stdout } = await device.shell(`getprop ${property}`);
  return ok && stdout ? stdout : "Unknown";
}

export async function getDeviceProperties(device: AdbClient): Promise<DeviceProperties> {
  const read = (key: keyof typeof DEVICE_PROPERTIES): Promise<string> =>
    getprop(device, DEVICE_PROPERTIES[key]);
  return {
    manufacturer: await read("manufacturer"),
    model: await read("model"),
    brand: await read("brand"),
    device: await read("device"),
    androidVersion: await read("androidVersion"),
    sdkVersion: await read("sdkVersion"),
    buildId: await read("buildId"),
    serial: await read("serial"),
  };
}

/** `key: value` lines of `dumpsys battery`, keys as printed. */
export function parseBatteryInfo(output: string): Record<string, string> {
  const battery: Record<string, string> = {};
  for (const raw of output.split("\n")) {
    const line = raw.trim();
    const colon = line.indexOf(":");
    if (colon <= 0) continue;
    const value = line.slice(colon + 1).trim();
    // Section headers ("Current Battery Service state:") carry no value
    if (!value) continue;
    battery[line.slice(0, colon).trim()] = value;
  }
  return battery;
}

async function isScreenOn(device: AdbClient): Promise<"ON" | "OFF"> {
  const { stdout } = await device.shell("dumpsys power | grep 'Display Power'");
  return stdout.includes("state=ON") ? "ON" : "OFF";
}

async function getDeviceStatus(device: AdbClient): Promise<DeviceStatus> {
  const battery = await device.shell("dumpsys battery");
  const parsed: Record<string, string> = battery.success ? parseBatteryInfo(battery.stdout) : {};
  const wifi = await device.shell("dumpsys wifi | grep 'Wi-Fi is'");

  return {
    batteryLevel: parsed["level"],
    batteryStatus: parsed["status"],
    screenOn: await isScreenOn(device),
    wifiEnabled: wifi.stdout.toLowerCase().includes("enabled"),
  };
}

// ===========================================
// Tools
// ===========================================

export async function listAndroidDevices(adb: AdbClient): Promise<string> {
  const devices = await adb.listDevices();
  if (devices.length === 0) {
    return success({ message: "No Android devices connected", count: 0, devices: [] });
  }

  const list: Array<Record<string, string>> = [];
  for (const { serial, status } of devices) {
    // Offline and unauthorized devices cannot answer getprop
    if (status !== "device") {
      list.push({ serial, status });
      continue;
    }
    const props = await getDeviceProperties(adb.forDevice(serial));
    list.push({
      serial,
      status,
      manufacturer: props.manufacturer,
      model: props.model,
      androidVersion: props.androidVersion,
    });
  }
  return success({ count: list.length, devices: list });
}

export async function getDeviceInfo(adb: AdbClient, args: DeviceOnlyArgs): Promise<string> {
  if (args.deviceSerial) {
    const devices = await adb.listDevices();
    if (!devices.some((d) => d.serial === args.deviceSerial)) {
      return failure(`Device ${args.deviceSerial} not found`, {
        availableDevices: devices.map((d) => d.serial),
      });
    }
  }

  return withDevice(adb, args.deviceSerial, async (device, serial) =>
    success({
      properties: await getDeviceProperties(device),
      currentStatus: await getDeviceStatus(device),
      device: serial,
    })
  );
}

export function getDeviceBatteryInfo(adb: AdbClient, args: DeviceOnlyArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const result = await device.shell("dumpsys battery");
    if (!result.success || !result.stdout) {
      return failure("Failed to get battery info");
    }
    return success({ battery: parseBatteryInfo(result.stdout), device: serial });
  });
}

export function getDeviceScreenInfo(adb: AdbClient, args: DeviceOnlyArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const screen: Record<string, string> = {};

    const size = await device.shell("wm size");
    const resolution = size.stdout.match(/Physical size:\s*(\S+)/);
    if (resolution?.[1]) screen.resolution = resolution[1];

    const density = await device.shell("wm density");
    const dpi = density.stdout.match(/Physical density:\s*(\S+)/);
    if (dpi?.[1]) screen.density = dpi[1];

    screen.screenOn = await isScreenOn(device);

    const orientation = await device.shell("dumpsys input | grep 'SurfaceOrientation'");
    if (orientation.stdout) screen.orientation = orientation.stdout;

    return success({ screen, device: serial });
  });
}

export function rebootDevice(adb: AdbClient, args: RebootArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const command = args.mode === "normal" ? ["reboot"] : ["reboot", args.mode];
    const result = await device.run(command);
    if (!result.success) {
      return failure(`Reboot command failed: ${result.stderr}`);
    }
    return success({
      message: `Device ${serial} rebooting to ${args.mode} mode`,
      mode: args.mode,
      device: serial,
    });
  });
}
