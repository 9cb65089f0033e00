import { describe, expect, it } from "vitest";
import { createFakeAdb, ONE_DEVICE } from "../test-utils.js";
import {
  getDeviceInfo,
  getDeviceScreenInfo,
  listAndroidDevices,
  parseBatteryInfo,
  rebootDevice,
} from "./device-manager.js";

describe("parseBatteryInfo", () => {
  it("reads key/value lines and skips the header", () => {
    const output = [
      "Current Battery Service state:",
      "  AC powered: false",
      "  USB powered: true",
      "  status: 2",
      "  level: 87",
      "  health: 2",
    ].join("\n");

    expect(parseBatteryInfo(output)).toEqual({
      "AC powered": "false",
      "USB powered": "true",
      status: "2",
      level: "87",
      health: "2",
    });
  });
});

describe("listAndroidDevices", () => {
  it("adds properties for online devices only", async () => {
    const { adb } = createFakeAdb([
      ["devices", { stdout: "List of devices attached\nemulator-5554\tdevice\nR58\tunauthorized\n" }],
      ["shell getprop ro.product.manufacturer", { stdout: "Google" }],
      ["shell getprop ro.product.model", { stdout: "Pixel 7" }],
      ["shell getprop ro.build.version.release", { stdout: "14" }],
    ]);

    expect(JSON.parse(await listAndroidDevices(adb))).toEqual({
      success: true,
      count: 2,
      devices: [
        {
          serial: "emulator-5554",
          status: "device",
          manufacturer: "Google",
          model: "Pixel 7",
          androidVersion: "14",
        },
        { serial: "R58", status: "unauthorized" },
      ],
    });
  });

  it("succeeds with an empty list when nothing is attached", async () => {
    const { adb } = createFakeAdb([["devices", { stdout: "List of devices attached\n" }]]);

    expect(JSON.parse(await listAndroidDevices(adb))).toEqual({
      success: true,
      message: "No Android devices connected",
      count: 0,
      devices: [],
    });
  });
});

describe("getDeviceInfo", () => {
  it("rejects a serial that is not attached", async () => {
    const { adb } = createFakeAdb([ONE_DEVICE]);

    expect(JSON.parse(await getDeviceInfo(adb, { deviceSerial: "xyz" }))).toEqual({
      success: false,
      error: "Device xyz not found",
      availableDevices: ["emulator-5554"],
    });
  });
});

describe("getDeviceScreenInfo", () => {
  it("collects resolution, density and power state", async () => {
    const { adb } = createFakeAdb([
      ["shell wm size", { stdout: "Physical size: 1080x2400" }],
      ["shell wm density", { stdout: "Physical density: 420" }],
      ["shell dumpsys power | grep 'Display Power'", { stdout: "Display Power: state=ON" }],
    ]);

    expect(JSON.parse(await getDeviceScreenInfo(adb, { deviceSerial: "abc" }))).toEqual({
      success: true,
      screen: { resolution: "1080x2400", density: "420", screenOn: "ON" },
      device: "abc",
    });
  });
});

describe("rebootDevice", () => {
  it("passes the mode to adb reboot", async () => {
    const { adb, calls } = createFakeAdb();

    const envelope = JSON.parse(await rebootDevice(adb, { mode: "recovery", deviceSerial: "abc" }));

    expect(calls).toEqual([["-s", "abc", "reboot", "recovery"]]);
    expect(envelope).toEqual({
      success: true,
      message: "Device abc rebooting to recovery mode",
      mode: "recovery",
      device: "abc",
    });
  });

  it("sends a bare reboot for normal mode", async () => {
    const { adb, calls } = createFakeAdb();

    await rebootDevice(adb, { mode: "normal", deviceSerial: "abc" });

    expect(calls).toEqual([["-s", "abc", "reboot"]]);
  });
});
