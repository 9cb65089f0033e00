/**
 * File operations on the device's storage, and transfers to and from it.
 */

import { existsSync, mkdirSync, statSync } from "fs";
import { dirname, join, posix } from "path";
import { z } from "zod";
import type { AdbClient } from "../adb.js";
import { FILE_TRANSFER_TIMEOUT } from "../constants.js";
import {
  deviceArgs,
  expandHome,
  failure,
  formatSize,
  shellQuote,
  success,
  withDevice,
} from "./envelope.js";
import { invalidPackage } from "./app-control.js";

export interface FileEntry {
  name: string;
  permissions: string;
  owner?: string;
  group?: string;
  sizeBytes: number;
  sizeFormatted: string;
  modified?: string;
  isDirectory: boolean;
  isLink: boolean;
}

// ===========================================
// Argument schemas
// ===========================================

export const pathArgs = z.object({
  path: z.string().min(1),
  ...deviceArgs,
});

export const pullFileArgs = z.object({
  remotePath: z.string().min(1),
  localPath: z.string().min(1),
  ...deviceArgs,
});

export const pushFileArgs = z.object({
  localPath: z.string().min(1),
  remotePath: z.string().min(1),
  ...deviceArgs,
});

export const readFileArgs = z.object({
  path: z.string().min(1),
  maxSize: z.number().int().positive().default(100_000),
  ...deviceArgs,
});

export const writeFileArgs = z.object({
  path: z.string().min(1),
  content: z.string(),
  ...deviceArgs,
});

export const appDatabasesArgs = z.object({
  packageName: z.string().min(1),
  ...deviceArgs,
});

export const pullAppDatabaseArgs = z.object({
  packageName: z.string().min(1),
  dbName: z.string().regex(/^[\w.-]+$/, "Database name must be a plain file name"),
  localDir: z.string().min(1).default("~/Downloads"),
  ...deviceArgs,
});

export type PathArgs = z.infer<typeof pathArgs>;
export type PullFileArgs = z.infer<typeof pullFileArgs>;
export type PushFileArgs = z.infer<typeof pushFileArgs>;
export type ReadFileArgs = z.infer<typeof readFileArgs>;
export type WriteFileArgs = z.infer<typeof writeFileArgs>;
export type AppDatabasesArgs = z.infer<typeof appDatabasesArgs>;
export type PullAppDatabaseArgs = z.infer<typeof pullAppDatabaseArgs>;

// ===========================================
// ls parsing
// ===========================================

// permissions links owner group size date name
// Dates come as "2024-01-15 10:30" (toybox) or "Jan 15 10:30" (busybox)
const LS_LINE =
  /^([bcdlps-][rwxsStT-]{9}\S*)\s+(\d+)\s+(\S+)\s+(\S+)\s+(\d+)\s+(\d{4}-\d{2}-\d{2}\s+[\d:]+|\w+\s+\d+\s+[\d:]+)\s+(.+)$/;

export function parseLsLine(line: string): FileEntry | null {
  if (!line.trim() || line.startsWith("total")) return null;

  const match = line.match(LS_LINE);
  if (match) {
    const [, permissions, , owner, group, size, modified, name] = match;
    const sizeBytes = Number(size);
    return {
      name,
      permissions,
      owner,
      group,
      sizeBytes,
      sizeFormatted: formatSize(sizeBytes),
      modified,
      isDirectory: permissions.startsWith("d"),
      isLink: permissions.startsWith("l"),
    };
  }

  // Unknown layout: fall back to whitespace columns
  const parts = line.trim().split(/\s+/);
  if (parts.length < 8) return null;
  const sizeBytes = Number.parseInt(parts[4], 10) || 0;
  return {
    name: parts.slice(7).join(" "),
    permissions: parts[0],
    sizeBytes,
    sizeFormatted: formatSize(sizeBytes),
    isDirectory: parts[0].startsWith("d"),
    isLink: parts[0].startsWith("l"),
  };
}

async function testPath(device: AdbClient, test: string, path: string): Promise<boolean> {
  const { stdout } = await device.shell(`[ ${test} ${shellQuote(path)} ] && echo 'yes' || echo 'no'`);
  return stdout.trim() === "yes";
}

// ===========================================
// Tools
// ===========================================

export function listFiles(adb: AdbClient, args: PathArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const result = await device.shell(`ls -la ${shellQuote(args.path)}`);
    const output = result.stdout;
    if (
      !result.success ||
      !output ||
      output.includes("No such file") ||
      output.includes("Permission denied")
    ) {
      return failure(output || result.stderr || `Cannot access ${args.path}`, { device: serial });
    }

    const directories: FileEntry[] = [];
    const files: FileEntry[] = [];
    for (const line of output.split("\n")) {
      const entry = parseLsLine(line);
      if (!entry || entry.name === "." || entry.name === "..") continue;
      (entry.isDirectory ? directories : files).push(entry);
    }

    return success({
      path: args.path,
      directories,
      files,
      totalDirectories: directories.length,
      totalFiles: files.length,
      device: serial,
    });
  });
}

export function pullFile(adb: AdbClient, args: PullFileArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const localPath = expandHome(args.localPath);
    mkdirSync(dirname(localPath), { recursive: true });

    const result = await device.run(["pull", args.remotePath, localPath], {
      timeoutMs: FILE_TRANSFER_TIMEOUT * 1000,
    });
    if (!result.success || !existsSync(localPath)) {
      return failure(result.stderr || result.stdout || "Failed to pull file", { device: serial });
    }

    const sizeBytes = statSync(localPath).size;
    return success({
      message: "Successfully pulled file",
      remotePath: args.remotePath,
      localPath,
      sizeBytes,
      sizeFormatted: formatSize(sizeBytes),
      device: serial,
    });
  });
}

export function pushFile(adb: AdbClient, args: PushFileArgs): Promise<string> {
  const localPath = expandHome(args.localPath);
  if (!existsSync(localPath)) {
    return Promise.resolve(failure(`Local file not found: ${localPath}`));
  }

  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const sizeBytes = statSync(localPath).size;
    const result = await device.run(["push", localPath, args.remotePath], {
      timeoutMs: FILE_TRANSFER_TIMEOUT * 1000,
    });
    if (!result.success) {
      return failure(result.stderr || result.stdout || "Failed to push file", { device: serial });
    }
    return success({
      message: "Successfully pushed file",
      localPath,
      remotePath: args.remotePath,
      sizeBytes,
      sizeFormatted: formatSize(sizeBytes),
      device: serial,
    });
  });
}

export function deleteFile(adb: AdbClient, args: PathArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    if (!(await testPath(device, "-e", args.path))) {
      return failure(`Path not found: ${args.path}`, { device: serial });
    }

    const isDirectory = await testPath(device, "-d", args.path);
    const removal = await device.shell(`rm ${isDirectory ? "-rf " : ""}${shellQuote(args.path)}`);

    if (await testPath(device, "-e", args.path)) {
      return failure(removal.stdout || removal.stderr || "Failed to delete", { device: serial });
    }
    return success({ message: `Successfully deleted ${args.path}`, device: serial });
  });
}

export function createDirectory(adb: AdbClient, args: PathArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const result = await device.shell(`mkdir -p ${shellQuote(args.path)}`);

    if (!(await testPath(device, "-d", args.path))) {
      return failure(result.stdout || result.stderr || "Failed to create directory", {
        device: serial,
      });
    }
    return success({
      message: `Successfully created directory ${args.path}`,
      path: args.path,
      device: serial,
    });
  });
}

export function fileExists(adb: AdbClient, args: PathArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const exists = await testPath(device, "-e", args.path);
    let type: "file" | "directory" | null = null;
    if (exists) {
      type = (await testPath(device, "-d", args.path)) ? "directory" : "file";
    }
    return success({ exists, path: args.path, type, device: serial });
  });
}

export function readFile(adb: AdbClient, args: ReadFileArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    if (!(await testPath(device, "-f", args.path))) {
      return failure(`File not found: ${args.path}`, { device: serial });
    }

    const size = await device.shell(`wc -c < ${shellQuote(args.path)}`);
    const sizeBytes = Number.parseInt(size.stdout, 10) || 0;
    if (sizeBytes > args.maxSize) {
      return failure(
        `File too large (${formatSize(sizeBytes)}). Max: ${formatSize(args.maxSize)}. Use pull_file instead.`,
        { sizeBytes, device: serial }
      );
    }

    const content = await device.shell(`cat ${shellQuote(args.path)}`);
    if (!content.success) {
      return failure(content.stderr || `Failed to read ${args.path}`, { device: serial });
    }
    return success({
      path: args.path,
      content: content.stdout,
      sizeBytes,
      sizeFormatted: formatSize(sizeBytes),
      device: serial,
    });
  });
}

export function fileStats(adb: AdbClient, args: PathArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    if (!(await testPath(device, "-e", args.path))) {
      return failure(`Path not found: ${args.path}`, { device: serial });
    }

    const isDirectory = await testPath(device, "-d", args.path);
    const stats: Record<string, unknown> = {
      path: args.path,
      type: isDirectory ? "directory" : "file",
    };

    // -d lists a directory itself rather than its contents
    const listing = await device.shell(`ls -lad ${shellQuote(args.path)}`);
    for (const line of listing.stdout.split("\n")) {
      const entry = parseLsLine(line);
      if (!entry) continue;
      stats.permissions = entry.permissions;
      stats.owner = entry.owner;
      stats.group = entry.group;
      stats.sizeBytes = entry.sizeBytes;
      stats.sizeFormatted = entry.sizeFormatted;
      stats.modified = entry.modified;
      break;
    }

    if (isDirectory) {
      const quoted = shellQuote(args.path);
      const fileCount = await device.shell(`find ${quoted} -type f 2>/dev/null | wc -l`);
      const dirCount = await device.shell(`find ${quoted} -type d 2>/dev/null | wc -l`);
      const files = Number.parseInt(fileCount.stdout, 10);
      const dirs = Number.parseInt(dirCount.stdout, 10);
      if (Number.isFinite(files)) stats.fileCount = files;
      // find lists the directory itself
      if (Number.isFinite(dirs)) stats.directoryCount = Math.max(0, dirs - 1);
    }

    return success({ ...stats, device: serial });
  });
}

export function writeFile(adb: AdbClient, args: WriteFileArgs): Promise<string> {
  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const parent = posix.dirname(args.path);
    if (parent !== "." && parent !== "/") {
      await device.shell(`mkdir -p ${shellQuote(parent)}`);
    }

    const result = await device.shell(`printf '%s' ${shellQuote(args.content)} > ${shellQuote(args.path)}`);
    if (!(await testPath(device, "-f", args.path))) {
      return failure(result.stderr || "Failed to write file", { device: serial });
    }

    const size = await device.shell(`wc -c < ${shellQuote(args.path)}`);
    const sizeBytes = Number.parseInt(size.stdout, 10);
    const written = Number.isFinite(sizeBytes) ? sizeBytes : Buffer.byteLength(args.content, "utf-8");
    return success({
      message: `Successfully wrote to ${args.path}`,
      path: args.path,
      sizeBytes: written,
      sizeFormatted: formatSize(written),
      device: serial,
    });
  });
}

// ===========================================
// App databases
// ===========================================

// Private app storage is reachable through run-as on debuggable builds,
// or through su on rooted devices.
type DatabaseAccess = "run-as" | "root" | "run-as-cp";

const DATABASE_FILE = /\.(db|sqlite3?)$/;
const DATABASE_COMPANIONS = ["-journal", "-wal", "-shm"] as const;

function databaseEntries(output: string): FileEntry[] {
  const entries: FileEntry[] = [];
  for (const line of output.split("\n")) {
    const entry = parseLsLine(line);
    if (!entry || entry.name === "." || entry.name === "..") continue;
    entries.push(entry);
  }
  return entries;
}

export function listAppDatabases(adb: AdbClient, args: AppDatabasesArgs): Promise<string> {
  const invalid = invalidPackage(args.packageName);
  if (invalid) return Promise.resolve(invalid);

  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const pkg = args.packageName;
    let accessMethod: DatabaseAccess | null = null;
    let entries: FileEntry[] = [];

    const runAs = await device.run(["shell", "run-as", pkg, "ls", "-la", "databases/"]);
    if (runAs.success && runAs.stdout && !runAs.stderr.toLowerCase().includes("not debuggable")) {
      accessMethod = "run-as";
      entries = databaseEntries(runAs.stdout);
    } else {
      const root = await device.shell(`su -c ${shellQuote(`ls -la /data/data/${pkg}/databases/`)}`);
      if (root.success && root.stdout && !root.stdout.includes("Permission denied")) {
        accessMethod = "root";
        entries = databaseEntries(root.stdout);
      }
    }

    if (entries.length === 0) {
      return failure("Cannot list databases. App may not be debuggable and device may not be rooted.", {
        package: pkg,
        device: serial,
      });
    }

    // Journals are listed only when they carry a database extension
    const databases = entries.filter((e) => DATABASE_FILE.test(e.name) || !e.name.includes("-journal"));
    return success({
      package: pkg,
      databases,
      count: databases.length,
      accessMethod,
      device: serial,
    });
  });
}

/** Shell commands that copy a file out of the app's databases/ directory. */
function databaseCopyCommand(method: DatabaseAccess, pkg: string, file: string, target: string): string {
  switch (method) {
    case "run-as":
      return `run-as ${pkg} cat ${shellQuote(`databases/${file}`)} > ${shellQuote(target)}`;
    case "root":
      return `su -c ${shellQuote(`cp /data/data/${pkg}/databases/${file} ${target}`)}`;
    case "run-as-cp":
      return `run-as ${pkg} cp ${shellQuote(`databases/${file}`)} ${shellQuote(target)}`;
  }
}

async function copyFromAppStorage(
  device: AdbClient,
  method: DatabaseAccess,
  pkg: string,
  file: string,
  target: string
): Promise<boolean> {
  await device.shell(databaseCopyCommand(method, pkg, file, target));
  return testPath(device, "-s", target);
}

async function pullTemp(device: AdbClient, temp: string, localPath: string) {
  await device.shell(`chmod 644 ${shellQuote(temp)}`);
  const pull = await device.run(["pull", temp, localPath], { timeoutMs: FILE_TRANSFER_TIMEOUT * 1000 });
  await device.shell(`rm -f ${shellQuote(temp)}`);
  return pull;
}

export function pullAppDatabase(adb: AdbClient, args: PullAppDatabaseArgs): Promise<string> {
  const invalid = invalidPackage(args.packageName);
  if (invalid) return Promise.resolve(invalid);

  return withDevice(adb, args.deviceSerial, async (device, serial) => {
    const { packageName: pkg, dbName } = args;
    const localDir = expandHome(args.localDir);
    mkdirSync(localDir, { recursive: true });
    const temp = `/sdcard/temp_${pkg}_${dbName}`;
    const localPath = join(localDir, `${pkg}_${dbName}`);

    let accessMethod: DatabaseAccess | null = null;
    for (const method of ["run-as", "root", "run-as-cp"] as const) {
      if (await copyFromAppStorage(device, method, pkg, dbName, temp)) {
        accessMethod = method;
        break;
      }
    }

    const failed = (details: string): string =>
      failure("Failed to pull database. App may not be debuggable and device may not be rooted.", {
        details,
        package: pkg,
        database: dbName,
        device: serial,
      });

    if (!accessMethod) {
      await device.shell(`rm -f ${shellQuote(temp)}`);
      return failed("No access method could copy the database");
    }

    const pull = await pullTemp(device, temp, localPath);
    if (!pull.success || !existsSync(localPath)) {
      return failed(pull.stderr || pull.stdout);
    }

    // SQLite keeps uncommitted pages beside the main file
    const companionFiles: string[] = [];
    for (const suffix of DATABASE_COMPANIONS) {
      const companionTemp = `${temp}${suffix}`;
      if (!(await copyFromAppStorage(device, accessMethod, pkg, `${dbName}${suffix}`, companionTemp))) {
        await device.shell(`rm -f ${shellQuote(companionTemp)}`);
        continue;
      }
      const companion = await pullTemp(device, companionTemp, `${localPath}${suffix}`);
      if (companion.success) companionFiles.push(`${localPath}${suffix}`);
    }

    const sizeBytes = statSync(localPath).size;
    return success({
      message: "Successfully pulled database",
      package: pkg,
      database: dbName,
      localPath,
      sizeBytes,
      sizeFormatted: formatSize(sizeBytes),
      accessMethod,
      companionFiles,
      device: serial,
    });
  });
}
