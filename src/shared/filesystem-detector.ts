import { execFileSync } from "node:child_process";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Logger } from "./error-handler.js";

/**
 * Filesystem type information
 */
export interface FilesystemInfo {
  /** The filesystem type (e.g., 'apfs', 'ext4', 'nfs') */
  type: string;
  /** Whether this is a network filesystem */
  isNetwork: boolean;
  /** Whether advisory locks and renames on this filesystem can be trusted */
  isSafeForAtomicOps: boolean;
  /** Warning message if filesystem is problematic */
  warning?: string;
  /** The mount point for this filesystem */
  mountPoint: string;
  /** Detection method used */
  detectionMethod: "mounts" | "mount" | "fallback";
}

/**
 * A parsed mount table row.
 */
export interface MountEntry {
  mountPoint: string;
  type: string;
}

/**
 * Network filesystems on which flock() is emulated, unsupported or not
 * coherent across clients.
 */
const NETWORK_FILESYSTEMS = new Set([
  "nfs",
  "nfs4",
  "cifs",
  "smb",
  "smb3",
  "smbfs",
  "afpfs",
  "afp",
  "webdav",
  "davfs",
  "sshfs",
  "fuse.sshfs",
  "fuse.rclone",
  "9p",
  "ceph",
  "glusterfs",
  "fuse.glusterfs",
]);

const NETWORK_WARNING = (type: string): string =>
  `Network filesystem (${type}) detected. Advisory locks are not guaranteed ` +
  `and concurrent working copy updates may corrupt metadata.`;

/**
 * Decodes the octal escapes (`\040` for space etc.) used in /proc/mounts.
 */
function decodeMountField(field: string): string {
  return field.replace(/\\([0-7]{3})/g, (_match, octal: string) =>
    String.fromCharCode(Number.parseInt(octal, 8)),
  );
}

/**
 * Returns true if `mountPoint` contains `target`.
 */
function isUnder(target: string, mountPoint: string): boolean {
  if (mountPoint === "/") {
    return true;
  }
  return target === mountPoint || target.startsWith(`${mountPoint}/`);
}

/**
 * Parses a Linux mount table (`/proc/self/mounts` format) and returns the
 * entry whose mount point is the longest prefix of `target`.
 */
export function parseMountTable(
  content: string,
  target: string,
): MountEntry | undefined {
  let best: MountEntry | undefined;

  for (const line of content.split("\n")) {
    // Format: <device> <mount point> <type> <options> <dump> <pass>
    const fields = line.trim().split(/\s+/);
    const rawMountPoint = fields[1];
    const rawType = fields[2];
    if (!rawMountPoint || !rawType) {
      continue;
    }

    const mountPoint = decodeMountField(rawMountPoint);
    if (
      isUnder(target, mountPoint) &&
      (!best || mountPoint.length >= best.mountPoint.length)
    ) {
      best = { mountPoint, type: rawType.toLowerCase() };
    }
  }

  return best;
}

/**
 * Parses the BSD/macOS `mount` output
 * (`/dev/disk1s1 on / (apfs, local, journaled)`).
 */
export function parseBsdMountOutput(
  content: string,
  target: string,
): (MountEntry & { local: boolean }) | undefined {
  let best: (MountEntry & { local: boolean }) | undefined;

  for (const line of content.split("\n")) {
    const match = line.match(/^(.+?)\s+on\s+(.+?)\s+\((.+?)\)$/);
    if (!match?.[2] || !match[3]) {
      continue;
    }
    const mountPoint = match[2];
    const options = match[3].split(",").map((option) => option.trim());
    if (
      isUnder(target, mountPoint) &&
      (!best || mountPoint.length >= best.mountPoint.length)
    ) {
      best = {
        mountPoint,
        type: options[0]?.toLowerCase() || "unknown",
        local: options.includes("local"),
      };
    }
  }

  return best;
}

function describeMount(
  entry: MountEntry,
  detectionMethod: FilesystemInfo["detectionMethod"],
  isNetwork: boolean,
): FilesystemInfo {
  return {
    type: entry.type,
    isNetwork,
    isSafeForAtomicOps: !isNetwork,
    mountPoint: entry.mountPoint,
    detectionMethod,
    ...(isNetwork && { warning: NETWORK_WARNING(entry.type) }),
  };
}

/**
 * Creates fallback filesystem info when detection fails.
 * Local-looking paths are assumed to be local.
 */
function createFallbackInfo(checkPath: string): FilesystemInfo {
  const isUnc = checkPath.startsWith("\\\\");
  return {
    type: isUnc ? "smb" : "unknown",
    isNetwork: isUnc,
    isSafeForAtomicOps: !isUnc,
    mountPoint: path.parse(checkPath).root || "/",
    detectionMethod: "fallback",
    ...(isUnc && { warning: NETWORK_WARNING("smb") }),
  };
}

/**
 * Detects the filesystem type for a given path and determines whether
 * advisory locking on it can be trusted.
 *
 * Network filesystems (NFS, SMB/CIFS, etc.) do not provide coherent
 * flock() semantics across clients, which defeats the working copy lock.
 */
export async function detectFilesystem(
  targetPath: string,
  logger: Logger = console,
): Promise<FilesystemInfo> {
  let checkPath = path.resolve(targetPath);
  try {
    checkPath = await fs.realpath(checkPath);
  } catch {
    // Not created yet; the parent's mount decides
    checkPath = path.dirname(checkPath);
  }

  const platform = os.platform();

  try {
    if (platform === "linux") {
      const table = await fs.readFile("/proc/self/mounts", "utf8");
      const entry = parseMountTable(table, checkPath);
      if (entry) {
        return describeMount(entry, "mounts", NETWORK_FILESYSTEMS.has(entry.type));
      }
    } else if (platform === "darwin" || platform === "freebsd") {
      const output = execFileSync("mount", { encoding: "utf8" });
      const entry = parseBsdMountOutput(output, checkPath);
      if (entry) {
        return describeMount(
          entry,
          "mount",
          NETWORK_FILESYSTEMS.has(entry.type) || !entry.local,
        );
      }
    }
  } catch (error) {
    logger.warn(`Failed to detect filesystem type: ${error}`);
  }

  return createFallbackInfo(checkPath);
}

/**
 * Checks if a path is on a safe filesystem and logs a warning if not
 *
 * @returns The filesystem info
 */
export async function checkFilesystemSafety(
  targetPath: string,
  logger: Logger = console,
): Promise<FilesystemInfo> {
  const fsInfo = await detectFilesystem(targetPath, logger);

  if (!fsInfo.isSafeForAtomicOps) {
    logger.warn(
      `[FILESYSTEM WARNING] ${fsInfo.warning || `Unsafe filesystem: ${fsInfo.type}`}`,
    );
    logger.warn(`   Path: ${targetPath}`);
    logger.warn(`   Mount: ${fsInfo.mountPoint}`);
    logger.warn(`   Type: ${fsInfo.type}`);
  }

  return fsInfo;
}
