import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { createWorkingCopyStore } from "../../../src/index.js";
import { UnsafeFilesystemError } from "../../../src/shared/error-handler.js";
import {
  checkFilesystemSafety,
  type FilesystemInfo,
} from "../../../src/shared/filesystem-detector.js";
import { createRecordingLogger, TempDirectory } from "../../utils/test-helpers.js";

vi.mock("../../../src/shared/filesystem-detector.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../../src/shared/filesystem-detector.js")>();
  return { ...actual, checkFilesystemSafety: vi.fn() };
});

const NFS_INFO: FilesystemInfo = {
  type: "nfs4",
  isNetwork: true,
  isSafeForAtomicOps: false,
  mountPoint: "/home",
  detectionMethod: "mounts",
};

describe("LockManager on a network filesystem", () => {
  let tempDir: TempDirectory;
  let root: string;

  beforeEach(async () => {
    tempDir = new TempDirectory("wc-lock-filesystem");
    await tempDir.setup();
    root = await tempDir.createDir("wc");
    await fs.mkdir(path.join(root, ".store", "data"), { recursive: true });
    vi.mocked(checkFilesystemSafety).mockImplementation(async (_target, logger) => {
      logger?.warn("[FILESYSTEM WARNING] Unsafe filesystem: nfs4");
      return NFS_INFO;
    });
  });

  afterEach(async () => {
    vi.mocked(checkFilesystemSafety).mockReset();
    await tempDir.cleanup();
  });

  test("acquires with a warning by default", async () => {
    const { logger, messages } = createRecordingLogger();
    const wc = createWorkingCopyStore({ logger });

    const lock = await wc.locks.acquire(root);
    expect(lock.isHeld()).toBe(true);
    await lock.release();

    expect(messages).toEqual(["[FILESYSTEM WARNING] Unsafe filesystem: nfs4"]);
  });

  test("checks each store only once per manager", async () => {
    const wc = createWorkingCopyStore({ logger: createRecordingLogger().logger });

    await wc.locks.withLock(root, async () => {});
    await wc.locks.withLock(root, async () => {});

    expect(checkFilesystemSafety).toHaveBeenCalledTimes(1);
  });

  test("refuses the store when enforcement is requested", async () => {
    const wc = createWorkingCopyStore({
      enforceSafeFilesystem: true,
      logger: createRecordingLogger().logger,
    });

    await expect(wc.locks.acquire(root)).rejects.toBeInstanceOf(UnsafeFilesystemError);
    await expect(fs.stat(path.join(root, ".store", "wc.lock"))).rejects.toMatchObject({
      code: "ENOENT",
    });
  });
});
