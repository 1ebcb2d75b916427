import { constants } from "node:fs";
import fs, { type FileHandle } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import fsNative from "fs-native-extensions";
import {
  DEFAULT_STORE_LAYOUT,
  type StoreLayout,
} from "../schemas/store-layout.js";
import {
  DoubleLockError,
  FileSystemError,
  isErrnoException,
  type Logger,
  NotAWorkingCopyError,
  UnacquiredLockReleaseError,
  UnsafeFilesystemError,
} from "./error-handler.js";
import { checkFilesystemSafety } from "./filesystem-detector.js";

/**
 * Options for a LockManager
 */
export interface LockOptions {
  /** Refuse to lock stores on network filesystems instead of warning (default: false) */
  enforceSafeFilesystem?: boolean;
  /** Receives warnings (default: console) */
  logger?: Logger;
}

/**
 * Diagnostic content of a held lock file. Never used for exclusivity.
 */
export interface LockOwner {
  pid: number;
  hostname: string;
  acquiredAt: string;
}

interface LockContext {
  layout: StoreLayout;
  logger: Logger;
  verifyFilesystem(storeDir: string): Promise<void>;
  /** Waits for this process's turn on a lock path; resolves to a leave function */
  enter(lockPath: string): Promise<() => void>;
}

/** Whole-file exclusive lock; waits until granted */
async function lockExclusive(fd: number): Promise<void> {
  await fsNative.waitForLock(fd);
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * A lock on one working copy.
 *
 * The lock file `<store>/<lockFile>` is locked with flock(LOCK_EX). The
 * kernel drops that lock when the descriptor closes, including when the
 * holding process dies, so a leftover lock file never blocks anyone.
 *
 * Because release deletes the lock file, a waiter may be granted the lock
 * on a file that is no longer linked at the lock path. After every grant
 * the handle compares device and inode of its descriptor with the file at
 * the path and starts over if they differ.
 *
 * A handle is not reentrant: acquiring it twice, or releasing it while
 * not held, is a programming error and fails immediately.
 *
 * @example
 * ```typescript
 * const lock = locks.lock('/path/to/wc');
 * await lock.withLock(async () => {
 *   await store.writeProject('/path/to/wc', 'home:user');
 *   await store.writePackage('/path/to/wc', 'hello');
 * });
 * ```
 */
export class WorkingCopyLock {
  private handle: FileHandle | undefined;
  private leave: (() => void) | undefined;
  private acquiring = false;

  constructor(
    readonly root: string,
    private readonly context: LockContext,
  ) {}

  get storeDir(): string {
    return path.join(this.root, this.context.layout.storeDir);
  }

  get lockPath(): string {
    return path.join(this.storeDir, this.context.layout.lockFile);
  }

  /**
   * Checks if this handle holds the lock.
   */
  isHeld(): boolean {
    return this.handle !== undefined;
  }

  /**
   * Acquires the lock. The returned promise stays pending while another
   * process holds it; there is no timeout.
   *
   * @throws {DoubleLockError} If this handle holds or is acquiring the lock
   * @throws {NotAWorkingCopyError} If the root has no store
   * @throws {UnsafeFilesystemError} On a network filesystem when enforceSafeFilesystem is set
   */
  async acquire(): Promise<void> {
    if (this.handle !== undefined || this.acquiring) {
      throw new DoubleLockError(this.lockPath);
    }

    this.acquiring = true;
    try {
      if (!(await isDirectory(this.storeDir))) {
        throw new NotAWorkingCopyError(this.root);
      }
      await this.context.verifyFilesystem(this.storeDir);

      const leave = await this.context.enter(this.lockPath);
      try {
        this.handle = await this.lockCurrentFile();
        this.leave = leave;
      } catch (error) {
        leave();
        throw error;
      }
    } finally {
      this.acquiring = false;
    }
  }

  /**
   * Releases the lock: removes the lock file while still holding it,
   * then unlocks and closes the descriptor.
   *
   * @throws {UnacquiredLockReleaseError} If this handle does not hold the lock
   */
  async release(): Promise<void> {
    const handle = this.handle;
    const leave = this.leave;
    if (handle === undefined) {
      throw new UnacquiredLockReleaseError(this.lockPath);
    }
    this.handle = undefined;
    this.leave = undefined;

    try {
      await fs.unlink(this.lockPath);
      fsNative.unlock(handle.fd);
    } catch (error) {
      if (!(isErrnoException(error) && error.code === "ENOENT")) {
        throw new FileSystemError("Lock release", this.lockPath, error);
      }
    } finally {
      try {
        await handle.close();
      } finally {
        leave?.();
      }
    }
  }

  /**
   * Runs `fn` with the lock held and releases it on every exit path.
   * An error thrown by `fn` wins over an error from the release.
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      try {
        await this.release();
      } catch (releaseError) {
        this.context.logger.warn(
          `Failed to release ${this.lockPath} after error: ${releaseError instanceof Error ? releaseError.message : String(releaseError)}`,
        );
      }
      throw error;
    }

    await this.release();
    return result;
  }

  /**
   * Reads the diagnostic owner record of the current lock file, if any.
   */
  async readOwner(): Promise<LockOwner | undefined> {
    try {
      const data: unknown = JSON.parse(await fs.readFile(this.lockPath, "utf8"));
      if (
        typeof data === "object" &&
        data !== null &&
        "pid" in data &&
        typeof data.pid === "number" &&
        "hostname" in data &&
        typeof data.hostname === "string" &&
        "acquiredAt" in data &&
        typeof data.acquiredAt === "string"
      ) {
        return { pid: data.pid, hostname: data.hostname, acquiredAt: data.acquiredAt };
      }
      return undefined;
    } catch {
      return undefined;
    }
  }

  private async lockCurrentFile(): Promise<FileHandle> {
    for (;;) {
      let handle: FileHandle;
      try {
        // No O_TRUNC: the current holder's owner record stays readable
        handle = await fs.open(
          this.lockPath,
          constants.O_RDWR | constants.O_CREAT,
          0o644,
        );
      } catch (error) {
        throw new FileSystemError("Lock file open", this.lockPath, error);
      }

      let current: boolean;
      try {
        await lockExclusive(handle.fd);
        current = await this.refersToLockPath(handle);
        if (current) {
          await this.recordOwner(handle);
        }
      } catch (error) {
        await handle.close();
        throw new FileSystemError("Lock acquisition", this.lockPath, error);
      }

      if (current) {
        return handle;
      }
      // Previous holder unlinked the file we waited on
      await handle.close();
    }
  }

  private async refersToLockPath(handle: FileHandle): Promise<boolean> {
    const held = await handle.stat();
    try {
      const onDisk = await fs.stat(this.lockPath);
      return held.dev === onDisk.dev && held.ino === onDisk.ino;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return false;
      }
      throw error;
    }
  }

  private async recordOwner(handle: FileHandle): Promise<void> {
    const owner: LockOwner = {
      pid: process.pid,
      hostname: os.hostname(),
      acquiredAt: new Date().toISOString(),
    };
    await handle.truncate(0);
    await handle.write(JSON.stringify(owner), 0, "utf8");
  }
}

/**
 * LockManager hands out working copy locks that share one layout and
 * one set of options.
 *
 * Handles of one manager queue up in process (FIFO per lock path) before
 * waiting on the OS lock. A blocked flock() occupies a libuv threadpool
 * thread, and enough of them would starve the holder's own file I/O.
 *
 * @example
 * ```typescript
 * const locks = new LockManager();
 * const result = await locks.withLock('/path/to/wc', async () => {
 *   const project = await store.readProject('/path/to/wc');
 *   await store.writePackages('/path/to/wc', render(project));
 *   return project;
 * });
 * ```
 */
export class LockManager {
  private readonly enforceSafeFilesystem: boolean;
  private readonly logger: Logger;
  /** Store directories whose filesystem has already been checked */
  private readonly checkedStores = new Set<string>();
  /** Tail of the in-process queue per lock path */
  private readonly queues = new Map<string, Promise<void>>();

  constructor(
    private readonly layout: StoreLayout = DEFAULT_STORE_LAYOUT,
    options: LockOptions = {},
  ) {
    this.enforceSafeFilesystem = options.enforceSafeFilesystem ?? false;
    this.logger = options.logger ?? console;
  }

  /**
   * Returns a new, unacquired lock handle for the working copy.
   */
  lock(root: string): WorkingCopyLock {
    return new WorkingCopyLock(root, {
      layout: this.layout,
      logger: this.logger,
      verifyFilesystem: (storeDir) => this.verifyFilesystem(storeDir),
      enter: (lockPath) => this.enter(lockPath),
    });
  }

  /**
   * Acquires a new lock handle for the working copy.
   */
  async acquire(root: string): Promise<WorkingCopyLock> {
    const handle = this.lock(root);
    await handle.acquire();
    return handle;
  }

  /**
   * Executes a function with the working copy locked, releasing the lock
   * afterwards on every exit path.
   */
  async withLock<T>(
    root: string,
    fn: (lock: WorkingCopyLock) => Promise<T>,
  ): Promise<T> {
    const handle = this.lock(root);
    return handle.withLock(() => fn(handle));
  }

  private async enter(lockPath: string): Promise<() => void> {
    const key = path.resolve(lockPath);
    const previous = this.queues.get(key) ?? Promise.resolve();

    let leave: () => void = () => {};
    const turn = new Promise<void>((resolve) => {
      leave = resolve;
    });
    const tail = previous.then(() => turn);
    this.queues.set(key, tail);

    await previous;
    return () => {
      leave();
      if (this.queues.get(key) === tail) {
        this.queues.delete(key);
      }
    };
  }

  private async verifyFilesystem(storeDir: string): Promise<void> {
    const key = path.resolve(storeDir);
    if (this.checkedStores.has(key)) {
      return;
    }

    const fsInfo = await checkFilesystemSafety(storeDir, this.logger);
    if (!fsInfo.isSafeForAtomicOps && this.enforceSafeFilesystem) {
      throw new UnsafeFilesystemError(storeDir, fsInfo.type);
    }
    this.checkedStores.add(key);
  }
}
