import { constants } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import {
  AlreadyAWorkingCopyError,
  type Logger,
  InvalidExternalStoreError,
  isErrnoException,
  NotADirectoryError,
  PermissionDeniedError,
} from "../shared/error-handler.js";
import type { MetadataStore } from "./metadata-store.js";

export interface InitOptions {
  /**
   * Existing, writable directory to use as the store. The working copy's
   * store becomes a symbolic link to it, so its data directory is shared
   * by every working copy linked to it.
   */
  externalStoreDir?: string;
}

async function isWritableDirectory(target: string): Promise<boolean> {
  try {
    if (!(await fs.stat(target)).isDirectory()) {
      return false;
    }
    await fs.access(target, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

async function pathExists(target: string, followLinks: boolean): Promise<boolean> {
  try {
    await (followLinks ? fs.stat(target) : fs.lstat(target));
    return true;
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

/**
 * Creates the store of a new working copy. Entries are written by the
 * caller afterwards, typically under the working copy lock.
 */
export class WorkingCopyInitializer {
  constructor(
    private readonly store: MetadataStore,
    private readonly logger: Logger = console,
  ) {}

  /**
   * Initializes `root` as a working copy, creating `root` if needed.
   *
   * @returns Path of the created store
   * @throws {InvalidExternalStoreError} If externalStoreDir is no writable directory
   * @throws {AlreadyAWorkingCopyError} If anything already occupies the store path
   * @throws {NotADirectoryError} If root exists and is not a directory
   * @throws {PermissionDeniedError} If root cannot be created or is not writable
   *
   * If the data directory cannot be created the new store is removed
   * again before the error propagates.
   */
  async init(root: string, options: InitOptions = {}): Promise<string> {
    const { externalStoreDir } = options;
    if (externalStoreDir !== undefined && !(await isWritableDirectory(externalStoreDir))) {
      throw new InvalidExternalStoreError(externalStoreDir);
    }

    const storeDir = this.store.storeDir(root);
    // lstat: a dangling link still occupies the name
    if (await pathExists(storeDir, false)) {
      throw new AlreadyAWorkingCopyError(root);
    }

    if (await pathExists(root, true)) {
      if (!(await fs.stat(root)).isDirectory()) {
        throw new NotADirectoryError(root);
      }
    } else {
      try {
        await fs.mkdir(root, { recursive: true });
      } catch (error) {
        if (isErrnoException(error) && (error.code === "EACCES" || error.code === "EPERM")) {
          throw new PermissionDeniedError(`No permission to create path "${root}"`, root, error);
        }
        throw error;
      }
    }

    try {
      await fs.access(root, constants.W_OK);
    } catch (error) {
      throw new PermissionDeniedError(
        `No permission to create a store directory (path: "${root}")`,
        root,
        error,
      );
    }

    if (externalStoreDir !== undefined) {
      await fs.symlink(path.resolve(externalStoreDir), storeDir, "dir");
    } else {
      await fs.mkdir(storeDir);
    }
    try {
      // recursive: a shared external store may already have one
      await fs.mkdir(this.store.dataDir(root), { recursive: true });
    } catch (error) {
      await this.removeStore(storeDir, externalStoreDir !== undefined);
      throw error;
    }

    return storeDir;
  }

  /**
   * Undoes the store creation of a failed init: the link, or the store
   * directory created a moment ago.
   */
  private async removeStore(storeDir: string, isLink: boolean): Promise<void> {
    try {
      await (isLink ? fs.unlink(storeDir) : fs.rmdir(storeDir));
    } catch (error) {
      this.logger.warn(
        `Failed to remove incomplete store ${storeDir}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
