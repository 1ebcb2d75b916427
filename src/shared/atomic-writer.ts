import fs from "node:fs/promises";
import path from "node:path";
import { hrtime } from "node:process";
import { nanoid } from "nanoid";
import {
  FileSystemError,
  isErrnoException,
  type Logger,
} from "./error-handler.js";

/**
 * Formats metadata entry content for storage: a trailing newline is
 * appended when the content is non-empty. Readers strip it again.
 */
export function formatEntry(content: string): string {
  return content ? `${content}\n` : "";
}

/**
 * AtomicWriter implements the write-rename pattern so a reader only ever
 * sees the previously committed content or the new one, never a partial
 * write.
 *
 * The temporary file is created in the target's own directory, so the
 * final rename never crosses a filesystem boundary. The parent directory
 * must already exist.
 *
 * DURABILITY:
 * The temporary file is fsynced before the rename and the parent
 * directory after it. Without the directory sync, on ext3/ext4/btrfs a
 * power loss right after the rename may persist neither version.
 *
 * @example
 * ```typescript
 * const writer = new AtomicWriter();
 * await writer.writeEntry('/wc/.store/_project', 'home:user');
 * ```
 */
export class AtomicWriter {
  constructor(private readonly logger: Logger = console) {}

  /**
   * Syncs the parent directory so the rename itself is durable.
   * Failure is not fatal: the rename already committed.
   */
  private async syncParentDirectory(filePath: string): Promise<void> {
    const dirPath = path.dirname(filePath);
    try {
      const dirHandle = await fs.open(dirPath, "r");
      try {
        await dirHandle.sync();
      } finally {
        await dirHandle.close();
      }
    } catch (error) {
      this.logger.warn(
        `Warning: Failed to sync directory ${dirPath}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  /**
   * Builds a collision-resistant temporary path next to the target.
   * Format: `<target>.tmp.<pid>.<hrtime>.<nanoid>`
   */
  tempPathFor(filePath: string): string {
    return `${filePath}.tmp.${process.pid}.${hrtime.bigint()}.${nanoid(8)}`;
  }

  /**
   * Writes a single file atomically.
   *
   * @throws {FileSystemError} If any step before or during the rename
   *   fails; the target is left untouched and the temporary file removed
   */
  async writeFile(filePath: string, content: string): Promise<void> {
    const tempPath = this.tempPathFor(filePath);

    try {
      const handle = await fs.open(tempPath, "wx", 0o644);
      try {
        await handle.writeFile(content, { encoding: "utf8" });
        await handle.sync();
      } finally {
        await handle.close();
      }

      await fs.rename(tempPath, filePath);
    } catch (error) {
      await this.removeTemp(tempPath);
      throw new FileSystemError("Atomic write", filePath, error);
    }

    await this.syncParentDirectory(filePath);
  }

  /**
   * Writes a metadata entry: {@link formatEntry} then {@link writeFile}.
   * This is the only path through which entries are mutated.
   */
  async writeEntry(filePath: string, content: string): Promise<void> {
    await this.writeFile(filePath, formatEntry(content));
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await fs.unlink(tempPath);
    } catch (error) {
      // ENOENT: never created, or already renamed
      if (!(isErrnoException(error) && error.code === "ENOENT")) {
        this.logger.warn(
          `Warning: Failed to remove temporary file ${tempPath}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
  }
}
