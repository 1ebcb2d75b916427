import fs from "node:fs/promises";
import path from "node:path";
import {
  DEFAULT_STORE_LAYOUT,
  type MetadataEntry,
  type StoreLayout,
} from "../schemas/store-layout.js";
import { AtomicWriter } from "../shared/atomic-writer.js";
import {
  EntryNotFoundError,
  FileSystemError,
  isErrnoException,
  NotAWorkingCopyError,
} from "../shared/error-handler.js";

/**
 * Options for {@link MetadataStore.missing}
 */
export interface MissingOptions {
  /** Test for directories instead of regular files (default: false) */
  directories?: boolean;
  /** Look inside the data directory instead of the store root (default: false) */
  data?: boolean;
}

async function statKind(target: string): Promise<"file" | "directory" | "other" | "absent"> {
  try {
    const stats = await fs.stat(target);
    if (stats.isFile()) {
      return "file";
    }
    return stats.isDirectory() ? "directory" : "other";
  } catch {
    return "absent";
  }
}

/**
 * MetadataStore gives named access to the metadata entries of a working
 * copy. Reads are strict: an absent store or entry raises. Writes go
 * through the AtomicWriter.
 *
 * It does not lock. A change spanning several entries must be wrapped
 * in one lock acquisition by the caller.
 *
 * @example
 * ```typescript
 * const store = new MetadataStore();
 * await store.writeApiurl(root, 'https://api.example.org');
 * const apiurl = await store.readApiurl(root);
 * ```
 */
export class MetadataStore {
  constructor(
    readonly layout: StoreLayout = DEFAULT_STORE_LAYOUT,
    private readonly writer: AtomicWriter = new AtomicWriter(),
  ) {}

  /**
   * Path of the store directory (or link) of a working copy.
   */
  storeDir(root: string): string {
    return path.join(root, this.layout.storeDir);
  }

  /**
   * Path of a file or directory inside the store.
   */
  storePath(root: string, ...segments: string[]): string {
    return path.join(this.storeDir(root), ...segments);
  }

  /**
   * Path of the payload data directory.
   */
  dataDir(root: string): string {
    return this.storePath(root, this.layout.dataDir);
  }

  /**
   * File name of a metadata entry.
   */
  entryFile(entry: MetadataEntry): string {
    return this.layout.entries[entry];
  }

  /**
   * Checks that `root` is a directory with a store directory (a link to
   * an external store counts). Never throws.
   */
  async hasStore(root: string): Promise<boolean> {
    const [rootKind, storeKind] = await Promise.all([
      statKind(root),
      statKind(this.storeDir(root)),
    ]);
    return rootKind === "directory" && storeKind === "directory";
  }

  /**
   * Returns the names (in input order) that do not exist in the store.
   * If the store itself is absent every name is reported missing.
   */
  async missing(
    root: string,
    names: readonly string[],
    options: MissingOptions = {},
  ): Promise<string[]> {
    if (!(await this.hasStore(root))) {
      return [...names];
    }

    const base = options.data ? this.dataDir(root) : this.storeDir(root);
    const wanted = options.directories ? "directory" : "file";
    const kinds = await Promise.all(
      names.map((name) => statKind(path.join(base, name))),
    );
    return names.filter((_name, index) => kinds[index] !== wanted);
  }

  /**
   * Reads an entry, with surrounding whitespace stripped.
   *
   * @throws {NotAWorkingCopyError} If the root has no store
   * @throws {EntryNotFoundError} If the entry is absent or not a regular file
   */
  async read(root: string, entry: MetadataEntry): Promise<string> {
    if (!(await this.hasStore(root))) {
      throw new NotAWorkingCopyError(root);
    }

    const fileName = this.entryFile(entry);
    const filePath = this.storePath(root, fileName);
    if ((await this.missing(root, [fileName])).length > 0) {
      throw new EntryNotFoundError(entry, filePath);
    }

    try {
      return (await fs.readFile(filePath, "utf8")).trim();
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        // Removed between the check and the read
        throw new EntryNotFoundError(entry, filePath, error);
      }
      throw new FileSystemError("Read", filePath, error);
    }
  }

  /**
   * Replaces an entry atomically.
   *
   * @throws {NotAWorkingCopyError} If the root has no store; initialize it first
   * @throws {FileSystemError} If the atomic write fails
   */
  async write(root: string, entry: MetadataEntry, content: string): Promise<void> {
    if (!(await this.hasStore(root))) {
      throw new NotAWorkingCopyError(root);
    }
    await this.writer.writeEntry(this.storePath(root, this.entryFile(entry)), content);
  }

  /** API endpoint URL of the working copy */
  readApiurl(root: string): Promise<string> {
    return this.read(root, "apiurl");
  }

  /** Project name; present in project and package working copies */
  readProject(root: string): Promise<string> {
    return this.read(root, "project");
  }

  /** Package name; present in package working copies only */
  readPackage(root: string): Promise<string> {
    return this.read(root, "package");
  }

  /** Serialized package list of a project working copy */
  readPackages(root: string): Promise<string> {
    return this.read(root, "packages");
  }

  /** Serialized file manifest of a package working copy */
  readFiles(root: string): Promise<string> {
    return this.read(root, "files");
  }

  writeApiurl(root: string, apiurl: string): Promise<void> {
    return this.write(root, "apiurl", apiurl);
  }

  writeProject(root: string, project: string): Promise<void> {
    return this.write(root, "project", project);
  }

  writePackage(root: string, pkg: string): Promise<void> {
    return this.write(root, "package", pkg);
  }

  writePackages(root: string, document: string): Promise<void> {
    return this.write(root, "packages", document);
  }

  writeFiles(root: string, document: string): Promise<void> {
    return this.write(root, "files", document);
  }
}
