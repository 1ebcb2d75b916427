import fs from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { type MetadataEntry } from "../../../src/schemas/store-layout.js";
import { AtomicWriter } from "../../../src/shared/atomic-writer.js";
import { EntryNotFoundError } from "../../../src/shared/error-handler.js";
import { WorkingCopyClassifier } from "../../../src/store/classifier.js";
import { WorkingCopyInitializer } from "../../../src/store/initializer.js";
import { MetadataStore } from "../../../src/store/metadata-store.js";
import { createRecordingLogger, TempDirectory } from "../../utils/test-helpers.js";

describe("WorkingCopyClassifier", () => {
  let tempDir: TempDirectory;
  let store: MetadataStore;
  let classifier: WorkingCopyClassifier;
  let root: string;

  async function writeEntries(...entries: MetadataEntry[]): Promise<void> {
    for (const entry of entries) {
      await store.write(root, entry, `value of ${entry}`);
    }
  }

  beforeEach(async () => {
    tempDir = new TempDirectory("classifier");
    await tempDir.setup();
    store = new MetadataStore(undefined, new AtomicWriter(createRecordingLogger().logger));
    classifier = new WorkingCopyClassifier(store);
    root = tempDir.getPath("wc");
    await new WorkingCopyInitializer(store).init(root);
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  test("a fresh store is neither project nor package", async () => {
    expect(await classifier.isProject(root)).toBe(false);
    expect(await classifier.isPackage(root)).toBe(false);
    expect(await classifier.classify(root)).toBe("none");
  });

  test("apiurl and project without package is a project", async () => {
    await writeEntries("apiurl", "project");

    expect(await classifier.isProject(root)).toBe(true);
    expect(await classifier.isPackage(root)).toBe(false);
    expect(await classifier.classify(root)).toBe("project");
  });

  test("apiurl, project and package is a package", async () => {
    await writeEntries("apiurl", "project", "package");

    expect(await classifier.isProject(root)).toBe(false);
    expect(await classifier.isPackage(root)).toBe(true);
    expect(await classifier.classify(root)).toBe("package");
  });

  test("project alone is neither", async () => {
    await writeEntries("project");

    expect(await classifier.isProject(root)).toBe(false);
    expect(await classifier.isPackage(root)).toBe(false);
  });

  test("package without project is neither and does not raise", async () => {
    await writeEntries("apiurl", "package");

    expect(await classifier.isProject(root)).toBe(false);
    expect(await classifier.isPackage(root)).toBe(false);
    await expect(store.readProject(root)).rejects.toBeInstanceOf(EntryNotFoundError);
  });

  test("a directory without store is neither", async () => {
    const plain = await tempDir.createDir("plain");

    expect(await classifier.isProject(plain)).toBe(false);
    expect(await classifier.isPackage(plain)).toBe(false);
    expect(await classifier.classify(tempDir.getPath("nowhere"))).toBe("none");
  });

  test("an entry that is a directory does not count", async () => {
    await writeEntries("apiurl", "project");
    await fs.mkdir(store.storePath(root, "_package"));

    expect(await classifier.isProject(root)).toBe(true);
    expect(await classifier.isPackage(root)).toBe(false);
  });

  test("the predicates never hold together for any subset of identity entries", async () => {
    const identity: MetadataEntry[] = ["apiurl", "project", "package"];

    for (let mask = 0; mask < 2 ** identity.length; mask++) {
      const wcRoot = tempDir.getPath(`subset-${mask}`);
      await new WorkingCopyInitializer(store).init(wcRoot);
      for (const [bit, entry] of identity.entries()) {
        if (mask & (1 << bit)) {
          await store.write(wcRoot, entry, entry);
        }
      }

      const both = (await classifier.isProject(wcRoot)) && (await classifier.isPackage(wcRoot));
      expect(both).toBe(false);
    }
  });
});
