import fs from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { AtomicWriter, formatEntry } from "../../../src/shared/atomic-writer.js";
import { ErrorCode, FileSystemError } from "../../../src/shared/error-handler.js";
import { createRecordingLogger, TempDirectory } from "../../utils/test-helpers.js";

describe("AtomicWriter", () => {
  let tempDir: TempDirectory;
  let writer: AtomicWriter;

  beforeEach(async () => {
    tempDir = new TempDirectory("atomic-writer");
    await tempDir.setup();
    writer = new AtomicWriter(createRecordingLogger().logger);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await tempDir.cleanup();
  });

  test("writes a single file atomically", async () => {
    const filePath = tempDir.getPath("test.txt");

    await writer.writeFile(filePath, "Hello, World!");

    expect(await fs.readFile(filePath, "utf8")).toBe("Hello, World!");
  });

  test("overwrites existing files", async () => {
    const filePath = await tempDir.createFile("Old content", "overwrite.txt");

    await writer.writeFile(filePath, "New content");

    expect(await fs.readFile(filePath, "utf8")).toBe("New content");
  });

  test("leaves no temporary files behind after success", async () => {
    await writer.writeFile(tempDir.getPath("clean.txt"), "content");

    expect(await fs.readdir(tempDir.getPath())).toEqual(["clean.txt"]);
  });

  test("creates the temporary file next to the target", () => {
    const target = tempDir.getPath("store", "_project");
    const temp = writer.tempPathFor(target);

    expect(temp.startsWith(`${target}.tmp.${process.pid}.`)).toBe(true);
  });

  test("does not create missing parent directories", async () => {
    const filePath = tempDir.getPath("missing", "file.txt");

    await expect(writer.writeFile(filePath, "content")).rejects.toBeInstanceOf(
      FileSystemError,
    );
    await expect(fs.stat(tempDir.getPath("missing"))).rejects.toThrow();
  });

  test("keeps the previous content and removes the temp file when rename fails", async () => {
    const filePath = await tempDir.createFile("committed\n", "_project");
    const renameError = Object.assign(new Error("EIO: i/o error, rename"), {
      code: "EIO",
    });
    vi.spyOn(fs, "rename").mockRejectedValueOnce(renameError);

    const failure = await writer.writeFile(filePath, "uncommitted\n").catch(
      (error: unknown) => error,
    );

    expect(failure).toBeInstanceOf(FileSystemError);
    expect(failure).toMatchObject({
      code: ErrorCode.FILE_SYSTEM,
      errno: "EIO",
      path: filePath,
    });
    expect(await fs.readFile(filePath, "utf8")).toBe("committed\n");
    expect(await fs.readdir(tempDir.getPath())).toEqual(["_project"]);
  });

  test("writes special characters unchanged", async () => {
    const filePath = tempDir.getPath("special.txt");
    const content = 'Special: \n\t"\'`$' + "{test} äöü";

    await writer.writeFile(filePath, content);

    expect(await fs.readFile(filePath, "utf8")).toBe(content);
  });

  describe("writeEntry", () => {
    test("appends a trailing newline to non-empty content", async () => {
      const filePath = tempDir.getPath("_apiurl");

      await writer.writeEntry(filePath, "https://api.example.org");

      expect(await fs.readFile(filePath, "utf8")).toBe("https://api.example.org\n");
    });

    test("writes a zero-byte file for empty content", async () => {
      const filePath = tempDir.getPath("_files");

      await writer.writeEntry(filePath, "");

      expect((await fs.stat(filePath)).size).toBe(0);
    });
  });

  test("formatEntry only adds a newline to non-empty content", () => {
    expect(formatEntry("home:user")).toBe("home:user\n");
    expect(formatEntry("")).toBe("");
  });
});
