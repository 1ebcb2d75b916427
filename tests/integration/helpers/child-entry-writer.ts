#!/usr/bin/env tsx
/**
 * Child process script that rewrites one entry many times with values
 * of a fixed shape, or stalls forever inside the rename when asked to.
 * Used for torn-write and crash injection testing.
 */

import fs from "node:fs/promises";
import { createWorkingCopyStore } from "../../../src/index.js";

interface WriterConfig {
  root: string;
  iterations: number;
  length: number;
  /** Block in rename and report, so the parent can kill us mid-write */
  stallBeforeRename?: boolean;
}

async function main(): Promise<void> {
  const configJson = process.env.HELPER_CONFIG;
  if (!configJson) {
    console.error("HELPER_CONFIG environment variable not set");
    process.exit(1);
  }

  const config: WriterConfig = JSON.parse(configJson);
  const wc = createWorkingCopyStore({ enforceSafeFilesystem: false });

  if (config.stallBeforeRename) {
    Object.defineProperty(fs, "rename", {
      value: () => {
        console.log(JSON.stringify({ renaming: true }));
        return new Promise<void>(() => {
          setInterval(() => {}, 1000);
        });
      },
    });
    await wc.store.writeFiles(config.root, "X".repeat(config.length));
    return;
  }

  for (let i = 0; i < config.iterations; i++) {
    const letter = i % 2 === 0 ? "A" : "B";
    await wc.store.writeFiles(config.root, letter.repeat(config.length));
  }

  console.log(JSON.stringify({ done: true }));
}

main().catch((error: unknown) => {
  console.error(JSON.stringify({ error: error instanceof Error ? error.message : String(error) }));
  process.exit(1);
});
