#!/usr/bin/env tsx
/**
 * Child process script that repeatedly locks a working copy and
 * increments a counter kept in its packages entry.
 * Used for multi-process lock contention testing.
 */

import { createWorkingCopyStore } from "../../../src/index.js";

interface IncrementerConfig {
  root: string;
  workerId: number;
  iterations: number;
}

async function main(): Promise<void> {
  const configJson = process.env.HELPER_CONFIG;
  if (!configJson) {
    console.error("HELPER_CONFIG environment variable not set");
    process.exit(1);
  }

  const config: IncrementerConfig = JSON.parse(configJson);
  const wc = createWorkingCopyStore({ enforceSafeFilesystem: false });
  const values: number[] = [];

  for (let i = 0; i < config.iterations; i++) {
    await wc.locks.withLock(config.root, async () => {
      const current = Number.parseInt(await wc.store.readPackages(config.root), 10);
      // Widen the window between read and write
      await new Promise((resolve) => setTimeout(resolve, Math.random() * 10));
      await wc.store.writePackages(config.root, String(current + 1));
      values.push(current + 1);
    });
  }

  console.log(JSON.stringify({ workerId: config.workerId, values }));
}

main().catch((error: unknown) => {
  console.error(JSON.stringify({ error: error instanceof Error ? error.message : String(error) }));
  process.exit(1);
});
