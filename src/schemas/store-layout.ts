/**
 * Store layout schema: every fixed name used inside a working copy.
 * Injected into the store components instead of living in module globals.
 */

import { z } from "zod";
import { LayoutValidationError } from "../shared/error-handler.js";

/**
 * Logical metadata entries kept in the store.
 */
export const METADATA_ENTRIES = [
  "apiurl",
  "project",
  "package",
  "packages",
  "files",
] as const;

export type MetadataEntry = (typeof METADATA_ENTRIES)[number];

/**
 * A single path segment: non-empty, no separators, no NUL, not `.` or `..`.
 */
export const PathSegmentSchema = z
  .string()
  .min(1, "Name cannot be empty")
  .regex(/^[^/\\\0]+$/, "Name must be a single path segment")
  .refine((name) => name !== "." && name !== "..", {
    message: "Name cannot be '.' or '..'",
  });

export const EntryFilesSchema = z.object({
  apiurl: PathSegmentSchema,
  project: PathSegmentSchema,
  package: PathSegmentSchema,
  packages: PathSegmentSchema,
  files: PathSegmentSchema,
});

/**
 * Store layout schema.
 *
 * @example
 * ```typescript
 * const layout: StoreLayout = {
 *   storeDir: ".store",
 *   dataDir: "data",
 *   lockFile: "wc.lock",
 *   entries: { apiurl: "_apiurl", project: "_project", ... },
 * };
 * ```
 */
export const StoreLayoutSchema = z
  .object({
    /** Name of the store directory (or link) inside a working-copy root */
    storeDir: PathSegmentSchema,
    /** Payload directory inside the store */
    dataDir: PathSegmentSchema,
    /** Lock file inside the store */
    lockFile: PathSegmentSchema,
    /** File name of each metadata entry */
    entries: EntryFilesSchema,
  })
  .strict()
  .superRefine((layout, ctx) => {
    const seen = new Map<string, string>([
      [layout.dataDir, "dataDir"],
      [layout.lockFile, "lockFile"],
    ]);
    if (layout.dataDir === layout.lockFile) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["lockFile"],
        message: `lockFile collides with dataDir ("${layout.lockFile}")`,
      });
    }
    for (const entry of METADATA_ENTRIES) {
      const file = layout.entries[entry];
      const owner = seen.get(file);
      if (owner !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["entries", entry],
          message: `entries.${entry} collides with ${owner} ("${file}")`,
        });
      } else {
        seen.set(file, `entries.${entry}`);
      }
    }
  });

export type StoreLayout = z.infer<typeof StoreLayoutSchema>;

export interface StoreLayoutOverrides {
  storeDir?: string;
  dataDir?: string;
  lockFile?: string;
  entries?: Partial<StoreLayout["entries"]>;
}

export const DEFAULT_STORE_LAYOUT: StoreLayout = {
  storeDir: ".store",
  dataDir: "data",
  lockFile: "wc.lock",
  entries: {
    apiurl: "_apiurl",
    project: "_project",
    package: "_package",
    packages: "_packages",
    files: "_files",
  },
};

/**
 * Merges overrides onto the default layout and validates the result.
 *
 * @throws {LayoutValidationError} If any name is invalid or names collide
 */
export function createStoreLayout(
  overrides: StoreLayoutOverrides = {},
): StoreLayout {
  const candidate = {
    ...DEFAULT_STORE_LAYOUT,
    ...overrides,
    entries: { ...DEFAULT_STORE_LAYOUT.entries, ...overrides.entries },
  };

  const result = StoreLayoutSchema.safeParse(candidate);
  if (!result.success) {
    throw new LayoutValidationError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "layout"}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}
