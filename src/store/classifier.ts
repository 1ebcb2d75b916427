import type { MetadataStore } from "./metadata-store.js";

export type WorkingCopyKind = "project" | "package" | "none";

/**
 * Answers yes/no questions about what a directory is, from the presence
 * of the apiurl, project and package entries alone. Nothing here throws
 * for absent or half-initialized stores; a store that matches neither
 * pattern (e.g. package without project) is simply neither.
 */
export class WorkingCopyClassifier {
  constructor(private readonly store: MetadataStore) {}

  private identityFiles(): string[] {
    return [
      this.store.entryFile("apiurl"),
      this.store.entryFile("project"),
      this.store.entryFile("package"),
    ];
  }

  /**
   * True iff apiurl and project are present and package is absent.
   */
  async isProject(root: string): Promise<boolean> {
    const missing = await this.store.missing(root, this.identityFiles());
    return missing.length === 1 && missing[0] === this.store.entryFile("package");
  }

  /**
   * True iff apiurl, project and package are all present.
   */
  async isPackage(root: string): Promise<boolean> {
    const missing = await this.store.missing(root, this.identityFiles());
    return missing.length === 0;
  }

  async classify(root: string): Promise<WorkingCopyKind> {
    const missing = await this.store.missing(root, this.identityFiles());
    if (missing.length === 0) {
      return "package";
    }
    if (missing.length === 1 && missing[0] === this.store.entryFile("package")) {
      return "project";
    }
    return "none";
  }
}
