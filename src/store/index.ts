/**
 * Working copy store: metadata entries, classification and initialization.
 */

export { type WorkingCopyKind, WorkingCopyClassifier } from "./classifier.js";
export { type InitOptions, WorkingCopyInitializer } from "./initializer.js";
export { MetadataStore, type MissingOptions } from "./metadata-store.js";
