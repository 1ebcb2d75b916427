import {
  createStoreLayout,
  type StoreLayout,
  type StoreLayoutOverrides,
} from "./schemas/store-layout.js";
import { AtomicWriter } from "./shared/atomic-writer.js";
import { LockManager, type LockOptions } from "./shared/wc-lock.js";
import { WorkingCopyClassifier } from "./store/classifier.js";
import { WorkingCopyInitializer } from "./store/initializer.js";
import { MetadataStore } from "./store/metadata-store.js";

export * from "./schemas/index.js";
export * from "./shared/index.js";
export * from "./store/index.js";

/**
 * The store components wired to one layout.
 */
export interface WorkingCopyStore {
  layout: StoreLayout;
  store: MetadataStore;
  classifier: WorkingCopyClassifier;
  initializer: WorkingCopyInitializer;
  locks: LockManager;
}

export interface WorkingCopyStoreOptions extends LockOptions {
  layout?: StoreLayoutOverrides;
}

/**
 * Builds a store, classifier, initializer and lock manager sharing one
 * validated layout.
 *
 * @example
 * ```typescript
 * const wc = createWorkingCopyStore();
 * await wc.initializer.init(root);
 * await wc.locks.withLock(root, async () => {
 *   await wc.store.writeApiurl(root, apiurl);
 *   await wc.store.writeProject(root, project);
 * });
 * ```
 */
export function createWorkingCopyStore(
  options: WorkingCopyStoreOptions = {},
): WorkingCopyStore {
  const layout = createStoreLayout(options.layout);
  const logger = options.logger ?? console;
  const store = new MetadataStore(layout, new AtomicWriter(logger));

  return {
    layout,
    store,
    classifier: new WorkingCopyClassifier(store),
    initializer: new WorkingCopyInitializer(store, logger),
    locks: new LockManager(layout, {
      logger,
      ...(options.enforceSafeFilesystem !== undefined && {
        enforceSafeFilesystem: options.enforceSafeFilesystem,
      }),
    }),
  };
}
