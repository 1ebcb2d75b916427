/**
 * Schemas for the working copy store configuration.
 */

export {
  createStoreLayout,
  DEFAULT_STORE_LAYOUT,
  METADATA_ENTRIES,
  type MetadataEntry,
  type StoreLayout,
  type StoreLayoutOverrides,
  StoreLayoutSchema,
} from "./store-layout.js";
