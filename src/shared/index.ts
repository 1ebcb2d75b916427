/**
 * Shared utilities for the working copy store.
 * Provides atomic file replacement, cross-process locking, filesystem
 * detection and structured errors.
 */

export { AtomicWriter, formatEntry } from "./atomic-writer.js";
export {
  AlreadyAWorkingCopyError,
  DoubleLockError,
  EntryNotFoundError,
  ErrorCategory,
  ErrorCode,
  ErrorHandler,
  type ErrorInfo,
  ErrorSeverity,
  FileSystemError,
  InvalidExternalStoreError,
  isErrnoException,
  LayoutValidationError,
  type Logger,
  NotADirectoryError,
  NotAWorkingCopyError,
  PermissionDeniedError,
  UnacquiredLockReleaseError,
  UnsafeFilesystemError,
  WorkingCopyError,
  WorkingCopyInconsistentError,
} from "./error-handler.js";
export {
  checkFilesystemSafety,
  detectFilesystem,
  type FilesystemInfo,
} from "./filesystem-detector.js";
export {
  type LockOptions,
  LockManager,
  type LockOwner,
  WorkingCopyLock,
} from "./wc-lock.js";
