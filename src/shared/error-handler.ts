/**
 * Error severity levels
 */
export enum ErrorSeverity {
  /** Caller bug; never retried */
  CRITICAL = "critical",
  /** The requested operation cannot proceed */
  HIGH = "high",
  /** Degraded but recoverable */
  MEDIUM = "medium",
  /** Informational */
  LOW = "low",
}

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  /** File system related errors */
  FILE_SYSTEM = "file_system",
  /** Validation errors */
  VALIDATION = "validation",
  /** Lock acquisition/concurrency errors */
  CONCURRENCY = "concurrency",
  /** Access rights */
  PERMISSION = "permission",
  /** Target already exists */
  CONFLICT = "conflict",
  /** General operational errors */
  OPERATIONAL = "operational",
}

/**
 * Stable error codes for programmatic handling by callers (e.g. a CLI
 * translating them into messages).
 */
export enum ErrorCode {
  WC_INCONSISTENT = "ERR_WC_INCONSISTENT",
  NOT_A_WORKING_COPY = "ERR_NOT_A_WORKING_COPY",
  NOT_FOUND = "ERR_NOT_FOUND",
  ALREADY_A_WORKING_COPY = "ERR_ALREADY_A_WORKING_COPY",
  INVALID_EXTERNAL_STORE = "ERR_INVALID_EXTERNAL_STORE",
  NOT_A_DIRECTORY = "ERR_NOT_A_DIRECTORY",
  PERMISSION_DENIED = "ERR_PERMISSION_DENIED",
  DOUBLE_LOCK = "ERR_DOUBLE_LOCK",
  UNACQUIRED_LOCK_RELEASE = "ERR_UNACQUIRED_LOCK_RELEASE",
  UNSAFE_FILESYSTEM = "ERR_UNSAFE_FILESYSTEM",
  FILE_SYSTEM = "ERR_FILE_SYSTEM",
  INVALID_LAYOUT = "ERR_INVALID_LAYOUT",
}

/**
 * Minimal logging surface. `console` satisfies it.
 */
export type Logger = Pick<Console, "log" | "warn" | "error">;

/**
 * Structured error information
 */
export interface ErrorInfo {
  /** Error message */
  message: string;
  /** Error severity */
  severity: ErrorSeverity;
  /** Error category */
  category: ErrorCategory;
  /** Error code for programmatic handling */
  code?: string;
  /** Context information */
  context?: Record<string, unknown>;
  /** Original error if this is a wrapped error */
  cause?: Error;
  /** Timestamp when error occurred */
  timestamp: string;
  /** Suggested fix or remediation */
  fix?: string;
  /** Suggested next command or action */
  next?: string;
}

interface WorkingCopyErrorOptions {
  code: ErrorCode;
  category: ErrorCategory;
  severity?: ErrorSeverity;
  path?: string;
  cause?: unknown;
}

/**
 * Narrows an unknown thrown value to a Node.js errno exception.
 */
export function isErrnoException(
  value: unknown,
): value is NodeJS.ErrnoException {
  return value instanceof Error && "code" in value;
}

/**
 * Base class of every error this package raises.
 */
export class WorkingCopyError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly path: string | undefined;

  constructor(message: string, options: WorkingCopyErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.category = options.category;
    this.severity = options.severity ?? ErrorSeverity.HIGH;
    this.path = options.path;
  }
}

/**
 * A store whose entries parse into a structurally invalid state.
 * Raised by layers that interpret entry content, never by the classifier.
 */
export class WorkingCopyInconsistentError extends WorkingCopyError {
  readonly meta: readonly string[];
  readonly xmlData: string | undefined;
  readonly data: readonly string[];

  constructor(
    root: string,
    details: { meta?: readonly string[]; xmlData?: string; data?: readonly string[] } = {},
  ) {
    super(`Working copy "${root}" is inconsistent`, {
      code: ErrorCode.WC_INCONSISTENT,
      category: ErrorCategory.VALIDATION,
      path: root,
    });
    this.meta = details.meta ?? [];
    this.xmlData = details.xmlData;
    this.data = details.data ?? [];
  }
}

export class NotAWorkingCopyError extends WorkingCopyError {
  constructor(root: string) {
    super(`"${root}" is not a working copy (no store directory)`, {
      code: ErrorCode.NOT_A_WORKING_COPY,
      category: ErrorCategory.FILE_SYSTEM,
      path: root,
    });
  }
}

export class EntryNotFoundError extends WorkingCopyError {
  readonly entry: string;

  constructor(entry: string, filePath: string, cause?: unknown) {
    super(`"${entry}" is no valid store file (${filePath})`, {
      code: ErrorCode.NOT_FOUND,
      category: ErrorCategory.FILE_SYSTEM,
      path: filePath,
      cause,
    });
    this.entry = entry;
  }
}

export class AlreadyAWorkingCopyError extends WorkingCopyError {
  constructor(root: string) {
    super(`"${root}" is already a working copy`, {
      code: ErrorCode.ALREADY_A_WORKING_COPY,
      category: ErrorCategory.CONFLICT,
      path: root,
    });
  }
}

export class InvalidExternalStoreError extends WorkingCopyError {
  constructor(storeDir: string, cause?: unknown) {
    super(`External store "${storeDir}" is no directory or not writable`, {
      code: ErrorCode.INVALID_EXTERNAL_STORE,
      category: ErrorCategory.VALIDATION,
      path: storeDir,
      cause,
    });
  }
}

export class NotADirectoryError extends WorkingCopyError {
  constructor(target: string) {
    super(`"${target}" already exists but is no directory`, {
      code: ErrorCode.NOT_A_DIRECTORY,
      category: ErrorCategory.FILE_SYSTEM,
      path: target,
    });
  }
}

export class PermissionDeniedError extends WorkingCopyError {
  constructor(message: string, target: string, cause?: unknown) {
    super(message, {
      code: ErrorCode.PERMISSION_DENIED,
      category: ErrorCategory.PERMISSION,
      path: target,
      cause,
    });
  }
}

export class DoubleLockError extends WorkingCopyError {
  constructor(lockPath: string) {
    super(`Double lock occurred on ${lockPath}`, {
      code: ErrorCode.DOUBLE_LOCK,
      category: ErrorCategory.CONCURRENCY,
      severity: ErrorSeverity.CRITICAL,
      path: lockPath,
    });
  }
}

export class UnacquiredLockReleaseError extends WorkingCopyError {
  constructor(lockPath: string) {
    super(`Attempting to release an unacquired lock on ${lockPath}`, {
      code: ErrorCode.UNACQUIRED_LOCK_RELEASE,
      category: ErrorCategory.CONCURRENCY,
      severity: ErrorSeverity.CRITICAL,
      path: lockPath,
    });
  }
}

export class UnsafeFilesystemError extends WorkingCopyError {
  readonly filesystemType: string;

  constructor(target: string, filesystemType: string) {
    super(
      `Unsafe filesystem detected (${filesystemType}). ` +
        `Advisory locks are not reliable on network filesystems.`,
      {
        code: ErrorCode.UNSAFE_FILESYSTEM,
        category: ErrorCategory.FILE_SYSTEM,
        path: target,
      },
    );
    this.filesystemType = filesystemType;
  }
}

/**
 * An operating system failure annotated with the path it happened on.
 */
export class FileSystemError extends WorkingCopyError {
  readonly errno: string | undefined;

  constructor(operation: string, target: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed for ${target}: ${reason}`, {
      code: ErrorCode.FILE_SYSTEM,
      category: ErrorCategory.FILE_SYSTEM,
      path: target,
      cause,
    });
    this.errno = isErrnoException(cause) ? cause.code : undefined;
  }
}

export class LayoutValidationError extends WorkingCopyError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid store layout: ${issues.join("; ")}`, {
      code: ErrorCode.INVALID_LAYOUT,
      category: ErrorCategory.VALIDATION,
    });
    this.issues = issues;
  }
}

const REMEDIATION: Record<ErrorCode, { fix: string; next?: string }> = {
  [ErrorCode.WC_INCONSISTENT]: {
    fix: "The working copy metadata is inconsistent and needs repair",
    next: "Inspect the store directory or check out again",
  },
  [ErrorCode.NOT_A_WORKING_COPY]: {
    fix: "Not a working copy",
    next: "Run the command inside a checked-out project or package",
  },
  [ErrorCode.NOT_FOUND]: {
    fix: "The working copy is missing required metadata",
    next: "Check out the project or package again",
  },
  [ErrorCode.ALREADY_A_WORKING_COPY]: {
    fix: "The directory is already a working copy",
    next: "Choose a different target directory",
  },
  [ErrorCode.INVALID_EXTERNAL_STORE]: {
    fix: "The external store must be an existing, writable directory",
  },
  [ErrorCode.NOT_A_DIRECTORY]: {
    fix: "The target path exists and is not a directory",
    next: "Choose a different target directory",
  },
  [ErrorCode.PERMISSION_DENIED]: {
    fix: "Check the permissions of the target directory",
  },
  [ErrorCode.DOUBLE_LOCK]: {
    fix: "The working copy lock was acquired twice by the same handle",
  },
  [ErrorCode.UNACQUIRED_LOCK_RELEASE]: {
    fix: "A working copy lock was released without being held",
  },
  [ErrorCode.UNSAFE_FILESYSTEM]: {
    fix: "Working copy locking is not reliable on network filesystems",
    next: "Use a local filesystem or disable enforceSafeFilesystem",
  },
  [ErrorCode.FILE_SYSTEM]: {
    fix: "Check disk space, file permissions and path",
  },
  [ErrorCode.INVALID_LAYOUT]: {
    fix: "Every store name must be a single, distinct path segment",
  },
};

/**
 * ErrorHandler turns thrown values into structured, printable error
 * information. It never retries: every failure surfaces to the caller.
 *
 * @example
 * ```typescript
 * const handler = new ErrorHandler();
 * try {
 *   await store.readProject(root);
 * } catch (error) {
 *   handler.logError(handler.describe(error), "status");
 *   process.exitCode = 1;
 * }
 * ```
 */
export class ErrorHandler {
  constructor(private readonly logger: Logger = console) {}

  /**
   * Creates a structured error information object.
   */
  createError(error: Partial<ErrorInfo> & { message: string }): ErrorInfo {
    return {
      message: error.message,
      severity: error.severity ?? ErrorSeverity.MEDIUM,
      category: error.category ?? ErrorCategory.OPERATIONAL,
      timestamp: new Date().toISOString(),
      ...(error.code && { code: error.code }),
      ...(error.context && { context: error.context }),
      ...(error.cause && { cause: error.cause }),
      ...(error.fix && { fix: error.fix }),
      ...(error.next && { next: error.next }),
    };
  }

  /**
   * Describes any thrown value. Errors of this package get their kind's
   * remediation text; anything else is treated as an operational error.
   */
  describe(error: unknown): ErrorInfo {
    if (error instanceof WorkingCopyError) {
      const remediation = REMEDIATION[error.code];
      return this.createError({
        message: error.message,
        severity: error.severity,
        category: error.category,
        code: error.code,
        ...(error.path !== undefined && { context: { path: error.path } }),
        ...(error.cause instanceof Error && { cause: error.cause }),
        fix: remediation.fix,
        ...(remediation.next && { next: remediation.next }),
      });
    }

    if (isErrnoException(error)) {
      return this.createError({
        message: error.message,
        severity: ErrorSeverity.HIGH,
        category: ErrorCategory.FILE_SYSTEM,
        ...(error.code && { code: error.code }),
        ...(error.path !== undefined && { context: { path: error.path } }),
        cause: error,
      });
    }

    return this.wrapError(error, "Unexpected failure");
  }

  /**
   * Formats an error for display or logging.
   * Uses the format: [STAGE] | [CATEGORY] | Error: <what> | Fix: <how> | Next: <action>
   */
  formatError(error: ErrorInfo, stage?: string): string {
    const parts: string[] = [];

    if (stage) {
      parts.push(`[${stage.toUpperCase()}]`);
    }

    parts.push(`[${error.category.toUpperCase()}]`);
    parts.push(`Error: ${error.message}`);

    if (error.fix) {
      parts.push(`Fix: ${error.fix}`);
    }

    if (error.next) {
      parts.push(`Next: ${error.next}`);
    }

    if (error.context && Object.keys(error.context).length > 0) {
      parts.push(`Context: ${JSON.stringify(error.context)}`);
    }

    return parts.join(" | ");
  }

  /**
   * Logs an error with the logger method matching its severity.
   */
  logError(error: ErrorInfo, stage?: string): void {
    const formatted = this.formatError(error, stage);

    switch (error.severity) {
      case ErrorSeverity.CRITICAL:
      case ErrorSeverity.HIGH:
        this.logger.error(formatted);
        break;
      case ErrorSeverity.MEDIUM:
        this.logger.warn(formatted);
        break;
      case ErrorSeverity.LOW:
        this.logger.log(formatted);
        break;
    }

    if (error.severity === ErrorSeverity.CRITICAL && error.cause) {
      this.logger.error("Stack trace:", error.cause.stack);
    }
  }

  /**
   * Wraps an error with additional context and information.
   */
  wrapError(
    error: unknown,
    message: string,
    category: ErrorCategory = ErrorCategory.OPERATIONAL,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
  ): ErrorInfo {
    const cause = error instanceof Error ? error : undefined;
    const errorMessage = cause ? cause.message : String(error);

    return this.createError({
      message: `${message}: ${errorMessage}`,
      severity,
      category,
      ...(cause && { cause }),
    });
  }
}
