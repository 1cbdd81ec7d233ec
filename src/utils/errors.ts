/**
 * Error handling for keel
 * Custom error types with context and recovery information
 */

/**
 * Base error class for keel
 */
export class KeelError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;
  readonly recoverable: boolean;
  readonly suggestion?: string;

  constructor(
    message: string,
    options: {
      code: string;
      context?: Record<string, unknown>;
      recoverable?: boolean;
      suggestion?: string;
      cause?: Error;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "KeelError";
    this.code = options.code;
    this.context = options.context ?? {};
    this.recoverable = options.recoverable ?? false;
    this.suggestion = options.suggestion;

    Error.captureStackTrace(this, KeelError);
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      recoverable: this.recoverable,
      suggestion: this.suggestion,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * No session or record with the requested identity exists
 */
export class NotFoundError extends KeelError {
  readonly sessionId?: string;

  constructor(message: string, options: { sessionId?: string; path?: string } = {}) {
    super(message, {
      code: "SESSION_NOT_FOUND",
      context: { sessionId: options.sessionId, path: options.path },
      recoverable: true,
      suggestion: "Start a fresh session with --new-session",
    });
    this.name = "NotFoundError";
    this.sessionId = options.sessionId;
  }
}

/**
 * A stored record failed structural validation
 */
export class CorruptError extends KeelError {
  readonly path: string;
  readonly reason: string;

  constructor(
    message: string,
    options: {
      path: string;
      reason: string;
      sessionId?: string;
      cause?: Error;
    },
  ) {
    super(message, {
      code: "SESSION_CORRUPT",
      context: { path: options.path, reason: options.reason, sessionId: options.sessionId },
      recoverable: true,
      suggestion: "The damaged record is skipped; start a fresh session with --new-session",
      cause: options.cause,
    });
    this.name = "CorruptError";
    this.path = options.path;
    this.reason = options.reason;
  }
}

/**
 * Details of the process currently holding a lock
 */
export interface LockHolder {
  pid: number;
  hostname: string;
  acquiredAt: string;
  heartbeatAt: string;
}

/**
 * A lock is held by another live process
 */
export class BusyError extends KeelError {
  readonly key: string;
  readonly holder?: LockHolder;

  constructor(
    message: string,
    options: {
      key: string;
      holder?: LockHolder;
      code?: string;
      suggestion?: string;
    },
  ) {
    const holder = options.holder;
    super(message, {
      code: options.code ?? "SESSION_BUSY",
      context: { key: options.key, holder },
      recoverable: false,
      suggestion:
        options.suggestion ??
        (holder
          ? `Another keel process (pid ${holder.pid} on ${holder.hostname}) is using this session. Wait for it to finish or use --new-session.`
          : "Another keel process is using this session. Wait for it to finish or use --new-session."),
    });
    this.name = "BusyError";
    this.key = options.key;
    this.holder = holder;
  }
}

/**
 * Another live session already exists for the project path
 */
export class AlreadyLockedError extends BusyError {
  readonly projectPath: string;

  constructor(message: string, options: { projectPath: string; sessionId: string; holder?: LockHolder }) {
    super(message, {
      key: options.sessionId,
      holder: options.holder,
      code: "SESSION_ALREADY_LOCKED",
      suggestion: `Session ${options.sessionId} is live for ${options.projectPath}. Finish that run first.`,
    });
    this.name = "AlreadyLockedError";
    this.projectPath = options.projectPath;
  }
}

/**
 * Underlying storage is unavailable
 */
export class IOFailureError extends KeelError {
  readonly path: string;

  constructor(
    message: string,
    options: {
      path: string;
      operation: "read" | "write" | "delete" | "sync" | "rename" | "lock";
      cause?: Error;
    },
  ) {
    super(message, {
      code: "IO_FAILURE",
      context: { path: options.path, operation: options.operation },
      recoverable: false,
      suggestion: `Check that the path exists and you have permissions: ${options.path}`,
      cause: options.cause,
    });
    this.name = "IOFailureError";
    this.path = options.path;
  }
}

/**
 * Configuration error
 */
export class ConfigError extends KeelError {
  readonly issues: ConfigIssue[];

  constructor(
    message: string,
    options: {
      issues?: ConfigIssue[];
      configPath?: string;
      cause?: Error;
    } = {},
  ) {
    super(message, {
      code: "CONFIG_ERROR",
      context: { configPath: options.configPath, issues: options.issues },
      recoverable: true,
      suggestion: "Check your .keel/config.json for errors",
      cause: options.cause,
    });
    this.name = "ConfigError";
    this.issues = options.issues ?? [];
  }

  /**
   * Format issues as a readable string
   */
  formatIssues(): string {
    if (this.issues.length === 0) return "";
    return this.issues.map((i) => `  - ${i.path}: ${i.message}`).join("\n");
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Invalid caller input (command-line flags, session ids)
 */
export class ValidationError extends KeelError {
  readonly field?: string;

  constructor(message: string, options: { field?: string; cause?: Error } = {}) {
    super(message, {
      code: "VALIDATION_ERROR",
      context: { field: options.field },
      recoverable: true,
      suggestion: "See 'keel --help' for usage",
      cause: options.cause,
    });
    this.name = "ValidationError";
    this.field = options.field;
  }
}

/**
 * Check if error is a specific type
 */
export function isKeelError(error: unknown): error is KeelError {
  return error instanceof KeelError;
}

/**
 * Wrap an unknown thrown value as an Error cause
 */
export function toError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

/**
 * Node error code of a thrown value, if any
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Default suggestions for common error codes.
 * Used as fallback when an error doesn't have a specific suggestion.
 */
export const ERROR_SUGGESTIONS: Record<string, string> = {
  SESSION_NOT_FOUND: "Run 'keel sessions' to list resumable sessions.",
  SESSION_CORRUPT: "Start a fresh session with --new-session.",
  SESSION_BUSY: "Another keel process holds this session. It is not retried automatically.",
  SESSION_ALREADY_LOCKED: "Another keel process holds a live session for this project.",
  IO_FAILURE: "Check that the session store exists and you have read/write permissions.",
  CONFIG_ERROR: "Check your .keel/config.json.",
  VALIDATION_ERROR: "See 'keel --help' for usage.",
  UNEXPECTED_ERROR: "An unexpected error occurred. Re-run with --verbose for details.",
};

/**
 * Format error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof KeelError) {
    let message = `[${error.code}] ${error.message}`;
    const suggestion = error.suggestion ?? ERROR_SUGGESTIONS[error.code];
    if (suggestion) {
      message += `\n  Suggestion: ${suggestion}`;
    }
    return message;
  }

  if (error instanceof Error) {
    return `${error.message}\n  Suggestion: ${ERROR_SUGGESTIONS["UNEXPECTED_ERROR"]}`;
  }

  return String(error);
}
