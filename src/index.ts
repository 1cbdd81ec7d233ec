/**
 * keel: durable, resumable CLI sessions
 *
 * Session records, per-session locks, an append-only transcript and the
 * resume policy shared by the interactive and non-interactive modes.
 *
 * @packageDocumentation
 */

// Version
export { VERSION } from "./version.js";

// Configuration
export { loadConfig } from "./config/loader.js";
export { KeelConfigSchema, createDefaultConfig, type KeelConfig } from "./config/schema.js";
export { getKeelHome, getDefaultSessionStoreDir } from "./config/paths.js";

// Sessions
export * from "./sessions/index.js";

// Transcript
export * from "./transcript/index.js";

// Runner
export * from "./runner/index.js";

// Errors
export {
  KeelError,
  NotFoundError,
  CorruptError,
  BusyError,
  AlreadyLockedError,
  IOFailureError,
  ConfigError,
  ValidationError,
  isKeelError,
  formatError,
  type LockHolder,
} from "./utils/errors.js";

// Logging
export { createLogger, getLogger, setLogger, type LogLevel } from "./utils/logger.js";
