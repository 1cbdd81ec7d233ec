/**
 * Session persistence for keel
 *
 * Durable session records, file locks and resume resolution.
 *
 * @module sessions
 */

export type {
  Session,
  LockedSession,
  SessionFiles,
  InvalidRecord,
  SessionScan,
  CreateSessionOptions,
} from "./types.js";

export {
  SessionStore,
  canonicalProjectPath,
  type SessionStoreConfig,
} from "./store.js";

export {
  SessionLock,
  SessionLockManager,
  projectLockKey,
  withProjectGuard,
  DEFAULT_LOCK_STALE_MS,
  DEFAULT_HEARTBEAT_MS,
  type LockAttempt,
  type LockStatus,
  type SessionLockManagerOptions,
} from "./lock.js";

export {
  ResumeResolver,
  type ResolveReport,
  type SkippedCandidate,
} from "./resolver.js";
