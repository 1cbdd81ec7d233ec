/**
 * Session persistence types for keel
 *
 * A session is one resumable unit of conversational state bound to a
 * project directory. Its snapshot is opaque to keel and replaced wholesale
 * on every save.
 */

import type { SessionLock } from "./lock.js";

/**
 * A loaded session record
 */
export interface Session {
  /** Unique session identifier (UUID), immutable */
  readonly id: string;

  /** Canonical absolute project path the session is scoped to */
  readonly projectPath: string;

  readonly createdAt: Date;

  /** Strictly increases with every save */
  readonly updatedAt: Date;

  /** Transcript destination, fixed when the session is created */
  readonly transcriptPath: string;

  /** Opaque resumable context */
  readonly snapshot: Buffer;
}

/**
 * A session together with the lock that makes the caller its only writer
 */
export interface LockedSession {
  session: Session;
  lock: SessionLock;
}

/**
 * File paths for one session directory
 */
export interface SessionFiles {
  /** Session directory: <root>/<id>/ */
  dir: string;

  /** Metadata record: <root>/<id>/session.json */
  record: string;

  /** Default transcript destination: <root>/<id>/transcript.jsonl */
  transcript: string;
}

/**
 * A record found on disk that failed validation
 */
export interface InvalidRecord {
  sessionId: string;

  /** Project path, when enough of the record survived to tell */
  projectPath?: string;

  reason: string;
}

/**
 * Result of scanning the store for one project
 */
export interface SessionScan {
  /** Valid sessions, most recently updated first */
  sessions: Session[];

  invalid: InvalidRecord[];
}

/**
 * Options for creating a session
 */
export interface CreateSessionOptions {
  /**
   * Refuse to create while another session for the same project is live
   * (lock held and not stale)
   */
  exclusive?: boolean;

  /** Transcript destination; defaults to the session directory */
  transcriptPath?: string;

  /** Initial snapshot; defaults to empty */
  snapshot?: Buffer;
}
