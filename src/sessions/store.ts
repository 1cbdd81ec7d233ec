/**
 * Session Store
 *
 * Durable session records keyed by session id, scoped to a project path.
 * Every record write goes through an atomic temp-file-and-rename, so a
 * crash mid-save leaves the previous record intact and a partial update is
 * never readable as a valid one.
 *
 * Storage Structure:
 *   <root>/
 *     locks/               - lock files (see lock.ts)
 *     <session-id>/
 *       session.json       - metadata, snapshot and checksum
 *       transcript.jsonl   - default transcript destination
 */

import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import { z } from "zod";
import type { Logger, ILogObj } from "tslog";
import type {
  CreateSessionOptions,
  InvalidRecord,
  LockedSession,
  Session,
  SessionFiles,
  SessionScan,
} from "./types.js";
import { SessionLockManager, withProjectGuard } from "./lock.js";
import {
  AlreadyLockedError,
  CorruptError,
  IOFailureError,
  NotFoundError,
  errnoCode,
  toError,
} from "../utils/errors.js";
import { atomicWriteFile, ensureDir, getStringHash, readTextFileIfExists } from "../utils/files.js";
import { createChildLogger, getLogger } from "../utils/logger.js";
import { SessionIdSchema, formatIssues, parseJsonSafe, safeValidate } from "../utils/validation.js";

/** Current record format version */
const RECORD_VERSION = 1;

const RECORD_FILE = "session.json";
const TRANSCRIPT_FILE = "transcript.jsonl";

const SessionRecordSchema = z.object({
  version: z.literal(RECORD_VERSION),
  id: SessionIdSchema,
  projectPath: z.string().min(1),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  transcriptPath: z.string().min(1),
  snapshot: z.string().base64(),
  checksum: z.string().regex(/^[0-9a-f]{64}$/),
});

type SessionRecord = z.infer<typeof SessionRecordSchema>;

export interface SessionStoreConfig {
  /** Root directory holding one subdirectory per session */
  rootDir: string;

  locks: SessionLockManager;

  logger?: Logger<ILogObj>;

  clock?: () => Date;
}

/**
 * Canonical absolute form of a project path. Symlinks are resolved when the
 * directory exists so two spellings of one directory share sessions.
 */
export async function canonicalProjectPath(projectPath: string): Promise<string> {
  const absolute = path.resolve(projectPath);
  try {
    return await fs.realpath(absolute);
  } catch {
    return absolute;
  }
}

/**
 * Checksum over every record field except the checksum itself, in a fixed order
 */
function recordChecksum(record: Omit<SessionRecord, "checksum">): string {
  return getStringHash(
    JSON.stringify([
      record.version,
      record.id,
      record.projectPath,
      record.createdAt,
      record.updatedAt,
      record.transcriptPath,
      record.snapshot,
    ]),
  );
}

function toRecord(session: Session): SessionRecord {
  const body = {
    version: RECORD_VERSION,
    id: session.id,
    projectPath: session.projectPath,
    createdAt: session.createdAt.toISOString(),
    updatedAt: session.updatedAt.toISOString(),
    transcriptPath: session.transcriptPath,
    snapshot: session.snapshot.toString("base64"),
  } as const;
  return { ...body, checksum: recordChecksum(body) };
}

function fromRecord(record: SessionRecord): Session {
  return {
    id: record.id,
    projectPath: record.projectPath,
    createdAt: new Date(record.createdAt),
    updatedAt: new Date(record.updatedAt),
    transcriptPath: record.transcriptPath,
    snapshot: Buffer.from(record.snapshot, "base64"),
  };
}

/**
 * Parse and verify a record's text. Returns the reason on failure, plus the
 * project path when the damaged record still names one.
 */
function parseRecord(
  sessionId: string,
  content: string,
): { ok: true; session: Session } | { ok: false; reason: string; projectPath?: string } {
  const json = parseJsonSafe(content);
  if (!json.ok) {
    return { ok: false, reason: "record is not valid JSON (truncated write?)" };
  }

  const loose = z.object({ projectPath: z.string() }).safeParse(json.value);
  const projectPath = loose.success ? loose.data.projectPath : undefined;

  const result = safeValidate(SessionRecordSchema, json.value);
  if (!result.success) {
    return { ok: false, reason: `invalid record: ${formatIssues(result.issues)}`, projectPath };
  }

  const record = result.data;
  if (record.id !== sessionId) {
    return { ok: false, reason: `record id ${record.id} does not match its directory`, projectPath };
  }

  const { checksum, ...body } = record;
  if (recordChecksum(body) !== checksum) {
    return { ok: false, reason: "checksum mismatch", projectPath };
  }

  return { ok: true, session: fromRecord(record) };
}

/**
 * SessionStore owns the on-disk representation of session records
 */
export class SessionStore {
  readonly rootDir: string;
  private readonly locks: SessionLockManager;
  private readonly logger: Logger<ILogObj>;
  private readonly clock: () => Date;

  constructor(config: SessionStoreConfig) {
    this.rootDir = path.resolve(config.rootDir);
    this.locks = config.locks;
    this.logger = config.logger ?? createChildLogger(getLogger(), "sessions");
    this.clock = config.clock ?? (() => new Date());
  }

  getSessionDir(sessionId: string): string {
    return path.join(this.rootDir, sessionId);
  }

  getSessionFiles(sessionId: string): SessionFiles {
    const dir = this.getSessionDir(sessionId);
    return {
      dir,
      record: path.join(dir, RECORD_FILE),
      transcript: path.join(dir, TRANSCRIPT_FILE),
    };
  }

  /**
   * Allocate a new session for a project path and write its initial record.
   *
   * With `exclusive`, creation fails with AlreadyLockedError while another
   * session for the same path is live.
   */
  async create(projectPath: string, options: CreateSessionOptions = {}): Promise<Session> {
    if (!options.exclusive) {
      return this.writeNew(await canonicalProjectPath(projectPath), options);
    }

    const { session, lock } = await this.createLocked(projectPath, options);
    await lock.release();
    return session;
  }

  /**
   * Allocate a new session and return it already locked by the caller.
   * The live-session check and the lock acquisition happen under the
   * project's creation guard, so two processes cannot both pass the check.
   */
  async createLocked(
    projectPath: string,
    options: Omit<CreateSessionOptions, "exclusive"> = {},
  ): Promise<LockedSession> {
    const canonical = await canonicalProjectPath(projectPath);

    return withProjectGuard(this.locks, canonical, async () => {
      await this.assertNoLiveSession(canonical);

      const id = crypto.randomUUID();
      const lock = await this.locks.acquire(id);
      try {
        const session = await this.writeNew(canonical, options, id);
        return { session, lock };
      } catch (error) {
        await lock.release();
        throw error;
      }
    });
  }

  /**
   * Throw AlreadyLockedError if any session for the path is live,
   * other than the one named by `except`
   */
  async assertNoLiveSession(projectPath: string, except?: string): Promise<void> {
    const { sessions } = await this.scan(projectPath);
    for (const session of sessions) {
      if (session.id === except) continue;
      const status = await this.locks.inspect(session.id);
      if (status.state === "live") {
        throw new AlreadyLockedError(`A live session already exists for ${projectPath}`, {
          projectPath,
          sessionId: session.id,
          holder: status.holder,
        });
      }
    }
  }

  private async writeNew(
    projectPath: string,
    options: Omit<CreateSessionOptions, "exclusive">,
    id: string = crypto.randomUUID(),
  ): Promise<Session> {
    const files = this.getSessionFiles(id);
    const now = this.clock();
    const session: Session = {
      id,
      projectPath,
      createdAt: now,
      updatedAt: now,
      transcriptPath: options.transcriptPath ? path.resolve(options.transcriptPath) : files.transcript,
      snapshot: options.snapshot ?? Buffer.alloc(0),
    };

    await ensureDir(files.dir);
    await atomicWriteFile(files.record, JSON.stringify(toRecord(session), null, 2));
    this.logger.debug({ event: "session.create", sessionId: id, projectPath });
    return session;
  }

  /**
   * Load and verify a session record
   */
  async load(sessionId: string): Promise<Session> {
    const files = this.getSessionFiles(sessionId);

    if (!SessionIdSchema.safeParse(sessionId).success) {
      throw new NotFoundError(`No session ${sessionId}`, { sessionId });
    }

    const content = await readTextFileIfExists(files.record);
    if (content === null) {
      throw new NotFoundError(`No session ${sessionId} in ${this.rootDir}`, {
        sessionId,
        path: files.record,
      });
    }

    const parsed = parseRecord(sessionId, content);
    if (!parsed.ok) {
      throw new CorruptError(`Session ${sessionId} is corrupt: ${parsed.reason}`, {
        path: files.record,
        reason: parsed.reason,
        sessionId,
      });
    }
    return parsed.session;
  }

  /**
   * Replace the snapshot and advance updatedAt, atomically.
   * Returns the session as now stored.
   */
  async save(session: Session, snapshot: Buffer): Promise<Session> {
    const now = this.clock().getTime();
    const updated: Session = {
      ...session,
      updatedAt: new Date(Math.max(now, session.updatedAt.getTime() + 1)),
      snapshot: Buffer.from(snapshot),
    };

    const files = this.getSessionFiles(session.id);
    await atomicWriteFile(files.record, JSON.stringify(toRecord(updated), null, 2));
    this.logger.debug({ event: "session.save", sessionId: session.id, bytes: snapshot.length });
    return updated;
  }

  /**
   * Remove a session's directory (its record and default transcript).
   * Only the caller holding the session's lock may discard it.
   */
  async discard(sessionId: string): Promise<void> {
    if (!SessionIdSchema.safeParse(sessionId).success) return;
    const { dir } = this.getSessionFiles(sessionId);
    try {
      await fs.rm(dir, { recursive: true, force: true });
    } catch (error) {
      throw new IOFailureError(`Failed to discard session ${sessionId}`, {
        path: dir,
        operation: "delete",
        cause: toError(error),
      });
    }
    this.logger.debug({ event: "session.discard", sessionId });
  }

  /**
   * Valid sessions for a project path, most recently updated first
   */
  async listFor(projectPath: string): Promise<Session[]> {
    const { sessions } = await this.scan(projectPath);
    return sessions;
  }

  /**
   * Read every record for a project path, separating valid sessions from
   * records that fail validation
   */
  async scan(projectPath: string): Promise<SessionScan> {
    const canonical = await canonicalProjectPath(projectPath);
    const sessions: Session[] = [];
    const invalid: InvalidRecord[] = [];

    let entries: string[];
    try {
      const dirents = await fs.readdir(this.rootDir, { withFileTypes: true });
      entries = dirents
        .filter((d) => d.isDirectory() && SessionIdSchema.safeParse(d.name).success)
        .map((d) => d.name);
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return { sessions, invalid };
      }
      throw new IOFailureError(`Failed to list sessions in ${this.rootDir}`, {
        path: this.rootDir,
        operation: "read",
        cause: toError(error),
      });
    }

    for (const id of entries) {
      const content = await readTextFileIfExists(this.getSessionFiles(id).record);
      if (content === null) {
        // Directory created but no record renamed into place yet
        continue;
      }

      const parsed = parseRecord(id, content);
      if (parsed.ok) {
        if (parsed.session.projectPath === canonical) {
          sessions.push(parsed.session);
        }
      } else if (parsed.projectPath === undefined || parsed.projectPath === canonical) {
        invalid.push({ sessionId: id, projectPath: parsed.projectPath, reason: parsed.reason });
      }
    }

    sessions.sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime());
    return { sessions, invalid };
  }
}
