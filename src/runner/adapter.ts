/**
 * Mode Adapter
 *
 * Wires the session store, lock manager, resume resolver and transcript
 * logger into one lifecycle that both the interactive and the exec mode
 * drive:
 *
 *   unopened -> resolving -> fresh | resuming -> active -> saved | abandoned
 *
 * In auto mode a session whose transcript cannot be reopened is passed
 * over (resuming -> fresh) so a fresh start is always possible.
 *
 * While active, this process holds the session's lock and is the only
 * writer of its record and transcript.
 */

import path from "node:path";
import type { Logger, ILogObj } from "tslog";
import type { ResumeMode, SessionPhase } from "./types.js";
import {
  ResumeResolver,
  SessionLockManager,
  SessionStore,
  canonicalProjectPath,
  withProjectGuard,
  type LockedSession,
  type Session,
  type SessionLock,
} from "../sessions/index.js";
import type { EntryKind, TranscriptEntry, TranscriptHandle, TranscriptLogger } from "../transcript/index.js";
import { CorruptError, KeelError, NotFoundError, ValidationError } from "../utils/errors.js";
import { createChildLogger, getLogger } from "../utils/logger.js";

const TRANSITIONS: Record<SessionPhase, readonly SessionPhase[]> = {
  unopened: ["resolving"],
  resolving: ["fresh", "resuming", "unopened"],
  fresh: ["active", "unopened"],
  resuming: ["active", "fresh", "unopened"],
  active: ["saved", "abandoned"],
  saved: [],
  abandoned: [],
};

export interface ModeAdapterDeps {
  store: SessionStore;
  locks: SessionLockManager;
  resolver: ResumeResolver;
  transcripts: TranscriptLogger;
  logger?: Logger<ILogObj>;
}

interface ActiveSession {
  session: Session;
  lock: SessionLock;
  transcript: TranscriptHandle;
}

export interface OpenOptions {
  /** Transcript destination for a new session. Ignored on resume. */
  transcriptPath?: string;
}

export class ModeAdapter {
  private readonly store: SessionStore;
  private readonly locks: SessionLockManager;
  private readonly resolver: ResumeResolver;
  private readonly transcripts: TranscriptLogger;
  private readonly logger: Logger<ILogObj>;

  private current: SessionPhase = "unopened";
  private active: ActiveSession | null = null;
  private wasResumed = false;

  constructor(deps: ModeAdapterDeps) {
    this.store = deps.store;
    this.locks = deps.locks;
    this.resolver = deps.resolver;
    this.transcripts = deps.transcripts;
    this.logger = deps.logger ?? createChildLogger(getLogger(), "adapter");
  }

  get phase(): SessionPhase {
    return this.current;
  }

  /** True when open() continued an existing session */
  get resumed(): boolean {
    return this.wasResumed;
  }

  get session(): Session {
    return this.requireActive().session;
  }

  get lastSequence(): number {
    return this.requireActive().transcript.lastSequence;
  }

  /**
   * Resolve, lock and open the session for a project directory.
   *
   * On failure nothing stays locked and the adapter returns to `unopened`.
   */
  async open(projectPath: string, mode: ResumeMode, options: OpenOptions = {}): Promise<Session> {
    this.transition("resolving");

    let claimed: LockedSession | null = null;
    let created = false;
    try {
      const canonical = await canonicalProjectPath(projectPath);
      const existing = await this.pick(canonical, mode);

      let opened: ActiveSession | null = null;
      if (existing) {
        claimed = await this.claim(existing);
        this.transition("resuming");
        this.wasResumed = true;
        const transcript = await this.openResumed(claimed, mode);
        if (transcript) {
          opened = { session: claimed.session, lock: claimed.lock, transcript };
          this.warnOnTranscriptOverride(claimed.session, options.transcriptPath);
        } else {
          const passedOver = claimed;
          claimed = null;
          await passedOver.lock.release();
        }
      }

      if (!opened) {
        await this.assertTranscriptUnused(options.transcriptPath);
        const fresh = await this.store.createLocked(canonical, {
          transcriptPath: options.transcriptPath,
        });
        claimed = fresh;
        created = true;
        this.transition("fresh");
        this.wasResumed = false;
        const transcript = await this.transcripts.open(fresh.session.id, fresh.session.transcriptPath);
        opened = { session: fresh.session, lock: fresh.lock, transcript };
      }

      this.active = opened;
      this.transition("active");
      this.logger.info(
        `${this.wasResumed ? "Resumed" : "Created"} session ${opened.session.id} for ${canonical}`,
      );
      return opened.session;
    } catch (error) {
      if (claimed) {
        const { session, lock } = claimed;
        try {
          // A session that never became active must not be picked up later
          if (created) await this.store.discard(session.id);
        } finally {
          await lock.release();
        }
      }
      this.current = "unopened";
      throw error;
    }
  }

  /**
   * Record one transcript entry
   */
  append(kind: EntryKind, payload: string): Promise<TranscriptEntry> {
    const { lock, transcript } = this.requireActive();
    lock.assertHeld();
    return transcript.append(kind, payload);
  }

  /**
   * Persist a new snapshot at a unit-of-work boundary
   */
  async save(snapshot: Buffer): Promise<Session> {
    const active = this.requireActive();
    active.lock.assertHeld();
    active.session = await this.store.save(active.session, snapshot);
    return active.session;
  }

  /**
   * End the run: optionally persist a final snapshot, then close the
   * transcript and release the lock. The transcript is closed and the lock
   * released even if the save fails; the run then ends `abandoned`.
   */
  async finish(snapshot?: Buffer): Promise<Session> {
    const active = this.requireActive();
    let saved = false;
    try {
      try {
        if (snapshot) {
          await this.save(snapshot);
        }
        saved = true;
      } finally {
        await active.transcript.close();
      }
    } finally {
      await active.lock.release();
      this.transition(saved ? "saved" : "abandoned");
      this.active = null;
    }
    return active.session;
  }

  /**
   * Stop without saving or releasing, leaving the lock to go stale as a
   * crashed process would
   */
  async abandon(): Promise<void> {
    const active = this.requireActive();
    active.lock.abandon();
    this.transition("abandoned");
    this.active = null;
    await active.transcript.close();
  }

  private async pick(projectPath: string, mode: ResumeMode): Promise<Session | null> {
    switch (mode.kind) {
      case "new":
        return null;
      case "id":
        return this.store.load(mode.sessionId);
      case "last": {
        const session = await this.resolver.resolve(projectPath);
        if (!session) {
          throw new NotFoundError(`No resumable session for ${projectPath}`, { path: projectPath });
        }
        return session;
      }
      case "auto":
        return this.resolver.resolve(projectPath);
    }
  }

  /**
   * Lock an existing session. The live-session check and the acquisition
   * run under the project guard, and the record is re-read once locked so
   * a save made by the previous holder is not lost.
   */
  private claim(session: Session): Promise<LockedSession> {
    return withProjectGuard(this.locks, session.projectPath, async () => {
      await this.store.assertNoLiveSession(session.projectPath, session.id);
      const lock = await this.locks.acquire(session.id);
      try {
        return { session: await this.store.load(session.id), lock };
      } catch (error) {
        await lock.release();
        throw error;
      }
    });
  }

  /**
   * Open the transcript of a claimed session. In auto mode a corrupt
   * transcript yields null so the caller can start fresh instead.
   */
  private async openResumed(claimed: LockedSession, mode: ResumeMode): Promise<TranscriptHandle | null> {
    const { session } = claimed;
    try {
      return await this.transcripts.open(session.id, session.transcriptPath);
    } catch (error) {
      if (mode.kind !== "auto" || !(error instanceof CorruptError)) throw error;
      this.logger.warn(`Session ${session.id} cannot be resumed (${error.reason}); starting fresh`);
      return null;
    }
  }

  /**
   * A new session may only log to a destination that holds no entries yet
   */
  private async assertTranscriptUnused(requested: string | undefined): Promise<void> {
    if (!requested) return;
    const target = path.resolve(requested);

    let entries: TranscriptEntry[];
    try {
      entries = await this.transcripts.read(target);
    } catch (error) {
      if (!(error instanceof CorruptError)) throw error;
      throw new ValidationError(`Transcript ${target} is not usable for a new session: ${error.reason}`, {
        field: "transcriptLog",
        cause: error,
      });
    }

    const owner = entries[0]?.sessionId;
    if (owner !== undefined) {
      throw new ValidationError(
        `Transcript ${target} already holds entries of session ${owner}; choose another file`,
        { field: "transcriptLog" },
      );
    }
  }

  private warnOnTranscriptOverride(session: Session, requested: string | undefined): void {
    if (requested && path.resolve(requested) !== session.transcriptPath) {
      this.logger.warn(
        `Session ${session.id} keeps its transcript at ${session.transcriptPath}; ignoring ${requested}`,
      );
    }
  }

  private requireActive(): ActiveSession {
    if (this.current !== "active" || !this.active) {
      throw new KeelError(`Session is not active (${this.current})`, {
        code: "SESSION_NOT_ACTIVE",
        context: { phase: this.current },
      });
    }
    return this.active;
  }

  private transition(next: SessionPhase): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new KeelError(`Invalid session transition ${this.current} -> ${next}`, {
        code: "INVALID_TRANSITION",
        context: { from: this.current, to: next },
      });
    }
    this.current = next;
  }
}
