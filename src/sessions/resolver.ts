/**
 * Resume Resolver
 *
 * Picks the session a run should continue for a project directory. Holds
 * no state of its own: it reads and ranks what the store has.
 */

import type { Logger, ILogObj } from "tslog";
import type { Session } from "./types.js";
import type { SessionStore } from "./store.js";
import type { TranscriptLogger } from "../transcript/index.js";
import { CorruptError } from "../utils/errors.js";
import { createChildLogger, getLogger } from "../utils/logger.js";

/**
 * A candidate passed over during resolution
 */
export interface SkippedCandidate {
  sessionId: string;
  reason: string;
}

/**
 * Full outcome of a resolution
 */
export interface ResolveReport {
  /** Session to resume, or null to start fresh */
  session: Session | null;

  /** Candidates that failed validation */
  skipped: SkippedCandidate[];
}

export class ResumeResolver {
  private readonly store: SessionStore;
  private readonly transcripts: TranscriptLogger;
  private readonly logger: Logger<ILogObj>;

  constructor(
    store: SessionStore,
    transcripts: TranscriptLogger,
    options: { logger?: Logger<ILogObj> } = {},
  ) {
    this.store = store;
    this.transcripts = transcripts;
    this.logger = options.logger ?? createChildLogger(getLogger(), "resume");
  }

  /**
   * Most recently updated valid session for the path, or null
   */
  async resolve(projectPath: string): Promise<Session | null> {
    const report = await this.inspect(projectPath);
    return report.session;
  }

  /**
   * Resolve and report which candidates were skipped and why
   */
  async inspect(projectPath: string): Promise<ResolveReport> {
    const { sessions, invalid } = await this.store.scan(projectPath);

    const skipped: SkippedCandidate[] = invalid.map((record) => ({
      sessionId: record.sessionId,
      reason: record.reason,
    }));
    for (const candidate of skipped) {
      this.logger.warn(`Skipping session ${candidate.sessionId}: ${candidate.reason}`);
    }

    const newest = sessions[0];
    if (!newest) {
      return { session: null, skipped };
    }

    const tied = sessions.filter((s) => s.updatedAt.getTime() === newest.updatedAt.getTime());
    if (tied.length === 1) {
      return { session: newest, skipped };
    }

    // Equal timestamps: more transcript progress wins
    let best = newest;
    let bestProgress = -1;
    for (const session of tied) {
      const progress = await this.transcriptProgress(session);
      if (progress > bestProgress) {
        best = session;
        bestProgress = progress;
      }
    }

    return { session: best, skipped };
  }

  private async transcriptProgress(session: Session): Promise<number> {
    try {
      return await this.transcripts.lastSequence(session.transcriptPath, session.id);
    } catch (error) {
      if (error instanceof CorruptError) {
        this.logger.warn(`Transcript for session ${session.id} is unreadable: ${error.reason}`);
        return 0;
      }
      throw error;
    }
  }
}
