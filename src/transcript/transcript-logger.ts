/**
 * Transcript Logger
 *
 * Append-only, crash-consistent log of one session's observable events.
 * Every append is written and fsync'ed before it resolves, so an entry
 * whose append succeeded survives a crash immediately afterwards.
 *
 * Reopening an existing file repairs a torn final record (left by a crash
 * mid-write) by truncating it away, then continues numbering from the
 * last complete entry.
 */

import fs, { type FileHandle } from "node:fs/promises";
import path from "node:path";
import type { Logger, ILogObj } from "tslog";
import { encodeEntry, scanTranscript } from "./codec.js";
import type { EntryKind, TranscriptEntry } from "./types.js";
import { CorruptError, IOFailureError, KeelError, errnoCode, toError } from "../utils/errors.js";
import { ensureDir, syncDirectory } from "../utils/files.js";
import { createChildLogger, getLogger } from "../utils/logger.js";

export interface TranscriptLoggerOptions {
  logger?: Logger<ILogObj>;
  clock?: () => Date;
}

/**
 * Open transcript destination. Only the lock holder for the session should
 * hold one.
 */
export class TranscriptHandle {
  readonly sessionId: string;
  readonly destination: string;

  private file: FileHandle | null;
  private size: number;
  private sequence: number;
  private broken = false;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly clock: () => Date;

  constructor(options: {
    sessionId: string;
    destination: string;
    file: FileHandle;
    size: number;
    lastSequence: number;
    clock: () => Date;
  }) {
    this.sessionId = options.sessionId;
    this.destination = options.destination;
    this.file = options.file;
    this.size = options.size;
    this.sequence = options.lastSequence;
    this.clock = options.clock;
  }

  /** Sequence number of the last durably written entry (0 when empty) */
  get lastSequence(): number {
    return this.sequence;
  }

  get closed(): boolean {
    return this.file === null;
  }

  /**
   * Append one entry. Calls are serialized so numbering follows call order.
   */
  append(kind: EntryKind, payload: string): Promise<TranscriptEntry> {
    const result = this.queue.then(() => this.write(kind, payload));
    this.queue = result.catch(() => undefined);
    return result;
  }

  private async write(kind: EntryKind, payload: string): Promise<TranscriptEntry> {
    const file = this.file;
    if (file === null) {
      throw new KeelError(`Transcript ${this.destination} is closed`, {
        code: "TRANSCRIPT_CLOSED",
        context: { sessionId: this.sessionId },
      });
    }
    if (this.broken) {
      throw new IOFailureError(`Transcript ${this.destination} is unusable after a failed write`, {
        path: this.destination,
        operation: "write",
      });
    }

    const entry: TranscriptEntry = {
      sequence: this.sequence + 1,
      sessionId: this.sessionId,
      timestamp: this.clock().toISOString(),
      kind,
      payload,
    };
    const bytes = Buffer.from(encodeEntry(entry), "utf-8");

    try {
      await file.appendFile(bytes);
      await file.sync();
    } catch (error) {
      // Cut back to the last complete record so later appends stay parseable
      try {
        await file.truncate(this.size);
        await file.sync();
      } catch {
        this.broken = true;
      }
      throw new IOFailureError(`Failed to append to transcript ${this.destination}`, {
        path: this.destination,
        operation: "write",
        cause: toError(error),
      });
    }

    this.size += bytes.length;
    this.sequence = entry.sequence;
    return entry;
  }

  /**
   * Release the destination. Content is kept. Closing twice is a no-op.
   */
  async close(): Promise<void> {
    await this.queue;
    const file = this.file;
    if (file === null) return;
    this.file = null;

    try {
      await file.close();
    } catch (error) {
      throw new IOFailureError(`Failed to close transcript ${this.destination}`, {
        path: this.destination,
        operation: "write",
        cause: toError(error),
      });
    }
  }
}

/**
 * Opens, appends to and reads transcript files
 */
export class TranscriptLogger {
  private readonly logger: Logger<ILogObj>;
  private readonly clock: () => Date;

  constructor(options: TranscriptLoggerOptions = {}) {
    this.logger = options.logger ?? createChildLogger(getLogger(), "transcript");
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Open or create a transcript destination for a session, repairing a
   * torn tail and continuing the sequence from the last complete entry.
   */
  async open(sessionId: string, destination: string): Promise<TranscriptHandle> {
    const target = path.resolve(destination);
    await ensureDir(path.dirname(target));

    const existing = await this.readBytes(target);
    let size = 0;
    let lastSequence = 0;

    if (existing !== null) {
      const scan = scanTranscript(existing, sessionId);
      if (!scan.ok) {
        throw new CorruptError(`Transcript ${target} is corrupt: ${scan.reason}`, {
          path: target,
          reason: scan.reason,
          sessionId,
        });
      }

      if (scan.discardedBytes > 0) {
        await this.truncate(target, scan.validLength);
        this.logger.warn(
          `Discarded ${scan.discardedBytes} bytes of incomplete transcript tail in ${target}`,
        );
      }

      size = scan.validLength;
      lastSequence = scan.entries.at(-1)?.sequence ?? 0;
    }

    let file: FileHandle;
    try {
      file = await fs.open(target, "a");
    } catch (error) {
      throw new IOFailureError(`Failed to open transcript ${target}`, {
        path: target,
        operation: "write",
        cause: toError(error),
      });
    }
    if (existing === null) {
      await syncDirectory(path.dirname(target));
    }

    this.logger.debug({ event: "transcript.open", sessionId, destination: target, lastSequence });

    return new TranscriptHandle({
      sessionId,
      destination: target,
      file,
      size,
      lastSequence,
      clock: this.clock,
    });
  }

  /**
   * Append an entry through a handle
   */
  append(handle: TranscriptHandle, kind: EntryKind, payload: string): Promise<TranscriptEntry> {
    return handle.append(kind, payload);
  }

  /**
   * Close a handle
   */
  close(handle: TranscriptHandle): Promise<void> {
    return handle.close();
  }

  /**
   * Read the complete entries of a transcript without modifying it.
   * A missing file reads as empty; a torn tail is ignored.
   */
  async read(destination: string, sessionId?: string): Promise<TranscriptEntry[]> {
    const target = path.resolve(destination);
    const bytes = await this.readBytes(target);
    if (bytes === null) return [];

    const scan = scanTranscript(bytes, sessionId);
    if (!scan.ok) {
      throw new CorruptError(`Transcript ${target} is corrupt: ${scan.reason}`, {
        path: target,
        reason: scan.reason,
        sessionId,
      });
    }
    return scan.entries;
  }

  /**
   * Sequence number of the last complete entry (0 for an empty or missing file)
   */
  async lastSequence(destination: string, sessionId?: string): Promise<number> {
    const entries = await this.read(destination, sessionId);
    return entries.at(-1)?.sequence ?? 0;
  }

  private async readBytes(target: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(target);
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return null;
      throw new IOFailureError(`Failed to read transcript ${target}`, {
        path: target,
        operation: "read",
        cause: toError(error),
      });
    }
  }

  private async truncate(target: string, length: number): Promise<void> {
    let file: FileHandle | undefined;
    try {
      file = await fs.open(target, "r+");
      await file.truncate(length);
      await file.sync();
    } catch (error) {
      throw new IOFailureError(`Failed to repair transcript tail in ${target}`, {
        path: target,
        operation: "write",
        cause: toError(error),
      });
    } finally {
      await file?.close();
    }
  }
}
