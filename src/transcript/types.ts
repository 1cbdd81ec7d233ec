/**
 * Transcript types for keel
 *
 * A transcript is the append-only, ordered record of the observable events
 * of one session's runs. Entries are never rewritten once durably stored.
 */

/**
 * Entry kinds written to a transcript
 */
export const ENTRY_KINDS = ["input", "output", "system", "error"] as const;

export type EntryKind = (typeof ENTRY_KINDS)[number];

/**
 * One immutable transcript record
 */
export interface TranscriptEntry {
  /** 1-based, gapless within a session */
  sequence: number;

  /** Session the entry belongs to */
  sessionId: string;

  /** ISO timestamp of the append */
  timestamp: string;

  kind: EntryKind;

  /** Opaque content; never interpreted */
  payload: string;
}

/**
 * Result of scanning a transcript file's bytes
 */
export type TranscriptScan =
  | {
      ok: true;
      entries: TranscriptEntry[];
      /** Byte length of the complete, valid prefix */
      validLength: number;
      /** Bytes after the valid prefix that belong to a torn final record */
      discardedBytes: number;
    }
  | {
      ok: false;
      reason: string;
      /** Byte offset of the offending record */
      offset: number;
    };
