/**
 * Transcript record codec
 *
 * Records are JSON Lines, each terminated by "\n" and carrying a short
 * checksum so a torn final write can be told apart from a complete record.
 */

import crypto from "node:crypto";
import { z } from "zod";
import { ENTRY_KINDS, type TranscriptEntry, type TranscriptScan } from "./types.js";
import { parseJsonSafe } from "../utils/validation.js";

const NEWLINE = 0x0a;

const RecordSchema = z.object({
  seq: z.number().int().positive(),
  session: z.string().min(1),
  ts: z.string().min(1),
  kind: z.enum(ENTRY_KINDS),
  payload: z.string(),
  sum: z.string().length(16),
});

/**
 * First 16 hex chars of SHA-256 over the record fields
 */
export function entryChecksum(entry: TranscriptEntry): string {
  return crypto
    .createHash("sha256")
    .update(`${entry.sequence}|${entry.sessionId}|${entry.timestamp}|${entry.kind}|${entry.payload}`)
    .digest("hex")
    .slice(0, 16);
}

/**
 * Encode an entry as one terminated line
 */
export function encodeEntry(entry: TranscriptEntry): string {
  return (
    JSON.stringify({
      seq: entry.sequence,
      session: entry.sessionId,
      ts: entry.timestamp,
      kind: entry.kind,
      payload: entry.payload,
      sum: entryChecksum(entry),
    }) + "\n"
  );
}

/**
 * Decode one line (without its terminator)
 */
export function decodeLine(
  line: string,
): { ok: true; entry: TranscriptEntry } | { ok: false; reason: string } {
  const json = parseJsonSafe(line);
  if (!json.ok) {
    return { ok: false, reason: "not valid JSON" };
  }

  const parsed = RecordSchema.safeParse(json.value);
  if (!parsed.success) {
    return { ok: false, reason: "missing or mistyped fields" };
  }

  const record = parsed.data;
  const entry: TranscriptEntry = {
    sequence: record.seq,
    sessionId: record.session,
    timestamp: record.ts,
    kind: record.kind,
    payload: record.payload,
  };

  if (entryChecksum(entry) !== record.sum) {
    return { ok: false, reason: "checksum mismatch" };
  }

  return { ok: true, entry };
}

interface RawLine {
  offset: number;
  end: number;
  text: string;
}

/**
 * Split a buffer into terminated lines. An unterminated trailing fragment
 * was never acknowledged to a caller and is left out.
 */
function splitLines(buffer: Buffer): RawLine[] {
  const lines: RawLine[] = [];
  let offset = 0;

  while (offset < buffer.length) {
    const newline = buffer.indexOf(NEWLINE, offset);
    if (newline === -1) break;
    lines.push({ offset, end: newline + 1, text: buffer.subarray(offset, newline).toString("utf-8") });
    offset = newline + 1;
  }

  return lines;
}

/**
 * Scan transcript bytes and find the longest valid prefix.
 *
 * A structurally broken record counts as a torn tail only when no complete
 * record follows it. A record that decodes cleanly but breaks numbering or
 * names another session is never discarded; the scan reports it instead.
 */
export function scanTranscript(buffer: Buffer, expectedSessionId?: string): TranscriptScan {
  const lines = splitLines(buffer);
  const entries: TranscriptEntry[] = [];
  let sessionId = expectedSessionId;
  let validLength = 0;

  for (const [i, line] of lines.entries()) {
    const decoded = decodeLine(line.text);
    if (!decoded.ok) {
      const laterComplete = lines.slice(i + 1).some((later) => decodeLine(later.text).ok);
      if (laterComplete) {
        return {
          ok: false,
          reason: `record at byte ${line.offset} is damaged (${decoded.reason}) but complete records follow it`,
          offset: line.offset,
        };
      }
      break;
    }

    const entry = decoded.entry;
    if (sessionId !== undefined && entry.sessionId !== sessionId) {
      return {
        ok: false,
        reason: `record ${entry.sequence} belongs to session ${entry.sessionId}, expected ${sessionId}`,
        offset: line.offset,
      };
    }
    if (entry.sequence !== entries.length + 1) {
      return {
        ok: false,
        reason: `expected sequence ${entries.length + 1}, found ${entry.sequence}`,
        offset: line.offset,
      };
    }

    sessionId = entry.sessionId;
    entries.push(entry);
    validLength = line.end;
  }

  return { ok: true, entries, validLength, discardedBytes: buffer.length - validLength };
}
