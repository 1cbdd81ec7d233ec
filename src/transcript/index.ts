/**
 * Transcript logging for keel
 *
 * @module transcript
 */

export { ENTRY_KINDS, type EntryKind, type TranscriptEntry, type TranscriptScan } from "./types.js";
export { encodeEntry, decodeLine, entryChecksum, scanTranscript } from "./codec.js";
export {
  TranscriptLogger,
  TranscriptHandle,
  type TranscriptLoggerOptions,
} from "./transcript-logger.js";
