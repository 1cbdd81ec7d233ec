/**
 * Runner types
 */

import type { EntryKind } from "../transcript/index.js";

/**
 * How a run chooses its session
 */
export type ResumeMode =
  | { kind: "auto" }
  | { kind: "new" }
  | { kind: "last" }
  | { kind: "id"; sessionId: string };

/**
 * Lifecycle of a session within one run
 */
export type SessionPhase =
  | "unopened"
  | "resolving"
  | "fresh"
  | "resuming"
  | "active"
  | "saved"
  | "abandoned";

/**
 * Input to one unit of work
 */
export interface TurnContext {
  sessionId: string;
  prompt: string;
  /** Snapshot as of the end of the previous turn */
  snapshot: Buffer;
  /** 1-based turn number within this run */
  turn: number;
}

/**
 * Something a turn produced that belongs in the transcript
 */
export interface TurnEvent {
  kind: Exclude<EntryKind, "input">;
  message: string;
}

export interface TurnResult {
  events: TurnEvent[];
  snapshot: Buffer;
}

/**
 * Performs the work for one prompt. The session layer treats the snapshot
 * as opaque bytes.
 */
export type TurnHandler = (context: TurnContext) => Promise<TurnResult>;

/**
 * Where rendered output goes (process.stdout in the CLI)
 */
export interface OutputSink {
  write(chunk: string): unknown;
}
