/**
 * Run modes for keel
 *
 * @module runner
 */

export type {
  ResumeMode,
  SessionPhase,
  TurnContext,
  TurnEvent,
  TurnResult,
  TurnHandler,
  OutputSink,
} from "./types.js";
export { ModeAdapter, type ModeAdapterDeps, type OpenOptions } from "./adapter.js";
export { ConciseOutput, formatTimestamp, type StatusStyle } from "./output.js";
export { createEchoHandler, decodeEchoState, encodeEchoState, type EchoState } from "./echo.js";
export { runTurn, startRun, type RunSummary, type TurnOutcome } from "./run.js";
export { runExec, type ExecRunOptions } from "./exec.js";
export { runInteractive, EXIT_COMMANDS, type InteractiveRunOptions } from "./interactive.js";
