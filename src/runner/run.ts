/**
 * Steps shared by the interactive and exec modes
 */

import type { Logger, ILogObj } from "tslog";
import type { ModeAdapter } from "./adapter.js";
import type { ConciseOutput } from "./output.js";
import type { ResumeMode, TurnHandler, TurnResult } from "./types.js";
import type { Session } from "../sessions/index.js";
import { VERSION } from "../version.js";

export interface RunSummary {
  session: Session;
  resumed: boolean;
  /** Sequence number of the first transcript entry written by this run */
  firstSequence: number;
  /** Sequence number of the last transcript entry written by this run */
  lastSequence: number;
  /** Turns attempted, including failed ones */
  turns: number;
  /** True when a signal ended the run */
  interrupted: boolean;
}

export type TurnOutcome = { ok: true; result: TurnResult } | { ok: false; error: unknown };

/**
 * Open the session and print the run banner. Returns the sequence number
 * the run's first entry received.
 */
export async function startRun(
  adapter: ModeAdapter,
  output: ConciseOutput,
  options: { projectPath: string; mode: ResumeMode; transcriptPath?: string; label: string },
): Promise<number> {
  const session = await adapter.open(options.projectPath, options.mode, {
    transcriptPath: options.transcriptPath,
  });

  const banner = await output.status(`keel (v${VERSION}) ${options.label} session`, "header");
  await output.status(`Session ${session.id} ${adapter.resumed ? "resumed" : "created"}`);
  await output.status(`Working directory: ${session.projectPath}`);
  return banner.sequence;
}

/**
 * Run one unit of work: record the prompt, call the handler, record what
 * it produced, then save the snapshot. A handler failure is recorded as an
 * error entry and the previous snapshot is saved unchanged.
 *
 * With `headFinalResult`, the last output block is preceded by a
 * "Final result:" heading.
 */
export async function runTurn(
  adapter: ModeAdapter,
  output: ConciseOutput,
  handler: TurnHandler,
  options: { prompt: string; turn: number; echoInput: boolean; headFinalResult?: boolean },
): Promise<TurnOutcome> {
  if (options.echoInput) {
    await output.status("Prompt:", "header");
    await output.block("input", options.prompt);
  } else {
    await output.record("input", options.prompt);
  }

  const before = adapter.session;
  let result: TurnResult;
  try {
    result = await handler({
      sessionId: before.id,
      prompt: options.prompt,
      snapshot: before.snapshot,
      turn: options.turn,
    });
  } catch (error) {
    await output.status(`Error: ${error instanceof Error ? error.message : String(error)}`, "error");
    await adapter.save(before.snapshot);
    return { ok: false, error };
  }

  const finalOutput = result.events.map((event) => event.kind).lastIndexOf("output");
  for (const [index, event] of result.events.entries()) {
    if (event.kind === "output") {
      if (options.headFinalResult && index === finalOutput) {
        await output.status("Final result:", "header");
      }
      await output.block("output", event.message);
    } else {
      await output.status(event.message, event.kind === "error" ? "error" : "info");
    }
  }

  await adapter.save(result.snapshot);
  return { ok: true, result };
}

/**
 * Close an adapter left active by a failure. Problems closing are logged
 * so the original failure is the one reported.
 */
export async function finishAfterFailure(adapter: ModeAdapter, logger: Logger<ILogObj>): Promise<void> {
  if (adapter.phase !== "active") return;
  try {
    await adapter.finish();
  } catch (error) {
    logger.error(`Failed to close session cleanly: ${String(error)}`);
  }
}
