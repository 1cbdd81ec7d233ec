/**
 * Interactive mode: read prompts until /exit, /quit, end of input or an
 * abort, saving the snapshot after every turn
 */

import type { Logger, ILogObj } from "tslog";
import type { ModeAdapter } from "./adapter.js";
import { ConciseOutput } from "./output.js";
import { finishAfterFailure, runTurn, startRun, type RunSummary } from "./run.js";
import type { OutputSink, ResumeMode, TurnHandler } from "./types.js";
import { createChildLogger, getLogger } from "../utils/logger.js";

export const EXIT_COMMANDS: readonly string[] = ["/exit", "/quit"];

export interface InteractiveRunOptions {
  adapter: ModeAdapter;
  projectPath: string;
  mode: ResumeMode;
  handler: TurnHandler;
  /** Lines typed by the user */
  input: AsyncIterable<string>;
  output: OutputSink;
  /** Prompt to run before reading input */
  initialPrompt?: string;
  transcriptPath?: string;
  color?: boolean;
  logger?: Logger<ILogObj>;
  /** Ends the session at the next turn boundary (SIGINT, SIGTERM) */
  signal?: AbortSignal;
}

export async function runInteractive(options: InteractiveRunOptions): Promise<RunSummary> {
  const { adapter } = options;
  const logger = options.logger ?? createChildLogger(getLogger(), "interactive");
  const output = new ConciseOutput(adapter, options.output, { color: options.color });

  const firstSequence = await startRun(adapter, output, {
    projectPath: options.projectPath,
    mode: options.mode,
    transcriptPath: options.transcriptPath,
    label: "interactive",
  });

  let turns = 0;
  const turn = async (prompt: string, echoInput: boolean): Promise<void> => {
    turns++;
    const outcome = await runTurn(adapter, output, options.handler, { prompt, turn: turns, echoInput });
    if (!outcome.ok) {
      logger.debug({ event: "turn.failed", turn: turns, error: String(outcome.error) });
    }
  };

  try {
    const initial = options.initialPrompt?.trim();
    if (initial) {
      await turn(initial, true);
    }

    const lines = options.input[Symbol.asyncIterator]();
    for (;;) {
      const line = await nextLine(lines, options.signal);
      if (line === null) break;
      const prompt = line.trim();
      if (!prompt) continue;
      if (EXIT_COMMANDS.includes(prompt)) break;
      await turn(prompt, false);
      if (options.signal?.aborted) break;
    }

    const interrupted = options.signal?.aborted === true;
    if (interrupted) {
      await output.status(`Interrupted by ${String(options.signal?.reason)}`);
    }
    await output.status("Session saved", "success");
    const lastSequence = adapter.lastSequence;
    const resumed = adapter.resumed;
    const session = await adapter.finish();
    return { session, resumed, firstSequence, lastSequence, turns, interrupted };
  } catch (error) {
    await finishAfterFailure(adapter, logger);
    throw error;
  }
}

/**
 * Next input line, or null at end of input or once the signal aborts.
 * A read still pending at abort is left to the input's owner to close.
 */
function nextLine(lines: AsyncIterator<string>, signal: AbortSignal | undefined): Promise<string | null> {
  if (signal?.aborted) return Promise.resolve(null);

  return new Promise((resolve, reject) => {
    const onAbort = (): void => resolve(null);
    signal?.addEventListener("abort", onAbort, { once: true });
    lines.next().then(
      (result) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(result.done ? null : result.value);
      },
      (error: unknown) => {
        signal?.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
