/**
 * Non-interactive mode: one prompt, one turn, then exit
 */

import type { Logger, ILogObj } from "tslog";
import type { ModeAdapter } from "./adapter.js";
import { ConciseOutput } from "./output.js";
import { finishAfterFailure, runTurn, startRun, type RunSummary } from "./run.js";
import type { OutputSink, ResumeMode, TurnHandler } from "./types.js";
import { ValidationError } from "../utils/errors.js";
import { createChildLogger, getLogger } from "../utils/logger.js";

export interface ExecRunOptions {
  adapter: ModeAdapter;
  projectPath: string;
  mode: ResumeMode;
  prompt: string;
  handler: TurnHandler;
  output: OutputSink;
  transcriptPath?: string;
  color?: boolean;
  logger?: Logger<ILogObj>;
}

/**
 * Run a single prompt against the resolved session. A failing turn is
 * recorded and saved, then rethrown once the session is closed.
 */
export async function runExec(options: ExecRunOptions): Promise<RunSummary> {
  const prompt = options.prompt.trim();
  if (prompt.length === 0) {
    throw new ValidationError("Prompt must not be empty", { field: "prompt" });
  }

  const { adapter } = options;
  const logger = options.logger ?? createChildLogger(getLogger(), "exec");
  const output = new ConciseOutput(adapter, options.output, { color: options.color });

  const firstSequence = await startRun(adapter, output, {
    projectPath: options.projectPath,
    mode: options.mode,
    transcriptPath: options.transcriptPath,
    label: "non-interactive",
  });

  try {
    const outcome = await runTurn(adapter, output, options.handler, {
      prompt,
      turn: 1,
      echoInput: true,
      headFinalResult: true,
    });
    if (!outcome.ok) {
      throw outcome.error;
    }

    await output.status("Task complete", "success");
    const lastSequence = adapter.lastSequence;
    const resumed = adapter.resumed;
    const session = await adapter.finish();
    return { session, resumed, firstSequence, lastSequence, turns: 1, interrupted: false };
  } catch (error) {
    await finishAfterFailure(adapter, logger);
    throw error;
  }
}
