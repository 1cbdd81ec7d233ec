/**
 * Chat command - interactive session (the default command)
 */

import { createInterface, type Interface } from "node:readline/promises";
import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import {
  addSessionOptions,
  createAdapter,
  createRunContext,
  resumeModeFrom,
  type ResumeFlags,
  type SessionCommandOptions,
} from "../context.js";
import { EXIT, exitCodeFor, type ExitCode } from "../exit-codes.js";
import { createEchoHandler } from "../../runner/echo.js";
import { runInteractive } from "../../runner/interactive.js";
import type { OutputSink, TurnHandler } from "../../runner/types.js";
import { formatError } from "../../utils/errors.js";

export interface ChatCommandOptions extends SessionCommandOptions, ResumeFlags {}

export interface ChatCommandIO {
  stdout?: OutputSink;
  /** Prompt lines; defaults to reading stdin */
  input?: AsyncIterable<string>;
  handler?: TurnHandler;
  color?: boolean;
}

export function registerChatCommand(program: Command): void {
  addSessionOptions(
    program
      .command("chat [prompt]", { isDefault: true })
      .description("Start or resume an interactive session for the project"),
  ).action(async (prompt: string | undefined, options: ChatCommandOptions) => {
    process.exitCode = await runChatCommand(prompt, options);
  });
}

export async function runChatCommand(
  prompt: string | undefined,
  options: ChatCommandOptions,
  io: ChatCommandIO = {},
): Promise<ExitCode> {
  const stdout = io.stdout ?? process.stdout;
  const rl = io.input
    ? null
    : createInterface({ input: process.stdin, terminal: false });

  // Ctrl+C or a termination request ends the session at the next turn
  // boundary; a second signal falls through to the default handler.
  const interrupt = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    interrupt.abort(signal);
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const mode = resumeModeFrom(options);
    const context = await createRunContext(options);

    const summary = await runInteractive({
      adapter: createAdapter(context),
      projectPath: context.projectPath,
      mode,
      handler: io.handler ?? createEchoHandler(),
      input: io.input ?? promptLines(rl, stdout, process.stdin.isTTY === true),
      output: stdout,
      initialPrompt: prompt,
      transcriptPath: options.transcriptLog,
      color: io.color,
      logger: context.logger,
      signal: interrupt.signal,
    });
    return summary.interrupted ? EXIT.INTERRUPTED : EXIT.SUCCESS;
  } catch (error) {
    p.log.error(formatError(error));
    return exitCodeFor(error);
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    rl?.close();
  }
}

/**
 * Lines from stdin, with a "> " prompt before each one on a terminal
 */
async function* promptLines(
  rl: Interface | null,
  stdout: OutputSink,
  showPrompt: boolean,
): AsyncGenerator<string> {
  if (!rl) return;
  const lines = rl[Symbol.asyncIterator]();
  for (;;) {
    if (showPrompt) stdout.write(chalk.cyan("> "));
    const next = await lines.next();
    if (next.done) return;
    yield next.value;
  }
}
