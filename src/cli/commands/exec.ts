/**
 * Exec command - run one prompt non-interactively
 */

import { Command } from "commander";
import * as p from "@clack/prompts";
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
import { runExec } from "../../runner/exec.js";
import type { OutputSink, TurnHandler } from "../../runner/types.js";
import { formatError } from "../../utils/errors.js";

export interface ExecCommandOptions extends SessionCommandOptions, ResumeFlags {}

/**
 * Streams and collaborators, replaceable in tests
 */
export interface ExecCommandIO {
  stdout?: OutputSink;
  stdin?: NodeJS.ReadableStream;
  handler?: TurnHandler;
  color?: boolean;
}

export function registerExecCommand(program: Command): void {
  addSessionOptions(
    program
      .command("exec <prompt>")
      .description("Run one prompt against the project's session and exit (use - to read stdin)"),
  ).action(async (prompt: string, options: ExecCommandOptions) => {
    process.exitCode = await runExecCommand(prompt, options);
  });
}

export async function runExecCommand(
  prompt: string,
  options: ExecCommandOptions,
  io: ExecCommandIO = {},
): Promise<ExitCode> {
  try {
    const mode = resumeModeFrom(options);
    const context = await createRunContext(options);
    const text = prompt === "-" ? await readAll(io.stdin ?? process.stdin) : prompt;

    await runExec({
      adapter: createAdapter(context),
      projectPath: context.projectPath,
      mode,
      prompt: text,
      handler: io.handler ?? createEchoHandler(),
      output: io.stdout ?? process.stdout,
      transcriptPath: options.transcriptLog,
      color: io.color,
      logger: context.logger,
    });
    return EXIT.SUCCESS;
  } catch (error) {
    p.log.error(formatError(error));
    return exitCodeFor(error);
  }
}

async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}
