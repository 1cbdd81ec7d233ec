/**
 * Sessions command - list the sessions stored for a project
 */

import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { createRunContext, type SessionCommandOptions } from "../context.js";
import { EXIT, exitCodeFor, type ExitCode } from "../exit-codes.js";
import type { OutputSink } from "../../runner/types.js";
import { formatError } from "../../utils/errors.js";

export interface SessionsCommandOptions extends SessionCommandOptions {
  json?: boolean;
}

export interface SessionListing {
  id: string;
  createdAt: string;
  updatedAt: string;
  transcriptPath: string;
  live: boolean;
}

export interface SessionsReport {
  projectPath: string;
  storeDir: string;
  sessions: SessionListing[];
  invalid: Array<{ sessionId: string; reason: string }>;
}

export function registerSessionsCommand(program: Command): void {
  program
    .command("sessions")
    .description("List sessions for the project, most recent first")
    .option("-C, --cd <dir>", "Project directory (defaults to the current directory)")
    .option("--session-store <path>", "Directory holding session records")
    .option("--config <path>", "Explicit configuration file")
    .option("--json", "Output as JSON")
    .option("--verbose", "Log debug output")
    .action(async (options: SessionsCommandOptions) => {
      process.exitCode = await runSessionsCommand(options);
    });
}

export async function runSessionsCommand(
  options: SessionsCommandOptions,
  io: { stdout?: OutputSink } = {},
): Promise<ExitCode> {
  const stdout = io.stdout ?? process.stdout;

  try {
    const context = await createRunContext(options);
    const scan = await context.store.scan(context.projectPath);

    const sessions: SessionListing[] = [];
    for (const session of scan.sessions) {
      sessions.push({
        id: session.id,
        createdAt: session.createdAt.toISOString(),
        updatedAt: session.updatedAt.toISOString(),
        transcriptPath: session.transcriptPath,
        live: await context.locks.isLive(session.id),
      });
    }

    const report: SessionsReport = {
      projectPath: context.projectPath,
      storeDir: context.storeDir,
      sessions,
      invalid: scan.invalid.map((record) => ({ sessionId: record.sessionId, reason: record.reason })),
    };

    if (options.json) {
      stdout.write(`${JSON.stringify(report, null, 2)}\n`);
      return EXIT.SUCCESS;
    }

    printReport(report, stdout);
    return EXIT.SUCCESS;
  } catch (error) {
    p.log.error(formatError(error));
    return exitCodeFor(error);
  }
}

function printReport(report: SessionsReport, stdout: OutputSink): void {
  if (report.sessions.length === 0) {
    p.log.info(`No sessions for ${report.projectPath}`);
  }

  for (const session of report.sessions) {
    const state = session.live ? chalk.yellow("live") : chalk.dim("idle");
    stdout.write(`${session.id}  ${session.updatedAt}  ${state}  ${session.transcriptPath}\n`);
  }

  for (const record of report.invalid) {
    p.log.warning(`Skipped ${record.sessionId}: ${record.reason}`);
  }
}
