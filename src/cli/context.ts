/**
 * Runtime wiring shared by the session commands
 */

import path from "node:path";
import type { Command } from "commander";
import type { Logger, ILogObj } from "tslog";
import { loadConfig } from "../config/loader.js";
import { getDefaultSessionStoreDir } from "../config/paths.js";
import type { KeelConfig } from "../config/schema.js";
import {
  ResumeResolver,
  SessionLockManager,
  SessionStore,
  canonicalProjectPath,
} from "../sessions/index.js";
import { TranscriptLogger } from "../transcript/index.js";
import { ModeAdapter } from "../runner/adapter.js";
import type { ResumeMode } from "../runner/types.js";
import { ValidationError } from "../utils/errors.js";
import { createChildLogger, initializeLogging } from "../utils/logger.js";
import { assertSessionId } from "../utils/validation.js";

/**
 * Flags accepted by every command that touches sessions
 */
export interface SessionCommandOptions {
  cd?: string;
  sessionStore?: string;
  transcriptLog?: string;
  config?: string;
  verbose?: boolean;
}

/**
 * Flags that choose which session a run uses
 */
export interface ResumeFlags {
  newSession?: boolean;
  resume?: string;
  last?: boolean;
}

export interface RunContext {
  projectPath: string;
  config: KeelConfig;
  logger: Logger<ILogObj>;
  storeDir: string;
  locks: SessionLockManager;
  store: SessionStore;
  transcripts: TranscriptLogger;
  resolver: ResumeResolver;
}

/**
 * Store root: --session-store, then sessions.storeDir, then the project default
 */
export function resolveStoreDir(
  projectPath: string,
  config: KeelConfig,
  override: string | undefined,
): string {
  if (override) return path.resolve(override);
  if (config.sessions.storeDir) return path.resolve(projectPath, config.sessions.storeDir);
  return getDefaultSessionStoreDir(projectPath);
}

export async function createRunContext(options: SessionCommandOptions): Promise<RunContext> {
  const projectPath = await canonicalProjectPath(options.cd ?? process.cwd());
  const config = await loadConfig(projectPath, { configPath: options.config });

  const logger = initializeLogging(projectPath, {
    level: options.verbose ? "debug" : config.logging.level,
    logToFile: config.logging.logToFile,
  });

  const storeDir = resolveStoreDir(projectPath, config, options.sessionStore);
  const locks = new SessionLockManager({
    lockDir: path.join(storeDir, "locks"),
    staleMs: config.sessions.lockStaleMs,
    heartbeatMs: config.sessions.heartbeatMs,
    logger: createChildLogger(logger, "lock"),
  });
  const store = new SessionStore({ rootDir: storeDir, locks, logger: createChildLogger(logger, "sessions") });
  const transcripts = new TranscriptLogger({ logger: createChildLogger(logger, "transcript") });
  const resolver = new ResumeResolver(store, transcripts, { logger: createChildLogger(logger, "resume") });

  return { projectPath, config, logger, storeDir, locks, store, transcripts, resolver };
}

export function createAdapter(context: RunContext): ModeAdapter {
  return new ModeAdapter({
    store: context.store,
    locks: context.locks,
    resolver: context.resolver,
    transcripts: context.transcripts,
    logger: createChildLogger(context.logger, "adapter"),
  });
}

/**
 * Turn the resume flags into a mode. At most one may be given; none means
 * resume the latest session automatically.
 */
export function resumeModeFrom(flags: ResumeFlags): ResumeMode {
  const given = [flags.newSession === true, flags.resume !== undefined, flags.last === true].filter(
    Boolean,
  ).length;
  if (given > 1) {
    throw new ValidationError("Use only one of --new-session, --resume and --last", {
      field: "resume",
    });
  }

  if (flags.newSession) return { kind: "new" };
  if (flags.last) return { kind: "last" };
  if (flags.resume !== undefined) {
    return { kind: "id", sessionId: assertSessionId(flags.resume) };
  }
  return { kind: "auto" };
}

/**
 * Register the session flags shared by chat and exec
 */
export function addSessionOptions(command: Command): Command {
  return command
    .option("-C, --cd <dir>", "Project directory (defaults to the current directory)")
    .option("--session-store <path>", "Directory holding session records")
    .option("--transcript-log <path>", "Transcript file for a new session")
    .option("--config <path>", "Explicit configuration file")
    .option("--new-session", "Always start a fresh session")
    .option("--resume <id>", "Resume the session with this id")
    .option("--last", "Resume the most recent session; fail if there is none")
    .option("--verbose", "Log debug output");
}
