/** Process exit codes for the keel CLI. */

import {
  BusyError,
  ConfigError,
  CorruptError,
  NotFoundError,
  ValidationError,
} from "../utils/errors.js";

export const EXIT = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
  NO_SESSION: 3,
  BUSY: 4,
  /** Interactive session ended by SIGINT or SIGTERM, after saving */
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof BusyError) return EXIT.BUSY;
  if (error instanceof NotFoundError || error instanceof CorruptError) return EXIT.NO_SESSION;
  if (error instanceof ValidationError || error instanceof ConfigError) return EXIT.USAGE;
  return EXIT.FAILURE;
}
