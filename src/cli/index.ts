#!/usr/bin/env node

/**
 * keel CLI Entry Point
 */

import { Command } from "commander";
import { VERSION } from "../version.js";
import { registerChatCommand } from "./commands/chat.js";
import { registerExecCommand } from "./commands/exec.js";
import { registerSessionsCommand } from "./commands/sessions.js";
import { EXIT } from "./exit-codes.js";
import { formatError } from "../utils/errors.js";

const program = new Command();

program
  .name("keel")
  .description("Durable, resumable sessions for interactive and scripted runs")
  .version(VERSION, "-v, --version", "Output the current version");

registerChatCommand(program);
registerExecCommand(program);
registerSessionsCommand(program);

async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exit(EXIT.FAILURE);
});
