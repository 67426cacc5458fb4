/**
 * coldbox command line interface.
 *
 * Argument parsing and output only; every operation runs in @coldbox/core.
 */

import chalk from "chalk";
import { Command } from "commander";
import { z } from "zod";

import { isColdboxError } from "@coldbox/core/errors";

import { registerBoxesCommand } from "./commands/boxes.js";
import { registerDeleteCommand } from "./commands/delete.js";
import { registerGetCommand } from "./commands/get.js";
import { registerInitCommand } from "./commands/init.js";
import { registerListCommand } from "./commands/list.js";
import { registerPutCommand } from "./commands/put.js";
import { registerRefreshCommand } from "./commands/refresh.js";
import { registerRemoveBoxCommand } from "./commands/remove-box.js";

export {
  collectOption,
  formatSize,
  parseCompression,
  pollUntilSettled,
} from "./helpers.js";
export { describeRefreshResult } from "./commands/refresh.js";

export interface ProgramOptions {
  /** Aborts long-running operations and --wait loops, e.g. on SIGINT. */
  signal?: AbortSignal;
}

export function formatError(error: unknown): string {
  if (isColdboxError(error)) {
    const lines = [chalk.red(`Error [${error.errorCode}]: ${error.message}`)];
    if (error.cause instanceof Error) {
      lines.push(chalk.gray(`  Cause: ${error.cause.message}`));
    }
    return lines.join("\n");
  }
  if (error instanceof z.ZodError) {
    return chalk.red(`Error: invalid input\n${z.prettifyError(error)}`);
  }
  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`);
  }
  return chalk.red(`Error: ${String(error)}`);
}

export function createProgram(options: ProgramOptions = {}): Command {
  const { signal } = options;
  const program = new Command()
    .name("coldbox")
    .description("Encrypted cold-storage archives with resumable retrievals")
    .version("0.1.0")
    .option("--root <path>", "State directory (default: $COLDBOX_ROOT or ~/.coldbox)");

  registerInitCommand(program);
  registerBoxesCommand(program);
  registerPutCommand(program, signal);
  registerGetCommand(program, signal);
  registerDeleteCommand(program, signal);
  registerListCommand(program);
  registerRefreshCommand(program, signal);
  registerRemoveBoxCommand(program);

  return program;
}
