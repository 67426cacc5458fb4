import chalk from "chalk";
import type { Command } from "commander";

import { deleteSource } from "@coldbox/core/engine";

import { inBox, loadCliContext } from "../helpers.js";

export function registerDeleteCommand(program: Command, signal?: AbortSignal): void {
  program
    .command("delete <box> <name>")
    .description("Delete a source and its remote objects")
    .action(async (box: string, name: string) => {
      const cli = await loadCliContext(program, signal);
      await inBox(cli, box, (ctx) => deleteSource(ctx, name, signal));
      console.log(chalk.green(`Deleted ${name}`));
    });
}
