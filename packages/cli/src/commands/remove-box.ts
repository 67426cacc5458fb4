import chalk from "chalk";
import type { Command } from "commander";

import { loadCliContext } from "../helpers.js";

export function registerRemoveBoxCommand(program: Command): void {
  program
    .command("remove-box <box>")
    .description("Forget a box's local state; remote objects are left in place")
    .option("-y, --yes", "Confirm removal")
    .action(async (box: string, options: { yes?: boolean }) => {
      if (!options.yes) {
        throw new Error(`Refusing to remove box ${box} without --yes`);
      }
      const cli = await loadCliContext(program);
      await cli.registry.removeBox(box);
      console.log(chalk.green(`Removed box ${box}`));
    });
}
