/**
 * list command - Show a box's sources from local state only.
 */

import chalk from "chalk";
import type { Command } from "commander";

import { listSources, withBoxReader } from "@coldbox/core/engine";

import { formatSize, loadCliContext } from "../helpers.js";

export function registerListCommand(program: Command): void {
  program
    .command("list <box>")
    .description("List the sources stored in a box")
    .option("--json", "Output as JSON")
    .action(async (box: string, options: { json?: boolean }) => {
      const cli = await loadCliContext(program);
      const listing = await withBoxReader(
        box,
        { registry: cli.registry },
        listSources,
      );

      if (options.json) {
        console.log(JSON.stringify(listing, null, 2));
        return;
      }

      for (const source of listing.sources) {
        const marker = source.orphanedAt ? chalk.red(" (orphaned)") : "";
        const comment = source.comment ? `  ${chalk.gray(source.comment)}` : "";
        console.log(
          `${chalk.bold(source.name)}  ${formatSize(source.plaintextSize)}${comment}${marker}`,
        );
      }
      const count = listing.sources.length;
      console.log(
        `${count} ${count === 1 ? "source" : "sources"}, ` +
          `${formatSize(listing.totalPlaintextSize)} ` +
          `(${formatSize(listing.totalEncryptedSize)} stored)`,
      );
      if (listing.orphaned > 0) {
        console.log(chalk.red(`${listing.orphaned} orphaned; run refresh to recheck`));
      }
    });
}
