/**
 * boxes command - List the boxes under the root.
 */

import chalk from "chalk";
import type { Command } from "commander";

import type { BackendConfig } from "@coldbox/core/schemas";

import { loadCliContext } from "../helpers.js";

export function describeBackend(backend: BackendConfig): string {
  switch (backend.kind) {
    case "local":
      return `local ${backend.folderPath}`;
    case "webdav":
      return `webdav ${backend.url}`;
    case "object-store":
      return `s3://${backend.bucket}/${backend.prefix} (${backend.storageClass})`;
  }
}

export function registerBoxesCommand(program: Command): void {
  program
    .command("boxes")
    .description("List boxes")
    .option("--json", "Output as JSON")
    .action(async (options: { json?: boolean }) => {
      const cli = await loadCliContext(program);
      const boxes = await cli.registry.listBoxes();

      if (options.json) {
        // Credentials stay out of the output.
        const redacted = boxes.map((box) =>
          box.backend.kind === "webdav"
            ? { ...box, backend: { ...box.backend, password: "***" } }
            : box,
        );
        console.log(JSON.stringify(redacted, null, 2));
        return;
      }
      if (boxes.length === 0) {
        console.log(chalk.gray("No boxes"));
        return;
      }
      for (const box of boxes) {
        console.log(`${chalk.bold(box.name)}  ${describeBackend(box.backend)}`);
      }
    });
}
