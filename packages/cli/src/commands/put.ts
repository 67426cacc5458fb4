/**
 * put command - Pack, encrypt and upload a file or directory.
 */

import chalk from "chalk";
import type { Command } from "commander";

import type { Compression } from "@coldbox/core/codec";
import { putSource } from "@coldbox/core/engine";

import { formatSize, inBox, loadCliContext, parseCompression } from "../helpers.js";

interface PutOptions {
  name?: string;
  comment?: string;
  compression: Compression;
  mode?: boolean;
  mtime?: boolean;
}

export function registerPutCommand(program: Command, signal?: AbortSignal): void {
  program
    .command("put <box> <path>")
    .description("Store a file or directory as a new source")
    .option("-n, --name <name>", "Source name (default: the path's basename)")
    .option("-c, --comment <text>", "Free-form comment")
    .option("--compression <type>", "Archive compression: gz or none", parseCompression, "gz")
    .option("--mode", "Store file and directory modes")
    .option("--mtime", "Store file and directory modification times")
    .action(async (box: string, path: string, options: PutOptions) => {
      const cli = await loadCliContext(program, signal);
      const source = await inBox(cli, box, (ctx) =>
        putSource(ctx, {
          path,
          name: options.name,
          comment: options.comment,
          compression: options.compression,
          mode: options.mode,
          mtime: options.mtime,
          signal,
        }),
      );
      console.log(
        chalk.green(`Stored ${source.name}`) +
          ` (${formatSize(source.plaintextSize)}, ${formatSize(source.encryptedSize)} encrypted)`,
      );
    });
}
