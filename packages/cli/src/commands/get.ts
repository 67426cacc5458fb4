/**
 * get command - Retrieve a source, requesting a restore first when the
 * backend needs one. Without --wait each run advances the retrieval by one
 * step.
 */

import { resolve } from "node:path";
import chalk from "chalk";
import type { Command } from "commander";

import type { BackendOptions } from "@coldbox/core/backends";
import { getSource, type GetResult } from "@coldbox/core/engine";

import { collectOption, inBox, loadCliContext, pollUntilSettled } from "../helpers.js";

interface GetOptions {
  option: BackendOptions;
  wait?: boolean;
  mode?: boolean;
  mtime?: boolean;
}

export function describeGetResult(name: string, result: GetResult): string {
  switch (result.status) {
    case "requested":
      return chalk.yellow(`Restore requested for ${name}; run get again later`);
    case "in-progress":
      return chalk.yellow(`Restore of ${name} is in progress`);
    case "failed":
      return chalk.red(`Retrieval of ${name} failed: ${result.reason}`);
    case "delivered":
      return chalk.green(`Delivered ${name} to ${result.destination}`);
  }
}

export function registerGetCommand(program: Command, signal?: AbortSignal): void {
  program
    .command("get <box> <name> [destination]")
    .description("Retrieve a source into a directory (default: current directory)")
    .option("-o, --option <key=value>", "Backend option, e.g. tier=Expedited", collectOption, {})
    .option("-w, --wait", "Keep polling until the source is delivered or fails")
    .option("--mode", "Restore stored file and directory modes")
    .option("--mtime", "Restore stored modification times")
    .action(
      async (box: string, name: string, destination: string | undefined, options: GetOptions) => {
        const cli = await loadCliContext(program, signal);
        const target = resolve(destination ?? ".");
        const result = await pollUntilSettled(
          () =>
            inBox(cli, box, (ctx) =>
              getSource(ctx, {
                name,
                destination: target,
                options: options.option,
                mode: options.mode,
                mtime: options.mtime,
                signal,
              }),
            ),
          {
            wait: options.wait ?? false,
            intervalMs: cli.config.poll.intervalMs,
            signal,
            onPending: (pending) => console.log(describeGetResult(name, pending)),
          },
        );
        console.log(describeGetResult(name, result));
        if (result.status === "failed") {
          process.exitCode = 1;
        }
      },
    );
}
