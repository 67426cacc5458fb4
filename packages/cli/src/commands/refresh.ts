/**
 * refresh command - Reconcile local state with the backend's inventory.
 */

import chalk from "chalk";
import type { Command } from "commander";

import type { BackendOptions } from "@coldbox/core/backends";
import { refreshBox, type RefreshReport, type RefreshResult } from "@coldbox/core/engine";

import { collectOption, inBox, loadCliContext, pollUntilSettled } from "../helpers.js";

interface RefreshOptions {
  option: BackendOptions;
  wait?: boolean;
}

export function describeReport(report: RefreshReport): string[] {
  const lines: string[] = [];
  for (const name of report.imported) lines.push(chalk.green(`  imported ${name}`));
  for (const name of report.recovered) lines.push(chalk.green(`  recovered ${name}`));
  for (const { name, missing } of report.orphaned) {
    lines.push(chalk.red(`  orphaned ${name} (missing ${missing.join(", ")})`));
  }
  for (const { key, reason } of report.undecodable) {
    lines.push(chalk.yellow(`  undecodable ${key}: ${reason}`));
  }
  for (const { name, metaKey } of report.duplicates) {
    lines.push(chalk.yellow(`  duplicate ${name} in ${metaKey}`));
  }
  for (const key of report.dangling) lines.push(chalk.gray(`  dangling ${key}`));
  return lines;
}

export function describeRefreshResult(result: RefreshResult): string[] {
  switch (result.status) {
    case "requested":
      return [chalk.yellow("Inventory requested; run refresh again later")];
    case "in-progress":
      return [
        chalk.yellow(
          result.pendingMetadata > 0
            ? `Waiting for ${result.pendingMetadata} metadata restore(s)`
            : "Inventory is in progress",
        ),
        ...(result.report ? describeReport(result.report) : []),
      ];
    case "failed":
      return [chalk.red(`Inventory failed: ${result.reason}`)];
    case "completed": {
      const { report } = result;
      return [
        chalk.green(
          `Refresh complete: ${report.imported.length} imported, ` +
            `${report.orphaned.length} orphaned, ${report.dangling.length} dangling`,
        ),
        ...describeReport(report),
      ];
    }
  }
}

export function registerRefreshCommand(program: Command, signal?: AbortSignal): void {
  program
    .command("refresh <box>")
    .description("Sync local state with the backend's inventory")
    .option("-o, --option <key=value>", "Backend option, e.g. tier=Bulk", collectOption, {})
    .option("-w, --wait", "Keep polling until the refresh completes or fails")
    .action(async (box: string, options: RefreshOptions) => {
      const cli = await loadCliContext(program, signal);
      const result = await pollUntilSettled(
        () => inBox(cli, box, (ctx) => refreshBox(ctx, { options: options.option, signal })),
        {
          wait: options.wait ?? false,
          intervalMs: cli.config.poll.intervalMs,
          signal,
          onPending: (pending) => {
            for (const line of describeRefreshResult(pending)) console.log(line);
          },
        },
      );
      for (const line of describeRefreshResult(result)) console.log(line);
      if (result.status === "failed") {
        process.exitCode = 1;
      }
    });
}
