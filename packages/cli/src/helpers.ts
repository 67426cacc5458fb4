/**
 * Shared CLI plumbing: root/config/logger resolution, box sessions,
 * `-o key=value` parsing and polling for `--wait`.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { InvalidArgumentError, type Command } from "commander";

import type { BackendOptions } from "@coldbox/core/backends";
import type { Compression } from "@coldbox/core/codec";
import { loadConfig, resolveRootPath } from "@coldbox/core/config";
import { withBoxSession, type BoxContext } from "@coldbox/core/engine";
import { createLogger, type Logger } from "@coldbox/core/logger";
import { createBoxRegistry, type BoxRegistry } from "@coldbox/core/registry";
import type { AppConfig } from "@coldbox/core/schemas";

export interface GlobalOptions {
  root?: string;
}

export interface CliContext {
  rootPath: string;
  config: AppConfig;
  logger: Logger;
  registry: BoxRegistry;
  signal?: AbortSignal;
}

export async function loadCliContext(
  program: Command,
  signal?: AbortSignal,
): Promise<CliContext> {
  const { root } = program.opts<GlobalOptions>();
  const rootPath = resolveRootPath(root);
  const config = await loadConfig({ rootPath });
  const logger = createLogger(config.logging);
  return {
    rootPath,
    config,
    logger,
    registry: createBoxRegistry({ rootPath, logger }),
    signal,
  };
}

export function inBox<T>(
  cli: CliContext,
  box: string,
  fn: (ctx: BoxContext) => Promise<T>,
): Promise<T> {
  return withBoxSession(
    box,
    { registry: cli.registry, config: cli.config, logger: cli.logger },
    fn,
  );
}

/** Commander collector for repeated `-o key=value`. */
export function collectOption(
  value: string,
  previous: BackendOptions,
): BackendOptions {
  const eq = value.indexOf("=");
  if (eq <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got "${value}".`);
  }
  return { ...previous, [value.slice(0, eq)]: value.slice(eq + 1) };
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return parsed;
}

const COMPRESSIONS: readonly Compression[] = ["gz", "none"];

export function parseCompression(value: string): Compression {
  const match = COMPRESSIONS.find((c) => c === value);
  if (!match) {
    throw new InvalidArgumentError(`Expected one of ${COMPRESSIONS.join(", ")}.`);
  }
  return match;
}

const SIZE_UNITS = ["KiB", "MiB", "GiB", "TiB"];

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  let value = bytes;
  let unit = "B";
  for (const next of SIZE_UNITS) {
    if (value < 1024) break;
    value /= 1024;
    unit = next;
  }
  return `${value.toFixed(1)} ${unit}`;
}

const PENDING = new Set(["requested", "in-progress"]);

/**
 * Runs `step` once, or with `wait` until it leaves the pending statuses,
 * sleeping `intervalMs` between calls. Each call is its own session, so the
 * box lock is not held while sleeping.
 */
export async function pollUntilSettled<R extends { status: string }>(
  step: () => Promise<R>,
  options: {
    wait: boolean;
    intervalMs: number;
    signal?: AbortSignal;
    onPending?: (result: R) => void;
  },
): Promise<R> {
  for (;;) {
    const result = await step();
    if (!options.wait || !PENDING.has(result.status)) {
      return result;
    }
    options.onPending?.(result);
    await sleep(options.intervalMs, undefined, { signal: options.signal });
  }
}
