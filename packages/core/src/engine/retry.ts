import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "pino";
import { TransientBackendError } from "../errors/catalog.js";
import type { RetryConfig } from "../schemas/app-config.js";

/**
 * Runs `fn`, repeating it on TransientBackendError until `attempts` calls
 * have been made. Any other error is thrown at once.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  retry: RetryConfig,
  logger: Logger,
  signal?: AbortSignal,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    signal?.throwIfAborted();
    try {
      return await fn();
    } catch (err) {
      if (!(err instanceof TransientBackendError) || attempt >= retry.attempts) {
        throw err;
      }
      logger.warn(
        { err, attempt, attempts: retry.attempts, details: err.details },
        "Transient backend error, retrying",
      );
      await sleep(retry.delayMs, undefined, { signal });
    }
  }
}
