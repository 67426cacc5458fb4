/**
 * Exclusive per-box lock held for the duration of one command.
 *
 * Uses proper-lockfile, which works across processes and inside one process.
 * A crashed holder's lock goes stale after `staleMs` and can be taken over.
 */

import { mkdir, writeFile, access } from "node:fs/promises";
import { dirname, join } from "node:path";
import lockfile from "proper-lockfile";
import { ColdboxError, LockTimeoutError } from "../errors/catalog.js";

export interface LockOptions {
  /** Stale lock threshold in milliseconds (default: 10000) */
  staleMs?: number;
  /** Retries at 100-200ms intervals before giving up (default: 50) */
  retries?: number;
}

const DEFAULT_LOCK_OPTIONS: Required<LockOptions> = {
  staleMs: 10_000,
  retries: 50,
};

export const BOX_LOCK_FILE = "box.lock";

export interface LockHandle {
  path: string;
  release(): Promise<void>;
}

export function boxLockPath(boxDir: string): string {
  return join(boxDir, BOX_LOCK_FILE);
}

async function ensureLockFile(lockPath: string): Promise<void> {
  await mkdir(dirname(lockPath), { recursive: true });
  try {
    await access(lockPath);
  } catch {
    await writeFile(lockPath, "");
  }
}

export async function acquireLock(
  lockPath: string,
  options: LockOptions = {},
): Promise<LockHandle> {
  const opts = { ...DEFAULT_LOCK_OPTIONS, ...options };
  await ensureLockFile(lockPath);

  let release: () => Promise<void>;
  try {
    release = await lockfile.lock(lockPath, {
      stale: opts.staleMs,
      retries: {
        retries: opts.retries,
        minTimeout: 100,
        maxTimeout: 200,
        factor: 1,
      },
    });
  } catch (err) {
    if (
      err instanceof Error &&
      "code" in err &&
      err.code === "ELOCKED"
    ) {
      throw new LockTimeoutError(lockPath, err);
    }
    throw new ColdboxError(
      "LOCK_FAILED",
      `Failed to lock ${lockPath}: ${err instanceof Error ? err.message : String(err)}`,
      { lockPath },
      { cause: err },
    );
  }

  let released = false;
  return {
    path: lockPath,
    async release() {
      if (released) return;
      released = true;
      await release();
    },
  };
}

export async function isLocked(lockPath: string): Promise<boolean> {
  try {
    await access(lockPath);
  } catch {
    return false;
  }
  return lockfile.check(lockPath);
}

/** Runs `fn` with the lock held; the lock is released on every exit path. */
export async function withLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options: LockOptions = {},
): Promise<T> {
  const handle = await acquireLock(lockPath, options);
  try {
    return await fn();
  } finally {
    await handle.release();
  }
}
