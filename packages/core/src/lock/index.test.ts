import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, rm, access } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { acquireLock, boxLockPath, isLocked, withLock } from "./index.js";
import { LockTimeoutError } from "../errors/catalog.js";

describe("box lock", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "lock-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("resolves the lock path inside the box directory", () => {
    expect(boxLockPath("/boxes/mybox")).toBe(join("/boxes/mybox", "box.lock"));
  });

  it("acquires and releases a lock", async () => {
    const lockPath = join(dir, "box.lock");

    const handle = await acquireLock(lockPath);
    expect(await isLocked(lockPath)).toBe(true);

    await handle.release();
    expect(await isLocked(lockPath)).toBe(false);
  });

  it("creates the lock file and parent directories", async () => {
    const lockPath = join(dir, "nested", "box.lock");
    const handle = await acquireLock(lockPath);
    await expect(access(lockPath)).resolves.toBeUndefined();
    await handle.release();
  });

  it("release is idempotent", async () => {
    const handle = await acquireLock(join(dir, "box.lock"));
    await handle.release();
    await expect(handle.release()).resolves.toBeUndefined();
  });

  it("times out when another holder keeps the lock", async () => {
    const lockPath = join(dir, "box.lock");
    const handle = await acquireLock(lockPath);

    await expect(acquireLock(lockPath, { retries: 1 })).rejects.toBeInstanceOf(
      LockTimeoutError,
    );

    await handle.release();
  });

  it("reports an unlocked path that does not exist", async () => {
    expect(await isLocked(join(dir, "missing.lock"))).toBe(false);
  });

  it("withLock releases after the callback throws", async () => {
    const lockPath = join(dir, "box.lock");

    await expect(
      withLock(lockPath, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(await isLocked(lockPath)).toBe(false);
  });

  it("withLock serializes concurrent callers", async () => {
    const lockPath = join(dir, "box.lock");
    const order: string[] = [];

    const run = (label: string) =>
      withLock(lockPath, async () => {
        order.push(`${label}:start`);
        await new Promise((resolve) => setTimeout(resolve, 50));
        order.push(`${label}:end`);
      });

    await Promise.all([run("a"), run("b")]);

    expect(order[1]).toBe(`${order[0]!.split(":")[0]}:end`);
    expect(order).toHaveLength(4);
  });
});
