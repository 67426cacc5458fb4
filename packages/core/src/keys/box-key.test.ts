import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createBoxKey, loadBoxKey } from "./box-key.js";
import { KeyMismatchError } from "../errors/catalog.js";

describe("box key", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "box-key-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates a key file readable only by the owner", async () => {
    const keyPath = join(dir, "secret.key");
    const key = await createBoxKey(keyPath);

    expect(key.masterKey.length).toBe(32);
    expect(key.id).toMatch(/^[0-9a-f]{16}$/);
    expect((await stat(keyPath)).mode & 0o777).toBe(0o600);
  });

  it("loads the same key back", async () => {
    const keyPath = join(dir, "secret.key");
    const created = await createBoxKey(keyPath);

    const loaded = await loadBoxKey(keyPath, created.id);

    expect(loaded.id).toBe(created.id);
    expect(Buffer.from(loaded.masterKey).equals(Buffer.from(created.masterKey))).toBe(true);
  });

  it("refuses to overwrite an existing key file", async () => {
    const keyPath = join(dir, "secret.key");
    await createBoxKey(keyPath);

    await expect(createBoxKey(keyPath)).rejects.toThrow();
  });

  it("rejects a key that does not match the expected id", async () => {
    const keyPath = join(dir, "secret.key");
    await createBoxKey(keyPath);

    await expect(loadBoxKey(keyPath, "0000000000000000")).rejects.toBeInstanceOf(
      KeyMismatchError,
    );
  });

  it("rejects a key file whose id was edited", async () => {
    const keyPath = join(dir, "secret.key");
    await createBoxKey(keyPath);
    const data = JSON.parse(await readFile(keyPath, "utf-8"));
    await writeFile(keyPath, JSON.stringify({ ...data, id: "ffffffffffffffff" }));

    await expect(loadBoxKey(keyPath)).rejects.toBeInstanceOf(KeyMismatchError);
  });
});
