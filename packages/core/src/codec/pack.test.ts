import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { chmod, mkdir, mkdtemp, readFile, rm, stat, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { packPath, unpackTo } from "./pack.js";
import { NotFoundError } from "../errors/catalog.js";

describe("pack", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pack-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("packs a single file and restores it by name", async () => {
    await writeFile(join(dir, "note.txt"), "hello");

    const archive = await packPath(join(dir, "note.txt"));
    // gzip magic
    expect(Array.from(archive.subarray(0, 2))).toEqual([0x1f, 0x8b]);

    const out = join(dir, "out");
    await unpackTo(archive, out);
    expect(await readFile(join(out, "note.txt"), "utf-8")).toBe("hello");
  });

  it("packs a directory recursively", async () => {
    const src = join(dir, "album");
    await mkdir(join(src, "2026"), { recursive: true });
    await writeFile(join(src, "index.md"), "# album");
    await writeFile(join(src, "2026", "a.jpg"), Buffer.from([1, 2, 3]));

    const archive = await packPath(src);
    const out = join(dir, "restored");
    await unpackTo(archive, out);

    expect(await readFile(join(out, "album", "index.md"), "utf-8")).toBe(
      "# album",
    );
    expect(await readFile(join(out, "album", "2026", "a.jpg"))).toEqual(
      Buffer.from([1, 2, 3]),
    );
  });

  it("writes an uncompressed tar when compression is none", async () => {
    await writeFile(join(dir, "note.txt"), "hello");

    const archive = await packPath(join(dir, "note.txt"), { compression: "none" });
    // a tar header starts with the entry path
    expect(Buffer.from(archive.subarray(0, 8)).toString("utf-8")).toBe("note.txt");

    const out = join(dir, "out");
    await unpackTo(archive, out);
    expect(await readFile(join(out, "note.txt"), "utf-8")).toBe("hello");
  });

  describe("modes and modification times", () => {
    const past = new Date("2001-02-03T04:05:06Z");
    let file: string;

    beforeEach(async () => {
      file = join(dir, "run.sh");
      await writeFile(file, "echo hi");
      await chmod(file, 0o700);
      await utimes(file, past, past);
    });

    it("drops both by default", async () => {
      const out = join(dir, "out");
      await unpackTo(await packPath(file), out);

      const restored = await stat(join(out, "run.sh"));
      expect(restored.mode & 0o100).toBe(0);
      expect(restored.mtime.getTime()).toBeGreaterThan(past.getTime());
    });

    it("restores both when stored and applied", async () => {
      const archive = await packPath(file, { mode: true, mtime: true });
      const out = join(dir, "out");
      await unpackTo(archive, out, { mode: true, mtime: true });

      const restored = await stat(join(out, "run.sh"));
      expect(restored.mode & 0o777).toBe(0o700);
      expect(restored.mtime.getTime()).toBe(past.getTime());
    });

    it("ignores stored values unless asked on extraction", async () => {
      const archive = await packPath(file, { mode: true, mtime: true });
      const out = join(dir, "out");
      await unpackTo(archive, out);

      const restored = await stat(join(out, "run.sh"));
      expect(restored.mode & 0o100).toBe(0);
      expect(restored.mtime.getTime()).toBeGreaterThan(past.getTime());
    });

    it("stores default modes when modes are not kept", async () => {
      const out = join(dir, "out");
      await unpackTo(await packPath(file), out, { mode: true });

      const restored = await stat(join(out, "run.sh"));
      expect(restored.mode & 0o100).toBe(0);
    });
  });

  it("throws NotFoundError for a missing path", async () => {
    await expect(packPath(join(dir, "missing"))).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });
});
