import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { access, mkdtemp, readFile, writeFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { loadConfig } from "./loader.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "config-test-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true });
  }
}

describe("loadConfig", () => {
  it("returns defaults when file is missing", async () => {
    await withTempDir(async (dir) => {
      const config = await loadConfig({ configPath: join(dir, "config.json") });

      expect(config.logging.level).toBe("info");
      expect(config.logging.pretty).toBe(false);
      expect(config.retry.attempts).toBe(3);
      expect(config.lock.staleMs).toBe(10000);
      expect(config.poll.intervalMs).toBe(60000);
    });
  });

  it("parses valid config", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(
        configPath,
        JSON.stringify({
          logging: { level: "debug", pretty: true },
          retry: { attempts: 5, delayMs: 10 },
        }),
      );

      const config = await loadConfig({ configPath });

      expect(config.logging.level).toBe("debug");
      expect(config.logging.pretty).toBe(true);
      expect(config.retry).toEqual({ attempts: 5, delayMs: 10 });
    });
  });

  it("throws for invalid config", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(configPath, JSON.stringify({ retry: { attempts: -1 } }));

      await expect(loadConfig({ configPath })).rejects.toThrow();
    });
  });

  it("throws for malformed JSON", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(configPath, "{ invalid json }}}");

      await expect(loadConfig({ configPath })).rejects.toThrow(SyntaxError);
    });
  });

  it("writes defaults to disk when file is missing", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "subdir", "config.json");
      await loadConfig({ configPath });

      await expect(access(configPath)).resolves.toBeUndefined();
      const contents = JSON.parse(await readFile(configPath, "utf-8"));
      expect(contents.retry.attempts).toBe(3);
    });
  });

  it("does not rewrite file when config already has all defaults", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");

      await loadConfig({ configPath });
      const firstWrite = await readFile(configPath, "utf-8");

      await loadConfig({ configPath });
      const secondRead = await readFile(configPath, "utf-8");

      expect(secondRead).toBe(firstWrite);
    });
  });

  it("applies a log level from the environment without saving it", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");

      const config = await loadConfig({
        configPath,
        env: { COLDBOX_LOG_LEVEL: "debug" },
      });

      expect(config.logging.level).toBe("debug");
      const saved = JSON.parse(await readFile(configPath, "utf-8"));
      expect(saved.logging.level).toBe("info");
    });
  });

  it("rejects an unknown log level from the environment", async () => {
    await withTempDir(async (dir) => {
      await expect(
        loadConfig({
          configPath: join(dir, "config.json"),
          env: { COLDBOX_LOG_LEVEL: "loud" },
        }),
      ).rejects.toThrow();
    });
  });

  it("resolves config.json under rootPath", async () => {
    await withTempDir(async (dir) => {
      await writeFile(
        join(dir, "config.json"),
        JSON.stringify({ logging: { level: "warn" } }),
      );

      const config = await loadConfig({ rootPath: dir });

      expect(config.logging.level).toBe("warn");
    });
  });
});
