/**
 * Box Registry: maps a box name to its backend parameters and key identity.
 *
 * Layout under `<root>/boxes/<name>/`:
 *   box.json    immutable box config, written last at creation
 *   secret.key  master key (0600)
 *   box.db      Metadata Store + Job Ledger
 *   box.lock    session lock
 */

import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "pino";
import {
  BoxExistsError,
  BoxNotFoundError,
  InvalidBoxNameError,
  LockTimeoutError,
} from "../errors/catalog.js";
import {
  BOX_NAME_PATTERN,
  BackendConfigSchema,
  BoxConfigSchema,
  type BackendConfig,
  type BackendConfigInput,
  type BoxConfig,
} from "../schemas/box-config.js";
import { createBackend } from "../backends/index.js";
import type { Backend } from "../backends/interface.js";
import { createBoxKey, loadBoxKey, type BoxKey } from "../keys/box-key.js";
import { boxLockPath, isLocked } from "../lock/index.js";
import { boxesDir } from "../config/paths.js";
import { BOX_DB_FILE } from "../store/index.js";
import { createSilentLogger } from "../logger/index.js";

export const BOX_CONFIG_FILE = "box.json";
export const BOX_KEY_FILE = "secret.key";

export interface BoxPaths {
  dir: string;
  config: string;
  key: string;
  db: string;
  lock: string;
}

export interface BoxRegistry {
  readonly rootPath: string;
  paths(name: string): BoxPaths;
  /**
   * Creates the box directory and key, runs the backend access test, then
   * writes box.json. A key file already in the directory is reused. A failed
   * access test removes only what this call created.
   */
  createBox(name: string, backend: BackendConfigInput): Promise<BoxConfig>;
  /** @throws BoxNotFoundError */
  loadBox(name: string): Promise<BoxConfig>;
  listBoxes(): Promise<BoxConfig[]>;
  /** Removes local state only; remote objects are untouched. */
  removeBox(name: string): Promise<void>;
  loadKey(box: BoxConfig): Promise<BoxKey>;
}

export interface BoxRegistryOptions {
  rootPath: string;
  backendFactory?: (config: BackendConfig) => Backend;
  logger?: Logger;
}

function assertValidName(name: string): void {
  if (!BOX_NAME_PATTERN.test(name)) {
    throw new InvalidBoxNameError(name);
  }
}

function isEnoent(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readExistingKey(keyPath: string): Promise<BoxKey | undefined> {
  try {
    return await loadBoxKey(keyPath);
  } catch (err) {
    if (isEnoent(err)) return undefined;
    throw err;
  }
}

async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  const tempPath = `${path}.tmp`;
  await writeFile(tempPath, JSON.stringify(value, null, 2) + "\n", {
    mode: 0o600,
  });
  await rename(tempPath, path);
}

export function createBoxRegistry(options: BoxRegistryOptions): BoxRegistry {
  const { rootPath } = options;
  const backendFactory = options.backendFactory ?? createBackend;
  const logger = options.logger ?? createSilentLogger();
  const root = boxesDir(rootPath);

  function paths(name: string): BoxPaths {
    assertValidName(name);
    const dir = join(root, name);
    return {
      dir,
      config: join(dir, BOX_CONFIG_FILE),
      key: join(dir, BOX_KEY_FILE),
      db: join(dir, BOX_DB_FILE),
      lock: boxLockPath(dir),
    };
  }

  async function readBoxConfig(name: string): Promise<BoxConfig | undefined> {
    let raw: string;
    try {
      raw = await readFile(paths(name).config, "utf-8");
    } catch (err) {
      if (isEnoent(err)) return undefined;
      throw err;
    }
    return BoxConfigSchema.parse(JSON.parse(raw));
  }

  return {
    rootPath,
    paths,

    async createBox(name, backendInput) {
      const p = paths(name);
      if (await readBoxConfig(name)) {
        throw new BoxExistsError(name);
      }
      const backendConfig = BackendConfigSchema.parse(backendInput);

      // A directory without box.json may still hold a backed-up key.
      const createdDir = await mkdir(p.dir, { recursive: true, mode: 0o700 });
      let createdKey = false;

      try {
        let key = await readExistingKey(p.key);
        if (key) {
          logger.info({ box: name, keyId: key.id }, "Existing key reused");
        } else {
          key = await createBoxKey(p.key);
          createdKey = true;
        }
        await backendFactory(backendConfig).init();

        const box = BoxConfigSchema.parse({
          version: 1,
          name,
          backend: backendConfig,
          key: { id: key.id, file: BOX_KEY_FILE },
          createdAt: new Date().toISOString(),
        });
        await writeJsonAtomic(p.config, box);
        logger.info({ box: name, backend: backendConfig.kind }, "Box created");
        return box;
      } catch (err) {
        if (createdDir !== undefined) {
          await rm(p.dir, { recursive: true, force: true });
        } else {
          if (createdKey) await rm(p.key, { force: true });
          await rm(`${p.config}.tmp`, { force: true });
        }
        throw err;
      }
    },

    async loadBox(name) {
      const box = await readBoxConfig(name);
      if (!box) {
        throw new BoxNotFoundError(name);
      }
      return box;
    },

    async listBoxes() {
      let names: string[];
      try {
        names = await readdir(root);
      } catch (err) {
        if (isEnoent(err)) return [];
        throw err;
      }
      const boxes: BoxConfig[] = [];
      for (const name of names.sort()) {
        if (!BOX_NAME_PATTERN.test(name)) continue;
        const box = await readBoxConfig(name);
        if (box) boxes.push(box);
      }
      return boxes;
    },

    async removeBox(name) {
      const p = paths(name);
      if (!(await readBoxConfig(name))) {
        throw new BoxNotFoundError(name);
      }
      if (await isLocked(p.lock)) {
        throw new LockTimeoutError(p.lock);
      }
      await rm(p.dir, { recursive: true, force: true });
      logger.info({ box: name }, "Box removed");
    },

    async loadKey(box) {
      return loadBoxKey(join(paths(box.name).dir, box.key.file), box.key.id);
    },
  };
}
