/**
 * Local folder backend. Objects are plain files directly inside `folderPath`.
 * Writes go to a hidden temp file first and are renamed into place.
 */

import {
  mkdir,
  readFile,
  readdir,
  rename,
  rm,
  stat,
  unlink,
  writeFile,
} from "node:fs/promises";
import type { Stats } from "node:fs";
import { join } from "node:path";
import { randomUUID } from "node:crypto";
import {
  FatalBackendError,
  NotFoundError,
  TransientBackendError,
} from "../errors/catalog.js";
import {
  collectEntries,
  type Backend,
  type ObjectEntry,
  type ObjectHead,
} from "./interface.js";

export interface LocalBackendOptions {
  folderPath: string;
}

const INVENTORY_HANDLE = "inventory";
const TRANSIENT_CODES = new Set(["EAGAIN", "EBUSY", "EMFILE", "ENFILE", "EIO"]);

function errnoOf(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string"
    ? err.code
    : undefined;
}

function toBackendError(err: unknown, operation: string, key?: string): Error {
  const code = errnoOf(err);
  const details = { backend: "local", operation, ...(key !== undefined && { key }), code };
  const message = `Local ${operation} failed${key ? ` for ${key}` : ""}: ${
    err instanceof Error ? err.message : String(err)
  }`;
  if (code !== undefined && TRANSIENT_CODES.has(code)) {
    return new TransientBackendError(message, details, err);
  }
  return new FatalBackendError(message, details, err);
}

function assertValidKey(key: string): void {
  if (
    key.length === 0 ||
    key.startsWith(".") ||
    key.includes("/") ||
    key.includes("\\")
  ) {
    throw new FatalBackendError(`Invalid object key: ${JSON.stringify(key)}`, {
      backend: "local",
      key,
    });
  }
}

export function createLocalBackend(options: LocalBackendOptions): Backend {
  const { folderPath } = options;

  function objectPath(key: string): string {
    assertValidKey(key);
    return join(folderPath, key);
  }

  async function head(key: string): Promise<ObjectHead | null> {
    const path = objectPath(key);
    try {
      const s = await stat(path);
      return { size: s.size, storageClass: null, restore: "not-required" };
    } catch (err) {
      if (errnoOf(err) === "ENOENT") return null;
      throw toBackendError(err, "head", key);
    }
  }

  async function* list(): AsyncIterable<ObjectEntry> {
    let names: string[];
    try {
      names = await readdir(folderPath);
    } catch (err) {
      throw toBackendError(err, "list");
    }
    for (const name of names.sort()) {
      if (name.startsWith(".")) continue;
      try {
        const s = await stat(join(folderPath, name));
        if (s.isFile()) {
          yield { key: name, size: s.size };
        }
      } catch (err) {
        // Removed between readdir and stat
        if (errnoOf(err) === "ENOENT") continue;
        throw toBackendError(err, "list", name);
      }
    }
  }

  return {
    kind: "local",
    tier: "standard",
    synchronous: true,

    async init() {
      let s: Stats;
      try {
        s = await stat(folderPath);
      } catch (err) {
        throw toBackendError(err, "init");
      }
      if (!s.isDirectory()) {
        throw new FatalBackendError(`Not a directory: ${folderPath}`, {
          backend: "local",
          folderPath,
        });
      }
    },

    async put(key, data) {
      const target = objectPath(key);
      const tempPath = join(folderPath, `.${key}.tmp-${randomUUID()}`);
      try {
        await mkdir(folderPath, { recursive: true });
        await writeFile(tempPath, data);
        await rename(tempPath, target);
      } catch (err) {
        await rm(tempPath, { force: true });
        throw toBackendError(err, "put", key);
      }
    },

    head,

    async delete(key) {
      const path = objectPath(key);
      try {
        await unlink(path);
        return true;
      } catch (err) {
        if (errnoOf(err) === "ENOENT") return false;
        throw toBackendError(err, "delete", key);
      }
    },

    list,

    async startInventory() {
      return INVENTORY_HANDLE;
    },

    async pollInventory() {
      return { status: "ready", entries: await collectEntries(list()) };
    },

    async startRetrieval(key) {
      assertValidKey(key);
      return key;
    },

    async pollRetrieval(handle) {
      return (await head(handle))
        ? { status: "ready" }
        : { status: "failed", reason: `Object not found: ${handle}` };
    },

    async fetch(key) {
      const path = objectPath(key);
      try {
        return new Uint8Array(await readFile(path));
      } catch (err) {
        if (errnoOf(err) === "ENOENT") {
          throw new NotFoundError(`Object not found: ${key}`, {
            backend: "local",
            key,
          });
        }
        throw toBackendError(err, "fetch", key);
      }
    },
  };
}
