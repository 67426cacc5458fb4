/**
 * In-memory backend for engine tests.
 *
 * Archive mode behaves like an archive-tier object store: data blobs need a
 * restore, restores stay in progress until `completeRestores()`, and
 * inventories stay in progress until `completeInventories()`.
 */

import { NotFoundError } from "../errors/catalog.js";
import type {
  Backend,
  BackendOptions,
  BlobRole,
  InventoryPoll,
  ObjectEntry,
  ObjectHead,
  RestoreState,
  RetrievalPoll,
} from "../backends/interface.js";

type Operation = "put" | "head" | "delete" | "fetch" | "startRetrieval";

export interface StoredObject {
  data: Uint8Array;
  role: BlobRole;
  restore: RestoreState;
}

export interface InjectedFailure {
  operation: Operation;
  /** Only keys ending with this suffix fail (default: any key). */
  keySuffix?: string;
  error: Error;
  /** Number of calls to fail (default: 1). */
  times?: number;
}

export interface MemoryBackend extends Backend {
  readonly objects: Map<string, StoredObject>;
  /** Options passed to each startRetrieval call, in order. */
  readonly retrievalRequests: Array<{ key: string; options: BackendOptions }>;
  readonly inventoryRequests: BackendOptions[];
  injectFailure(failure: InjectedFailure): void;
  /** Marks every restore in progress as ready. */
  completeRestores(): void;
  /** Lets every pending inventory answer on its next poll. */
  completeInventories(): void;
  /** Drops the restored copy of every object, as an expired restore would. */
  expireRestores(): void;
}

export interface MemoryBackendOptions {
  archive?: boolean;
  /** In archive mode, also archive metadata blobs. */
  archiveMetadata?: boolean;
}

export function createMemoryBackend(
  options: MemoryBackendOptions = {},
): MemoryBackend {
  const archive = options.archive ?? false;
  const archivedRoles: BlobRole[] = archive
    ? options.archiveMetadata
      ? ["data", "metadata"]
      : ["data"]
    : [];
  const objects = new Map<string, StoredObject>();
  const failures: Array<Required<InjectedFailure>> = [];
  const retrievalRequests: Array<{ key: string; options: BackendOptions }> = [];
  const inventoryRequests: BackendOptions[] = [];
  const inventories = new Map<string, boolean>();

  function maybeFail(operation: Operation, key: string): void {
    const index = failures.findIndex(
      (f) => f.operation === operation && key.endsWith(f.keySuffix),
    );
    const failure = failures[index];
    if (!failure) return;
    failure.times -= 1;
    if (failure.times <= 0) failures.splice(index, 1);
    throw failure.error;
  }

  function entries(): ObjectEntry[] {
    return [...objects.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([key, object]) => ({ key, size: object.data.byteLength }));
  }

  async function* list(): AsyncIterable<ObjectEntry> {
    yield* entries();
  }

  async function head(key: string): Promise<ObjectHead | null> {
    maybeFail("head", key);
    const object = objects.get(key);
    if (!object) return null;
    return {
      size: object.data.byteLength,
      storageClass: object.restore === "not-required" ? "STANDARD" : "DEEP_ARCHIVE",
      restore: object.restore,
    };
  }

  const backend: MemoryBackend = {
    kind: "object-store",
    tier: archive ? "archive" : "standard",
    synchronous: !archive,
    objects,
    retrievalRequests,
    inventoryRequests,

    async init() {},

    async put(key, data, role) {
      maybeFail("put", key);
      objects.set(key, {
        data: new Uint8Array(data),
        role,
        restore: archivedRoles.includes(role) ? "required" : "not-required",
      });
    },

    head,

    async delete(key) {
      maybeFail("delete", key);
      return objects.delete(key);
    },

    async startInventory(inventoryOptions) {
      inventoryRequests.push(inventoryOptions);
      const handle = `inventory-${inventoryRequests.length}`;
      inventories.set(handle, !archive);
      return handle;
    },

    async pollInventory(handle): Promise<InventoryPoll> {
      const ready = inventories.get(handle);
      if (ready === undefined) {
        return { status: "failed", reason: `Unknown inventory ${handle}` };
      }
      return ready ? { status: "ready", entries: entries() } : { status: "in-progress" };
    },

    async startRetrieval(key, retrievalOptions) {
      maybeFail("startRetrieval", key);
      retrievalRequests.push({ key, options: retrievalOptions });
      const object = objects.get(key);
      if (!object) {
        throw new NotFoundError(`Object not found: ${key}`, { key });
      }
      if (object.restore === "required") {
        object.restore = "in-progress";
      }
      return key;
    },

    async pollRetrieval(handle): Promise<RetrievalPoll> {
      const object = objects.get(handle);
      if (!object) return { status: "failed", reason: `Object not found: ${handle}` };
      switch (object.restore) {
        case "in-progress":
          return { status: "in-progress" };
        case "required":
          return { status: "failed", reason: `No active restore for ${handle}` };
        default:
          return { status: "ready" };
      }
    },

    async fetch(key) {
      maybeFail("fetch", key);
      const object = objects.get(key);
      if (!object) {
        throw new NotFoundError(`Object not found: ${key}`, { key });
      }
      if (object.restore === "required" || object.restore === "in-progress") {
        throw new Error(`Object ${key} is archived and not restored`);
      }
      return new Uint8Array(object.data);
    },

    injectFailure(failure) {
      failures.push({ keySuffix: "", times: 1, ...failure });
    },

    completeRestores() {
      for (const object of objects.values()) {
        if (object.restore === "in-progress") object.restore = "ready";
      }
    },

    completeInventories() {
      for (const handle of inventories.keys()) inventories.set(handle, true);
    },

    expireRestores() {
      for (const object of objects.values()) {
        if (object.restore === "ready" || object.restore === "in-progress") {
          object.restore = "required";
        }
      }
    },
  };

  return archive ? backend : { ...backend, list };
}
