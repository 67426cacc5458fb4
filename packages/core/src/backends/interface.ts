/**
 * Storage backend capability contract.
 *
 * All methods operate on opaque encrypted blobs under flat string keys.
 * Backends that complete retrievals and inventories immediately
 * (`synchronous: true`) still expose the job methods, returning handles whose
 * first poll is `ready`, so callers use one protocol for every backend.
 */

export type BackendKind = "local" | "webdav" | "object-store";

/** "archive" backends store data objects in a tier that needs a restore. */
export type BackendTier = "standard" | "archive";

/** What a blob is; archive-tier backends keep metadata in the standard class. */
export type BlobRole = "data" | "metadata";

export type RestoreState =
  /** Directly fetchable. */
  | "not-required"
  /** Archived and no restore has been requested. */
  | "required"
  | "in-progress"
  /** A restored copy is available. */
  | "ready";

export interface ObjectHead {
  size: number;
  storageClass: string | null;
  restore: RestoreState;
}

export interface ObjectEntry {
  key: string;
  size: number;
}

/** Key/value overrides passed through from the command line unchanged. */
export type BackendOptions = Readonly<Record<string, string>>;

export type RetrievalPoll =
  | { status: "in-progress" }
  | { status: "ready" }
  | { status: "failed"; reason: string };

export type InventoryPoll =
  | { status: "in-progress" }
  | { status: "ready"; entries: ObjectEntry[] }
  | { status: "failed"; reason: string };

export interface Backend {
  readonly kind: BackendKind;
  readonly tier: BackendTier;
  readonly synchronous: boolean;

  /** Access test run once when a box is created. */
  init(): Promise<void>;

  /**
   * Upload a blob.
   * @throws TransientBackendError or FatalBackendError
   */
  put(key: string, data: Uint8Array, role: BlobRole): Promise<void>;

  /** @returns null if the object does not exist */
  head(key: string): Promise<ObjectHead | null>;

  /** @returns true if deleted, false if not found */
  delete(key: string): Promise<boolean>;

  /** Finite, restartable listing. Absent on archive-tier backends. */
  list?(): AsyncIterable<ObjectEntry>;

  startInventory(options: BackendOptions): Promise<string>;
  pollInventory(handle: string): Promise<InventoryPoll>;

  /** Request that `key` be made fetchable; never re-requests an active restore. */
  startRetrieval(key: string, options: BackendOptions): Promise<string>;
  pollRetrieval(handle: string): Promise<RetrievalPoll>;

  /**
   * Download a blob. Only valid once the object is fetchable.
   * @throws NotFoundError if the object does not exist
   */
  fetch(key: string): Promise<Uint8Array>;
}

/** Collects a synchronous listing for backends that answer inventories at once. */
export async function collectEntries(
  iterable: AsyncIterable<ObjectEntry>,
): Promise<ObjectEntry[]> {
  const entries: ObjectEntry[] = [];
  for await (const entry of iterable) {
    entries.push(entry);
  }
  return entries;
}
