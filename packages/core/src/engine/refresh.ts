/**
 * Resumable inventory sync.
 *
 * One inventory job per box. When it is ready the remote listing is
 * reconciled with the Metadata Store: sources with missing objects are
 * flagged orphaned, unknown `.data`/`.meta` pairs are imported from their
 * metadata blob, and everything else is reported. Metadata blobs that need a
 * restore get their own metadata job; the inventory job stays until they
 * are all resolved.
 */

import type { Logger } from "pino";
import { DecodeError, NotFoundError } from "../errors/catalog.js";
import type { BackendOptions, ObjectEntry } from "../backends/interface.js";
import type { SourceMetadata } from "../codec/interface.js";
import { objectKeysFor } from "../store/sources.js";
import type { BoxContext } from "./context.js";
import { withRetry } from "./retry.js";

const INVENTORY_SUBJECT = "";
const OBJECT_KEY_PATTERN = /^(.+)\.(data|meta)$/;

export interface RefreshReport {
  imported: string[];
  orphaned: Array<{ name: string; missing: string[] }>;
  /** Previously orphaned sources whose objects are all present again. */
  recovered: string[];
  undecodable: Array<{ key: string; reason: string }>;
  duplicates: Array<{ name: string; metaKey: string }>;
  dangling: string[];
}

export type RefreshResult =
  | { status: "requested" }
  | { status: "in-progress"; pendingMetadata: number; report?: RefreshReport }
  | { status: "failed"; reason: string }
  | { status: "completed"; report: RefreshReport };

export interface RefreshInput {
  /** Passed to startInventory and to metadata restores, e.g. `{ tier: "Bulk" }`. */
  options?: BackendOptions;
  signal?: AbortSignal;
}

type MetadataFetch =
  | { status: "ready"; bytes: Uint8Array }
  | { status: "pending" }
  | { status: "failed"; reason: string };

function emptyReport(): RefreshReport {
  return {
    imported: [],
    orphaned: [],
    recovered: [],
    undecodable: [],
    duplicates: [],
    dangling: [],
  };
}

export async function refreshBox(
  ctx: BoxContext,
  input: RefreshInput = {},
): Promise<RefreshResult> {
  const { backend, store } = ctx;
  const { signal } = input;
  const log = ctx.logger;

  let job = store.jobs.find("inventory", INVENTORY_SUBJECT);
  if (!job) {
    const options = input.options ?? {};
    signal?.throwIfAborted();
    const handle = await backend.startInventory(options);
    job = store.jobs.create(
      { kind: "inventory", subject: INVENTORY_SUBJECT, handle, options },
      ctx.now(),
    );
    log.info({ handle }, "Inventory requested");
    if (!backend.synchronous) {
      return { status: "requested" };
    }
  }

  const { handle, options } = job;
  const poll = await withRetry(
    () => backend.pollInventory(handle),
    ctx.config.retry,
    log,
    signal,
  );

  if (poll.status === "in-progress") {
    store.jobs.updateStatus("inventory", INVENTORY_SUBJECT, "in-progress", ctx.now());
    return {
      status: "in-progress",
      pendingMetadata: store.jobs.list("metadata").length,
    };
  }
  if (poll.status === "failed") {
    store.transaction(() => {
      store.jobs.delete("inventory", INVENTORY_SUBJECT);
      for (const metadataJob of store.jobs.list("metadata")) {
        store.jobs.delete("metadata", metadataJob.subject);
      }
    });
    log.warn({ reason: poll.reason }, "Inventory failed, job cleared");
    return { status: "failed", reason: poll.reason };
  }

  const { report, pending } = await reconcile(ctx, poll.entries, options, signal);

  if (pending > 0) {
    store.jobs.updateStatus("inventory", INVENTORY_SUBJECT, "ready", ctx.now());
    log.info({ pending }, "Inventory reconciled, metadata restores pending");
    return { status: "in-progress", pendingMetadata: pending, report };
  }

  store.jobs.delete("inventory", INVENTORY_SUBJECT);
  log.info(
    {
      imported: report.imported.length,
      orphaned: report.orphaned.length,
      undecodable: report.undecodable.length,
      dangling: report.dangling.length,
    },
    "Inventory reconciled",
  );
  return { status: "completed", report };
}

async function reconcile(
  ctx: BoxContext,
  entries: ObjectEntry[],
  options: BackendOptions,
  signal: AbortSignal | undefined,
): Promise<{ report: RefreshReport; pending: number }> {
  const { store } = ctx;
  const report = emptyReport();
  const remote = new Map(entries.map((e) => [e.key, e.size]));
  const now = ctx.now();

  for (const source of store.sources.list()) {
    const missing = [source.dataKey, source.metaKey].filter((k) => !remote.has(k));
    if (missing.length > 0) {
      if (source.orphanedAt === null) {
        store.sources.setOrphaned(source.name, now);
      }
      report.orphaned.push({ name: source.name, missing });
    } else if (source.orphanedAt !== null) {
      store.sources.setOrphaned(source.name, null);
      report.recovered.push(source.name);
    }
  }

  const unknown = new Map<string, { data: boolean; meta: boolean }>();
  for (const key of remote.keys()) {
    if (store.sources.isKeyKnown(key)) {
      // Live keys were handled above; retired ones are leftovers.
      if (!store.sources.findByKey(key)) report.dangling.push(key);
      continue;
    }
    const match = OBJECT_KEY_PATTERN.exec(key);
    const id = match?.[1];
    if (id === undefined) {
      report.dangling.push(key);
      continue;
    }
    const parts = unknown.get(id) ?? { data: false, meta: false };
    if (match?.[2] === "data") parts.data = true;
    else parts.meta = true;
    unknown.set(id, parts);
  }

  const pendingKeys = new Set<string>();
  for (const [id, parts] of [...unknown.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    const { dataKey, metaKey } = objectKeysFor(id);
    if (!parts.data || !parts.meta) {
      report.dangling.push(parts.data ? dataKey : metaKey);
      continue;
    }
    signal?.throwIfAborted();
    const log = ctx.logger.child({ key: metaKey });

    const fetched = await fetchMetadata(ctx, metaKey, options, log, signal);
    if (fetched.status === "pending") {
      pendingKeys.add(metaKey);
      continue;
    }
    if (fetched.status === "failed") {
      report.undecodable.push({ key: metaKey, reason: fetched.reason });
      continue;
    }

    let info: SourceMetadata;
    try {
      info = await ctx.codec.readMetadata(fetched.bytes, ctx.key);
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      log.warn({ err }, "Undecodable metadata");
      report.undecodable.push({ key: metaKey, reason: err.message });
      continue;
    }

    if (store.sources.find(info.name)) {
      report.duplicates.push({ name: info.name, metaKey });
      continue;
    }
    store.sources.insert({
      name: info.name,
      comment: info.comment,
      dataKey,
      metaKey,
      plaintextSize: info.plaintextSize,
      encryptedSize: remote.get(dataKey) ?? 0,
      fingerprint: info.fingerprint,
      createdAt: info.createdAt,
      orphanedAt: null,
    });
    report.imported.push(info.name);
    log.info({ source: info.name }, "Source imported from remote metadata");
  }

  // Metadata jobs for keys that are no longer unknown are stale.
  for (const metadataJob of store.jobs.list("metadata")) {
    if (!pendingKeys.has(metadataJob.subject)) {
      store.jobs.delete("metadata", metadataJob.subject);
    }
  }

  return { report, pending: pendingKeys.size };
}

async function fetchMetadata(
  ctx: BoxContext,
  metaKey: string,
  options: BackendOptions,
  log: Logger,
  signal: AbortSignal | undefined,
): Promise<MetadataFetch> {
  const { backend, store } = ctx;
  const job = store.jobs.find("metadata", metaKey);

  if (job) {
    const poll = await withRetry(
      () => backend.pollRetrieval(job.handle),
      ctx.config.retry,
      log,
      signal,
    );
    if (poll.status === "in-progress") {
      store.jobs.updateStatus("metadata", metaKey, "in-progress", ctx.now());
      return { status: "pending" };
    }
    if (poll.status === "failed") {
      store.jobs.delete("metadata", metaKey);
      return { status: "failed", reason: poll.reason };
    }
  } else if (backend.tier === "archive") {
    const head = await withRetry(
      () => backend.head(metaKey),
      ctx.config.retry,
      log,
      signal,
    );
    if (!head) {
      return { status: "failed", reason: `Object not found: ${metaKey}` };
    }
    if (head.restore === "required" || head.restore === "in-progress") {
      const handle = await backend.startRetrieval(metaKey, options);
      store.jobs.create({ kind: "metadata", subject: metaKey, handle, options }, ctx.now());
      log.info({ handle }, "Metadata restore requested");
      return { status: "pending" };
    }
  }

  let bytes: Uint8Array;
  try {
    bytes = await withRetry(
      () => backend.fetch(metaKey),
      ctx.config.retry,
      log,
      signal,
    );
  } catch (err) {
    if (!(err instanceof NotFoundError)) throw err;
    if (job) store.jobs.delete("metadata", metaKey);
    return { status: "failed", reason: err.message };
  }
  if (job) store.jobs.delete("metadata", metaKey);
  return { status: "ready", bytes };
}
