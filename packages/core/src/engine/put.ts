import { basename, resolve } from "node:path";
import { packPath, type Compression } from "../codec/pack.js";
import { DuplicateError } from "../errors/catalog.js";
import type { Source } from "../store/types.js";
import type { BoxContext } from "./context.js";
import { withRetry } from "./retry.js";

export interface PutInput {
  path: string;
  /** Defaults to the basename of `path`. */
  name?: string;
  comment?: string;
  /** Default: "gz". */
  compression?: Compression;
  /** Store file and directory modes. */
  mode?: boolean;
  /** Store modification times. */
  mtime?: boolean;
  signal?: AbortSignal;
}

/**
 * Packs, encodes and uploads `path` as a new source.
 * Nothing is recorded unless both blobs were uploaded; on failure any blob
 * already uploaded is removed again.
 */
export async function putSource(ctx: BoxContext, input: PutInput): Promise<Source> {
  const { backend, store, codec, key } = ctx;
  const { signal } = input;
  const name = input.name ?? basename(resolve(input.path));
  const comment = input.comment ?? "";
  const log = ctx.logger.child({ source: name });

  if (store.sources.find(name)) {
    throw new DuplicateError(`Source already exists: ${name}`, {
      box: ctx.box.name,
      source: name,
    });
  }

  const plaintext = await packPath(input.path, {
    compression: input.compression,
    mode: input.mode,
    mtime: input.mtime,
  });
  signal?.throwIfAborted();
  const encoded = await codec.encode(
    { name, comment, plaintext, createdAt: ctx.now() },
    key,
  );
  const { dataKey, metaKey } = store.sources.allocateKeys();

  const uploaded: string[] = [];
  try {
    signal?.throwIfAborted();
    await withRetry(
      () => backend.put(dataKey, encoded.data, "data"),
      ctx.config.retry,
      log,
      signal,
    );
    uploaded.push(dataKey);
    log.debug({ key: dataKey, size: encoded.data.byteLength }, "Data uploaded");

    signal?.throwIfAborted();
    await withRetry(
      () => backend.put(metaKey, encoded.metadata, "metadata"),
      ctx.config.retry,
      log,
      signal,
    );
    uploaded.push(metaKey);
  } catch (err) {
    for (const uploadedKey of uploaded) {
      try {
        await backend.delete(uploadedKey);
      } catch (cleanupErr) {
        log.warn(
          { err: cleanupErr, key: uploadedKey },
          "Failed to remove uploaded object after a failed put",
        );
      }
    }
    throw err;
  }

  const source: Source = {
    name,
    comment,
    dataKey,
    metaKey,
    plaintextSize: encoded.info.plaintextSize,
    encryptedSize: encoded.data.byteLength,
    fingerprint: encoded.info.fingerprint,
    createdAt: encoded.info.createdAt,
    orphanedAt: null,
  };
  store.sources.insert(source);
  log.info(
    { dataKey, plaintextSize: source.plaintextSize, encryptedSize: source.encryptedSize },
    "Source stored",
  );
  return source;
}
