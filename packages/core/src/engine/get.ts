import { unpackTo, type UnpackOptions } from "../codec/pack.js";
import {
  DecodeError,
  JobConflictError,
  NotFoundError,
} from "../errors/catalog.js";
import type { BackendOptions } from "../backends/interface.js";
import type { Source } from "../store/types.js";
import type { BoxContext } from "./context.js";
import { withRetry } from "./retry.js";

export interface GetInput {
  name: string;
  /** Directory the source is unpacked into. */
  destination: string;
  /** Passed to startRetrieval when a restore is requested, e.g. `{ tier: "Expedited" }`. */
  options?: BackendOptions;
  /** Apply stored file and directory modes. */
  mode?: boolean;
  /** Apply stored modification times. */
  mtime?: boolean;
  signal?: AbortSignal;
}

export type GetResult =
  | { status: "requested" }
  | { status: "in-progress" }
  | { status: "failed"; reason: string }
  | { status: "delivered"; destination: string; source: Source };

/**
 * Resumable retrieval. Each call advances the source's retrieval job by at
 * most one step and returns; only a fetchable object is downloaded.
 */
export async function getSource(ctx: BoxContext, input: GetInput): Promise<GetResult> {
  const { backend, store } = ctx;
  const { signal } = input;
  const log = ctx.logger.child({ source: input.name });

  const source = store.sources.find(input.name);
  if (!source) {
    throw new NotFoundError(`Source not found: ${input.name}`, {
      box: ctx.box.name,
      source: input.name,
    });
  }

  const job = store.jobs.find("retrieval", source.name);

  if (!job) {
    const head = await withRetry(
      () => backend.head(source.dataKey),
      ctx.config.retry,
      log,
      signal,
    );
    if (!head) {
      throw new NotFoundError(`Remote object missing for ${source.name}`, {
        box: ctx.box.name,
        source: source.name,
        key: source.dataKey,
      });
    }

    if (head.restore === "required" || head.restore === "in-progress") {
      signal?.throwIfAborted();
      const options = input.options ?? {};
      const handle = await backend.startRetrieval(source.dataKey, options);
      try {
        store.jobs.create(
          { kind: "retrieval", subject: source.name, handle, options },
          ctx.now(),
        );
      } catch (err) {
        if (!(err instanceof JobConflictError)) throw err;
        log.debug("Retrieval job already recorded, attaching");
      }
      log.info({ key: source.dataKey, handle, options }, "Retrieval requested");
      return { status: "requested" };
    }
  } else {
    const poll = await withRetry(
      () => backend.pollRetrieval(job.handle),
      ctx.config.retry,
      log,
      signal,
    );
    switch (poll.status) {
      case "in-progress":
        store.jobs.updateStatus("retrieval", source.name, "in-progress", ctx.now());
        return { status: "in-progress" };
      case "failed":
        store.jobs.delete("retrieval", source.name);
        log.warn({ reason: poll.reason }, "Retrieval failed, job cleared");
        return { status: "failed", reason: poll.reason };
      case "ready":
        store.jobs.updateStatus("retrieval", source.name, "ready", ctx.now());
        break;
    }
  }

  await deliver(ctx, source, input.destination, {
    unpack: { mode: input.mode, mtime: input.mtime },
    signal,
  });
  if (job) store.jobs.delete("retrieval", source.name);
  log.info({ destination: input.destination }, "Source delivered");
  return { status: "delivered", destination: input.destination, source };
}

async function deliver(
  ctx: BoxContext,
  source: Source,
  destination: string,
  options: { unpack: UnpackOptions; signal?: AbortSignal },
): Promise<void> {
  const { signal } = options;
  const log = ctx.logger.child({ source: source.name });
  signal?.throwIfAborted();
  const data = await withRetry(
    () => ctx.backend.fetch(source.dataKey),
    ctx.config.retry,
    log,
    signal,
  );
  signal?.throwIfAborted();
  const metadata = await withRetry(
    () => ctx.backend.fetch(source.metaKey),
    ctx.config.retry,
    log,
    signal,
  );
  const { plaintext, info } = await ctx.codec.decode(data, metadata, ctx.key);
  if (info.fingerprint !== source.fingerprint) {
    throw new DecodeError(`Remote objects do not hold ${source.name}`, {
      source: source.name,
      expected: source.fingerprint,
      actual: info.fingerprint,
    });
  }
  signal?.throwIfAborted();
  await unpackTo(plaintext, destination, options.unpack);
}
