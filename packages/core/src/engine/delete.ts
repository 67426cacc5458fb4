import { NotFoundError } from "../errors/catalog.js";
import type { Source } from "../store/types.js";
import type { BoxContext } from "./context.js";
import { withRetry } from "./retry.js";

/**
 * Deletes both remote objects, then forgets the source in one transaction.
 * A remote object that is already gone counts as deleted.
 */
export async function deleteSource(
  ctx: BoxContext,
  name: string,
  signal?: AbortSignal,
): Promise<Source> {
  const { backend, store } = ctx;
  const source = store.sources.find(name);
  if (!source) {
    throw new NotFoundError(`Source not found: ${name}`, {
      box: ctx.box.name,
      source: name,
    });
  }
  const log = ctx.logger.child({ source: name });

  for (const key of [source.dataKey, source.metaKey]) {
    signal?.throwIfAborted();
    const deleted = await withRetry(
      () => backend.delete(key),
      ctx.config.retry,
      log,
      signal,
    );
    if (!deleted) {
      log.warn({ key }, "Remote object was already gone");
    }
  }

  store.transaction(() => {
    store.sources.retireKeys([source.dataKey, source.metaKey], ctx.now());
    store.sources.delete(name);
    store.jobs.delete("retrieval", name);
  });
  log.info("Source deleted");
  return source;
}
