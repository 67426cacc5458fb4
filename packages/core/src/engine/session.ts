import type { Logger } from "pino";
import { createBackend } from "../backends/index.js";
import type { Backend } from "../backends/interface.js";
import { createOpenPgpCodec } from "../codec/openpgp.js";
import type { Codec } from "../codec/interface.js";
import { withLock } from "../lock/index.js";
import type { BoxRegistry } from "../registry/registry.js";
import type { AppConfig } from "../schemas/app-config.js";
import type { BackendConfig } from "../schemas/box-config.js";
import { openBoxStore } from "../store/index.js";
import type { BoxContext } from "./context.js";

export interface BoxSessionOptions {
  registry: BoxRegistry;
  config: AppConfig;
  logger: Logger;
  backendFactory?: (config: BackendConfig) => Backend;
  codec?: Codec;
  now?: () => string;
}

/**
 * Runs `fn` against one box with its lock held and its database open.
 * The database is closed and the lock released on every exit path.
 */
export async function withBoxSession<T>(
  name: string,
  options: BoxSessionOptions,
  fn: (ctx: BoxContext) => Promise<T>,
): Promise<T> {
  const { registry, config } = options;
  const box = await registry.loadBox(name);
  const paths = registry.paths(name);
  const logger = options.logger.child({ box: name });

  return withLock(
    paths.lock,
    async () => {
      const key = await registry.loadKey(box);
      const store = openBoxStore(paths.db);
      try {
        const backend = (options.backendFactory ?? createBackend)(box.backend);
        logger.debug({ backend: backend.kind, tier: backend.tier }, "Session opened");
        return await fn({
          box,
          backend,
          store,
          key,
          codec: options.codec ?? createOpenPgpCodec(),
          config,
          logger,
          now: options.now ?? (() => new Date().toISOString()),
        });
      } finally {
        store.close();
      }
    },
    { staleMs: config.lock.staleMs, retries: config.lock.retries },
  );
}

export interface BoxReaderOptions {
  registry: BoxRegistry;
}

/**
 * Runs `fn` against a box's database without the lock, the key or a backend.
 * For commands that only read the Metadata Store.
 */
export async function withBoxReader<T>(
  name: string,
  options: BoxReaderOptions,
  fn: (ctx: Pick<BoxContext, "box" | "store">) => T | Promise<T>,
): Promise<T> {
  const box = await options.registry.loadBox(name);
  const store = openBoxStore(options.registry.paths(name).db);
  try {
    return await fn({ box, store });
  } finally {
    store.close();
  }
}
