import { createOpenPgpCodec } from "../codec/openpgp.js";
import type { BoxContext } from "../engine/context.js";
import { createSilentLogger } from "../logger/index.js";
import { AppConfigSchema } from "../schemas/app-config.js";
import { BoxConfigSchema } from "../schemas/box-config.js";
import { createBoxStore, initializeBoxDatabase } from "../store/index.js";
import { createMemoryBackend, type MemoryBackend } from "./memory-backend.js";

export const TEST_BOX_KEY = {
  id: "0011223344556677",
  masterKey: new Uint8Array(32).fill(1),
};

export interface TestBoxContext extends BoxContext {
  backend: MemoryBackend;
}

/**
 * Box context over an in-memory database and backend. Retries have no delay
 * and the clock advances one second per call from 2026-03-01T00:00:00Z.
 */
export function createTestBoxContext(
  backend: MemoryBackend = createMemoryBackend(),
): TestBoxContext {
  let tick = 0;
  return {
    box: BoxConfigSchema.parse({
      version: 1,
      name: "test-box",
      backend: { kind: "object-store", bucket: "test-bucket" },
      key: { id: TEST_BOX_KEY.id, file: "secret.key" },
      createdAt: "2026-03-01T00:00:00.000Z",
    }),
    backend,
    store: createBoxStore(initializeBoxDatabase(":memory:")),
    key: TEST_BOX_KEY,
    codec: createOpenPgpCodec(),
    config: AppConfigSchema.parse({ retry: { attempts: 3, delayMs: 0 } }),
    logger: createSilentLogger(),
    now: () => new Date(Date.UTC(2026, 2, 1, 0, 0, tick++)).toISOString(),
  };
}
