import type { BackendConfig } from "../schemas/box-config.js";
import type { Backend } from "./interface.js";
import { createLocalBackend } from "./local.js";
import { createObjectStoreBackend } from "./object-store.js";
import { createWebDavBackend } from "./webdav.js";

export type {
  Backend,
  BackendKind,
  BackendOptions,
  BackendTier,
  BlobRole,
  InventoryPoll,
  ObjectEntry,
  ObjectHead,
  RestoreState,
  RetrievalPoll,
} from "./interface.js";
export { collectEntries } from "./interface.js";
export { createLocalBackend, type LocalBackendOptions } from "./local.js";
export { createWebDavBackend, type WebDavBackendOptions } from "./webdav.js";
export {
  createObjectStoreBackend,
  parseRestoreHeader,
  type ObjectStoreBackendOptions,
} from "./object-store.js";

/** Builds the backend a box config names. */
export function createBackend(config: BackendConfig): Backend {
  switch (config.kind) {
    case "local":
      return createLocalBackend({ folderPath: config.folderPath });
    case "webdav":
      return createWebDavBackend({
        url: config.url,
        username: config.username,
        password: config.password,
      });
    case "object-store": {
      const { kind: _kind, ...options } = config;
      return createObjectStoreBackend(options);
    }
  }
}
