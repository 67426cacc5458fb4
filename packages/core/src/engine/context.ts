import type { Logger } from "pino";
import type { Backend } from "../backends/interface.js";
import type { Codec } from "../codec/interface.js";
import type { BoxKey } from "../keys/box-key.js";
import type { AppConfig } from "../schemas/app-config.js";
import type { BoxConfig } from "../schemas/box-config.js";
import type { BoxStore } from "../store/index.js";

/** Everything an operation needs for one box, valid for one session. */
export interface BoxContext {
  box: BoxConfig;
  backend: Backend;
  store: BoxStore;
  key: BoxKey;
  codec: Codec;
  config: AppConfig;
  /** Child logger bound to `{ box }`. */
  logger: Logger;
  now(): string;
}
