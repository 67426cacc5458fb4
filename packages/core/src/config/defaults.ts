import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), ".coldbox");
export const CONFIG_FILENAME = "config.json";
export const BOXES_DIRNAME = "boxes";

/** Environment variable that overrides the root path. */
export const ROOT_PATH_ENV = "COLDBOX_ROOT";
/** Environment variable that overrides `logging.level` for one run. */
export const LOG_LEVEL_ENV = "COLDBOX_LOG_LEVEL";
