export {
  DEFAULT_ROOT_PATH,
  CONFIG_FILENAME,
  BOXES_DIRNAME,
  ROOT_PATH_ENV,
  LOG_LEVEL_ENV,
} from "./defaults.js";
export { loadConfig, type LoadConfigOptions } from "./loader.js";
export { expandHomePath, resolveRootPath, boxesDir } from "./paths.js";
