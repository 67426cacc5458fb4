export {
  BOX_CONFIG_FILE,
  BOX_KEY_FILE,
  createBoxRegistry,
  type BoxPaths,
  type BoxRegistry,
  type BoxRegistryOptions,
} from "./registry.js";
