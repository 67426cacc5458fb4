export {
  derivePurposeKey,
  keyIdOf,
  purposePassword,
  MASTER_KEY_LENGTH,
  type KeyPurpose,
} from "./derive.js";

export {
  createBoxKey,
  loadBoxKey,
  type BoxKey,
} from "./box-key.js";
