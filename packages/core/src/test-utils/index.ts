export {
  createMemoryBackend,
  type InjectedFailure,
  type MemoryBackend,
  type MemoryBackendOptions,
  type StoredObject,
} from "./memory-backend.js";
export {
  createTestBoxContext,
  TEST_BOX_KEY,
  type TestBoxContext,
} from "./context.js";
