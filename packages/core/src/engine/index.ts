export type { BoxContext } from "./context.js";
export {
  withBoxReader,
  withBoxSession,
  type BoxReaderOptions,
  type BoxSessionOptions,
} from "./session.js";
export { withRetry } from "./retry.js";
export { putSource, type PutInput } from "./put.js";
export { getSource, type GetInput, type GetResult } from "./get.js";
export { deleteSource } from "./delete.js";
export { listSources, type SourceListing } from "./list.js";
export {
  refreshBox,
  type RefreshInput,
  type RefreshReport,
  type RefreshResult,
} from "./refresh.js";
