import type { Source } from "../store/types.js";
import type { BoxContext } from "./context.js";

export interface SourceListing {
  sources: Source[];
  totalPlaintextSize: number;
  totalEncryptedSize: number;
  orphaned: number;
}

/** Reads the Metadata Store only; the backend is never contacted. */
export function listSources(ctx: Pick<BoxContext, "store">): SourceListing {
  const sources = ctx.store.sources.list();
  return {
    sources,
    totalPlaintextSize: sources.reduce((sum, s) => sum + s.plaintextSize, 0),
    totalEncryptedSize: sources.reduce((sum, s) => sum + s.encryptedSize, 0),
    orphaned: sources.filter((s) => s.orphanedAt !== null).length,
  };
}
