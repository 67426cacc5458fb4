import type Database from "better-sqlite3";
import { initializeBoxDatabase } from "./schema.js";
import { createSourceStore, type SourceStore } from "./sources.js";
import { createJobLedger, type JobLedger } from "./jobs.js";

export type {
  Job,
  JobKind,
  JobStatus,
  NewJob,
  Source,
} from "./types.js";
export { JobKindSchema, JobStatusSchema } from "./types.js";
export { initializeBoxDatabase, SCHEMA_VERSION } from "./schema.js";
export {
  createSourceStore,
  objectKeysFor,
  type ObjectKeys,
  type SourceStore,
} from "./sources.js";
export { createJobLedger, type JobLedger } from "./jobs.js";

export const BOX_DB_FILE = "box.db";

/** Metadata Store and Job Ledger over one box database. */
export interface BoxStore {
  sources: SourceStore;
  jobs: JobLedger;
  /** Runs `fn` in a single SQLite transaction. */
  transaction<T>(fn: () => T): T;
  close(): void;
}

export function createBoxStore(db: Database.Database): BoxStore {
  return {
    sources: createSourceStore(db),
    jobs: createJobLedger(db),
    transaction(fn) {
      return db.transaction(fn)();
    },
    close() {
      db.close();
    },
  };
}

export function openBoxStore(dbPath: string): BoxStore {
  return createBoxStore(initializeBoxDatabase(dbPath));
}
