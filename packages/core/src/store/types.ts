import { z } from "zod";
import type { BackendOptions } from "../backends/interface.js";

export interface Source {
  /** Unique within a box, compared exactly. */
  name: string;
  comment: string;
  dataKey: string;
  metaKey: string;
  plaintextSize: number;
  encryptedSize: number;
  /** sha256 of the packed plaintext, hex */
  fingerprint: string;
  createdAt: string; // ISO 8601
  /** Set by refresh while the backend is missing one of the source's objects. */
  orphanedAt: string | null;
}

export const JobKindSchema = z.enum(["retrieval", "inventory", "metadata"]);
export const JobStatusSchema = z.enum([
  "requested",
  "in-progress",
  "ready",
  "failed",
]);

export type JobKind = z.infer<typeof JobKindSchema>;
export type JobStatus = z.infer<typeof JobStatusSchema>;

export interface Job {
  kind: JobKind;
  /** Source name for retrievals, meta key for metadata jobs, "" for the inventory. */
  subject: string;
  handle: string;
  options: BackendOptions;
  status: JobStatus;
  error: string | null;
  requestedAt: string;
  updatedAt: string;
}

export type NewJob = Pick<Job, "kind" | "subject" | "handle" | "options"> & {
  status?: JobStatus;
};
