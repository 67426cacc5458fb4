import Database from "better-sqlite3";
import { z } from "zod";
import { JobConflictError, NotFoundError } from "../errors/catalog.js";
import {
  JobKindSchema,
  JobStatusSchema,
  type Job,
  type JobKind,
  type JobStatus,
  type NewJob,
} from "./types.js";

/** Job Ledger: in-flight asynchronous backend jobs, at most one per (kind, subject). */
export interface JobLedger {
  find(kind: JobKind, subject: string): Job | undefined;
  /** @throws JobConflictError if a job for (kind, subject) already exists */
  create(job: NewJob, now: string): Job;
  /** @throws NotFoundError if there is no such job */
  updateStatus(
    kind: JobKind,
    subject: string,
    status: JobStatus,
    now: string,
    error?: string,
  ): Job;
  delete(kind: JobKind, subject: string): boolean;
  list(kind?: JobKind): Job[];
}

interface RawRow {
  kind: string;
  subject: string;
  handle: string;
  options: string;
  status: string;
  error: string | null;
  requested_at: string;
  updated_at: string;
}

const OptionsSchema = z.record(z.string(), z.string());

function rowToJob(row: RawRow): Job {
  return {
    kind: JobKindSchema.parse(row.kind),
    subject: row.subject,
    handle: row.handle,
    options: OptionsSchema.parse(JSON.parse(row.options)),
    status: JobStatusSchema.parse(row.status),
    error: row.error,
    requestedAt: row.requested_at,
    updatedAt: row.updated_at,
  };
}

export function createJobLedger(db: Database.Database): JobLedger {
  const insertStmt = db.prepare<RawRow>(
    `INSERT INTO jobs (kind, subject, handle, options, status, error,
       requested_at, updated_at)
     VALUES (@kind, @subject, @handle, @options, @status, @error,
       @requested_at, @updated_at)`,
  );

  const findStmt = db.prepare<{ kind: string; subject: string }, RawRow>(
    "SELECT * FROM jobs WHERE kind = @kind AND subject = @subject",
  );

  const updateStmt = db.prepare<{
    kind: string;
    subject: string;
    status: string;
    error: string | null;
    updated_at: string;
  }>(
    `UPDATE jobs SET status = @status, error = @error, updated_at = @updated_at
     WHERE kind = @kind AND subject = @subject`,
  );

  const deleteStmt = db.prepare<{ kind: string; subject: string }>(
    "DELETE FROM jobs WHERE kind = @kind AND subject = @subject",
  );

  const listAllStmt = db.prepare<[], RawRow>(
    "SELECT * FROM jobs ORDER BY requested_at ASC, subject ASC",
  );

  const listKindStmt = db.prepare<{ kind: string }, RawRow>(
    "SELECT * FROM jobs WHERE kind = @kind ORDER BY requested_at ASC, subject ASC",
  );

  function find(kind: JobKind, subject: string): Job | undefined {
    const row = findStmt.get({ kind, subject });
    return row ? rowToJob(row) : undefined;
  }

  return {
    find,

    create(job, now) {
      const row: RawRow = {
        kind: job.kind,
        subject: job.subject,
        handle: job.handle,
        options: JSON.stringify(job.options),
        status: job.status ?? "requested",
        error: null,
        requested_at: now,
        updated_at: now,
      };
      try {
        insertStmt.run(row);
      } catch (err) {
        if (
          err instanceof Database.SqliteError &&
          err.code.startsWith("SQLITE_CONSTRAINT")
        ) {
          throw new JobConflictError(job.kind, job.subject);
        }
        throw err;
      }
      return rowToJob(row);
    },

    updateStatus(kind, subject, status, now, error) {
      const result = updateStmt.run({
        kind,
        subject,
        status,
        error: error ?? null,
        updated_at: now,
      });
      const job = result.changes > 0 ? find(kind, subject) : undefined;
      if (!job) {
        throw new NotFoundError(`No ${kind} job for ${subject || "box"}`, {
          kind,
          subject,
        });
      }
      return job;
    },

    delete(kind, subject) {
      return deleteStmt.run({ kind, subject }).changes > 0;
    },

    list(kind) {
      const rows = kind ? listKindStmt.all({ kind }) : listAllStmt.all();
      return rows.map(rowToJob);
    },
  };
}
