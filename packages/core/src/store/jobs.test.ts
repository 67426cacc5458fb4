import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type Database from "better-sqlite3";
import { initializeBoxDatabase } from "./schema.js";
import { createJobLedger, type JobLedger } from "./jobs.js";
import { JobConflictError, NotFoundError } from "../errors/catalog.js";

const T0 = "2026-03-01T10:00:00.000Z";
const T1 = "2026-03-01T11:00:00.000Z";

describe("JobLedger", () => {
  let db: Database.Database;
  let jobs: JobLedger;

  beforeEach(() => {
    db = initializeBoxDatabase(":memory:");
    jobs = createJobLedger(db);
  });

  afterEach(() => {
    db.close();
  });

  it("creates a requested job", () => {
    const job = jobs.create(
      {
        kind: "retrieval",
        subject: "photos",
        handle: "id-1.data",
        options: { tier: "Expedited" },
      },
      T0,
    );

    expect(job).toEqual({
      kind: "retrieval",
      subject: "photos",
      handle: "id-1.data",
      options: { tier: "Expedited" },
      status: "requested",
      error: null,
      requestedAt: T0,
      updatedAt: T0,
    });
    expect(jobs.find("retrieval", "photos")).toEqual(job);
  });

  it("allows one job per kind and subject", () => {
    jobs.create({ kind: "inventory", subject: "", handle: "h1", options: {} }, T0);

    expect(() =>
      jobs.create({ kind: "inventory", subject: "", handle: "h2", options: {} }, T1),
    ).toThrow(JobConflictError);
    expect(jobs.find("inventory", "")?.handle).toBe("h1");
  });

  it("keeps kinds apart for the same subject", () => {
    jobs.create({ kind: "retrieval", subject: "x", handle: "h", options: {} }, T0);
    jobs.create({ kind: "metadata", subject: "x", handle: "h", options: {} }, T0);
    expect(jobs.list()).toHaveLength(2);
    expect(jobs.list("metadata").map((j) => j.kind)).toEqual(["metadata"]);
  });

  it("updates status and error", () => {
    jobs.create({ kind: "retrieval", subject: "a", handle: "h", options: {} }, T0);

    const updated = jobs.updateStatus("retrieval", "a", "failed", T1, "expired");
    expect(updated.status).toBe("failed");
    expect(updated.error).toBe("expired");
    expect(updated.requestedAt).toBe(T0);
    expect(updated.updatedAt).toBe(T1);
  });

  it("updating a missing job throws NotFoundError", () => {
    expect(() => jobs.updateStatus("retrieval", "nope", "ready", T1)).toThrow(
      NotFoundError,
    );
  });

  it("deletes a job", () => {
    jobs.create({ kind: "retrieval", subject: "a", handle: "h", options: {} }, T0);
    expect(jobs.delete("retrieval", "a")).toBe(true);
    expect(jobs.delete("retrieval", "a")).toBe(false);
    expect(jobs.find("retrieval", "a")).toBeUndefined();
  });
});
