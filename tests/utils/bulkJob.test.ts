import { describe, it, expect } from "vitest";
import { BulkJob, BulkJobState, isTerminal } from "../../src/utils/bulkJob.js";
import { BulkOperationError } from "../../src/utils/errorHandler.js";

function openJob(): BulkJob {
  const job = new BulkJob("Account", "insert");
  job.open("750TEST");
  return job;
}

describe("BulkJob", () => {
  it("starts Created without an id and opens with one", () => {
    const job = new BulkJob("Account", "insert");
    expect(job.state).toBe(BulkJobState.Created);
    expect(job.id).toBeUndefined();

    job.open("750TEST");
    expect(job.state).toBe(BulkJobState.Open);
    expect(job.id).toBe("750TEST");
  });

  it("follows the normal lifecycle, including repeated processing states", () => {
    const job = openJob();
    for (const state of ["UploadComplete", "UploadComplete", "InProgress", "InProgress", "JobComplete"]) {
      job.transition(state);
    }
    expect(job.state).toBe(BulkJobState.JobComplete);
  });

  it("rejects skipping the upload step", () => {
    const job = new BulkJob("Account", "insert");
    expect(() => job.transition(BulkJobState.UploadComplete)).toThrow(BulkOperationError);
    expect(job.state).toBe(BulkJobState.Created);
  });

  it("rejects leaving a terminal state", () => {
    const job = openJob();
    job.transition(BulkJobState.Aborted);

    let caught: unknown;
    try {
      job.transition(BulkJobState.Open);
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({
      reason: "invalid_transition",
      jobId: "750TEST",
      message: "Bulk job cannot move from Aborted to Open",
    });
  });

  it("rejects states it does not know", () => {
    const job = openJob();
    expect(() => job.transition("Exploded")).toThrow('Bulk job reported unknown state "Exploded"');
  });

  it("knows which states are terminal", () => {
    expect(
      Object.values(BulkJobState).filter((state) => isTerminal(state))
    ).toEqual([BulkJobState.JobComplete, BulkJobState.Failed, BulkJobState.Aborted]);
  });
});
