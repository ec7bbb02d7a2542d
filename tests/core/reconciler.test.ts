import { beforeEach, describe, expect, test, vi } from "vitest";
import { JobCreationError, TransientStoreError, UpdateConflictError } from "../../src/core/errors";
import {
  JOB_FAILED_REASON,
  jobMissingReason,
  Reconciler,
  type ReconcilerOptions,
} from "../../src/core/reconcile/reconciler";
import type { BackupPolicy } from "../../src/types";
import { FakeJobRunner, MemoryPolicyStore, makePolicy, type PolicyOverrides } from "../helpers/fakes";

const ID = { namespace: "default", name: "nightly" };
const NOW = new Date("2026-10-19T01:30:00.000Z");
const NEXT_HOUR = new Date("2026-10-19T02:00:00.000Z");
const PAST_HOUR = new Date("2026-10-19T01:00:00.000Z");
const JOB_NAME = "nightly-20261019013000000-abc123";

describe("Reconciler", () => {
  let store: MemoryPolicyStore;
  let jobs: FakeJobRunner;
  let now: Date;

  function setup(overrides: PolicyOverrides = {}, options: Partial<ReconcilerOptions> = {}): Reconciler {
    store = new MemoryPolicyStore([makePolicy(overrides)]);
    return new Reconciler({
      store,
      jobs,
      now: () => now,
      timezone: "UTC",
      shortId: () => "abc123",
      ...options,
    });
  }

  function stored(): BackupPolicy {
    const policy = store.snapshot(ID);
    if (!policy) {
      throw new Error("policy missing from store");
    }
    return policy;
  }

  beforeEach(() => {
    jobs = new FakeJobRunner();
    now = NOW;
  });

  describe("first pass", () => {
    test("initializes status and schedules the next run without launching", async () => {
      const reconciler = setup();

      const result = await reconciler.reconcile(ID);

      expect(result).toEqual({
        statusWritten: true,
        requeueAfterMs: 30 * 60 * 1000,
        jobCreated: null,
        phase: "Pending",
      });
      expect(stored().status).toEqual({
        lastBackupStatus: "Pending",
        lastSuccessfulBackupAt: null,
        nextScheduledBackupAt: NEXT_HOUR,
        failureReason: "",
        activeJobRef: "",
        observedGeneration: 1,
      });
      expect(jobs.created).toHaveLength(0);
    });

    test("a second pass at the same instant writes nothing", async () => {
      const reconciler = setup();
      await reconciler.reconcile(ID);
      const writes = store.writes.length;

      const result = await reconciler.reconcile(ID);

      expect(result.statusWritten).toBe(false);
      expect(result.requeueAfterMs).toBe(30 * 60 * 1000);
      expect(store.writes).toHaveLength(writes);
    });
  });

  describe("due policy", () => {
    const due: PolicyOverrides = {
      status: { lastBackupStatus: "Pending", observedGeneration: 1, nextScheduledBackupAt: PAST_HOUR },
    };

    test("launches exactly one job and records it", async () => {
      const reconciler = setup(due);

      const result = await reconciler.reconcile(ID);

      expect(result.jobCreated).toBe(JOB_NAME);
      expect(result.phase).toBe("Running");
      expect(jobs.created).toHaveLength(1);
      expect(jobs.created[0]?.name).toBe(JOB_NAME);
      expect(stored().status).toMatchObject({
        activeJobRef: JOB_NAME,
        lastBackupStatus: "Running",
        failureReason: "",
        nextScheduledBackupAt: NEXT_HOUR,
      });
    });

    test("polls the active job instead of waiting for the next run", async () => {
      const reconciler = setup(due);

      const result = await reconciler.reconcile(ID);

      expect(result.requeueAfterMs).toBe(30_000);
    });

    test("fills in an unset next run before checking whether it is due", async () => {
      const reconciler = setup({ status: { lastBackupStatus: "Pending", observedGeneration: 1 } });

      const result = await reconciler.reconcile(ID);

      expect(result.jobCreated).toBeNull();
      expect(stored().status.nextScheduledBackupAt).toEqual(NEXT_HOUR);
    });

    test("does not launch while a job is active", async () => {
      jobs.addJob("default", "nightly-20261019003000000-zzz999", "Running");
      const reconciler = setup({
        status: {
          lastBackupStatus: "Running",
          observedGeneration: 1,
          nextScheduledBackupAt: PAST_HOUR,
          activeJobRef: "nightly-20261019003000000-zzz999",
        },
      });

      const result = await reconciler.reconcile(ID);

      expect(result.jobCreated).toBeNull();
      expect(jobs.created).toHaveLength(0);
      expect(result.requeueAfterMs).toBe(1_000);
    });

    test("clears a previous failure reason when launching", async () => {
      const reconciler = setup({
        status: {
          lastBackupStatus: "Failed",
          observedGeneration: 1,
          nextScheduledBackupAt: PAST_HOUR,
          failureReason: JOB_FAILED_REASON,
        },
      });

      await reconciler.reconcile(ID);

      expect(stored().status.failureReason).toBe("");
      expect(stored().status.lastBackupStatus).toBe("Running");
    });
  });

  describe("active job observation", () => {
    const active: PolicyOverrides = {
      status: {
        lastBackupStatus: "Running",
        observedGeneration: 1,
        nextScheduledBackupAt: NEXT_HOUR,
        activeJobRef: JOB_NAME,
      },
    };

    test("records a successful run", async () => {
      jobs.addJob("default", JOB_NAME, "Succeeded");
      now = new Date("2026-10-19T01:45:00.000Z");
      const reconciler = setup(active);

      const result = await reconciler.reconcile(ID);

      expect(result.phase).toBe("Succeeded");
      expect(result.requeueAfterMs).toBe(15 * 60 * 1000);
      expect(stored().status).toEqual({
        lastBackupStatus: "Succeeded",
        lastSuccessfulBackupAt: now,
        nextScheduledBackupAt: NEXT_HOUR,
        failureReason: "",
        activeJobRef: "",
        observedGeneration: 1,
      });
    });

    test("records a failed run", async () => {
      jobs.addJob("default", JOB_NAME, "Failed");
      const reconciler = setup(active);

      const result = await reconciler.reconcile(ID);

      expect(result.phase).toBe("Failed");
      expect(stored().status).toMatchObject({
        lastBackupStatus: "Failed",
        failureReason: JOB_FAILED_REASON,
        activeJobRef: "",
        lastSuccessfulBackupAt: null,
      });
    });

    test("marks a vanished job as failed", async () => {
      const reconciler = setup(active);

      const result = await reconciler.reconcile(ID);

      expect(result.phase).toBe("Failed");
      expect(stored().status).toMatchObject({
        lastBackupStatus: "Failed",
        failureReason: jobMissingReason(JOB_NAME),
        activeJobRef: "",
      });
      expect(jobMissingReason(JOB_NAME)).toBe(
        `Backup job ${JOB_NAME} disappeared before reporting a result`,
      );
    });

    test("leaves a running job alone", async () => {
      jobs.addJob("default", JOB_NAME, "Running");
      const reconciler = setup(active);

      const result = await reconciler.reconcile(ID);

      expect(result).toEqual({
        statusWritten: false,
        requeueAfterMs: 30_000,
        jobCreated: null,
        phase: "Running",
      });
    });

    test("launches the next job once the finished one is recorded", async () => {
      jobs.addJob("default", JOB_NAME, "Succeeded");
      now = new Date("2026-10-19T02:00:00.000Z");
      const reconciler = setup(active);

      const result = await reconciler.reconcile(ID);

      expect(result.jobCreated).toBe("nightly-20261019020000000-abc123");
      expect(stored().status).toMatchObject({
        lastBackupStatus: "Running",
        lastSuccessfulBackupAt: now,
        activeJobRef: "nightly-20261019020000000-abc123",
        nextScheduledBackupAt: new Date("2026-10-19T03:00:00.000Z"),
      });
    });
  });

  describe("schedule handling", () => {
    test("rejects an invalid schedule with a sticky error", async () => {
      const reconciler = setup({ spec: { schedule: "every day" } });

      const result = await reconciler.reconcile(ID);

      expect(result).toEqual({
        statusWritten: true,
        requeueAfterMs: 60_000,
        jobCreated: null,
        phase: "Error",
      });
      expect(stored().status.failureReason).toBe(
        "Invalid schedule: expected 5 fields (minute hour day-of-month month day-of-week), got 2",
      );

      const again = await reconciler.reconcile(ID);
      expect(again.statusWritten).toBe(false);
      expect(again.phase).toBe("Error");
    });

    test("clears the schedule error once an edited schedule parses", async () => {
      const reconciler = setup({
        generation: 2,
        status: {
          lastBackupStatus: "Error",
          failureReason: "Invalid schedule: expected 5 fields (minute hour day-of-month month day-of-week), got 2",
          observedGeneration: 1,
        },
      });

      const result = await reconciler.reconcile(ID);

      expect(result).toEqual({
        statusWritten: true,
        requeueAfterMs: 30 * 60 * 1000,
        jobCreated: null,
        phase: "Pending",
      });
      expect(stored().status).toEqual({
        lastBackupStatus: "Pending",
        lastSuccessfulBackupAt: null,
        nextScheduledBackupAt: NEXT_HOUR,
        failureReason: "",
        activeJobRef: "",
        observedGeneration: 2,
      });
    });

    test("keeps a job creation error until the next launch", async () => {
      const reconciler = setup({
        status: {
          lastBackupStatus: "Error",
          failureReason: "Failed to create backup job: image not found",
          observedGeneration: 1,
          nextScheduledBackupAt: NEXT_HOUR,
        },
      });

      const result = await reconciler.reconcile(ID);

      expect(result.statusWritten).toBe(false);
      expect(stored().status.failureReason).toBe("Failed to create backup job: image not found");
    });

    test("never moves the next run backward", async () => {
      const later = new Date("2026-10-19T05:00:00.000Z");
      const reconciler = setup({
        generation: 2,
        status: { lastBackupStatus: "Pending", observedGeneration: 1, nextScheduledBackupAt: later },
      });

      const result = await reconciler.reconcile(ID);

      expect(stored().status.nextScheduledBackupAt).toEqual(later);
      expect(stored().status.observedGeneration).toBe(2);
      expect(result.requeueAfterMs).toBe(3.5 * 60 * 60 * 1000);
    });

    test("moves the next run forward when the schedule does", async () => {
      const reconciler = setup({
        spec: { schedule: "0 6 * * *" },
        status: { lastBackupStatus: "Pending", observedGeneration: 1, nextScheduledBackupAt: NEXT_HOUR },
      });

      await reconciler.reconcile(ID);

      expect(stored().status.nextScheduledBackupAt).toEqual(new Date("2026-10-19T06:00:00.000Z"));
    });

    test("uses the policy's own timezone", async () => {
      const reconciler = setup({ spec: { schedule: "0 2 * * *", timezone: "America/New_York" } });
      now = new Date("2026-10-19T00:00:00.000Z");

      await reconciler.reconcile(ID);

      expect(stored().status.nextScheduledBackupAt).toEqual(new Date("2026-10-19T06:00:00.000Z"));
    });

    test("a suspended policy skips the missed run", async () => {
      const reconciler = setup({
        spec: { suspend: true },
        status: { lastBackupStatus: "Pending", observedGeneration: 1, nextScheduledBackupAt: PAST_HOUR },
      });

      const result = await reconciler.reconcile(ID);

      expect(result.jobCreated).toBeNull();
      expect(jobs.created).toHaveLength(0);
      expect(stored().status.nextScheduledBackupAt).toEqual(NEXT_HOUR);
      expect(result.requeueAfterMs).toBe(30 * 60 * 1000);
    });

    test("waits at least the minimum requeue delay", async () => {
      now = new Date("2026-10-19T01:59:59.800Z");
      const reconciler = setup({
        status: { lastBackupStatus: "Pending", observedGeneration: 1, nextScheduledBackupAt: NEXT_HOUR },
      });

      const result = await reconciler.reconcile(ID);

      expect(result.requeueAfterMs).toBe(1_000);
    });
  });

  describe("failures", () => {
    test("returns no requeue for a deleted policy", async () => {
      const reconciler = setup();
      await store.delete(ID);

      const result = await reconciler.reconcile(ID);

      expect(result).toEqual({
        statusWritten: false,
        requeueAfterMs: null,
        jobCreated: null,
        phase: null,
      });
    });

    test("records and rethrows a job creation failure", async () => {
      jobs.createError = new Error("image not found");
      const reconciler = setup({
        status: { lastBackupStatus: "Pending", observedGeneration: 1, nextScheduledBackupAt: PAST_HOUR },
      });

      const pass = reconciler.reconcile(ID);

      await expect(pass).rejects.toBeInstanceOf(JobCreationError);
      await expect(pass).rejects.toThrow(
        `Failed to create backup job ${JOB_NAME}: image not found`,
      );
      expect(stored().status).toMatchObject({
        lastBackupStatus: "Error",
        failureReason: "Failed to create backup job: image not found",
        activeJobRef: "",
      });
    });

    test("keeps the job creation failure when recording it also fails", async () => {
      const logged = vi.spyOn(console, "error").mockImplementation(() => {});
      jobs.createError = new Error("image not found");
      const reconciler = setup({
        status: { lastBackupStatus: "Pending", observedGeneration: 1, nextScheduledBackupAt: PAST_HOUR },
      });
      store.failNextUpdate = new TransientStoreError("Store busy during updateStatus");

      await expect(reconciler.reconcile(ID)).rejects.toThrow(
        new JobCreationError(JOB_NAME, new Error("image not found")),
      );
      expect(logged).toHaveBeenCalledWith(
        expect.stringContaining(
          "default/nightly: failed to record job creation failure Store busy during updateStatus",
        ),
      );
      expect(stored().status).toMatchObject({ lastBackupStatus: "Pending", failureReason: "" });
      expect(store.writes).toHaveLength(0);
    });

    test("propagates a write conflict and abandons the pass", async () => {
      const reconciler = setup();
      store.failNextUpdate = new UpdateConflictError(ID, 1);

      await expect(reconciler.reconcile(ID)).rejects.toBeInstanceOf(UpdateConflictError);
      expect(jobs.created).toHaveLength(0);
    });
  });
});
