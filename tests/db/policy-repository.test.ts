import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { NotFoundError, UpdateConflictError } from "../../src/core/errors";
import { closeDatabase, initDatabase } from "../../src/db/connection";
import {
  applyPolicy,
  createPolicyStore,
  deletePolicy,
  getPolicy,
  listPolicies,
  updatePolicyStatus,
} from "../../src/db/policy-repository";
import type { PolicyManifest } from "../../src/types";
import { makeSpec } from "../helpers/fakes";

const T0 = new Date("2026-10-19T01:00:00.000Z");

function manifest(name = "nightly", namespace = "default", schedule = "0 * * * *"): PolicyManifest {
  return {
    apiVersion: "backup-controller.io/v1alpha1",
    kind: "BackupPolicy",
    metadata: { namespace, name },
    spec: makeSpec({ schedule }),
  };
}

describe("policy repository", () => {
  beforeEach(async () => {
    closeDatabase();
    await initDatabase(":memory:");
  });

  afterEach(() => {
    closeDatabase();
  });

  describe("applyPolicy", () => {
    test("creates a policy with an empty status", () => {
      const { policy, action } = applyPolicy(manifest(), T0);

      expect(action).toBe("created");
      expect(policy).toMatchObject({
        namespace: "default",
        name: "nightly",
        generation: 1,
        resourceVersion: 1,
        createdAt: T0,
        spec: makeSpec(),
        status: {
          lastBackupStatus: null,
          lastSuccessfulBackupAt: null,
          nextScheduledBackupAt: null,
          failureReason: "",
          activeJobRef: "",
          observedGeneration: null,
        },
      });
      expect(policy.uid).toMatch(/^[0-9a-f-]{36}$/);
    });

    test("leaves an identical spec unchanged", () => {
      const created = applyPolicy(manifest(), T0).policy;

      const { policy, action } = applyPolicy(manifest());

      expect(action).toBe("unchanged");
      expect(policy.generation).toBe(1);
      expect(policy.resourceVersion).toBe(created.resourceVersion);
    });

    test("ignores key order when comparing specs", () => {
      applyPolicy(manifest(), T0);
      const reordered = manifest();
      const { databaseSelector, storageDestination, ...rest } = reordered.spec;
      reordered.spec = { databaseSelector, ...rest, storageDestination };

      expect(applyPolicy(reordered).action).toBe("unchanged");
    });

    test("bumps generation and resource version when the spec changes", () => {
      const created = applyPolicy(manifest(), T0).policy;

      const { policy, action } = applyPolicy(manifest("nightly", "default", "30 2 * * *"));

      expect(action).toBe("configured");
      expect(policy.uid).toBe(created.uid);
      expect(policy.generation).toBe(2);
      expect(policy.resourceVersion).toBe(2);
      expect(policy.spec.schedule).toBe("30 2 * * *");
    });

    test("keeps the status when the spec changes", () => {
      const created = applyPolicy(manifest(), T0).policy;
      updatePolicyStatus({
        ...created,
        status: { ...created.status, lastBackupStatus: "Succeeded", observedGeneration: 1 },
      });

      const { policy } = applyPolicy(manifest("nightly", "default", "30 2 * * *"));

      expect(policy.status.lastBackupStatus).toBe("Succeeded");
      expect(policy.status.observedGeneration).toBe(1);
      expect(policy.resourceVersion).toBe(3);
    });
  });

  describe("updatePolicyStatus", () => {
    test("writes every status field and bumps the resource version", () => {
      const created = applyPolicy(manifest(), T0).policy;
      const next = new Date("2026-10-19T02:00:00.000Z");

      const updated = updatePolicyStatus({
        ...created,
        status: {
          lastBackupStatus: "Running",
          lastSuccessfulBackupAt: T0,
          nextScheduledBackupAt: next,
          failureReason: "",
          activeJobRef: "nightly-20261019010000000-abc123",
          observedGeneration: 1,
        },
      });

      expect(updated.resourceVersion).toBe(2);
      expect(updated.status).toEqual({
        lastBackupStatus: "Running",
        lastSuccessfulBackupAt: T0,
        nextScheduledBackupAt: next,
        failureReason: "",
        activeJobRef: "nightly-20261019010000000-abc123",
        observedGeneration: 1,
      });
    });

    test("rejects a write based on a stale resource version", () => {
      const stale = applyPolicy(manifest(), T0).policy;
      updatePolicyStatus(stale);

      expect(() => updatePolicyStatus(stale)).toThrow(UpdateConflictError);
    });

    test("rejects a write to a policy that was deleted and recreated", () => {
      const original = applyPolicy(manifest(), T0).policy;
      deletePolicy(original);
      applyPolicy(manifest(), T0);

      expect(() => updatePolicyStatus(original)).toThrow(UpdateConflictError);
    });

    test("reports a deleted policy as not found", () => {
      const policy = applyPolicy(manifest(), T0).policy;
      deletePolicy(policy);

      expect(() => updatePolicyStatus(policy)).toThrow(NotFoundError);
    });
  });

  describe("queries", () => {
    test("lists policies ordered by namespace and name", () => {
      applyPolicy(manifest("weekly", "prod"), T0);
      applyPolicy(manifest("nightly", "prod"), T0);
      applyPolicy(manifest("hourly", "default"), T0);

      expect(listPolicies().map((p) => `${p.namespace}/${p.name}`)).toEqual([
        "default/hourly",
        "prod/nightly",
        "prod/weekly",
      ]);
    });

    test("returns null for an unknown policy", () => {
      expect(getPolicy({ namespace: "default", name: "missing" })).toBeNull();
    });

    test("reports whether a delete removed anything", () => {
      applyPolicy(manifest(), T0);

      expect(deletePolicy({ namespace: "default", name: "nightly" })).toBe(true);
      expect(deletePolicy({ namespace: "default", name: "nightly" })).toBe(false);
    });
  });

  describe("createPolicyStore", () => {
    test("serves the repository operations asynchronously", async () => {
      const store = createPolicyStore();

      const { policy, action } = await store.apply(manifest());
      const fetched = await store.get(policy);
      const written = await store.updateStatus({
        ...policy,
        status: { ...policy.status, failureReason: "boom", lastBackupStatus: "Failed" },
      });

      expect(action).toBe("created");
      expect(fetched?.uid).toBe(policy.uid);
      expect(written.status.failureReason).toBe("boom");
      expect(await store.list()).toHaveLength(1);
      expect(await store.delete(policy)).toBe(true);
      expect(await store.get(policy)).toBeNull();
    });
  });
});
