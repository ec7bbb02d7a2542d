/**
 * BackupPolicy repository
 */

import { NotFoundError, TransientStoreError, UpdateConflictError } from "../core/errors";
import type {
  ApplyResult,
  BackupPolicy,
  PolicyId,
  PolicyManifest,
  PolicyRepository,
  PolicyRow,
} from "../types";
import { emptyStatus } from "../types";
import { generateUUID } from "../utils/crypto";
import { getDatabase } from "./connection";
import { parsePolicyRow, serializeSpec, serializeStatus } from "./mappers";

export function getPolicy(id: PolicyId): BackupPolicy | null {
  const database = getDatabase();
  const row = database
    .prepare<PolicyId, PolicyRow>(
      "SELECT * FROM policies WHERE namespace = @namespace AND name = @name",
    )
    .get({ namespace: id.namespace, name: id.name });

  if (!row) return null;
  return parsePolicyRow(row);
}

export function listPolicies(): BackupPolicy[] {
  const database = getDatabase();
  const rows = database
    .prepare<[], PolicyRow>("SELECT * FROM policies ORDER BY namespace, name")
    .all();

  return rows.map(parsePolicyRow);
}

function requirePolicy(id: PolicyId): BackupPolicy {
  const policy = getPolicy(id);
  if (!policy) {
    throw new NotFoundError("BackupPolicy", id);
  }
  return policy;
}

/**
 * Create the policy, or replace its spec. The generation only moves when the
 * spec actually changed; status is left alone either way.
 */
export function applyPolicy(manifest: PolicyManifest, now: Date = new Date()): ApplyResult {
  const database = getDatabase();
  const id: PolicyId = manifest.metadata;
  const spec = serializeSpec(manifest.spec);
  const timestamp = now.toISOString();

  const apply = database.transaction((): ApplyResult => {
    const existing = getPolicy(id);

    if (!existing) {
      const status = serializeStatus(emptyStatus());
      database
        .prepare(`
          INSERT INTO policies (
            namespace, name, uid, generation, resource_version, spec,
            last_backup_status, last_successful_backup_at, next_scheduled_backup_at,
            failure_reason, active_job_ref, observed_generation, created_at, updated_at
          ) VALUES (@namespace, @name, @uid, 1, 1, @spec,
            @last_backup_status, @last_successful_backup_at, @next_scheduled_backup_at,
            @failure_reason, @active_job_ref, @observed_generation, @timestamp, @timestamp)
        `)
        .run({
          namespace: id.namespace,
          name: id.name,
          uid: generateUUID(),
          spec,
          ...status,
          timestamp,
        });
      return { policy: requirePolicy(id), action: "created" };
    }

    if (serializeSpec(existing.spec) === spec) {
      return { policy: existing, action: "unchanged" };
    }

    database
      .prepare(`
        UPDATE policies
        SET spec = @spec,
            generation = generation + 1,
            resource_version = resource_version + 1,
            updated_at = @timestamp
        WHERE namespace = @namespace AND name = @name
      `)
      .run({ namespace: id.namespace, name: id.name, spec, timestamp });
    return { policy: requirePolicy(id), action: "configured" };
  });

  return apply();
}

/**
 * Write the status of a policy read earlier. The row must still carry the
 * uid and resource version the caller saw.
 */
export function updatePolicyStatus(policy: BackupPolicy, now: Date = new Date()): BackupPolicy {
  const database = getDatabase();

  const result = database
    .prepare(`
      UPDATE policies
      SET last_backup_status = @last_backup_status,
          last_successful_backup_at = @last_successful_backup_at,
          next_scheduled_backup_at = @next_scheduled_backup_at,
          failure_reason = @failure_reason,
          active_job_ref = @active_job_ref,
          observed_generation = @observed_generation,
          resource_version = resource_version + 1,
          updated_at = @timestamp
      WHERE namespace = @namespace AND name = @name
        AND uid = @uid AND resource_version = @resource_version
    `)
    .run({
      ...serializeStatus(policy.status),
      namespace: policy.namespace,
      name: policy.name,
      uid: policy.uid,
      resource_version: policy.resourceVersion,
      timestamp: now.toISOString(),
    });

  if (result.changes === 0) {
    if (!getPolicy(policy)) {
      throw new NotFoundError("BackupPolicy", policy);
    }
    throw new UpdateConflictError(policy, policy.resourceVersion);
  }

  return requirePolicy(policy);
}

export function deletePolicy(id: PolicyId): boolean {
  const database = getDatabase();
  const result = database
    .prepare("DELETE FROM policies WHERE namespace = @namespace AND name = @name")
    .run({ namespace: id.namespace, name: id.name });

  return result.changes > 0;
}

function isBusyError(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error) || typeof error.code !== "string") {
    return false;
  }
  return error.code.startsWith("SQLITE_BUSY") || error.code.startsWith("SQLITE_LOCKED");
}

function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (isBusyError(error)) {
      throw new TransientStoreError(`Store busy during ${operation}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Store backed by the open database connection
 */
export function createPolicyStore(): PolicyRepository {
  return {
    async get(id) {
      return guard("get", () => getPolicy(id));
    },
    async list() {
      return guard("list", () => listPolicies());
    },
    async apply(manifest) {
      return guard("apply", () => applyPolicy(manifest));
    },
    async updateStatus(policy) {
      return guard("updateStatus", () => updatePolicyStatus(policy));
    },
    async delete(id) {
      return guard("delete", () => deletePolicy(id));
    },
  };
}
