/**
 * Database row mapping utilities
 */

import { parsePolicySpec } from "../config/manifest";
import type { BackupPolicy, BackupPolicySpec, BackupPolicyStatus, PolicyRow } from "../types";
import { isBackupPhase } from "../types";

export type StatusColumns = Pick<
  PolicyRow,
  | "last_backup_status"
  | "last_successful_backup_at"
  | "next_scheduled_backup_at"
  | "failure_reason"
  | "active_job_ref"
  | "observed_generation"
>;

function parseDate(value: string | null): Date | null {
  return value ? new Date(value) : null;
}

function serializeDate(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

export function parsePolicyRow(row: PolicyRow): BackupPolicy {
  return {
    namespace: row.namespace,
    name: row.name,
    uid: row.uid,
    generation: row.generation,
    resourceVersion: row.resource_version,
    createdAt: new Date(row.created_at),
    spec: parsePolicySpec(JSON.parse(row.spec)),
    status: {
      lastBackupStatus: isBackupPhase(row.last_backup_status) ? row.last_backup_status : null,
      lastSuccessfulBackupAt: parseDate(row.last_successful_backup_at),
      nextScheduledBackupAt: parseDate(row.next_scheduled_backup_at),
      failureReason: row.failure_reason,
      activeJobRef: row.active_job_ref,
      observedGeneration: row.observed_generation,
    },
  };
}

export function serializeStatus(status: BackupPolicyStatus): StatusColumns {
  return {
    last_backup_status: status.lastBackupStatus,
    last_successful_backup_at: serializeDate(status.lastSuccessfulBackupAt),
    next_scheduled_backup_at: serializeDate(status.nextScheduledBackupAt),
    failure_reason: status.failureReason,
    active_job_ref: status.activeJobRef,
    observed_generation: status.observedGeneration,
  };
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key);
      if (entry !== undefined) {
        sorted[key] = canonicalize(entry);
      }
    }
    return sorted;
  }
  return value;
}

/**
 * JSON with object keys sorted, so equal specs serialize identically
 */
export function serializeSpec(spec: BackupPolicySpec): string {
  return JSON.stringify(canonicalize(spec));
}
