/**
 * Resource store interface definitions
 */

import type { BackupPolicy, PolicyId, PolicyManifest } from "./policy";

export interface PolicyStore {
  /**
   * Fetch a policy; null once it has been deleted
   */
  get(id: PolicyId): Promise<BackupPolicy | null>;

  /**
   * Persist the status of a policy read earlier.
   * Rejects with UpdateConflictError when the policy changed since it was read.
   */
  updateStatus(policy: BackupPolicy): Promise<BackupPolicy>;
}

export interface PolicyLister {
  list(): Promise<BackupPolicy[]>;
}

export type ApplyAction = "created" | "configured" | "unchanged";

export interface ApplyResult {
  policy: BackupPolicy;
  action: ApplyAction;
}

export interface PolicyRepository extends PolicyStore, PolicyLister {
  apply(manifest: PolicyManifest): Promise<ApplyResult>;
  /** Whether a policy was removed */
  delete(id: PolicyId): Promise<boolean>;
}
