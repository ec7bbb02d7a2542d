/**
 * Status subresource writer for a single reconcile pass
 */

import type { BackupPolicy, BackupPolicyStatus, PolicyStore } from "../../types";
import { policyKey } from "../../types";
import { createLogger } from "../../utils/logger";

const log = createLogger("status");

function sameValue(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return a === b;
}

function isUnchanged<T extends object>(current: T, patch: Partial<T>): boolean {
  for (const key in patch) {
    if (!sameValue(current[key], patch[key])) {
      return false;
    }
  }
  return true;
}

/**
 * Holds the latest stored copy of a policy so that later writes in the same
 * pass carry the resource version returned by earlier ones.
 */
export class StatusWriter {
  private current: BackupPolicy;
  private writes = 0;

  constructor(
    private readonly store: PolicyStore,
    policy: BackupPolicy,
  ) {
    this.current = policy;
  }

  get policy(): BackupPolicy {
    return this.current;
  }

  get status(): BackupPolicyStatus {
    return this.current.status;
  }

  get written(): boolean {
    return this.writes > 0;
  }

  /**
   * Merge `patch` into the status and persist it. A patch that changes nothing
   * is not written.
   */
  async write(patch: Partial<BackupPolicyStatus>, reason: string): Promise<BackupPolicy> {
    if (isUnchanged(this.current.status, patch)) {
      return this.current;
    }

    const next: BackupPolicy = {
      ...this.current,
      status: { ...this.current.status, ...patch },
    };

    this.current = await this.store.updateStatus(next);
    this.writes++;
    log.debug(`${policyKey(this.current)}: ${reason}`, patch);
    return this.current;
  }
}
