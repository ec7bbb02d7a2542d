/**
 * Error taxonomy shared by the store, the execution platform and the reconciler
 */

import { type PolicyId, policyKey } from "../types";

/**
 * A policy or job vanished. Expected after deletion.
 */
export class NotFoundError extends Error {
  constructor(
    public readonly resource: string,
    public readonly id: PolicyId,
  ) {
    super(`${resource} ${policyKey(id)} not found`);
    this.name = "NotFoundError";
  }
}

/**
 * The store could not serve the request right now; retry the pass.
 */
export class TransientStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientStoreError";
  }
}

/**
 * A write was based on a stale resource version.
 */
export class UpdateConflictError extends Error {
  constructor(
    public readonly id: PolicyId,
    public readonly expectedVersion: number,
  ) {
    super(
      `Conflict updating ${policyKey(id)}: resource version ${expectedVersion} is no longer current`,
    );
    this.name = "UpdateConflictError";
  }
}

export class InvalidScheduleError extends Error {
  constructor(
    public readonly expression: string,
    message: string,
  ) {
    super(message);
    this.name = "InvalidScheduleError";
  }
}

export class JobCreationError extends Error {
  constructor(
    public readonly jobName: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to create backup job ${jobName}: ${reason}`, { cause });
    this.name = "JobCreationError";
  }
}

/**
 * Errors that are retried by re-running the whole pass
 */
export function isRetryable(error: unknown): boolean {
  return (
    error instanceof TransientStoreError ||
    error instanceof UpdateConflictError ||
    error instanceof JobCreationError
  );
}
