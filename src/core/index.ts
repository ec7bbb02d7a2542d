/**
 * Core module exports
 */

// Errors
export {
  InvalidScheduleError,
  isRetryable,
  JobCreationError,
  NotFoundError,
  TransientStoreError,
  UpdateConflictError,
} from "./errors";

// Reconcile
export * from "./reconcile";

// Scheduler
export * from "./scheduler";
