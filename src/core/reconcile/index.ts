export {
  buildJobSpec,
  CREDENTIALS_MOUNT_PATH,
  CREDENTIALS_VOLUME_NAME,
  type JobSpecOptions,
  LABEL_MANAGED_BY,
  LABEL_POLICY_NAME,
  LABEL_POLICY_NAMESPACE,
  LABEL_POLICY_UID,
  MANAGED_BY,
  ownerLabels,
  selectImage,
  STORAGE_MOUNT_PATH,
  STORAGE_VOLUME_NAME,
} from "./job-spec";
export {
  ACTIVE_JOB_POLL_MS,
  DEFAULT_REQUEUE_MS,
  INVALID_SCHEDULE_PREFIX,
  JOB_FAILED_REASON,
  jobMissingReason,
  MIN_REQUEUE_MS,
  type ReconcileResult,
  Reconciler,
  type ReconcilerOptions,
} from "./reconciler";
export { StatusWriter } from "./status-writer";
