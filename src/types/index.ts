/**
 * Centralized type exports for backup-controller
 */

// Config types
export type {
  BackoffConfig,
  ControllerConfig,
  ControllerSettings,
  DatabaseConfig,
  ImageMap,
  JobsConfig,
} from "./config";
// Database types
export type { Migration, PolicyRow } from "./database";
// Job types
export type {
  CompletionState,
  EnvVar,
  Job,
  JobCollector,
  JobRunner,
  JobSpec,
  JobVolume,
  OwnerReference,
  VolumeSource,
} from "./job";
// Policy types
export type {
  BackupPhase,
  BackupPolicy,
  BackupPolicySpec,
  BackupPolicyStatus,
  DatabaseSelector,
  KnownDatabaseType,
  PolicyId,
  PolicyManifest,
  StorageDestination,
  StorageType,
} from "./policy";
export {
  BACKUP_PHASES,
  emptyStatus,
  isBackupPhase,
  isKnownDatabaseType,
  KNOWN_DATABASE_TYPES,
  policyKey,
  STORAGE_TYPES,
} from "./policy";
// Store types
export type {
  ApplyAction,
  ApplyResult,
  PolicyLister,
  PolicyRepository,
  PolicyStore,
} from "./store";
