/**
 * BackupPolicy resource type definitions
 */

export const KNOWN_DATABASE_TYPES = ["postgres", "mysql", "mongodb"] as const;
export type KnownDatabaseType = (typeof KNOWN_DATABASE_TYPES)[number];

export const STORAGE_TYPES = ["s3", "gcs", "pvc"] as const;
export type StorageType = (typeof STORAGE_TYPES)[number];

export const BACKUP_PHASES = ["Pending", "Running", "Succeeded", "Failed", "Error"] as const;
export type BackupPhase = (typeof BACKUP_PHASES)[number];

export interface PolicyId {
  namespace: string;
  name: string;
}

export interface StorageDestination {
  type: StorageType;
  /** Bucket name (s3, gcs) */
  bucket?: string;
  /** Path within the bucket or volume */
  path?: string;
  /** Volume claim to mount (pvc) */
  pvcName?: string;
  /** Secret holding storage credentials */
  secretName?: string;
}

export interface DatabaseSelector {
  matchLabels: Record<string, string>;
}

export interface BackupPolicySpec {
  /** postgres, mysql, mongodb; anything else runs the generic image */
  databaseType: string;
  schedule: string;
  /** IANA timezone the schedule is evaluated in */
  timezone?: string;
  /** Hours to keep backups */
  backupRetention: number;
  storageDestination: StorageDestination;
  databaseSelector: DatabaseSelector;
  suspend?: boolean;
}

export interface BackupPolicyStatus {
  lastBackupStatus: BackupPhase | null;
  lastSuccessfulBackupAt: Date | null;
  nextScheduledBackupAt: Date | null;
  /** Empty when not applicable */
  failureReason: string;
  /** Empty when no job is in flight */
  activeJobRef: string;
  observedGeneration: number | null;
}

export interface BackupPolicy extends PolicyId {
  uid: string;
  /** Bumped whenever the spec changes */
  generation: number;
  /** Bumped on every write; stale versions are rejected */
  resourceVersion: number;
  createdAt: Date;
  spec: BackupPolicySpec;
  status: BackupPolicyStatus;
}

export interface PolicyManifest {
  apiVersion: string;
  kind: "BackupPolicy";
  metadata: PolicyId;
  spec: BackupPolicySpec;
}

export function isBackupPhase(value: unknown): value is BackupPhase {
  return typeof value === "string" && (BACKUP_PHASES as readonly string[]).includes(value);
}

export function isKnownDatabaseType(value: string): value is KnownDatabaseType {
  return (KNOWN_DATABASE_TYPES as readonly string[]).includes(value);
}

export function policyKey(id: PolicyId): string {
  return `${id.namespace}/${id.name}`;
}

export function emptyStatus(): BackupPolicyStatus {
  return {
    lastBackupStatus: null,
    lastSuccessfulBackupAt: null,
    nextScheduledBackupAt: null,
    failureReason: "",
    activeJobRef: "",
    observedGeneration: null,
  };
}
