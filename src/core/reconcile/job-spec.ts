/**
 * Backup job specification builder
 */

import { DEFAULT_IMAGES } from "../../config/defaults";
import type { BackupPolicy, EnvVar, ImageMap, JobSpec, JobVolume } from "../../types";
import { isKnownDatabaseType } from "../../types";
import { generateJobName } from "../../utils/naming";

export const MANAGED_BY = "backup-controller";

export const LABEL_MANAGED_BY = "app.kubernetes.io/managed-by";
export const LABEL_POLICY_NAME = "backup-controller/policy-name";
export const LABEL_POLICY_NAMESPACE = "backup-controller/policy-namespace";
export const LABEL_POLICY_UID = "backup-controller/policy-uid";

export const STORAGE_VOLUME_NAME = "backup-storage";
export const STORAGE_MOUNT_PATH = "/backups";
export const CREDENTIALS_VOLUME_NAME = "storage-credentials";
export const CREDENTIALS_MOUNT_PATH = "/credentials";

export interface JobSpecOptions {
  images?: ImageMap;
  /** Extra labels, never overriding the ownership labels */
  labels?: Record<string, string>;
  now?: Date;
  /** Random suffix source for the job name */
  shortId?: () => string;
}

export function selectImage(databaseType: string, images: ImageMap = DEFAULT_IMAGES): string {
  return isKnownDatabaseType(databaseType) ? images[databaseType] : images.default;
}

function formatSelector(matchLabels: Record<string, string>): string {
  return Object.keys(matchLabels)
    .sort()
    .map((key) => `${key}=${matchLabels[key]}`)
    .join(",");
}

function buildEnv(policy: BackupPolicy): EnvVar[] {
  const { spec } = policy;
  const destination = spec.storageDestination;

  return [
    { name: "DB_TYPE", value: spec.databaseType },
    { name: "STORAGE_TYPE", value: destination.type },
    { name: "BUCKET", value: destination.bucket ?? "" },
    { name: "BACKUP_PATH", value: destination.path ?? "" },
    { name: "RETENTION_HOURS", value: String(spec.backupRetention) },
    { name: "DB_SELECTOR", value: formatSelector(spec.databaseSelector.matchLabels) },
    { name: "POLICY_NAME", value: policy.name },
    { name: "POLICY_NAMESPACE", value: policy.namespace },
  ];
}

function buildVolumes(policy: BackupPolicy): JobVolume[] {
  const destination = policy.spec.storageDestination;
  const volumes: JobVolume[] = [];

  if (destination.type === "pvc" && destination.pvcName) {
    volumes.push({
      name: STORAGE_VOLUME_NAME,
      source: { kind: "volume", claimName: destination.pvcName },
      mountPath: STORAGE_MOUNT_PATH,
      readOnly: false,
    });
  }

  if (destination.secretName) {
    volumes.push({
      name: CREDENTIALS_VOLUME_NAME,
      source: { kind: "secret", secretName: destination.secretName },
      mountPath: CREDENTIALS_MOUNT_PATH,
      readOnly: true,
    });
  }

  return volumes;
}

export function ownerLabels(policy: BackupPolicy): Record<string, string> {
  return {
    [LABEL_MANAGED_BY]: MANAGED_BY,
    [LABEL_POLICY_NAME]: policy.name,
    [LABEL_POLICY_NAMESPACE]: policy.namespace,
    [LABEL_POLICY_UID]: policy.uid,
  };
}

/**
 * Build the workload that performs one backup run of a policy
 */
export function buildJobSpec(policy: BackupPolicy, options: JobSpecOptions = {}): JobSpec {
  const now = options.now ?? new Date();
  const name = options.shortId
    ? generateJobName(policy.name, now, options.shortId())
    : generateJobName(policy.name, now);

  return {
    name,
    namespace: policy.namespace,
    image: selectImage(policy.spec.databaseType, options.images),
    env: buildEnv(policy),
    volumes: buildVolumes(policy),
    labels: { ...options.labels, ...ownerLabels(policy) },
    owner: {
      kind: "BackupPolicy",
      namespace: policy.namespace,
      name: policy.name,
      uid: policy.uid,
    },
  };
}
