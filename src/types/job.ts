/**
 * Backup job and execution platform definitions
 */

import type { PolicyId } from "./policy";

export type CompletionState = "Running" | "Succeeded" | "Failed";

export interface OwnerReference extends PolicyId {
  kind: "BackupPolicy";
  uid: string;
}

export type VolumeSource =
  | { kind: "volume"; claimName: string }
  | { kind: "secret"; secretName: string };

export interface JobVolume {
  name: string;
  source: VolumeSource;
  mountPath: string;
  readOnly: boolean;
}

export interface EnvVar {
  name: string;
  value: string;
}

export interface JobSpec {
  name: string;
  namespace: string;
  image: string;
  env: EnvVar[];
  volumes: JobVolume[];
  labels: Record<string, string>;
  owner: OwnerReference;
}

export interface Job {
  name: string;
  namespace: string;
  image: string;
  owner: OwnerReference | null;
  completionState: CompletionState;
  startedAt: Date | null;
  finishedAt: Date | null;
  exitCode: number | null;
}

export interface JobRunner {
  /**
   * Look up a job; null when the platform has no such job
   */
  getJob(namespace: string, name: string): Promise<Job | null>;

  /**
   * Submit a job; rejects when the platform refuses it
   */
  createJob(spec: JobSpec): Promise<Job>;
}

/**
 * Reclaims jobs whose owning policy is gone
 */
export interface JobCollector {
  listOwnedJobs(owner: Pick<OwnerReference, "uid">): Promise<string[]>;
  deleteOwnedJobs(owner: Pick<OwnerReference, "uid">): Promise<string[]>;
}
