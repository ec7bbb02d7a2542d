/**
 * Configuration type definitions for backup-controller
 */

import type { KnownDatabaseType } from "./policy";

export interface DatabaseConfig {
  path: string;
}

export interface BackoffConfig {
  /** Seconds before the first retry of a failed pass */
  base: number;
  /** Upper bound in seconds */
  max: number;
}

/**
 * Controller timing settings, all durations in seconds
 */
export interface ControllerSettings {
  /** How often the store is polled for new or edited policies */
  watchInterval: number;
  /** Requeue delay when no next run is known */
  defaultRequeue: number;
  /** Smallest requeue delay, used when a run is already due */
  minRequeue: number;
  /** Longest wait between passes while a job is running */
  activeJobPoll: number;
  maxConcurrentReconciles: number;
  backoff: BackoffConfig;
  /** Default IANA timezone for schedules that don't set one */
  timezone?: string;
}

export type ImageMap = Record<KnownDatabaseType | "default", string>;

export interface JobsConfig {
  images: ImageMap;
  /** Extra labels put on every job */
  labels?: Record<string, string>;
  /** Docker network jobs are attached to */
  network?: string;
}

export interface ControllerConfig {
  version: string;
  database: DatabaseConfig;
  controller: ControllerSettings;
  jobs: JobsConfig;
}
