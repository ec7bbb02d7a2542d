/**
 * Database record type definitions
 */

export interface PolicyRow {
  id: number;
  namespace: string;
  name: string;
  uid: string;
  generation: number;
  resource_version: number;
  spec: string;
  last_backup_status: string | null;
  last_successful_backup_at: string | null;
  next_scheduled_backup_at: string | null;
  failure_reason: string;
  active_job_ref: string;
  observed_generation: number | null;
  created_at: string;
  updated_at: string;
}

export interface Migration {
  version: number;
  name: string;
  description: string;
  up: string;
}
