import type { Migration } from "../../types/database";

export const migration: Migration = {
  version: 1,
  name: "initial",
  description: "Initial database schema with policies and schema_version tables",
  up: `
CREATE TABLE policies (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    namespace TEXT NOT NULL,
    name TEXT NOT NULL,
    uid TEXT UNIQUE NOT NULL,
    generation INTEGER NOT NULL DEFAULT 1,
    resource_version INTEGER NOT NULL DEFAULT 1,
    spec TEXT NOT NULL,
    last_backup_status TEXT,
    last_successful_backup_at TEXT,
    next_scheduled_backup_at TEXT,
    failure_reason TEXT NOT NULL DEFAULT '',
    active_job_ref TEXT NOT NULL DEFAULT '',
    observed_generation INTEGER,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    UNIQUE (namespace, name)
);

CREATE INDEX idx_policies_active_job ON policies(active_job_ref) WHERE active_job_ref <> '';

CREATE TABLE schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT DEFAULT (datetime('now'))
);
`,
};
