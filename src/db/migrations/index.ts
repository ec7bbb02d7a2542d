import type { Database } from "better-sqlite3";
import type { Migration } from "../../types/database";

import { migration as m0001 } from "./0001_initial";

const migrations: Migration[] = [m0001];

export function getAllMigrations(): Migration[] {
  return [...migrations].sort((a, b) => a.version - b.version);
}

export function getLatestVersion(): number {
  const all = getAllMigrations();
  const lastMigration = all[all.length - 1];
  return lastMigration ? lastMigration.version : 0;
}

function hasVersionTable(database: Database): boolean {
  const row = database
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'",
    )
    .get();
  return row !== undefined;
}

export function getCurrentVersion(database: Database): number {
  if (!hasVersionTable(database)) {
    return 0;
  }
  const row = database
    .prepare<[], { version: number | null }>("SELECT MAX(version) as version FROM schema_version")
    .get();
  return row?.version ?? 0;
}

export function getPendingMigrations(currentVersion: number): Migration[] {
  return getAllMigrations().filter((m) => m.version > currentVersion);
}

function applyMigration(database: Database, migration: Migration): void {
  const apply = database.transaction(() => {
    database.exec(migration.up);
    database.prepare("INSERT INTO schema_version (version) VALUES (?)").run(migration.version);
  });
  apply();
}

export function runMigrations(database: Database): void {
  const pending = getPendingMigrations(getCurrentVersion(database));

  for (const migration of pending) {
    applyMigration(database, migration);
  }
}

export function initializeDatabase(database: Database): void {
  database.pragma("journal_mode = WAL");
  database.pragma("foreign_keys = ON");
  database.pragma("busy_timeout = 5000");

  runMigrations(database);
}
