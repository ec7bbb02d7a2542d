/**
 * Database connection management
 */

import { existsSync } from "node:fs";
import { copyFile, mkdir, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { IN_MEMORY_DATABASE } from "../config/resolver";
import { createLogger } from "../utils/logger";
import {
  getAllMigrations,
  getCurrentVersion,
  getPendingMigrations,
  initializeDatabase,
} from "./migrations";

const log = createLogger("db");

let db: Database.Database | null = null;

async function removeBackup(backupPath: string): Promise<void> {
  try {
    await unlink(backupPath);
  } catch (err) {
    log.warn(`Could not remove migration backup ${backupPath}: ${(err as Error).message}`);
  }
}

export async function initDatabase(dbPath: string): Promise<Database.Database> {
  if (db) {
    return db;
  }

  if (dbPath === IN_MEMORY_DATABASE) {
    db = new Database(dbPath);
    initializeDatabase(db);
    return db;
  }

  // Ensure parent directory exists
  await mkdir(dirname(dbPath), { recursive: true });

  if (existsSync(dbPath)) {
    // Open temporarily to check migration status
    const tempDb = new Database(dbPath);
    const currentVersion = getCurrentVersion(tempDb);
    const pending = getPendingMigrations(currentVersion);
    tempDb.close();

    if (pending.length > 0) {
      // Backup before migrations
      const backupPath = `${dbPath}.migration-backup`;
      log.info(`Pending migrations detected (${pending.length}), creating backup...`);
      await copyFile(dbPath, backupPath);

      try {
        db = new Database(dbPath);
        initializeDatabase(db);
        log.info(
          `Migrations completed successfully (v${currentVersion} -> v${getAllMigrations().slice(-1)[0]?.version})`,
        );

        await removeBackup(backupPath);
      } catch (err) {
        log.error(`Migration failed: ${(err as Error).message}`);
        log.info("Rolling back database from backup...");

        if (db) {
          db.close();
          db = null;
        }

        await copyFile(backupPath, dbPath);
        await removeBackup(backupPath);

        throw new Error(`Database migration failed and was rolled back: ${(err as Error).message}`, {
          cause: err,
        });
      }

      return db;
    }
  }

  // No pending migrations or new database
  db = new Database(dbPath);
  initializeDatabase(db);

  return db;
}

export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error("Database not initialized. Call initDatabase() first.");
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
