import { existsSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { closeDatabase, getDatabase, initDatabase } from "../../src/db/connection";
import { getCurrentVersion, getLatestVersion } from "../../src/db/migrations";

describe("connection", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "backup-controller-connection-test-"));
    closeDatabase();
  });

  afterEach(async () => {
    closeDatabase();
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("initDatabase", () => {
    test("creates new database with all migrations applied", async () => {
      const db = await initDatabase(path.join(tempDir, "new.db"));

      expect(getCurrentVersion(db)).toBe(getLatestVersion());
    });

    test("creates parent directories if they don't exist", async () => {
      const dbPath = path.join(tempDir, "nested", "path", "db.sqlite");

      await initDatabase(dbPath);

      expect(existsSync(dbPath)).toBe(true);
    });

    test("opens an in-memory database", async () => {
      const db = await initDatabase(":memory:");

      expect(getCurrentVersion(db)).toBe(getLatestVersion());
      expect(existsSync(":memory:")).toBe(false);
    });

    test("returns existing connection on subsequent calls", async () => {
      const dbPath = path.join(tempDir, "singleton.db");

      const db1 = await initDatabase(dbPath);
      const db2 = await initDatabase(dbPath);

      expect(db1).toBe(db2);
      expect(getDatabase()).toBe(db1);
    });

    test("preserves data across reopen", async () => {
      const dbPath = path.join(tempDir, "preserve.db");
      const db1 = await initDatabase(dbPath);
      db1
        .prepare(
          "INSERT INTO policies (namespace, name, uid, spec, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?)",
        )
        .run("default", "nightly", "uid-1", "{}", "2026-10-19T00:00:00.000Z", "2026-10-19T00:00:00.000Z");
      closeDatabase();

      const db2 = await initDatabase(dbPath);
      const row = db2
        .prepare<[string], { uid: string }>("SELECT uid FROM policies WHERE name = ?")
        .get("nightly");

      expect(row).toEqual({ uid: "uid-1" });
    });
  });

  describe("migration backup and rollback", () => {
    test("does not create backup for new databases", async () => {
      const dbPath = path.join(tempDir, "fresh.db");

      await initDatabase(dbPath);

      expect(existsSync(`${dbPath}.migration-backup`)).toBe(false);
    });

    test("does not create backup when no pending migrations", async () => {
      const dbPath = path.join(tempDir, "uptodate.db");
      await initDatabase(dbPath);
      closeDatabase();

      await initDatabase(dbPath);

      expect(existsSync(`${dbPath}.migration-backup`)).toBe(false);
    });

    test("migrates an existing unversioned database", async () => {
      const dbPath = path.join(tempDir, "unversioned.db");
      new Database(dbPath).close();

      const db = await initDatabase(dbPath);

      expect(getCurrentVersion(db)).toBe(getLatestVersion());
      expect(existsSync(`${dbPath}.migration-backup`)).toBe(false);
    });

    test("restores the original file when a migration fails", async () => {
      const dbPath = path.join(tempDir, "conflict.db");
      const legacy = new Database(dbPath);
      legacy.exec("CREATE TABLE policies (legacy TEXT)");
      legacy.prepare("INSERT INTO policies (legacy) VALUES (?)").run("kept");
      legacy.close();

      await expect(initDatabase(dbPath)).rejects.toThrow(
        "Database migration failed and was rolled back: table policies already exists",
      );
      expect(existsSync(`${dbPath}.migration-backup`)).toBe(false);
      expect(() => getDatabase()).toThrow("Database not initialized");

      const restored = new Database(dbPath);
      const rows = restored.prepare<[], { legacy: string }>("SELECT legacy FROM policies").all();
      restored.close();
      expect(rows).toEqual([{ legacy: "kept" }]);
    });
  });

  describe("closeDatabase", () => {
    test("allows reopening after close", async () => {
      const dbPath = path.join(tempDir, "close.db");
      const first = await initDatabase(dbPath);
      closeDatabase();

      const second = await initDatabase(dbPath);

      expect(second).not.toBe(first);
      expect(first.open).toBe(false);
    });

    test("is safe to call multiple times", () => {
      expect(() => {
        closeDatabase();
        closeDatabase();
      }).not.toThrow();
    });
  });
});
