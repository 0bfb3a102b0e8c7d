/**
 * Test Database Harness
 *
 * Creates a fresh temporary host taxonomy database per test.
 * Runs the real migrations, injects the handle into the db singleton,
 * handles cleanup.
 *
 * Usage:
 *   const harness = createTestDb();
 *   upsertTaxonNodes([...]);
 *   harness.cleanup();
 */

import Database from "better-sqlite3";
import { mkdirSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { applyPendingMigrations, setDbForTesting } from "@/db";

export interface TestDbHarness {
  /** The SQLite database connection */
  db: Database.Database;
  /** Path to the temp database file */
  dbPath: string;
  /** Clean up: release the singleton, close connection, delete temp file */
  cleanup: () => void;
}

/**
 * Generate a unique temp file path for a test database
 */
export function generateTempDbPath(): string {
  const random = Math.random().toString(36).substring(2, 8);
  const tempDir = join(tmpdir(), "symbiont-predictor-tests");
  mkdirSync(tempDir, { recursive: true });
  return join(tempDir, `test-${Date.now()}-${random}.db`);
}

/**
 * Create a migrated database file without touching the singleton.
 * The caller owns the returned connection.
 */
export function createMigratedDb(dbPath: string): Database.Database {
  const db = new Database(dbPath);
  applyPendingMigrations(db);
  return db;
}

/**
 * Create a fresh test database with all migrations applied.
 *
 * IMPORTANT: Always call cleanup() after the test completes.
 *
 * The harness injects the test DB into the production singleton,
 * so repos work transparently with the test database.
 */
export function createTestDb(): TestDbHarness {
  const dbPath = generateTempDbPath();
  const db = createMigratedDb(dbPath);

  setDbForTesting(db);

  const cleanup = () => {
    setDbForTesting(null);
    if (db.open) {
      db.close();
    }
    rmSync(dbPath, { force: true });
    rmSync(dbPath + "-wal", { force: true });
    rmSync(dbPath + "-shm", { force: true });
  };

  return { db, dbPath, cleanup };
}
