/**
 * SQLite database connection
 *
 * One process-wide connection to the host taxonomy database.
 *
 * Two ways to open it:
 * - writable (migrations, seeding): creates the file and its directory, WAL journal
 * - read-only (prediction runs): the file must already exist and is never written
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, join } from "path";
import { DEFAULT_HOST_DB_PATH } from "@/constants";

let db: Database.Database | null = null;

export type OpenDbOptions = {
  /** Open an existing snapshot without writing to it (no WAL, no journal files) */
  readonly?: boolean;
};

/**
 * Host taxonomy database path from HOST_DB_PATH, else the default under cwd
 */
export function getDbPath(): string {
  return process.env.HOST_DB_PATH || join(process.cwd(), DEFAULT_HOST_DB_PATH);
}

/**
 * Open the connection, or return the one already open
 *
 * @param dbPath - Overrides HOST_DB_PATH / the default path
 * @throws {Error} In read-only mode, if the file does not exist
 */
export function openDb(
  dbPath: string = getDbPath(),
  options: OpenDbOptions = {},
): Database.Database {
  if (db) {
    return db;
  }

  if (options.readonly) {
    db = new Database(dbPath, { readonly: true, fileMustExist: true });
    return db;
  }

  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Current connection
 *
 * @throws {Error} If openDb() has not been called
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not opened. Call openDb() first.");
  }
  return db;
}

/**
 * Inject a connection into the singleton (tests only)
 *
 * @internal
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
