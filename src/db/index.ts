import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { resolve } from "node:path";
import { mkdirSync, existsSync } from "node:fs";
import * as schema from "./schema.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

const DEFAULT_DB_PATH = process.env["DATABASE_PATH"] ?? "./data/funding-discovery.db";
const BUSY_TIMEOUT_MS = 5_000;
const IN_MEMORY = ":memory:";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DbConnection {
  db: AppDatabase;
  sqlite: Database.Database;
}

/**
 * Opens a new connection. `":memory:"` gives a private database, which is
 * what the tests use; any other path is created on demand.
 *
 * Configuration:
 * - WAL journal mode for concurrent read performance
 * - busy_timeout to avoid SQLITE_BUSY under contention
 * - foreign_keys enforcement enabled
 */
export function createDb(dbPath: string = DEFAULT_DB_PATH): DbConnection {
  let sqlite: Database.Database;

  if (dbPath === IN_MEMORY) {
    sqlite = new Database(IN_MEMORY);
  } else {
    const fullPath = resolve(dbPath);
    const dir = resolve(fullPath, "..");
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    sqlite = new Database(fullPath);
    sqlite.pragma("journal_mode = WAL");
  }

  sqlite.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
  sqlite.pragma("foreign_keys = ON");
  sqlite.pragma("synchronous = NORMAL");

  return { db: drizzle(sqlite, { schema }), sqlite };
}

// ---------------------------------------------------------------------------
// Singleton
// ---------------------------------------------------------------------------

let _connection: DbConnection | undefined;

/**
 * Returns the process-wide connection, opening it on first call.
 */
export function getConnection(dbPath?: string): DbConnection {
  _connection ??= createDb(dbPath);
  return _connection;
}

/**
 * Closes the database connection and resets the singleton.
 * Safe to call multiple times.
 */
export function closeDb(): void {
  if (_connection) {
    _connection.sqlite.close();
    _connection = undefined;
  }
}

// Re-export schema for convenience
export { schema };
