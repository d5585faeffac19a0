/**
 * Migration runner for the discovery database.
 *
 * Creates all tables and indexes if they do not already exist. Uses raw
 * SQL via better-sqlite3 so the migration is idempotent and can run
 * without drizzle-kit tooling at runtime.
 *
 * Usage:
 *   import { migrate } from './migrate.js'
 *   migrate(getSqlite())
 */
import type Database from "better-sqlite3";
import { getLogger } from "../shared/logger.js";

const log = getLogger("db", { component: "migrate" });

// ---------------------------------------------------------------------------
// DDL statements
// ---------------------------------------------------------------------------

const DDL_STATEMENTS: string[] = [
  // ── domains ───────────────────────────────────────────────────────────
  `CREATE TABLE IF NOT EXISTS domains (
    id                     TEXT PRIMARY KEY,
    name                   TEXT NOT NULL,
    status                 TEXT NOT NULL DEFAULT 'DISCOVERED' CHECK(status IN ('DISCOVERED','PROCESSING','PROCESSED_HIGH_QUALITY','PROCESSED_LOW_QUALITY','NO_FUNDS_THIS_YEAR','PROCESSING_FAILED','BLACKLISTED')),
    discovery_session_id   TEXT,
    discovered_at          TEXT NOT NULL,
    last_processed_at      TEXT,
    processing_count       INTEGER NOT NULL DEFAULT 0,
    best_confidence_score  REAL CHECK(best_confidence_score IS NULL OR (best_confidence_score >= 0 AND best_confidence_score <= 1)),
    high_quality_count     INTEGER NOT NULL DEFAULT 0,
    low_quality_count      INTEGER NOT NULL DEFAULT 0,
    blacklist_reason       TEXT,
    blacklisted_by         TEXT,
    blacklisted_at         TEXT,
    no_funds_year          INTEGER,
    no_funds_reason        TEXT,
    notes                  TEXT,
    failure_count          INTEGER NOT NULL DEFAULT 0,
    failure_reason         TEXT,
    retry_after            TEXT,
    created_at             TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    updated_at             TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  )`,

  // ── funding_candidates ────────────────────────────────────────────────
  `CREATE TABLE IF NOT EXISTS funding_candidates (
    id                TEXT PRIMARY KEY,
    session_id        TEXT NOT NULL,
    domain_id         TEXT NOT NULL REFERENCES domains(id) ON DELETE CASCADE,
    domain            TEXT NOT NULL,
    source_url        TEXT NOT NULL,
    title             TEXT,
    snippet           TEXT,
    confidence_score  REAL NOT NULL,
    status            TEXT NOT NULL DEFAULT 'pending_review' CHECK(status IN ('pending_review','approved','rejected')),
    created_at        TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  )`,
];

const INDEX_STATEMENTS: string[] = [
  // domains
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_domains_name ON domains(name)`,
  `CREATE INDEX IF NOT EXISTS idx_domains_status ON domains(status)`,
  `CREATE INDEX IF NOT EXISTS idx_domains_session ON domains(discovery_session_id)`,
  `CREATE INDEX IF NOT EXISTS idx_domains_retry_after ON domains(retry_after)`,

  // funding_candidates
  `CREATE INDEX IF NOT EXISTS idx_candidates_session ON funding_candidates(session_id)`,
  `CREATE INDEX IF NOT EXISTS idx_candidates_domain ON funding_candidates(domain_id)`,
  `CREATE INDEX IF NOT EXISTS idx_candidates_status ON funding_candidates(status)`,
];

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Run all migrations (idempotent). Creates tables and indexes if they
 * do not already exist.
 */
export function migrate(sqlite: Database.Database): void {
  sqlite.exec("BEGIN TRANSACTION");
  try {
    for (const ddl of DDL_STATEMENTS) {
      sqlite.exec(ddl);
    }
    for (const idx of INDEX_STATEMENTS) {
      sqlite.exec(idx);
    }
    sqlite.exec("COMMIT");
    log.debug(
      { tables: DDL_STATEMENTS.length, indexes: INDEX_STATEMENTS.length },
      "Migrations applied",
    );
  } catch (err) {
    sqlite.exec("ROLLBACK");
    log.error({ err }, "Migration failed, rolled back");
    throw err;
  }
}
