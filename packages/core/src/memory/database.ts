// packages/core/src/memory/database.ts

import Database from 'better-sqlite3';
import { DatabaseError } from '../utils/errors.js';

export const SCHEMA_VERSION = '1';

const MIGRATIONS = [
  // Sessions
  `CREATE TABLE IF NOT EXISTS sessions (
    id              TEXT PRIMARY KEY,
    goal            TEXT NOT NULL,
    status          TEXT NOT NULL DEFAULT 'running'
                    CHECK(status IN ('running','success','stuck','lost','error')),
    step_budget     INTEGER NOT NULL CHECK(step_budget >= 1),
    checkpoints     TEXT NOT NULL DEFAULT '[]',
    browser         TEXT,
    terminal_reason TEXT,
    created_at      TEXT NOT NULL,
    updated_at      TEXT NOT NULL,
    finished_at     TEXT
  )`,
  'CREATE INDEX IF NOT EXISTS idx_sessions_status ON sessions(status)',
  'CREATE INDEX IF NOT EXISTS idx_sessions_created ON sessions(created_at DESC)',

  // Step records (append-only audit trail)
  `CREATE TABLE IF NOT EXISTS step_records (
    id                    INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id            TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
    step_number           INTEGER NOT NULL CHECK(step_number >= 1),
    thought               TEXT NOT NULL,
    instruction           TEXT NOT NULL,
    instruction_source    TEXT NOT NULL,
    action_summary        TEXT NOT NULL,
    decision_status       TEXT NOT NULL CHECK(decision_status IN ('CONTINUE','SUCCESS','LOST')),
    outcome               TEXT NOT NULL CHECK(outcome IN ('Pass','Fail')),
    failure_detail        TEXT,
    before_snapshot       TEXT,
    after_snapshot        TEXT,
    verification_achieved INTEGER CHECK(verification_achieved IS NULL OR verification_achieved IN (0, 1)),
    verification_reason   TEXT,
    created_at            TEXT NOT NULL
  )`,
  'CREATE UNIQUE INDEX IF NOT EXISTS idx_steps_unique ON step_records(session_id, step_number)',
  'CREATE INDEX IF NOT EXISTS idx_steps_outcome ON step_records(outcome)',
  `CREATE TRIGGER IF NOT EXISTS step_records_no_update BEFORE UPDATE ON step_records BEGIN
    SELECT RAISE(ABORT, 'step records are append-only');
  END`,

  // Post-mortems (one per session, write-once)
  `CREATE TABLE IF NOT EXISTS post_mortems (
    session_id          TEXT PRIMARY KEY REFERENCES sessions(id) ON DELETE CASCADE,
    original_goal       TEXT NOT NULL,
    optimized_prompt    TEXT NOT NULL,
    summary             TEXT,
    validation_achieved INTEGER CHECK(validation_achieved IS NULL OR validation_achieved IN (0, 1)),
    validation_reason   TEXT,
    created_at          TEXT NOT NULL
  )`,
  `CREATE TRIGGER IF NOT EXISTS post_mortems_no_update BEFORE UPDATE ON post_mortems BEGIN
    SELECT RAISE(ABORT, 'post-mortems are write-once');
  END`,

  // Schema meta
  `CREATE TABLE IF NOT EXISTS schema_meta (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  )`,
];

/**
 * Open a SQLite database and run migrations.
 * Pass ':memory:' for in-memory databases (testing).
 */
export function openDatabase(dbPath: string): Database.Database {
  try {
    const db = new Database(dbPath);
    configurePragmas(db);
    runMigrations(db);
    return db;
  } catch (err) {
    throw new DatabaseError(
      `Failed to open database at "${dbPath}": ${err instanceof Error ? err.message : String(err)}`,
      'open',
    );
  }
}

function configurePragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
}

/**
 * Run all schema migrations. Idempotent (uses IF NOT EXISTS).
 */
export function runMigrations(db: Database.Database): void {
  db.transaction(() => {
    for (const sql of MIGRATIONS) {
      db.exec(sql);
    }
    db.prepare("INSERT OR REPLACE INTO schema_meta(key, value) VALUES ('version', ?)").run(
      SCHEMA_VERSION,
    );
    db.prepare(
      "INSERT OR IGNORE INTO schema_meta(key, value) VALUES ('created_at', datetime('now'))",
    ).run();
  })();
}

/** Get the current schema version. */
export function getSchemaVersion(db: Database.Database): string | null {
  const row = db
    .prepare<[], { value: string }>("SELECT value FROM schema_meta WHERE key = 'version'")
    .get();
  return row?.value ?? null;
}
