/**
 * SQLite database schema and initialization utilities
 *
 * The connection itself is cached by manager.ts. This module provides schema
 * definitions, migrations and the connection factory.
 */

import Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';

// Schema version for migrations
export const SCHEMA_VERSION = 1;

// SQL statements for schema creation
export const SCHEMA_SQL = `
-- Project forest: one path segment per row
CREATE TABLE IF NOT EXISTS projects (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    parent INTEGER,
    name TEXT NOT NULL,
    FOREIGN KEY (parent) REFERENCES projects(id)
);

-- Tracked intervals, unix seconds; end_ts is NULL while open
CREATE TABLE IF NOT EXISTS records (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    project_id INTEGER NOT NULL,
    start_ts INTEGER NOT NULL,
    end_ts INTEGER,
    note TEXT,
    FOREIGN KEY (project_id) REFERENCES projects(id)
);

-- Schema version tracking
CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY
);

-- Sibling names are unique, top-level ones included
CREATE UNIQUE INDEX IF NOT EXISTS idx_projects_sibling_name
    ON projects(COALESCE(parent, 0), name);
CREATE INDEX IF NOT EXISTS idx_records_project ON records(project_id);
CREATE INDEX IF NOT EXISTS idx_records_start ON records(start_ts);
`;

/**
 * Initialize database schema
 */
export function initializeSchema(db: Database.Database): void {
  const hasVersionTable = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'")
    .get();

  let currentVersion = 0;
  if (hasVersionTable) {
    const row = db
      .prepare('SELECT version FROM schema_version ORDER BY version DESC LIMIT 1')
      .get() as { version: number } | undefined;
    currentVersion = row?.version ?? 0;
  }

  if (currentVersion < SCHEMA_VERSION) {
    logger.debug(`Migrating database from version ${currentVersion} to ${SCHEMA_VERSION}`);
    runMigrations(db, currentVersion);
  }
}

/**
 * Run database migrations
 */
function runMigrations(db: Database.Database, fromVersion: number): void {
  db.exec('BEGIN TRANSACTION');

  try {
    if (fromVersion < 1) {
      db.exec(SCHEMA_SQL);
      db.prepare('INSERT OR REPLACE INTO schema_version (version) VALUES (?)').run(1);
    }

    db.exec('COMMIT');
    logger.debug('Database migration completed');
  } catch (error) {
    db.exec('ROLLBACK');
    logger.error('Database migration failed', error);
    throw error;
  }
}

/**
 * Create and initialize a new database connection
 *
 * Pass ':memory:' for a throwaway database.
 */
export function createDatabase(dbPath: string): Database.Database {
  logger.info(`Opening database at: ${dbPath}`);

  const db = new Database(dbPath);
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  initializeSchema(db);

  return db;
}
