/**
 * Schema creation and migration tests
 */

import { describe, it, expect } from 'vitest';
import Database from 'better-sqlite3';
import { createDatabase, initializeSchema, SCHEMA_VERSION } from '../../../src/services/db/sqlite.js';

function columns(db: Database.Database, table: string): string[] {
  return (db.prepare(`PRAGMA table_info(${table})`).all() as { name: string }[]).map((c) => c.name);
}

function version(db: Database.Database): number | undefined {
  const row = db.prepare('SELECT MAX(version) AS version FROM schema_version').get() as
    | { version: number }
    | undefined;
  return row?.version;
}

describe('database schema', () => {
  it('creates the latest schema', () => {
    const db = createDatabase(':memory:');
    expect(version(db)).toBe(SCHEMA_VERSION);
    expect(columns(db, 'records')).toEqual(['id', 'project_id', 'start_ts', 'end_ts', 'note']);
    expect(columns(db, 'projects')).toEqual(['id', 'parent', 'name']);
    db.close();
  });

  it('enforces foreign keys', () => {
    const db = createDatabase(':memory:');
    expect(() => db.prepare('INSERT INTO records (project_id, start_ts) VALUES (?, ?)').run(99, 0)).toThrow();
    db.close();
  });

  it('keeps sibling names unique at the top level', () => {
    const db = createDatabase(':memory:');
    const insert = db.prepare('INSERT INTO projects (parent, name) VALUES (?, ?)');
    insert.run(null, 'Work');
    expect(() => insert.run(null, 'Work')).toThrow();
    db.close();
  });

  it('indexes records by start', () => {
    const db = createDatabase(':memory:');
    const names = (
      db.prepare("SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = 'records'").all() as {
        name: string;
      }[]
    ).map((row) => row.name);
    expect(names).toContain('idx_records_start');
    db.close();
  });

  it('leaves an up-to-date database alone', () => {
    const db = createDatabase(':memory:');
    db.prepare('INSERT INTO projects (parent, name) VALUES (?, ?)').run(null, 'Work');

    initializeSchema(db);

    expect(version(db)).toBe(1);
    expect(db.prepare('SELECT COUNT(*) AS count FROM schema_version').get()).toEqual({ count: 1 });
    expect(db.prepare('SELECT name FROM projects').all()).toEqual([{ name: 'Work' }]);
    db.close();
  });
});
