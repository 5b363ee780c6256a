/**
 * Time record storage
 *
 * Records are half-open [start, end) intervals in unix seconds. An open record
 * (end_ts NULL) extends to infinity for overlap checks, which keeps at most one
 * record open at a time.
 */

import Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';
import { TimeTreeError } from '../../utils/errors.js';
import { formatDateTime } from '../../utils/format.js';
import { fromUnix, toUnix } from '../time/calendar.js';
import { loadProjects, requireProject } from '../projects/store.js';
import type { Period, TimeRecord } from '../../types/index.js';

interface RecordRow {
  id: number;
  project_id: number;
  start_ts: number;
  end_ts: number | null;
  note: string | null;
}

export interface NewRecord {
  project: string;
  start: Date;
  end?: Date | null | undefined;
  note?: string | undefined;
  force?: boolean | undefined;
}

export interface StartRecordResult {
  record: TimeRecord;
  truncated: TimeRecord[];
}

export interface RecordChanges {
  project?: string | undefined;
  start?: Date | undefined;
  end?: Date | undefined;
}

const SELECT_RECORDS = 'SELECT id, project_id, start_ts, end_ts, note FROM records';

function projectPaths(db: Database.Database): Map<number, string> {
  return new Map(loadProjects(db).map((p) => [p.id, p.path]));
}

function toRecord(row: RecordRow, paths: Map<number, string>): TimeRecord {
  return {
    id: row.id,
    projectId: row.project_id,
    projectPath: paths.get(row.project_id) ?? `#${row.project_id}`,
    start: fromUnix(row.start_ts),
    end: row.end_ts === null ? null : fromUnix(row.end_ts),
    note: row.note,
  };
}

function toRecords(db: Database.Database, rows: RecordRow[]): TimeRecord[] {
  const paths = projectPaths(db);
  return rows.map((row) => toRecord(row, paths));
}

/**
 * One-line description used in conflict messages
 */
export function describeRecord(record: TimeRecord): string {
  const end = record.end ? formatDateTime(record.end) : 'in progress';
  return `#${record.id} ${record.projectPath} ${formatDateTime(record.start)} -> ${end}`;
}

/**
 * Length of a record in seconds; an open record runs until `now`
 */
export function recordDuration(record: TimeRecord, now: Date): number {
  const end = record.end ?? now;
  return Math.max(0, toUnix(end) - toUnix(record.start));
}

export function getRecord(db: Database.Database, id: number): TimeRecord | null {
  const row = db.prepare(`${SELECT_RECORDS} WHERE id = ?`).get(id) as RecordRow | undefined;
  return row ? toRecords(db, [row])[0] ?? null : null;
}

export function requireRecord(db: Database.Database, id: number): TimeRecord {
  const record = getRecord(db, id);
  if (!record) {
    throw new TimeTreeError(`Unknown record: ${id}`, 'NOT_FOUND');
  }
  return record;
}

/**
 * Records whose interval intersects [start, end); a null end means open-ended
 */
export function findOverlapping(
  db: Database.Database,
  start: Date,
  end: Date | null,
  excludeId?: number
): TimeRecord[] {
  const rows = db
    .prepare(
      `${SELECT_RECORDS}
       WHERE (end_ts IS NULL OR end_ts > ?)
         AND (? IS NULL OR start_ts < ?)
         AND id != ?
       ORDER BY start_ts`
    )
    .all(toUnix(start), end === null ? null : toUnix(end), end === null ? null : toUnix(end), excludeId ?? -1) as RecordRow[];
  return toRecords(db, rows);
}

// An invalid Date would be stored as NULL, turning a closed record into an open one
function assertValid(date: Date, field: 'start' | 'end'): void {
  if (Number.isNaN(date.getTime())) {
    throw new TimeTreeError(`Record ${field} is not a valid date`, 'INVALID');
  }
}

function assertOrdered(start: Date, end: Date | null): void {
  assertValid(start, 'start');
  if (end !== null) assertValid(end, 'end');
  if (end !== null && toUnix(end) <= toUnix(start)) {
    throw new TimeTreeError(
      `Record end (${formatDateTime(end)}) must be after its start (${formatDateTime(start)})`,
      'INVALID'
    );
  }
}

function conflictError(message: string, records: TimeRecord[]): TimeTreeError {
  return new TimeTreeError(
    `${message}:\n${records.map((r) => `  ${describeRecord(r)}`).join('\n')}`,
    'CONFLICT',
    { records: records.map((r) => r.id) }
  );
}

/**
 * Insert a record, open when it has no end
 *
 * With `force`, overlapping records that began earlier are cut off at the new
 * start; records beginning inside the new interval still conflict.
 */
export function startRecord(db: Database.Database, input: NewRecord): StartRecordResult {
  const project = requireProject(db, input.project);
  const end = input.end ?? null;
  assertOrdered(input.start, end);

  const overlapping = findOverlapping(db, input.start, end);
  const startTs = toUnix(input.start);

  if (overlapping.length > 0) {
    if (!input.force) {
      throw conflictError('Overlapping records (use force to end them at the new start)', overlapping);
    }
    const blocking = overlapping.filter((r) => toUnix(r.start) >= startTs);
    if (blocking.length > 0) {
      throw conflictError('Records start inside the new interval and cannot be cut off', blocking);
    }
  }

  const truncate = db.prepare('UPDATE records SET end_ts = ? WHERE id = ?');
  const insert = db.prepare('INSERT INTO records (project_id, start_ts, end_ts, note) VALUES (?, ?, ?, ?)');

  const id = db.transaction(() => {
    for (const record of overlapping) truncate.run(startTs, record.id);
    const info = insert.run(project.id, startTs, end === null ? null : toUnix(end), input.note ?? null);
    return Number(info.lastInsertRowid);
  })();

  if (overlapping.length > 0) {
    logger.info(`Ended ${overlapping.length} overlapping record(s) at ${formatDateTime(input.start)}`);
  }
  logger.info(`Inserted record ${id} for ${project.path}`);

  return {
    record: requireRecord(db, id),
    truncated: overlapping.map((r) => requireRecord(db, r.id)),
  };
}

/**
 * Close every record open at `at`
 */
export function stopRecords(db: Database.Database, at: Date): TimeRecord[] {
  const atTs = toUnix(at);
  const rows = db
    .prepare(`${SELECT_RECORDS} WHERE end_ts IS NULL AND start_ts < ? ORDER BY start_ts`)
    .all(atTs) as RecordRow[];

  if (rows.length === 0) {
    return [];
  }

  const close = db.prepare('UPDATE records SET end_ts = ? WHERE id = ?');
  db.transaction(() => {
    for (const row of rows) close.run(atTs, row.id);
  })();

  logger.info(`Closed ${rows.length} record(s) at ${formatDateTime(at)}`);
  return toRecords(
    db,
    rows.map((row) => ({ ...row, end_ts: atTs }))
  );
}

/**
 * The record in progress, if any
 */
export function currentRecord(db: Database.Database): TimeRecord | null {
  const row = db
    .prepare(`${SELECT_RECORDS} WHERE end_ts IS NULL ORDER BY start_ts DESC LIMIT 1`)
    .get() as RecordRow | undefined;
  return row ? toRecords(db, [row])[0] ?? null : null;
}

/**
 * Change the project, start or end of a record
 */
export function editRecord(db: Database.Database, id: number, changes: RecordChanges): TimeRecord {
  const record = requireRecord(db, id);

  if (changes.project === undefined && changes.start === undefined && changes.end === undefined) {
    throw new TimeTreeError('Nothing to change: give a project, a start or an end', 'INVALID');
  }

  const projectId = changes.project === undefined ? record.projectId : requireProject(db, changes.project).id;
  const start = changes.start ?? record.start;
  const end = changes.end ?? record.end;
  assertOrdered(start, end);

  const overlapping = findOverlapping(db, start, end, id);
  if (overlapping.length > 0) {
    throw conflictError(`Record ${id} would overlap`, overlapping);
  }

  db.prepare('UPDATE records SET project_id = ?, start_ts = ?, end_ts = ? WHERE id = ?').run(
    projectId,
    toUnix(start),
    end === null ? null : toUnix(end),
    id
  );
  logger.info(`Updated record ${id}`);

  return requireRecord(db, id);
}

/**
 * Delete records by id; nothing is deleted when any id is unknown
 */
export function deleteRecords(db: Database.Database, ids: number[]): TimeRecord[] {
  const unique = [...new Set(ids)];
  const records = unique.map((id) => getRecord(db, id));
  const missing = unique.filter((_, i) => records[i] === null);

  if (missing.length > 0) {
    throw new TimeTreeError(`Unknown record(s): ${missing.join(', ')}`, 'NOT_FOUND', { records: missing });
  }

  const remove = db.prepare('DELETE FROM records WHERE id = ?');
  db.transaction(() => {
    for (const id of unique) remove.run(id);
  })();

  logger.info(`Deleted record(s) ${unique.join(', ')}`);
  return records.filter((r): r is TimeRecord => r !== null);
}

/**
 * Records intersecting the period, oldest first
 */
export function listRecords(db: Database.Database, period: Period): TimeRecord[] {
  const rows = db
    .prepare(
      `${SELECT_RECORDS}
       WHERE start_ts < ? AND (end_ts IS NULL OR end_ts > ?)
       ORDER BY start_ts, id`
    )
    .all(toUnix(period.end), toUnix(period.start)) as RecordRow[];
  return toRecords(db, rows);
}

/**
 * Most recent records, newest first
 */
export function lastRecords(db: Database.Database, limit = 20): TimeRecord[] {
  const rows = db
    .prepare(`${SELECT_RECORDS} ORDER BY start_ts DESC, id DESC LIMIT ?`)
    .all(limit) as RecordRow[];
  return toRecords(db, rows);
}
