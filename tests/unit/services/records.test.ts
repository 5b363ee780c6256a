/**
 * Record store tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { addProject } from '../../../src/services/projects/store.js';
import {
  currentRecord,
  deleteRecords,
  describeRecord,
  editRecord,
  getRecord,
  lastRecords,
  listRecords,
  recordDuration,
  startRecord,
  stopRecords,
} from '../../../src/services/records/store.js';
import { march, memoryDb, thrownCode } from '../../helpers.js';

describe('record store', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = memoryDb();
    addProject(db, 'Work.Coding');
    addProject(db, 'Work.Meetings');
    addProject(db, 'Home');
  });

  afterEach(() => {
    db.close();
  });

  describe('startRecord', () => {
    it('opens a record without an end', () => {
      const { record, truncated } = startRecord(db, { project: 'Work.Coding', start: march(13, 9) });
      expect(record.end).toBeNull();
      expect(record.projectPath).toBe('Work.Coding');
      expect(truncated).toEqual([]);
      expect(currentRecord(db)?.id).toBe(record.id);
    });

    it('stores a closed record with its note', () => {
      const { record } = startRecord(db, {
        project: 'Home',
        start: march(13, 9),
        end: march(13, 10),
        note: 'groceries',
      });
      expect(record.end).toEqual(march(13, 10));
      expect(record.note).toBe('groceries');
      expect(currentRecord(db)).toBeNull();
    });

    it('drops fractions of a second', () => {
      const { record } = startRecord(db, { project: 'Home', start: new Date(march(13, 9).getTime() + 750) });
      expect(record.start).toEqual(march(13, 9));
    });

    it('rejects an end before the start', () => {
      expect(thrownCode(() => startRecord(db, { project: 'Home', start: march(13, 10), end: march(13, 9) }))).toBe(
        'INVALID'
      );
      expect(thrownCode(() => startRecord(db, { project: 'Home', start: march(13, 10), end: march(13, 10) }))).toBe(
        'INVALID'
      );
    });

    it('refuses an invalid end instead of storing an open record', () => {
      const end = new Date(Number.NaN);
      expect(thrownCode(() => startRecord(db, { project: 'Home', start: march(13, 9), end }))).toBe('INVALID');
      expect(currentRecord(db)).toBeNull();
      expect(lastRecords(db)).toEqual([]);
    });

    it('rejects unknown projects', () => {
      expect(thrownCode(() => startRecord(db, { project: 'Garden', start: march(13, 9) }))).toBe('NOT_FOUND');
    });

    it('lists overlapping records in the conflict', () => {
      startRecord(db, { project: 'Work.Coding', start: march(13, 9), end: march(13, 10) });
      expect(() =>
        startRecord(db, { project: 'Home', start: march(13, 9, 30), end: march(13, 11) })
      ).toThrow('#1 Work.Coding 2024-03-13 09:00 -> 2024-03-13 10:00');
    });

    it('allows adjacent records', () => {
      startRecord(db, { project: 'Work.Coding', start: march(13, 9), end: march(13, 10) });
      const { record } = startRecord(db, { project: 'Home', start: march(13, 10), end: march(13, 11) });
      expect(record.id).toBe(2);
    });

    it('treats an open record as running forever', () => {
      startRecord(db, { project: 'Work.Coding', start: march(13, 9) });
      expect(thrownCode(() => startRecord(db, { project: 'Home', start: march(14, 9) }))).toBe('CONFLICT');
    });

    it('truncates earlier records with force', () => {
      const first = startRecord(db, { project: 'Work.Coding', start: march(13, 9) }).record;
      const { record, truncated } = startRecord(db, { project: 'Home', start: march(13, 11), force: true });

      expect(truncated).toHaveLength(1);
      expect(truncated[0]?.id).toBe(first.id);
      expect(truncated[0]?.end).toEqual(march(13, 11));
      expect(getRecord(db, first.id)?.end).toEqual(march(13, 11));
      expect(currentRecord(db)?.id).toBe(record.id);
    });

    it('cannot truncate records starting at or after the new start', () => {
      startRecord(db, { project: 'Work.Coding', start: march(13, 10), end: march(13, 11) });
      expect(thrownCode(() => startRecord(db, { project: 'Home', start: march(13, 9), force: true }))).toBe(
        'CONFLICT'
      );
      expect(currentRecord(db)).toBeNull();
    });
  });

  describe('stopRecords', () => {
    it('closes the open record', () => {
      startRecord(db, { project: 'Work.Coding', start: march(13, 9) });
      const closed = stopRecords(db, march(13, 12));
      expect(closed).toHaveLength(1);
      expect(closed[0]?.end).toEqual(march(13, 12));
      expect(currentRecord(db)).toBeNull();
    });

    it('leaves records starting after the stop time open', () => {
      startRecord(db, { project: 'Work.Coding', start: march(13, 13) });
      expect(stopRecords(db, march(13, 12))).toEqual([]);
      expect(currentRecord(db)?.start).toEqual(march(13, 13));
    });

    it('returns nothing when no record is open', () => {
      expect(stopRecords(db, march(13, 12))).toEqual([]);
    });
  });

  describe('editRecord', () => {
    beforeEach(() => {
      startRecord(db, { project: 'Work.Coding', start: march(13, 9), end: march(13, 10) });
      startRecord(db, { project: 'Home', start: march(13, 11) });
    });

    it('moves a record to another project', () => {
      expect(editRecord(db, 1, { project: 'Work.Meetings' }).projectPath).toBe('Work.Meetings');
    });

    it('closes an open record', () => {
      expect(editRecord(db, 2, { end: march(13, 12) }).end).toEqual(march(13, 12));
    });

    it('ignores the record itself when checking overlaps', () => {
      const edited = editRecord(db, 1, { start: march(13, 8, 30), end: march(13, 10, 30) });
      expect(edited.start).toEqual(march(13, 8, 30));
    });

    it('rejects overlaps with other records', () => {
      expect(thrownCode(() => editRecord(db, 1, { end: march(13, 11, 30) }))).toBe('CONFLICT');
    });

    it('rejects a start after the end', () => {
      expect(thrownCode(() => editRecord(db, 1, { start: march(13, 10, 30) }))).toBe('INVALID');
    });

    it('rejects empty edits and unknown ids', () => {
      expect(thrownCode(() => editRecord(db, 1, {}))).toBe('INVALID');
      expect(thrownCode(() => editRecord(db, 42, { project: 'Home' }))).toBe('NOT_FOUND');
    });
  });

  describe('deleteRecords', () => {
    beforeEach(() => {
      startRecord(db, { project: 'Work.Coding', start: march(13, 9), end: march(13, 10) });
      startRecord(db, { project: 'Home', start: march(13, 11), end: march(13, 12) });
    });

    it('deletes by id', () => {
      expect(deleteRecords(db, [2, 1]).map((r) => r.id)).toEqual([2, 1]);
      expect(lastRecords(db)).toEqual([]);
    });

    it('deletes nothing when an id is unknown', () => {
      expect(thrownCode(() => deleteRecords(db, [1, 99]))).toBe('NOT_FOUND');
      expect(getRecord(db, 1)).not.toBeNull();
    });
  });

  describe('queries', () => {
    beforeEach(() => {
      startRecord(db, { project: 'Work.Coding', start: march(13, 8), end: march(13, 9) });
      startRecord(db, { project: 'Work.Meetings', start: march(13, 9, 30), end: march(13, 10, 30) });
      startRecord(db, { project: 'Home', start: march(13, 11), end: march(13, 13) });
      startRecord(db, { project: 'Work.Coding', start: march(13, 14) });
    });

    it('lists records intersecting a period', () => {
      expect(listRecords(db, { start: march(13, 10), end: march(13, 12) }).map((r) => r.id)).toEqual([2, 3]);
      expect(listRecords(db, { start: march(13, 12), end: march(13, 15) }).map((r) => r.id)).toEqual([3, 4]);
      expect(listRecords(db, { start: march(13, 9), end: march(13, 9, 30) })).toEqual([]);
    });

    it('lists the latest records first', () => {
      expect(lastRecords(db, 2).map((r) => r.id)).toEqual([4, 3]);
    });

    it('measures open records up to now', () => {
      const open = currentRecord(db);
      expect(open && recordDuration(open, march(13, 15, 30))).toBe(5400);
    });

    it('describes records on one line', () => {
      const open = currentRecord(db);
      expect(open && describeRecord(open)).toBe('#4 Work.Coding 2024-03-13 14:00 -> in progress');
    });
  });
});
