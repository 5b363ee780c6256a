/**
 * Project hierarchy store tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import {
  addProject,
  compareNatural,
  findProject,
  getDescendantIds,
  getProjectTree,
  loadProjects,
  moveProject,
  removeProject,
  renameProject,
  splitProjectPath,
} from '../../../src/services/projects/store.js';
import { startRecord } from '../../../src/services/records/store.js';
import { TimeTreeError } from '../../../src/utils/errors.js';
import { march, memoryDb, thrownCode } from '../../helpers.js';

function paths(db: Database.Database): string[] {
  return loadProjects(db).map((p) => p.path);
}

describe('project store', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = memoryDb();
  });

  afterEach(() => {
    db.close();
  });

  describe('paths', () => {
    it('splits dotted paths', () => {
      expect(splitProjectPath('Client.Website.Backend')).toEqual(['Client', 'Website', 'Backend']);
    });

    it('rejects empty segments and whitespace', () => {
      expect(thrownCode(() => splitProjectPath('Client..Web'))).toBe('INVALID');
      expect(thrownCode(() => splitProjectPath('Has Space'))).toBe('INVALID');
      expect(thrownCode(() => splitProjectPath(''))).toBe('INVALID');
      expect(thrownCode(() => splitProjectPath('.Client'))).toBe('INVALID');
    });

    it('orders names naturally', () => {
      const names = ['Task10', 'Task2', 'task1'];
      expect([...names].sort(compareNatural)).toEqual(['task1', 'Task2', 'Task10']);
    });
  });

  describe('addProject', () => {
    it('creates missing ancestors', () => {
      const { project, created } = addProject(db, 'Client.Website.Backend');
      expect(created).toEqual(['Client', 'Client.Website', 'Client.Website.Backend']);
      expect(project.name).toBe('Backend');
      expect(project.path).toBe('Client.Website.Backend');
    });

    it('only creates what is missing', () => {
      addProject(db, 'Client.Website');
      expect(addProject(db, 'Client.Mobile').created).toEqual(['Client.Mobile']);
    });

    it('refuses an existing path', () => {
      addProject(db, 'Client.Website.Backend');
      expect(thrownCode(() => addProject(db, 'Client.Website'))).toBe('CONFLICT');
    });

    it('allows the same name under different parents', () => {
      addProject(db, 'A.Docs');
      addProject(db, 'B.Docs');
      expect(paths(db)).toEqual(['A', 'A.Docs', 'B', 'B.Docs']);
    });
  });

  describe('listing', () => {
    it('sorts paths naturally', () => {
      addProject(db, 'Task10');
      addProject(db, 'Task2');
      addProject(db, 'Task1');
      expect(paths(db)).toEqual(['Task1', 'Task2', 'Task10']);
    });

    it('builds a tree', () => {
      addProject(db, 'Work.Meetings');
      addProject(db, 'Work.Coding');
      addProject(db, 'Home');

      const tree = getProjectTree(db);
      expect(tree.map((n) => n.name)).toEqual(['Home', 'Work']);
      expect(tree[1]?.children.map((n) => n.path)).toEqual(['Work.Coding', 'Work.Meetings']);
    });

    it('collects descendants at any depth', () => {
      addProject(db, 'A.B.C');
      addProject(db, 'A.D');
      const projects = loadProjects(db);
      const id = (path: string): number => projects.find((p) => p.path === path)?.id ?? -1;

      expect(getDescendantIds(projects, id('A')).sort()).toEqual([id('A.B'), id('A.B.C'), id('A.D')].sort());
      expect(getDescendantIds(projects, id('A.D'))).toEqual([]);
    });
  });

  describe('renameProject', () => {
    it('renames the subtree with it', () => {
      addProject(db, 'Client.Website.Backend');
      expect(renameProject(db, 'Client', 'Acme').path).toBe('Acme');
      expect(findProject(db, 'Acme.Website.Backend')).not.toBeNull();
      expect(findProject(db, 'Client.Website')).toBeNull();
    });

    it('refuses a sibling name clash', () => {
      addProject(db, 'Client.Website');
      addProject(db, 'Client.Mobile');
      expect(thrownCode(() => renameProject(db, 'Client.Website', 'Mobile'))).toBe('CONFLICT');
    });

    it('refuses names that would change the path', () => {
      addProject(db, 'Client');
      expect(thrownCode(() => renameProject(db, 'Client', 'Acme.Corp'))).toBe('INVALID');
    });

    it('reports unknown projects', () => {
      expect(thrownCode(() => renameProject(db, 'Nope', 'Other'))).toBe('NOT_FOUND');
    });
  });

  describe('moveProject', () => {
    beforeEach(() => {
      addProject(db, 'Client.Website.Backend');
      addProject(db, 'Other');
    });

    it('reparents a subtree', () => {
      expect(moveProject(db, 'Client.Website', 'Other').path).toBe('Other.Website');
      expect(findProject(db, 'Other.Website.Backend')).not.toBeNull();
    });

    it('moves to the top level', () => {
      expect(moveProject(db, 'Client.Website', null).path).toBe('Website');
    });

    it('refuses to move a project below itself', () => {
      expect(thrownCode(() => moveProject(db, 'Client', 'Client.Website'))).toBe('INVALID');
      expect(thrownCode(() => moveProject(db, 'Client', 'Client'))).toBe('INVALID');
    });

    it('refuses a name clash at the destination', () => {
      addProject(db, 'Website');
      expect(thrownCode(() => moveProject(db, 'Client.Website', null))).toBe('CONFLICT');
    });
  });

  describe('removeProject', () => {
    beforeEach(() => {
      addProject(db, 'Client.Website.Backend');
      addProject(db, 'Client.Mobile');
    });

    it('removes a leaf', () => {
      expect(removeProject(db, 'Client.Mobile')).toEqual(['Client.Mobile']);
      expect(findProject(db, 'Client.Mobile')).toBeNull();
    });

    it('needs recursive for a project with children', () => {
      expect(thrownCode(() => removeProject(db, 'Client.Website'))).toBe('INVALID');
      expect(removeProject(db, 'Client', { recursive: true })).toEqual([
        'Client',
        'Client.Mobile',
        'Client.Website',
        'Client.Website.Backend',
      ]);
      expect(paths(db)).toEqual([]);
    });

    it('refuses while records use the subtree', () => {
      const { record } = startRecord(db, {
        project: 'Client.Website.Backend',
        start: march(13, 9),
        end: march(13, 10),
      });

      let caught: unknown;
      try {
        removeProject(db, 'Client', { recursive: true });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(TimeTreeError);
      expect(caught instanceof TimeTreeError && caught.code).toBe('IN_USE');
      expect(caught instanceof TimeTreeError && caught.details).toEqual({ records: [record.id] });
      expect(findProject(db, 'Client.Website.Backend')).not.toBeNull();
    });
  });
});
