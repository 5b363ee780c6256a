/**
 * Tests for the project tools
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  projectAddHandler,
  projectListHandler,
  projectMoveHandler,
  projectRemoveHandler,
  projectRenameHandler,
} from '../../../src/tools/projects.js';
import { workStartHandler } from '../../../src/tools/work.js';
import { resetDatabase } from '../../../src/services/db/manager.js';

describe('project tools', () => {
  beforeEach(() => {
    resetDatabase();
  });

  afterEach(() => {
    resetDatabase();
  });

  it('adds projects with their parents', async () => {
    const result = await projectAddHandler({ path: 'Client.Website' });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.created).toEqual(['Client', 'Client.Website']);
    expect(result.data.message).toBe('Created Client, Client.Website');
  });

  it('returns validation error when path is missing', async () => {
    const result = await projectAddHandler({});
    expect(result.success).toBe(false);
    if (!result.success) expect(result.code).toBe('VALIDATION_ERROR');
  });

  it('reports duplicates', async () => {
    await projectAddHandler({ path: 'Client' });
    const result = await projectAddHandler({ path: 'Client' });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.code).toBe('CONFLICT');
  });

  it('lists projects flat and as a tree', async () => {
    await projectAddHandler({ path: 'Client.Website' });
    await projectAddHandler({ path: 'Admin' });

    const result = await projectListHandler({});
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.projects.map((p) => p.path)).toEqual(['Admin', 'Client', 'Client.Website']);
    expect(result.data.tree.map((n) => n.name)).toEqual(['Admin', 'Client']);
  });

  it('renames and moves', async () => {
    await projectAddHandler({ path: 'Client.Website' });
    await projectAddHandler({ path: 'Archive' });

    const renamed = await projectRenameHandler({ path: 'Client.Website', name: 'Site' });
    expect(renamed.success && renamed.data.message).toBe('Renamed Client.Website to Client.Site');

    const moved = await projectMoveHandler({ path: 'Client.Site', parent: 'Archive' });
    expect(moved.success && moved.data.project.path).toBe('Archive.Site');

    const top = await projectMoveHandler({ path: 'Archive.Site' });
    expect(top.success && top.data.message).toBe('Moved Archive.Site to Site');
  });

  it('removes unused projects only', async () => {
    await projectAddHandler({ path: 'Client.Website' });
    await workStartHandler({ project: 'Client.Website', at: '2024-03-13_9:00', for: '1h' });

    const used = await projectRemoveHandler({ path: 'Client', recursive: true });
    expect(used.success).toBe(false);
    if (!used.success) expect(used.code).toBe('IN_USE');

    await projectAddHandler({ path: 'Admin.Mail' });
    const nested = await projectRemoveHandler({ path: 'Admin' });
    expect(nested.success).toBe(false);
    if (!nested.success) expect(nested.code).toBe('INVALID');

    const removed = await projectRemoveHandler({ path: 'Admin', recursive: true });
    expect(removed.success && removed.data.removed).toEqual(['Admin', 'Admin.Mail']);
  });
});
