/**
 * Tests for the reporting tools: timetree_stats, timetree_report
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../src/config/index.js', () => ({
  getConfig: vi.fn(),
}));

import { reportHandler, statsHandler } from '../../../src/tools/stats.js';
import { workStartHandler } from '../../../src/tools/work.js';
import { projectAddHandler } from '../../../src/tools/projects.js';
import { resetDatabase } from '../../../src/services/db/manager.js';
import { getConfig } from '../../../src/config/index.js';
import { march } from '../../helpers.js';

describe('reporting tools', () => {
  beforeEach(async () => {
    vi.clearAllMocks();
    // Seven-day weeks
    (getConfig as ReturnType<typeof vi.fn>).mockReturnValue({
      dbPath: ':memory:',
      logLevel: 'error',
      weekDays: 7,
      barWidth: 20,
      configPath: '/dev/null',
    });
    vi.useFakeTimers({ toFake: ['Date'] });
    // Wednesday
    vi.setSystemTime(march(13, 15, 30));
    resetDatabase();

    await projectAddHandler({ path: 'Work.Coding' });
    await projectAddHandler({ path: 'Work.Meetings' });
    await workStartHandler({ project: 'Work.Coding', at: '2024-03-11_9:00', for: '3h' });
    await workStartHandler({ project: 'Work.Meetings', at: '2024-03-12_10:00', for: '1h' });
    // Sunday, only inside a seven-day week
    await workStartHandler({ project: 'Work', at: '2024-03-17_10:00', for: '30m' });
    await workStartHandler({ project: 'Work.Coding', at: '14:00', for: '1h30m' });
  });

  afterEach(() => {
    resetDatabase();
    vi.useRealTimers();
  });

  describe('timetree_stats', () => {
    it('totals the configured week', async () => {
      const result = await statsHandler({});
      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.period).toEqual({ start: march(11), end: march(18) });
      expect(result.data.total).toBe(3 * 3600 + 3600 + 1800 + 5400);
      expect(result.data.roots.map((r) => r.path)).toEqual(['Work']);
      expect(result.data.roots[0]?.own).toBe(1800);
    });

    it('limits to a subtree', async () => {
      const result = await statsHandler({ project: 'Work.Coding' });
      expect(result.success && result.data.total).toBe(3 * 3600 + 5400);
    });

    it('reports unknown subtrees', async () => {
      const result = await statsHandler({ project: 'Garden' });
      expect(result.success).toBe(false);
      if (!result.success) expect(result.code).toBe('NOT_FOUND');
    });
  });

  describe('timetree_report', () => {
    it('splits the period into days', async () => {
      const result = await reportHandler({ period: 'thisweek', by: 'day' });
      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.buckets).toHaveLength(7);
      expect(result.data.bucketTotals).toEqual([10800, 3600, 5400, 0, 0, 0, 1800]);
    });

    it('uses a single bucket without by', async () => {
      const result = await reportHandler({ period: 'today' });
      expect(result.success && result.data.bucketTotals).toEqual([5400]);
    });

    it('rejects unknown bucket widths', async () => {
      const result = await reportHandler({ by: 'fortnight' });
      expect(result.success).toBe(false);
      if (!result.success) expect(result.code).toBe('INVALID_EXPRESSION');
    });
  });
});
