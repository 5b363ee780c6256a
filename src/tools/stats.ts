/**
 * Reporting tools: per-project totals and bucketed reports
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import { getConfig } from '../config/index.js';
import { getDatabase } from '../services/db/manager.js';
import { loadProjects } from '../services/projects/store.js';
import { listRecords } from '../services/records/store.js';
import { buildReport } from '../services/report/aggregator.js';
import type { Report } from '../services/report/aggregator.js';
import { parseBucketSpec, resolvePeriod } from '../services/time/expressions.js';
import { periodProperties, periodSchema, toPeriodInput, toolFailure, validationError } from './shared.js';

const statsSchema = periodSchema.extend({
  project: z.string().min(1).optional(),
});

const reportSchema = statsSchema.extend({
  by: z.string().min(1).optional(),
});

export const statsTool: Tool = {
  name: 'timetree_stats',
  description:
    'Time spent per project over a period (default: this week). Each project carries its own time and the total of its subprojects.',
  inputSchema: {
    type: 'object',
    properties: {
      ...periodProperties,
      project: {
        type: 'string',
        description: 'Only report this project and its subprojects',
      },
    },
  },
};

export const reportTool: Tool = {
  name: 'timetree_report',
  description:
    'Time per project split into buckets: day, week, month or a fixed duration such as 4h. Without "by" the period is a single bucket.',
  inputSchema: {
    type: 'object',
    properties: {
      ...periodProperties,
      project: {
        type: 'string',
        description: 'Only report this project and its subprojects',
      },
      by: {
        type: 'string',
        description: 'Bucket width: day, week, month or a duration (e.g. 12h)',
      },
    },
  },
};

function runReport(input: z.infer<typeof reportSchema>): Report {
  const now = new Date();
  const db = getDatabase();
  const period = resolvePeriod(toPeriodInput(input), now, { weekDays: getConfig().weekDays });
  const bucket = input.by === undefined ? null : parseBucketSpec(input.by);

  return buildReport(loadProjects(db), listRecords(db, period), period, {
    now,
    bucket,
    project: input.project,
  });
}

export async function statsHandler(args: Record<string, unknown>): Promise<ToolResult<Report>> {
  const parseResult = statsSchema.safeParse(args);
  if (!parseResult.success) {
    return validationError(parseResult.error);
  }

  try {
    return { success: true, data: runReport(parseResult.data) };
  } catch (error) {
    return toolFailure(error, 'REPORT_ERROR');
  }
}

export async function reportHandler(args: Record<string, unknown>): Promise<ToolResult<Report>> {
  const parseResult = reportSchema.safeParse(args);
  if (!parseResult.success) {
    return validationError(parseResult.error);
  }

  try {
    return { success: true, data: runReport(parseResult.data) };
  } catch (error) {
    return toolFailure(error, 'REPORT_ERROR');
  }
}
