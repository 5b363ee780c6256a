/**
 * Work tools: start, stop and inspect the record in progress
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { TimeRecord, ToolResult } from '../types/index.js';
import { getDatabase } from '../services/db/manager.js';
import { currentRecord, recordDuration, startRecord, stopRecords } from '../services/records/store.js';
import { addDuration, parseTime } from '../services/time/expressions.js';
import { ExpressionError } from '../utils/errors.js';
import { formatDateTime, formatDuration } from '../utils/format.js';
import { logger } from '../utils/logger.js';
import { toolFailure, validationError } from './shared.js';

const startSchema = z.object({
  project: z.string().min(1, 'Project is required'),
  at: z.string().min(1).optional(),
  for: z.string().min(1).optional(),
  to: z.string().min(1).optional(),
  note: z.string().optional(),
  force: z.boolean().optional().default(false),
});

const stopSchema = z.object({
  at: z.string().min(1).optional(),
});

export interface WorkStartData {
  record: TimeRecord;
  truncated: TimeRecord[];
  message: string;
}

export interface WorkStopData {
  closed: TimeRecord[];
  message: string;
}

export interface StatusData {
  record: TimeRecord | null;
  elapsed: number; // Seconds since the open record started
  message: string;
}

export const workStartTool: Tool = {
  name: 'timetree_work_start',
  description:
    'Start working on a project now or at a given time. With "for" or "to" a closed record is logged instead. Overlapping records are refused unless force is set, which ends earlier records at the new start.',
  inputSchema: {
    type: 'object',
    properties: {
      project: {
        type: 'string',
        description: 'Dotted project path, e.g. "Client.Website"',
      },
      at: {
        type: 'string',
        description: 'Start time: now (default), 9:10, 2024-03-01_9:10, -30m',
      },
      for: {
        type: 'string',
        description: 'Duration of the record, e.g. 1h30m or 1:30',
      },
      to: {
        type: 'string',
        description: 'End time of the record',
      },
      note: {
        type: 'string',
        description: 'Free-text note',
      },
      force: {
        type: 'boolean',
        description: 'End overlapping earlier records at the new start (default: false)',
      },
    },
    required: ['project'],
  },
};

export const workStopTool: Tool = {
  name: 'timetree_work_stop',
  description: 'Stop the record in progress, now or at a given time.',
  inputSchema: {
    type: 'object',
    properties: {
      at: {
        type: 'string',
        description: 'End time (default: now)',
      },
    },
  },
};

export const statusTool: Tool = {
  name: 'timetree_status',
  description: 'Show the record in progress and how long it has been running.',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

export async function workStartHandler(args: Record<string, unknown>): Promise<ToolResult<WorkStartData>> {
  const parseResult = startSchema.safeParse(args);
  if (!parseResult.success) {
    return validationError(parseResult.error);
  }

  const input = parseResult.data;

  try {
    if (input.for !== undefined && input.to !== undefined) {
      throw new ExpressionError('Use either "to" or "for", not both', `for ${input.for} to ${input.to}`);
    }

    const now = new Date();
    const start = parseTime(input.at ?? 'now', now);
    let end: Date | null = null;
    if (input.for !== undefined) {
      end = addDuration(start, input.for);
    } else if (input.to !== undefined) {
      end = parseTime(input.to, now);
    }

    const db = getDatabase();
    const { record, truncated } = startRecord(db, {
      project: input.project,
      start,
      end,
      note: input.note,
      force: input.force,
    });

    const message = record.end
      ? `Logged ${formatDuration(recordDuration(record, now))} on ${record.projectPath}`
      : `Started ${record.projectPath} at ${formatDateTime(record.start)}`;
    logger.debug(message);

    return {
      success: true,
      data: { record, truncated, message },
    };
  } catch (error) {
    return toolFailure(error, 'WORK_ERROR');
  }
}

export async function workStopHandler(args: Record<string, unknown>): Promise<ToolResult<WorkStopData>> {
  const parseResult = stopSchema.safeParse(args);
  if (!parseResult.success) {
    return validationError(parseResult.error);
  }

  try {
    const at = parseTime(parseResult.data.at ?? 'now', new Date());
    const closed = stopRecords(getDatabase(), at);

    const message =
      closed.length === 0
        ? 'No record in progress'
        : closed.map((r) => `Stopped ${r.projectPath} at ${formatDateTime(at)}`).join('\n');

    return {
      success: true,
      data: { closed, message },
    };
  } catch (error) {
    return toolFailure(error, 'WORK_ERROR');
  }
}

export async function statusHandler(_args: Record<string, unknown>): Promise<ToolResult<StatusData>> {
  try {
    const now = new Date();
    const record = currentRecord(getDatabase());
    const elapsed = record ? recordDuration(record, now) : 0;

    return {
      success: true,
      data: {
        record,
        elapsed,
        message: record
          ? `Working on ${record.projectPath} since ${formatDateTime(record.start)} (${formatDuration(elapsed)})`
          : 'No record in progress',
      },
    };
  } catch (error) {
    return toolFailure(error, 'STATUS_ERROR');
  }
}
