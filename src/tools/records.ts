/**
 * Record tools: list, edit and delete tracked intervals
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Period, TimeRecord, ToolResult } from '../types/index.js';
import { getConfig } from '../config/index.js';
import { getDatabase } from '../services/db/manager.js';
import {
  deleteRecords,
  editRecord,
  lastRecords,
  listRecords,
  recordDuration,
} from '../services/records/store.js';
import { parseTime, resolvePeriod } from '../services/time/expressions.js';
import { TimeTreeError } from '../utils/errors.js';
import { periodProperties, periodSchema, toPeriodInput, toolFailure, validationError } from './shared.js';

const listSchema = periodSchema.extend({
  last: z.number().int().min(1).max(1000).optional(),
});

const editSchema = z.object({
  id: z.number().int().positive(),
  project: z.string().min(1).optional(),
  start: z.string().min(1).optional(),
  end: z.string().min(1).optional(),
});

const deleteSchema = z.object({
  ids: z.array(z.number().int().positive()).min(1, 'At least one record id is required'),
});

export interface RecordsData {
  period: Period | null; // Null when listing the last records
  records: TimeRecord[];
  total: number; // Seconds, open records counted up to now
}

export interface RecordEditData {
  record: TimeRecord;
  message: string;
}

export interface RecordDeleteData {
  deleted: TimeRecord[];
  message: string;
}

export const recordsTool: Tool = {
  name: 'timetree_records',
  description:
    'List records intersecting a period (default: this week), or the most recent records with "last".',
  inputSchema: {
    type: 'object',
    properties: {
      ...periodProperties,
      last: {
        type: 'number',
        description: 'List this many most recent records instead of a period',
      },
    },
  },
};

export const recordEditTool: Tool = {
  name: 'timetree_record_edit',
  description: 'Change the project, start or end of a record. The result must not overlap other records.',
  inputSchema: {
    type: 'object',
    properties: {
      id: {
        type: 'number',
        description: 'Record id',
      },
      project: {
        type: 'string',
        description: 'New project path',
      },
      start: {
        type: 'string',
        description: 'New start time',
      },
      end: {
        type: 'string',
        description: 'New end time (closes an open record)',
      },
    },
    required: ['id'],
  },
};

export const recordDeleteTool: Tool = {
  name: 'timetree_record_delete',
  description: 'Delete records by id. Nothing is deleted when any id is unknown.',
  inputSchema: {
    type: 'object',
    properties: {
      ids: {
        type: 'array',
        items: { type: 'number' },
        description: 'Record ids',
      },
    },
    required: ['ids'],
  },
};

export async function recordsHandler(args: Record<string, unknown>): Promise<ToolResult<RecordsData>> {
  const parseResult = listSchema.safeParse(args);
  if (!parseResult.success) {
    return validationError(parseResult.error);
  }

  const input = parseResult.data;

  try {
    const now = new Date();
    const db = getDatabase();
    let period: Period | null = null;
    let records: TimeRecord[];

    if (input.last !== undefined) {
      if (input.period || input.from || input.to || input.for) {
        throw new TimeTreeError('"last" cannot be combined with a period', 'INVALID');
      }
      records = lastRecords(db, input.last);
    } else {
      period = resolvePeriod(toPeriodInput(input), now, { weekDays: getConfig().weekDays });
      records = listRecords(db, period);
    }

    const total = records.reduce((sum, record) => sum + recordDuration(record, now), 0);

    return {
      success: true,
      data: { period, records, total },
    };
  } catch (error) {
    return toolFailure(error, 'RECORDS_ERROR');
  }
}

export async function recordEditHandler(args: Record<string, unknown>): Promise<ToolResult<RecordEditData>> {
  const parseResult = editSchema.safeParse(args);
  if (!parseResult.success) {
    return validationError(parseResult.error);
  }

  const input = parseResult.data;

  try {
    const now = new Date();
    const record = editRecord(getDatabase(), input.id, {
      project: input.project,
      start: input.start === undefined ? undefined : parseTime(input.start, now),
      end: input.end === undefined ? undefined : parseTime(input.end, now),
    });

    return {
      success: true,
      data: { record, message: `Updated record ${record.id}` },
    };
  } catch (error) {
    return toolFailure(error, 'RECORDS_ERROR');
  }
}

export async function recordDeleteHandler(args: Record<string, unknown>): Promise<ToolResult<RecordDeleteData>> {
  const parseResult = deleteSchema.safeParse(args);
  if (!parseResult.success) {
    return validationError(parseResult.error);
  }

  try {
    const deleted = deleteRecords(getDatabase(), parseResult.data.ids);
    return {
      success: true,
      data: {
        deleted,
        message: `Deleted ${deleted.length} record(s): ${deleted.map((r) => r.id).join(', ')}`,
      },
    };
  } catch (error) {
    return toolFailure(error, 'RECORDS_ERROR');
  }
}
