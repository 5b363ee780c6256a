/**
 * Helpers shared by the tool handlers
 */

import { z } from 'zod';
import type { ToolError } from '../types/index.js';
import type { PeriodInput } from '../services/time/expressions.js';
import { errorCode, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

// Period selection accepted by every reporting tool
export const periodSchema = z.object({
  period: z.string().min(1).optional(),
  from: z.string().min(1).optional(),
  to: z.string().min(1).optional(),
  for: z.string().min(1).optional(),
});

export type PeriodArgs = z.infer<typeof periodSchema>;

// JSON-schema counterpart of periodSchema
export const periodProperties = {
  period: {
    type: 'string',
    description:
      'Named period: today, yesterday, thisweek, lastweek, thismonth, lastmonth, thisyear (default: thisweek)',
  },
  from: {
    type: 'string',
    description: 'Start: a date (2024-03-01), date and time (2024-03-01_9:00), time (9:00) or offset from midnight (-1w)',
  },
  to: {
    type: 'string',
    description: 'End instant (defaults to now)',
  },
  for: {
    type: 'string',
    description: 'Length of the period from its start, e.g. 1w or 3d',
  },
} as const;

export function toPeriodInput(args: PeriodArgs): PeriodInput {
  return {
    name: args.period,
    from: args.from,
    to: args.to,
    duration: args.for,
  };
}

export function validationError(error: z.ZodError): ToolError {
  return {
    success: false,
    error: error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    code: 'VALIDATION_ERROR',
  };
}

/**
 * Map a caught error to a tool error, keeping service error codes
 */
export function toolFailure(error: unknown, fallbackCode: string): ToolError {
  const code = errorCode(error, fallbackCode);
  if (code === fallbackCode) {
    logger.error('Unexpected tool failure', error);
  }
  return {
    success: false,
    error: errorMessage(error),
    code,
  };
}
