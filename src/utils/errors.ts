/**
 * Error types thrown by the services and mapped to tool error codes
 */

export type TimeTreeErrorCode = 'NOT_FOUND' | 'CONFLICT' | 'IN_USE' | 'INVALID';

export class TimeTreeError extends Error {
  constructor(
    message: string,
    public code: TimeTreeErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TimeTreeError';
  }
}

/**
 * Raised by the date/duration expression parser
 */
export class ExpressionError extends Error {
  readonly code = 'INVALID_EXPRESSION';

  constructor(
    message: string,
    public input: string
  ) {
    super(`${message}: "${input}"`);
    this.name = 'ExpressionError';
  }
}

/**
 * Error code for a caught value, falling back to the caller's default
 */
export function errorCode(error: unknown, fallback: string): string {
  if (error instanceof TimeTreeError || error instanceof ExpressionError) {
    return error.code;
  }
  return fallback;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
