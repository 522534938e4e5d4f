import logger from './logger';

const CODE_HINTS: Record<string, string> = {
  ECONNREFUSED: 'database unreachable',
  ENOTFOUND: 'database host not found',
  '42P01': 'missing table',
  '42703': 'missing column',
  '23502': 'missing required value',
};

export class DatabaseError extends Error {
  public readonly operation: string;
  public readonly code?: string;

  constructor(message: string, operation: string, code?: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DatabaseError';
    this.operation = operation;
    this.code = code;
  }
}

/** Wraps a pg failure with the operation and a readable hint for known codes. */
export function createDatabaseError(error: unknown, operation: string): DatabaseError {
  const errorCode =
    typeof error === 'object' && error !== null && 'code' in error ? String(error.code) : undefined;
  const errorMessage = error instanceof Error ? error.message : 'Unknown database error';

  logger.error(`Database error during ${operation}:`, { code: errorCode, message: errorMessage });

  const hint = errorCode ? CODE_HINTS[errorCode] : undefined;
  const message = `${operation} failed${hint ? ` (${hint})` : ''}: ${errorMessage}`;
  return new DatabaseError(message, operation, errorCode, error);
}
