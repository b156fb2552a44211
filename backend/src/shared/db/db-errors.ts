/**
 * backend/src/shared/db/db-errors.ts
 *
 * WHY:
 * - DAL code must react to a few specific Postgres failures (unique violations)
 *   without importing pg internals everywhere.
 * - The HTTP error handler maps transient failures (statement timeout, lost
 *   connection, pool exhaustion) to a retryable 503 instead of a 500.
 *
 * RULES:
 * - Pure inspection of error objects. No logging, no AppError.
 */

const UNIQUE_VIOLATION = '23505';

// 57014 = query_canceled (statement_timeout), 57P01..03 = shutdown/cannot connect now,
// 53300 = too_many_connections. Class 08 is connection exceptions.
const TRANSIENT_PG_CODES = new Set(['57014', '57P01', '57P02', '57P03', '53300']);
const TRANSIENT_NODE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE']);

const TRANSIENT_MESSAGES = [
  'timeout exceeded when trying to connect',
  'Connection terminated',
  'connection timeout',
];

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

function errorConstraint(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('constraint' in err)) return undefined;
  return typeof err.constraint === 'string' ? err.constraint : undefined;
}

export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  if (errorCode(err) !== UNIQUE_VIOLATION) return false;
  if (!constraint) return true;
  return errorConstraint(err) === constraint;
}

export function isTransientDbError(err: unknown): boolean {
  const code = errorCode(err);
  if (code) {
    if (TRANSIENT_PG_CODES.has(code) || TRANSIENT_NODE_CODES.has(code)) return true;
    if (code.startsWith('08')) return true;
  }

  if (err instanceof Error) {
    return TRANSIENT_MESSAGES.some((m) => err.message.includes(m));
  }

  return false;
}
