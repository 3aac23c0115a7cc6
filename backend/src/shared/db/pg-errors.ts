/**
 * backend/src/shared/db/pg-errors.ts
 *
 * Postgres error classification for repositories.
 * Repositories translate driver errors into return values; they never throw AppError.
 */

const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  if (!err || typeof err !== 'object') return false;
  if (!('code' in err) || err.code !== UNIQUE_VIOLATION) return false;
  if (!constraint) return true;
  return 'constraint' in err && err.constraint === constraint;
}
