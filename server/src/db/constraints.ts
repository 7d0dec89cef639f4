/**
 * Driver error → ConstraintViolationError
 *
 * pg reports SQLSTATE codes (class 23 = integrity constraint violation);
 * better-sqlite3 reports extended result codes such as SQLITE_CONSTRAINT_UNIQUE.
 */

import { ConstraintViolationError } from '../utils/errors.js';
import type { ConstraintKind } from '../utils/errors.js';

const CONSTRAINT_CODES = new Map<string, ConstraintKind>([
    // PostgreSQL
    ['23505', 'unique'],
    ['23503', 'foreign_key'],
    ['23502', 'not_null'],
    // SQLite
    ['SQLITE_CONSTRAINT_UNIQUE', 'unique'],
    ['SQLITE_CONSTRAINT_PRIMARYKEY', 'unique'],
    ['SQLITE_CONSTRAINT_FOREIGNKEY', 'foreign_key'],
    ['SQLITE_CONSTRAINT_NOTNULL', 'not_null'],
]);

function isConstraintCode(code: string): boolean {
    return code.startsWith('23') || code.startsWith('SQLITE_CONSTRAINT');
}

/**
 * Translate a driver error into a ConstraintViolationError.
 * Returns null for anything that is not a constraint failure.
 */
export function toConstraintViolation(error: unknown): ConstraintViolationError | null {
    if (error instanceof ConstraintViolationError) return error;
    if (!(error instanceof Error) || !('code' in error) || typeof error.code !== 'string') {
        return null;
    }

    const code = error.code;
    if (!isConstraintCode(code)) return null;

    const kind = CONSTRAINT_CODES.get(code) ?? 'other';
    return new ConstraintViolationError(error.message, kind, error);
}
