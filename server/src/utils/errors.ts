/**
 * Custom error classes for better error handling
 * Use these instead of generic Error for specific error types
 */

/**
 * Base interface for custom errors with HTTP status codes
 */
export interface CustomError extends Error {
    readonly statusCode: number;
}

/** Which store rule rejected a write */
export type ConstraintKind = 'unique' | 'foreign_key' | 'not_null' | 'other';

/**
 * Constraint violation - thrown by the store when a write breaks a
 * uniqueness or referential rule. The transaction has been rolled back
 * by the time this reaches a caller.
 *
 * @example
 * throw new ConstraintViolationError('Duplicate serial', 'unique', driverError);
 */
export class ConstraintViolationError extends Error implements CustomError {
    readonly name = 'ConstraintViolationError' as const;
    readonly statusCode = 409 as const;
    readonly constraint: ConstraintKind;
    readonly originalError: Error | null;

    constructor(message: string, constraint: ConstraintKind = 'other', originalError: Error | null = null) {
        super(message);
        this.constraint = constraint;
        this.originalError = originalError;
        Object.setPrototypeOf(this, ConstraintViolationError.prototype);
    }
}

/**
 * Database error - thrown by the store when a unit of work fails for a reason
 * other than a constraint (connection lost, bad SQL, ...). The transaction has
 * been rolled back and the connection released.
 */
export class DatabaseError extends Error implements CustomError {
    readonly name = 'DatabaseError' as const;
    readonly statusCode = 500 as const;
    readonly originalError: Error | null;

    constructor(message: string, originalError: Error | null = null) {
        super(message);
        this.originalError = originalError;
        Object.setPrototypeOf(this, DatabaseError.prototype);
    }
}
