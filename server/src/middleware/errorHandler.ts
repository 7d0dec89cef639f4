/**
 * Centralized Error Handler Middleware
 * Catches anything a route lets escape and answers with a consistent JSON body,
 * so no request ends without a response.
 *
 * Must be added AFTER all routes in Express app:
 * app.use(errorHandler);
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { DatabaseError } from '../utils/errors.js';
import { httpLogger } from '../utils/logger.js';

/**
 * Extended error type to handle various error shapes
 * (body-parser sets `status`/`statusCode`)
 */
interface ExtendedError extends Error {
    statusCode?: number;
    status?: number;
}

const isDevelopment = (): boolean => process.env.NODE_ENV === 'development';

/**
 * Global error handling middleware
 */
export const errorHandler: ErrorRequestHandler = (
    err: ExtendedError,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    const errorLog = {
        method: req.method,
        path: req.path,
        error: err.message,
        type: err.name,
        username: req.sessionState?.status === 'authenticated' ? req.sessionState.username : undefined,
        ...(isDevelopment() && { stack: err.stack }),
    };

    if (res.headersSent) {
        httpLogger.error(errorLog, 'Error after response started');
        return;
    }

    if (err instanceof DatabaseError) {
        httpLogger.error(errorLog, 'Database error');
        res.status(500).json({
            error: 'Database operation failed',
            type: 'DatabaseError',
            // Don't expose internal DB errors in production
            ...(isDevelopment() && { details: err.message }),
        });
        return;
    }

    // Default: body-parser and friends carry their own status
    const statusCode = err.statusCode ?? err.status ?? 500;
    if (statusCode >= 500) {
        httpLogger.error(errorLog, 'Unhandled error');
    } else {
        httpLogger.warn(errorLog, 'Request rejected');
    }

    const response: { error: string; type: string; stack?: string } = {
        error: statusCode >= 500 ? 'Internal server error' : err.message,
        type: err.name || 'Error',
    };
    if (isDevelopment()) {
        response.stack = err.stack;
    }

    res.status(statusCode).json(response);
};

export default errorHandler;
