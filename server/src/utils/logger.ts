/**
 * Centralized logger using Pino
 *
 * Development pretty-prints through pino-pretty, production writes JSON lines
 * to stdout with string levels, and tests stay silent unless LOG_LEVEL says otherwise.
 */
import pino from 'pino';
import type { Logger } from 'pino';
import type { Request, Response, NextFunction, RequestHandler } from 'express';

export interface LoggerOptions {
    nodeEnv?: string;
    level?: string;
}

/** Requests slower than this are logged at warn level */
const SLOW_REQUEST_MS = 1000;

export function createLogger(options: LoggerOptions = {}): Logger {
    const nodeEnv = options.nodeEnv ?? process.env.NODE_ENV ?? 'development';

    if (nodeEnv === 'test') {
        return pino({ level: options.level ?? 'silent' });
    }

    const isDev = nodeEnv !== 'production';
    const level = options.level ?? (isDev ? 'debug' : 'info');

    if (isDev) {
        return pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return pino({
        level,
        formatters: {
            level: (label: string) => ({ level: label }),
        },
    });
}

// Create the logger instance
const logger: Logger = createLogger({ level: process.env.LOG_LEVEL });

// Child loggers for different modules
export const dbLogger: Logger = logger.child({ module: 'db' });
export const seedLogger: Logger = logger.child({ module: 'seed' });
export const authLogger: Logger = logger.child({ module: 'auth' });
export const inventoryLogger: Logger = logger.child({ module: 'inventory' });
export const httpLogger: Logger = logger.child({ module: 'http' });
export const serverLogger: Logger = logger.child({ module: 'server' });

export default logger;

// Request logging middleware
export function requestLogger(log: Logger = httpLogger): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        const start = Date.now();

        res.on('finish', () => {
            const duration = Date.now() - start;
            const logData = {
                method: req.method,
                url: req.originalUrl,
                status: res.statusCode,
                duration: `${duration}ms`,
            };

            if (res.statusCode >= 500) {
                log.error(logData, 'Request error');
            } else if (res.statusCode >= 400) {
                log.warn(logData, 'Request warning');
            } else if (duration > SLOW_REQUEST_MS) {
                log.warn(logData, 'Slow request');
            } else {
                log.debug(logData, 'Request completed');
            }
        });

        next();
    };
}
