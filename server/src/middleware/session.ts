/**
 * Session middleware
 *
 * attachSession() resolves the session cookie into req.sessionState on every
 * request; routes then hand that state to the services. Reading the cookie
 * requires cookie-parser to run first.
 */

import type { Request, Response, NextFunction, RequestHandler, CookieOptions } from 'express';
import { SESSION_COOKIE } from '../services/sessionGate.js';
import type { SessionGate } from '../services/sessionGate.js';

export interface SessionCookieOptions {
    secure: boolean;
    ttlSeconds: number;
}

function baseCookieOptions(options: SessionCookieOptions): CookieOptions {
    return {
        httpOnly: true,
        secure: options.secure,
        sameSite: 'lax',
        path: '/',
    };
}

export function attachSession(gate: SessionGate): RequestHandler {
    return (req: Request, _res: Response, next: NextFunction): void => {
        const cookies: Record<string, unknown> = req.cookies ?? {};
        const token = cookies[SESSION_COOKIE];
        req.sessionState = gate.resolve(typeof token === 'string' ? token : undefined);
        next();
    };
}

export function setSessionCookie(res: Response, token: string, options: SessionCookieOptions): void {
    res.cookie(SESSION_COOKIE, token, {
        ...baseCookieOptions(options),
        maxAge: options.ttlSeconds * 1000,
    });
}

export function clearSessionCookie(res: Response, options: SessionCookieOptions): void {
    res.clearCookie(SESSION_COOKIE, baseCookieOptions(options));
}
