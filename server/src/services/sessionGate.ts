/**
 * Session Gate
 *
 * Two states per caller: anonymous, or authenticated as a username. The state
 * travels in a signed session token (HS256 JWT, subject = username) held in an
 * HttpOnly cookie, so nothing about who is logged in lives in process memory.
 *
 * A missing, tampered, expired or malformed token resolves to anonymous; the
 * gate never throws for a bad token.
 */

import jwt from 'jsonwebtoken';
import { z } from 'zod';

// ============================================
// STATES
// ============================================

export interface AnonymousSession {
    status: 'anonymous';
}

export interface AuthenticatedSession {
    status: 'authenticated';
    username: string;
}

export type SessionState = AnonymousSession | AuthenticatedSession;

export const ANONYMOUS: AnonymousSession = Object.freeze({ status: 'anonymous' });

export function authenticatedAs(username: string): AuthenticatedSession {
    return { status: 'authenticated', username };
}

export function isAuthenticated(session: SessionState): session is AuthenticatedSession {
    return session.status === 'authenticated';
}

// ============================================
// TOKENS
// ============================================

/** Cookie carrying the session token */
export const SESSION_COOKIE = 'session_token';

const SessionTokenSchema = z.object({
    sub: z.string().min(1),
    iat: z.number().optional(),
    exp: z.number().optional(),
});

export interface SessionGateOptions {
    secret: string;
    ttlSeconds: number;
}

export class SessionGate {
    private readonly secret: string;
    readonly ttlSeconds: number;

    constructor(options: SessionGateOptions) {
        if (!options.secret) throw new Error('Session secret is required');
        this.secret = options.secret;
        this.ttlSeconds = options.ttlSeconds;
    }

    /** Sign a session token for a verified user */
    open(username: string): string {
        return jwt.sign({}, this.secret, {
            subject: username,
            expiresIn: this.ttlSeconds,
            algorithm: 'HS256',
        });
    }

    /** Resolve a token (or its absence) to a session state */
    resolve(token: string | undefined): SessionState {
        if (!token) return ANONYMOUS;

        try {
            const decoded = jwt.verify(token, this.secret, { algorithms: ['HS256'] });
            const parsed = SessionTokenSchema.safeParse(decoded);
            return parsed.success ? authenticatedAs(parsed.data.sub) : ANONYMOUS;
        } catch {
            return ANONYMOUS;
        }
    }
}
