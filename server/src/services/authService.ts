/**
 * Auth Service
 *
 * login() verifies a username/password pair against the stored hash and opens a
 * session; logout() always returns the anonymous state.
 *
 * "No such user" and "wrong password" produce the same outcome and the same
 * amount of hashing work: an unknown username is checked against a throwaway
 * hash so response timing does not reveal which usernames exist.
 */

import type { Logger } from 'pino';
import { LoginSchema } from '@stockroom/shared';
import type { LoginInput } from '@stockroom/shared';
import type { InventoryStore } from '../db/index.js';
import type { PasswordHasher } from './passwordHasher.js';
import { ANONYMOUS, authenticatedAs } from './sessionGate.js';
import type { AnonymousSession, AuthenticatedSession, SessionGate } from './sessionGate.js';
import { authLogger } from '../utils/logger.js';

// ============================================
// TYPES
// ============================================

export type LoginResult =
    | { success: true; session: AuthenticatedSession; token: string }
    | { success: false; error: string };

export interface AuthServiceDeps {
    store: InventoryStore;
    hasher: PasswordHasher;
    gate: SessionGate;
    logger?: Logger;
}

/** Hashed once, then only ever compared against */
const DUMMY_PASSWORD = 'not-a-real-password';

/** The only failure message login ever gives */
export const INVALID_CREDENTIALS = 'Invalid credentials';

// ============================================
// SERVICE
// ============================================

export class AuthService {
    private readonly store: InventoryStore;
    private readonly hasher: PasswordHasher;
    private readonly gate: SessionGate;
    private readonly log: Logger;
    private dummyHash: Promise<string> | null = null;

    constructor(deps: AuthServiceDeps) {
        this.store = deps.store;
        this.hasher = deps.hasher;
        this.gate = deps.gate;
        this.log = deps.logger ?? authLogger;
    }

    async login(username: string, password: string): Promise<LoginResult> {
        const parsed = LoginSchema.safeParse({ username, password });
        if (!parsed.success) {
            return this.fail(username);
        }

        const credentials: LoginInput = parsed.data;
        const user = await this.store.read((repo) => repo.findUserByUsername(credentials.username));

        // Same hashing work whether or not the user exists
        const hash = user ? user.passwordHash : await this.getDummyHash();
        const valid = await this.hasher.verify(credentials.password, hash);

        if (!user || !valid) {
            return this.fail(credentials.username);
        }

        const session = authenticatedAs(user.username);
        this.log.info({ username: user.username }, 'Login succeeded');
        return { success: true, session, token: this.gate.open(user.username) };
    }

    logout(): AnonymousSession {
        return ANONYMOUS;
    }

    private fail(username: string): LoginResult {
        this.log.warn({ username }, 'Login failed');
        return { success: false, error: INVALID_CREDENTIALS };
    }

    private getDummyHash(): Promise<string> {
        if (!this.dummyHash) {
            const pending = this.hasher.hash(DUMMY_PASSWORD);
            // A failed hash is not cached; the next unknown-user login tries again
            pending.catch(() => {
                if (this.dummyHash === pending) this.dummyHash = null;
            });
            this.dummyHash = pending;
        }
        return this.dummyHash;
    }
}
