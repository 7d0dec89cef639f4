/**
 * Test fixtures: an in-memory SQLite store and a fast fake hasher.
 */

import { openInventoryStore } from '../db/index.js';
import type { KyselyInventoryStore } from '../db/index.js';
import type { PasswordHasher } from '../services/passwordHasher.js';
import type { AppConfig } from '../config/env.js';

export const TEST_SESSION_SECRET = 'test-secret';

export const testSessionConfig: AppConfig['session'] = {
    secret: TEST_SESSION_SECRET,
    ttlSeconds: 3600,
    secureCookie: false,
};

/** Fresh, migrated, empty store per call */
export function createTestStore(): Promise<KyselyInventoryStore> {
    return openInventoryStore('sqlite::memory:');
}

/** Prefix "hash" so tests can read what was stored */
export function createFakeHasher(): PasswordHasher {
    return {
        hash: async (password) => `hashed:${password}`,
        verify: async (password, hash) => hash === `hashed:${password}`,
    };
}
