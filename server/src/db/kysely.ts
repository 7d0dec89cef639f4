/**
 * Kysely Factory
 *
 * Builds the Kysely instance the store runs on. The DATABASE_URL scheme picks
 * the dialect:
 *   postgres://... | postgresql://...  → pg.Pool behind PostgresDialect
 *   sqlite:<path> | sqlite::memory:      → better-sqlite3 behind SqliteDialect
 *
 * Usage:
 *   const { db, dialect } = createDatabase(config.databaseUrl);
 *   await migrate(db, dialect);
 */

import { Kysely, PostgresDialect, SqliteDialect } from 'kysely';
import type { LogEvent } from 'kysely';
import pg from 'pg';
import SQLite from 'better-sqlite3';
import type { DB } from './types.js';
import { dbLogger } from '../utils/logger.js';

export type StoreDialect = 'postgres' | 'sqlite';

export interface DatabaseHandle {
    db: Kysely<DB>;
    dialect: StoreDialect;
}

const SQLITE_PREFIX = 'sqlite:';
const POOL_SIZE = 10;

export function resolveDialect(databaseUrl: string): StoreDialect {
    if (/^postgres(ql)?:\/\//.test(databaseUrl)) return 'postgres';
    if (databaseUrl.startsWith(SQLITE_PREFIX)) return 'sqlite';
    throw new Error(`Unsupported DATABASE_URL scheme: ${databaseUrl.split(':')[0] ?? ''}`);
}

// Failed queries are expected (constraint checks), so they only go to debug
function logQuery(event: LogEvent): void {
    if (event.level === 'error') {
        dbLogger.debug({ sql: event.query.sql, err: event.error }, 'Query failed');
    }
}

/**
 * Create a Kysely instance for the given DATABASE_URL.
 * The caller owns it and must call `db.destroy()` when done.
 */
export function createDatabase(databaseUrl: string): DatabaseHandle {
    const dialect = resolveDialect(databaseUrl);

    if (dialect === 'postgres') {
        const pool = new pg.Pool({
            connectionString: databaseUrl,
            max: POOL_SIZE,
        });
        return {
            dialect,
            db: new Kysely<DB>({ dialect: new PostgresDialect({ pool }), log: logQuery }),
        };
    }

    const filename = databaseUrl.slice(SQLITE_PREFIX.length) || ':memory:';
    const database = new SQLite(filename);
    // SQLite leaves foreign keys unenforced unless asked, per connection
    database.pragma('foreign_keys = ON');
    if (filename !== ':memory:') {
        database.pragma('journal_mode = WAL');
    }

    return {
        dialect,
        db: new Kysely<DB>({ dialect: new SqliteDialect({ database }), log: logQuery }),
    };
}
