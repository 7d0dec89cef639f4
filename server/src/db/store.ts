/**
 * Inventory Store
 *
 * Scoped units of work over the Kysely instance:
 *
 *   const stock = await store.read((repo) => repo.listStock());
 *   const id = await store.write((repo) => repo.insertStock(item));
 *
 * - read()  holds one pooled connection for the callback and releases it on every exit path
 * - write() runs the callback in a transaction; any throw rolls it back
 *
 * Failures leave both as ConstraintViolationError (driver constraint codes) or
 * DatabaseError (anything else).
 */

import type { Kysely } from 'kysely';
import type { DB } from './types.js';
import { createDatabase } from './kysely.js';
import { migrate } from './schema.js';
import { KyselyInventoryRepository } from './queries/inventoryRepository.js';
import type { InventoryRepository } from './queries/inventoryRepository.js';
import { toConstraintViolation } from './constraints.js';
import { DatabaseError } from '../utils/errors.js';
import type { ConstraintViolationError } from '../utils/errors.js';
import { dbLogger } from '../utils/logger.js';

export type UnitOfWork<T> = (repo: InventoryRepository) => Promise<T>;

export interface InventoryStore {
    read<T>(work: UnitOfWork<T>): Promise<T>;
    write<T>(work: UnitOfWork<T>): Promise<T>;
    close(): Promise<void>;
}

function translateStoreError(error: unknown): ConstraintViolationError | DatabaseError {
    const violation = toConstraintViolation(error);
    if (violation) return violation;
    if (error instanceof DatabaseError) return error;
    if (error instanceof Error) return new DatabaseError(error.message, error);
    return new DatabaseError(`Store operation failed: ${String(error)}`);
}

export class KyselyInventoryStore implements InventoryStore {
    constructor(private readonly db: Kysely<DB>) {}

    async read<T>(work: UnitOfWork<T>): Promise<T> {
        try {
            return await this.db.connection().execute((conn) => work(new KyselyInventoryRepository(conn)));
        } catch (error) {
            throw translateStoreError(error);
        }
    }

    async write<T>(work: UnitOfWork<T>): Promise<T> {
        try {
            return await this.db.transaction().execute((trx) => work(new KyselyInventoryRepository(trx)));
        } catch (error) {
            throw translateStoreError(error);
        }
    }

    async close(): Promise<void> {
        await this.db.destroy();
        dbLogger.debug('Store closed');
    }
}

/**
 * Connect to DATABASE_URL, make sure the schema exists and return a ready store.
 */
export async function openInventoryStore(databaseUrl: string): Promise<KyselyInventoryStore> {
    const { db, dialect } = createDatabase(databaseUrl);
    try {
        await migrate(db, dialect);
    } catch (error) {
        await db.destroy();
        throw error;
    }
    dbLogger.info({ dialect }, 'Store opened');
    return new KyselyInventoryStore(db);
}
