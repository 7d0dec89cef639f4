/**
 * Schema migration
 *
 * Creates the four inventory tables when they are missing. Safe to run on every
 * start. Ids are SERIAL on PostgreSQL and INTEGER PRIMARY KEY AUTOINCREMENT on
 * SQLite, so a deleted id is never handed out again.
 */

import type { ColumnDefinitionBuilder, Kysely } from 'kysely';
import type { DB } from './types.js';
import type { StoreDialect } from './kysely.js';
import { dbLogger } from '../utils/logger.js';

export async function migrate(db: Kysely<DB>, dialect: StoreDialect): Promise<void> {
    const idType = dialect === 'postgres' ? 'serial' : 'integer';
    const idColumn = (col: ColumnDefinitionBuilder): ColumnDefinitionBuilder =>
        dialect === 'postgres' ? col.primaryKey() : col.primaryKey().autoIncrement();

    await db.schema
        .createTable('users')
        .ifNotExists()
        .addColumn('id', idType, idColumn)
        .addColumn('username', 'varchar(50)', (col) => col.notNull().unique())
        .addColumn('password_hash', 'varchar(128)', (col) => col.notNull())
        .execute();

    await db.schema
        .createTable('locations')
        .ifNotExists()
        .addColumn('id', idType, idColumn)
        // Reference locations are seeded by office code; the index settles concurrent seeds
        .addColumn('office', 'varchar(10)', (col) => col.unique())
        .addColumn('zone', 'varchar(10)')
        .addColumn('bay', 'varchar(10)')
        .execute();

    await db.schema
        .createTable('stock')
        .ifNotExists()
        .addColumn('id', idType, idColumn)
        .addColumn('serial', 'varchar(50)', (col) => col.notNull().unique())
        .addColumn('mfg', 'varchar(50)')
        .addColumn('dimen', 'varchar(50)')
        .addColumn('type', 'varchar(50)')
        .addColumn('modifier', 'varchar(50)')
        .addColumn('location_id', 'integer', (col) => col.references('locations.id'))
        .execute();

    await db.schema
        .createIndex('stock_location_id_idx')
        .ifNotExists()
        .on('stock')
        .column('location_id')
        .execute();

    await db.schema
        .createTable('notes')
        .ifNotExists()
        .addColumn('id', idType, idColumn)
        .addColumn('content', 'varchar(500)', (col) => col.notNull())
        .addColumn('timestamp', 'varchar(50)', (col) => col.notNull())
        .execute();

    dbLogger.debug({ dialect }, 'Schema ready');
}
