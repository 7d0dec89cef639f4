/**
 * Kysely Inventory Repository
 *
 * Every query the app runs against the four inventory tables. An instance is
 * bound to one connection or one transaction by InventoryStore; never keep one
 * past the unit of work that created it.
 *
 * Rows come back snake_case and leave this module as camelCase domain records.
 */

import { sql } from 'kysely';
import type { Kysely } from 'kysely';
import type {
    Location,
    NewLocation,
    NewNote,
    NewStock,
    NewUser,
    Note,
    Stock,
    UserRecord,
    UserSummary,
} from '@stockroom/shared';
import type { DB, LocationRow, NoteRow, StockRow, UserRow } from '../types.js';

// ============================================
// CONTRACT
// ============================================

export interface InventoryRepository {
    insertUser(user: NewUser): Promise<number>;
    insertLocation(location: NewLocation): Promise<number>;
    insertStock(stock: NewStock): Promise<number>;
    insertNote(note: NewNote): Promise<number>;

    findUserByUsername(username: string): Promise<UserRecord | undefined>;
    findLocationByOffice(office: string): Promise<Location | undefined>;
    findStockBySerial(serial: string): Promise<Stock | undefined>;
    countStockBySerial(serial: string): Promise<number>;
    /** One query for any number of ids; unknown ids are simply absent */
    findLocationsByIds(ids: readonly number[]): Promise<Location[]>;

    listUsers(): Promise<UserSummary[]>;
    listLocations(): Promise<Location[]>;
    listStock(): Promise<Stock[]>;
    listNotesNewestFirst(): Promise<Note[]>;

    ping(): Promise<void>;
}

// ============================================
// ROW MAPPERS
// ============================================

function toUserRecord(row: UserRow): UserRecord {
    return { id: row.id, username: row.username, passwordHash: row.password_hash };
}

function toLocation(row: LocationRow): Location {
    return { id: row.id, office: row.office, zone: row.zone, bay: row.bay };
}

function toStock(row: StockRow): Stock {
    return {
        id: row.id,
        serial: row.serial,
        mfg: row.mfg,
        dimen: row.dimen,
        type: row.type,
        modifier: row.modifier,
        locationId: row.location_id,
    };
}

function toNote(row: NoteRow): Note {
    return { id: row.id, content: row.content, timestamp: row.timestamp };
}

// ============================================
// IMPLEMENTATION
// ============================================

export class KyselyInventoryRepository implements InventoryRepository {
    constructor(private readonly db: Kysely<DB>) {}

    async insertUser(user: NewUser): Promise<number> {
        const row = await this.db
            .insertInto('users')
            .values({ username: user.username, password_hash: user.passwordHash })
            .returning('id')
            .executeTakeFirstOrThrow();
        return row.id;
    }

    async insertLocation(location: NewLocation): Promise<number> {
        const row = await this.db
            .insertInto('locations')
            .values({ office: location.office, zone: location.zone, bay: location.bay })
            .returning('id')
            .executeTakeFirstOrThrow();
        return row.id;
    }

    async insertStock(stock: NewStock): Promise<number> {
        const row = await this.db
            .insertInto('stock')
            .values({
                serial: stock.serial,
                mfg: stock.mfg,
                dimen: stock.dimen,
                type: stock.type,
                modifier: stock.modifier,
                location_id: stock.locationId,
            })
            .returning('id')
            .executeTakeFirstOrThrow();
        return row.id;
    }

    async insertNote(note: NewNote): Promise<number> {
        const row = await this.db
            .insertInto('notes')
            .values({ content: note.content, timestamp: note.timestamp })
            .returning('id')
            .executeTakeFirstOrThrow();
        return row.id;
    }

    async findUserByUsername(username: string): Promise<UserRecord | undefined> {
        const row = await this.db
            .selectFrom('users')
            .selectAll()
            .where('username', '=', username)
            .executeTakeFirst();
        return row ? toUserRecord(row) : undefined;
    }

    async findLocationByOffice(office: string): Promise<Location | undefined> {
        const row = await this.db
            .selectFrom('locations')
            .selectAll()
            .where('office', '=', office)
            .orderBy('id')
            .limit(1)
            .executeTakeFirst();
        return row ? toLocation(row) : undefined;
    }

    async findStockBySerial(serial: string): Promise<Stock | undefined> {
        const row = await this.db
            .selectFrom('stock')
            .selectAll()
            .where('serial', '=', serial)
            .executeTakeFirst();
        return row ? toStock(row) : undefined;
    }

    async countStockBySerial(serial: string): Promise<number> {
        const row = await this.db
            .selectFrom('stock')
            .select((eb) => eb.fn.countAll().as('count'))
            .where('serial', '=', serial)
            .executeTakeFirstOrThrow();
        // pg returns bigint counts as strings
        return Number(row.count);
    }

    async findLocationsByIds(ids: readonly number[]): Promise<Location[]> {
        if (ids.length === 0) return [];
        const rows = await this.db
            .selectFrom('locations')
            .selectAll()
            .where('id', 'in', [...ids])
            .orderBy('id')
            .execute();
        return rows.map(toLocation);
    }

    async listUsers(): Promise<UserSummary[]> {
        return this.db.selectFrom('users').select(['id', 'username']).orderBy('id').execute();
    }

    async listLocations(): Promise<Location[]> {
        const rows = await this.db.selectFrom('locations').selectAll().orderBy('id').execute();
        return rows.map(toLocation);
    }

    async listStock(): Promise<Stock[]> {
        const rows = await this.db.selectFrom('stock').selectAll().orderBy('id').execute();
        return rows.map(toStock);
    }

    async listNotesNewestFirst(): Promise<Note[]> {
        const rows = await this.db.selectFrom('notes').selectAll().orderBy('id', 'desc').execute();
        return rows.map(toNote);
    }

    async ping(): Promise<void> {
        await sql`select 1`.execute(this.db);
    }
}
