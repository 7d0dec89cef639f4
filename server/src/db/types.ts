/**
 * Database table types for Kysely
 *
 * Column names match the SQL schema in ./schema.ts. Keep the two in step when
 * adding a column.
 */

import type { Generated, Selectable } from 'kysely';

export interface UsersTable {
    id: Generated<number>;
    username: string;
    password_hash: string;
}

export interface LocationsTable {
    id: Generated<number>;
    office: string | null;
    zone: string | null;
    bay: string | null;
}

export interface StockTable {
    id: Generated<number>;
    serial: string;
    mfg: string | null;
    dimen: string | null;
    type: string | null;
    modifier: string | null;
    location_id: number | null;
}

export interface NotesTable {
    id: Generated<number>;
    content: string;
    timestamp: string;
}

export interface DB {
    users: UsersTable;
    locations: LocationsTable;
    stock: StockTable;
    notes: NotesTable;
}

export type UserRow = Selectable<UsersTable>;
export type LocationRow = Selectable<LocationsTable>;
export type StockRow = Selectable<StockTable>;
export type NoteRow = Selectable<NotesTable>;

