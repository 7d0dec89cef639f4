/**
 * Entity Types
 *
 * Plain data shapes passed between the store, the services and the view layer.
 * Row types (snake_case columns) live with the database code in the server package;
 * these are the camelCase domain records the rest of the app works with.
 */

// ============================================
// USERS
// ============================================

/** User as shown in listings - never carries the password hash */
export interface UserSummary {
    id: number;
    username: string;
}

/** Full user record, only read by the auth service */
export interface UserRecord extends UserSummary {
    passwordHash: string;
}

export interface NewUser {
    username: string;
    passwordHash: string;
}

// ============================================
// LOCATIONS
// ============================================

/** Physical storage slot: office / zone / bay */
export interface Location {
    id: number;
    office: string | null;
    zone: string | null;
    bay: string | null;
}

export type NewLocation = Omit<Location, 'id'>;

// ============================================
// STOCK
// ============================================

export interface Stock {
    id: number;
    serial: string;
    mfg: string | null;
    dimen: string | null;
    type: string | null;
    modifier: string | null;
    /** Non-owning reference; null when the item is not placed anywhere */
    locationId: number | null;
}

export type NewStock = Omit<Stock, 'id'>;

/** Stock row with its location resolved for display */
export interface StockWithLocation extends Stock {
    location: Location | null;
}

// ============================================
// NOTES
// ============================================

export interface Note {
    id: number;
    content: string;
    /** Server wall-clock time at creation, `YYYY-MM-DD HH:MM:SS` */
    timestamp: string;
}

export type NewNote = Omit<Note, 'id'>;

// ============================================
// VIEWS
// ============================================

export interface InventorySnapshot {
    users: UserSummary[];
    stock: StockWithLocation[];
    locations: Location[];
}
