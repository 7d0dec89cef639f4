/**
 * Inventory Service
 *
 * Session-gated create/list operations for stock and notes.
 *
 * GATING:
 * - Every operation takes the caller's SessionState first
 * - Anonymous callers get `rejected/unauthenticated` (mutations) or null (listings)
 *   and the store is never touched
 *
 * EXPECTED FAILURES DO NOT ESCAPE AS ERRORS:
 * - Invalid input → `rejected/invalid`, no store access
 * - Duplicate serial / unknown location → transaction rolled back, logged,
 *   `rejected/constraint`
 * - Any other store failure on addStock (DatabaseError) reaches the HTTP error
 *   handler; addNote reports it as `rejected/store_error`
 * The HTTP layer redirects the same way for every outcome; the reason is for
 * logs and tests.
 *
 * USAGE:
 * ```ts
 * const outcome = await inventory.addStock(req.sessionState, req.body);
 * // { status: 'created', id: 12 } | { status: 'rejected', reason: 'constraint' }
 * ```
 */

import type { Logger } from 'pino';
import {
    AddNoteSchema,
    AddStockSchema,
    formatNoteTimestamp,
    indexLocationsById,
} from '@stockroom/shared';
import type {
    AddNoteBody,
    AddNoteInput,
    AddStockBody,
    AddStockInput,
    InventorySnapshot,
    NewStock,
    Note,
    StockWithLocation,
} from '@stockroom/shared';
import type { ZodError } from 'zod';
import type { InventoryStore } from '../db/index.js';
import { isAuthenticated } from './sessionGate.js';
import type { SessionState } from './sessionGate.js';
import { ConstraintViolationError } from '../utils/errors.js';
import { inventoryLogger } from '../utils/logger.js';

// ============================================
// TYPE DEFINITIONS
// ============================================

export type RejectionReason = 'unauthenticated' | 'invalid' | 'constraint' | 'store_error';

export type MutationOutcome =
    | { status: 'created'; id: number }
    | { status: 'rejected'; reason: RejectionReason };

export interface InventoryServiceDeps {
    store: InventoryStore;
    logger?: Logger;
    /** Source of note timestamps */
    clock?: () => Date;
}

const rejected = (reason: RejectionReason): MutationOutcome => ({ status: 'rejected', reason });

/** Log fields for a rejected submission */
function describeIssues(error: ZodError): { details: { path: string; message: string }[] } {
    return { details: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })) };
}

// ============================================
// SERVICE
// ============================================

export class InventoryService {
    private readonly store: InventoryStore;
    private readonly log: Logger;
    private readonly clock: () => Date;

    constructor(deps: InventoryServiceDeps) {
        this.store = deps.store;
        this.log = deps.logger ?? inventoryLogger;
        this.clock = deps.clock ?? (() => new Date());
    }

    /**
     * Record a stock item. The location id is not checked here; the store's
     * foreign key rejects ids that do not exist.
     */
    async addStock(session: SessionState, input: Partial<AddStockBody>): Promise<MutationOutcome> {
        if (!isAuthenticated(session)) {
            this.log.debug('addStock skipped: not logged in');
            return rejected('unauthenticated');
        }

        const parsed = AddStockSchema.safeParse(input);
        if (!parsed.success) {
            this.log.debug(describeIssues(parsed.error), 'addStock rejected: invalid submission');
            return rejected('invalid');
        }

        const { location_id: locationId, ...fields }: AddStockInput = parsed.data;
        const item: NewStock = { ...fields, locationId };

        try {
            const id = await this.store.write((repo) => repo.insertStock(item));
            this.log.info({ id, serial: item.serial, locationId, username: session.username }, 'Stock added');
            return { status: 'created', id };
        } catch (error) {
            if (error instanceof ConstraintViolationError) {
                this.log.warn(
                    { serial: item.serial, locationId, constraint: error.constraint },
                    error.constraint === 'unique'
                        ? `Stock not added: serial ${item.serial} already exists`
                        : 'Stock not added: rejected by store'
                );
                return rejected('constraint');
            }
            throw error;
        }
    }

    /**
     * Users, stock and locations for the index view; null when anonymous.
     * Stock locations are resolved with one batched lookup, not one query per row.
     */
    async listInventory(session: SessionState): Promise<InventorySnapshot | null> {
        if (!isAuthenticated(session)) return null;

        return this.store.read(async (repo) => {
            const users = await repo.listUsers();
            const stock = await repo.listStock();
            const locations = await repo.listLocations();

            const locationIds = [
                ...new Set(stock.map((item) => item.locationId).filter((id): id is number => id !== null)),
            ];
            const byId = indexLocationsById(await repo.findLocationsByIds(locationIds));

            const resolved: StockWithLocation[] = stock.map((item) => ({
                ...item,
                location: item.locationId === null ? null : (byId.get(item.locationId) ?? null),
            }));

            return { users, stock: resolved, locations };
        });
    }

    /**
     * Save a note stamped with the current wall-clock time.
     */
    async addNote(session: SessionState, input: Partial<AddNoteBody>): Promise<MutationOutcome> {
        if (!isAuthenticated(session)) {
            this.log.debug('addNote skipped: not logged in');
            return rejected('unauthenticated');
        }

        const parsed = AddNoteSchema.safeParse(input);
        if (!parsed.success) {
            this.log.debug(describeIssues(parsed.error), 'addNote rejected: invalid submission');
            return rejected('invalid');
        }

        const body: AddNoteInput = parsed.data;
        const note = {
            content: body.note_content,
            timestamp: formatNoteTimestamp(this.clock()),
        };

        try {
            const id = await this.store.write((repo) => repo.insertNote(note));
            this.log.info({ id, username: session.username }, 'Note added');
            return { status: 'created', id };
        } catch (error) {
            if (error instanceof ConstraintViolationError) {
                this.log.warn({ constraint: error.constraint }, 'Note not saved: rejected by store');
                return rejected('constraint');
            }
            this.log.error({ err: error }, 'Note not saved');
            return rejected('store_error');
        }
    }

    /** All notes, newest first; null when anonymous */
    async listNotes(session: SessionState): Promise<Note[] | null> {
        if (!isAuthenticated(session)) return null;
        return this.store.read((repo) => repo.listNotesNewestFirst());
    }
}
