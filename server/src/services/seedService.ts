/**
 * Reference Data Seeding
 *
 * Makes sure the baseline locations, user and stock exist exactly once. Runs on
 * every start, before the server accepts requests.
 *
 * IDEMPOTENCY:
 * - Each record is looked up by its natural key and inserted only when absent
 * - Lookup + insert share one transaction per record
 * - A ConstraintViolationError (another initializer got there first) rolls that
 *   record back, is logged, and seeding moves on
 *
 * USAGE:
 * ```ts
 * const report = await seedReferenceData({ store, hasher, password: config.seedUserPassword });
 * // report: { created: ['location:TPA', ...], skipped: [...], failed: [...] }
 * ```
 */

import type { Logger } from 'pino';
import {
    REFERENCE_LOCATIONS,
    REFERENCE_STOCK,
    REFERENCE_USER,
    DEFAULT_REFERENCE_PASSWORD,
    formatLocationCode,
} from '@stockroom/shared';
import type { InventoryStore, UnitOfWork } from '../db/index.js';
import type { PasswordHasher } from './passwordHasher.js';
import { ConstraintViolationError } from '../utils/errors.js';
import { seedLogger } from '../utils/logger.js';

// ============================================
// TYPE DEFINITIONS
// ============================================

export interface SeedDeps {
    store: InventoryStore;
    hasher: PasswordHasher;
    /** Password for the reference user when it is first created */
    password?: string;
    logger?: Logger;
}

/** Record keys look like `location:TPA`, `user:max`, `stock:1137` */
export interface SeedReport {
    created: string[];
    skipped: string[];
    failed: string[];
}

/** Resolves true when the record was inserted, false when it already existed */
type SeedStep = UnitOfWork<boolean>;

// ============================================
// SEEDING
// ============================================

async function runStep(
    store: InventoryStore,
    key: string,
    step: SeedStep,
    report: SeedReport,
    log: Logger
): Promise<void> {
    try {
        const created = await store.write(step);
        if (created) {
            report.created.push(key);
            log.info({ key }, 'Seeded reference record');
        } else {
            report.skipped.push(key);
        }
    } catch (error) {
        if (error instanceof ConstraintViolationError) {
            report.failed.push(key);
            log.warn({ key, constraint: error.constraint }, 'Seed commit rejected, rolled back and continuing');
            return;
        }
        throw error;
    }
}

export async function seedReferenceData(deps: SeedDeps): Promise<SeedReport> {
    const { store, hasher } = deps;
    const log = deps.logger ?? seedLogger;
    const report: SeedReport = { created: [], skipped: [], failed: [] };

    for (const location of REFERENCE_LOCATIONS) {
        await runStep(
            store,
            `location:${location.office}`,
            async (repo) => {
                if (await repo.findLocationByOffice(location.office)) return false;
                await repo.insertLocation(location);
                return true;
            },
            report,
            log
        );
    }

    // Hash outside the transaction so no connection is held while bcrypt runs
    const passwordHash = await hasher.hash(deps.password ?? DEFAULT_REFERENCE_PASSWORD);
    await runStep(
        store,
        `user:${REFERENCE_USER.username}`,
        async (repo) => {
            if (await repo.findUserByUsername(REFERENCE_USER.username)) return false;
            await repo.insertUser({ username: REFERENCE_USER.username, passwordHash });
            return true;
        },
        report,
        log
    );

    for (const item of REFERENCE_STOCK) {
        await runStep(
            store,
            `stock:${item.serial}`,
            async (repo) => {
                if (await repo.findStockBySerial(item.serial)) return false;

                const location = await repo.findLocationByOffice(item.office);
                if (!location) {
                    log.warn({ serial: item.serial, office: item.office }, 'Reference location missing, seeding stock unplaced');
                }

                await repo.insertStock({
                    serial: item.serial,
                    mfg: item.mfg,
                    dimen: item.dimen,
                    type: item.type,
                    modifier: item.modifier,
                    locationId: location?.id ?? null,
                });
                if (location) {
                    log.debug({ serial: item.serial, location: formatLocationCode(location) }, 'Placed reference stock');
                }
                return true;
            },
            report,
            log
        );
    }

    log.info(
        { created: report.created.length, skipped: report.skipped.length, failed: report.failed.length },
        'Reference data ready'
    );
    return report;
}
