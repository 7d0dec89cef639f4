/**
 * Seed Reference Data
 *
 * Creates the schema if needed and inserts the reference locations, user and
 * stock. Safe to run multiple times - existing records are left alone.
 *
 * Usage: npm run seed
 */

// Must load before the logger reads LOG_LEVEL
import 'dotenv/config';
import { loadConfig } from '../config/env.js';
import { openInventoryStore } from '../db/index.js';
import { seedReferenceData } from '../services/seedService.js';
import { createBcryptHasher } from '../services/passwordHasher.js';
import { seedLogger } from '../utils/logger.js';

async function main(): Promise<void> {
    const config = loadConfig();
    const store = await openInventoryStore(config.databaseUrl);

    try {
        const report = await seedReferenceData({
            store,
            hasher: createBcryptHasher(config.bcryptRounds),
            password: config.seedUserPassword,
        });
        seedLogger.info(report, 'Seed finished');
    } finally {
        await store.close();
    }
}

main().catch((error: unknown) => {
    seedLogger.fatal({ err: error }, 'Seed error');
    process.exit(1);
});
