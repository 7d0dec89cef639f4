/**
 * Server entry point
 *
 * Startup order: config → store (schema migration) → reference data → HTTP.
 * The listener only opens once seeding has finished.
 */

// Must load before the logger reads LOG_LEVEL
import 'dotenv/config';
import type { Server } from 'node:http';
import { loadConfig } from './config/env.js';
import { openInventoryStore } from './db/index.js';
import { seedReferenceData } from './services/seedService.js';
import { createBcryptHasher } from './services/passwordHasher.js';
import { createApp } from './app.js';
import { serverLogger } from './utils/logger.js';
import { registerServerShutdown, shutdownCoordinator } from './utils/shutdownCoordinator.js';

async function main(): Promise<void> {
    const config = loadConfig();
    const store = await openInventoryStore(config.databaseUrl);

    const hasher = createBcryptHasher(config.bcryptRounds);
    await seedReferenceData({ store, hasher, password: config.seedUserPassword });

    const { app } = createApp({ store, config, hasher });
    const server: Server = app.listen(config.port, () => {
        serverLogger.info({ port: config.port, env: config.nodeEnv }, 'Server listening');
    });
    server.on('error', (error) => {
        serverLogger.fatal({ err: error, port: config.port }, 'HTTP server error');
        process.exit(1);
    });

    registerServerShutdown(shutdownCoordinator, server, store);

    for (const signal of ['SIGTERM', 'SIGINT'] as const) {
        process.once(signal, () => {
            serverLogger.info({ signal }, 'Shutdown requested');
            shutdownCoordinator
                .shutdown()
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    serverLogger.fatal({ err: error }, 'Shutdown failed');
                    process.exit(1);
                });
        });
    }
}

main().catch((error: unknown) => {
    serverLogger.fatal({ err: error }, 'Server failed to start');
    process.exit(1);
});
