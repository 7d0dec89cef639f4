/**
 * Persistence Store
 *
 * Usage:
 *   import { openInventoryStore } from './db/index.js';
 *
 *   const store = await openInventoryStore(config.databaseUrl);
 *   const notes = await store.read((repo) => repo.listNotesNewestFirst());
 *   await store.close();
 */

export { openInventoryStore, KyselyInventoryStore } from './store.js';
export type { InventoryStore, UnitOfWork } from './store.js';
export { createDatabase, resolveDialect } from './kysely.js';
export type { DatabaseHandle, StoreDialect } from './kysely.js';
export { migrate } from './schema.js';
export { toConstraintViolation } from './constraints.js';
export { KyselyInventoryRepository } from './queries/index.js';
export type { InventoryRepository } from './queries/index.js';
export type { DB } from './types.js';
