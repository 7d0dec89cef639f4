export { KyselyInventoryRepository } from './inventoryRepository.js';
export type { InventoryRepository } from './inventoryRepository.js';
