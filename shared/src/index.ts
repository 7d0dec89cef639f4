/**
 * @stockroom/shared - Shared types, schemas and reference data
 *
 * Pure code only: no database or HTTP dependencies, so anything here can be
 * imported from the server, scripts and tests alike.
 */

// Entity types (type-only)
export type * from './types/index.js';

// Zod schemas + inferred input types
export * from './schemas/index.js';

// Reference data and location helpers
export * from './domain/index.js';

// Pure utilities
export * from './utils/index.js';
