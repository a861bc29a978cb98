/**
 * Caches persisted to JSON files.
 *
 * @packageDocumentation
 */

export { createPersistableCache, createPersistableValueCache } from './persistable-cache.js';
export type { PersistableCache, PersistableCacheOptions, PersistenceCodec } from './types.js';
