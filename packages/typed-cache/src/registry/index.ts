/**
 * Explicitly created registry of shared caches.
 *
 * @packageDocumentation
 */

export { createCacheRegistry, createLoggerAccessor } from './cache-registry.js';
export type { CacheRegistry, CacheRegistryOptions } from './cache-registry.js';
