/**
 * Least-recently-used eviction cache.
 *
 * @packageDocumentation
 */

export { createLruCache } from './lru-cache.js';
export type { LruCache, LruCacheOptions } from './types.js';
