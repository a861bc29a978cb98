/**
 * Type-erased views and composable cache pipelines.
 *
 * @packageDocumentation
 */

export { eraseCache, type AnyCacheable } from './any-cacheable.js';
export { createComposableCache, createComposableCacheFromValues } from './composable-cache.js';
export type { CacheStage, ComposableCache, ComposableCacheOptions } from './types.js';
