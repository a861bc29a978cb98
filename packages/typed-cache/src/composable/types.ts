import type { LoggerOptions } from '../logging/logger.js';
import type { Cacheable } from '../types.js';

/**
 * A stage of a composable pipeline: any cache over `unknown` values.
 *
 * Typed caches become stages through `eraseCache`.
 */
export type CacheStage<K> = Cacheable<K, unknown>;

/**
 * Ordered pipeline of caches read in priority order and written to as a
 * whole.
 *
 * Reads take the first stage that yields a value. Writes and removals fan
 * out to every stage. Enumeration is "first match wins": the snapshot of
 * the first stage with a non-empty result, never a union across stages.
 */
export interface ComposableCache<K> extends Cacheable<K, unknown, ComposableCache<K>> {
  /** Stages in read priority order, fixed at construction */
  readonly stages: readonly CacheStage<K>[];
}

/**
 * Options for creating a composable cache.
 */
export interface ComposableCacheOptions<K> extends LoggerOptions {
  /** Stages in read priority order */
  readonly stages: readonly CacheStage<K>[];
}
