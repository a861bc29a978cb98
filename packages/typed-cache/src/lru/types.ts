import type { LoggerOptions } from '../logging/logger.js';
import type { Cacheable, CacheSeedOptions, ObservableCache } from '../types.js';

/**
 * Capacity-bounded cache evicting the least recently used key.
 *
 * `get` (on a type-compatible hit), `contains` (on a hit), `resolve` (on a
 * present key) and `set` all count as a use and move the key to the most
 * recently used end. `require`, `valuesOfType` and `allValues` are pure
 * reads and leave recency unchanged.
 */
export interface LruCache<K, V> extends Cacheable<K, V, LruCache<K, V>>, ObservableCache<K, V> {
  /** Maximum number of entries kept */
  readonly capacity: number;

  /**
   * Keys ordered from least to most recently used.
   */
  readonly recency: () => readonly K[];

  /**
   * Number of entries.
   */
  readonly size: () => number;
}

/**
 * Options for creating an LRU cache.
 */
export interface LruCacheOptions<K, V> extends CacheSeedOptions<K, V>, LoggerOptions {
  /**
   * Maximum number of entries (default: the number of initial values).
   * A capacity of 0 evicts every write immediately.
   */
  readonly capacity?: number | undefined;
}
