import type { LoggerOptions } from '../logging/logger.js';
import type { Cacheable, CacheSeedOptions, ObservableCache } from '../types.js';
import type { ExpirationDuration } from './duration.js';

/**
 * Cache whose entries expire a fixed duration after they are written.
 *
 * Expired entries are evicted lazily: `get`, `resolve`, `contains` and the
 * `require` gates drop an expired entry when they find it. `valuesOfType`
 * and `allValues` skip expired entries without evicting them.
 */
export interface ExpiringCache<K, V>
  extends Cacheable<K, V, ExpiringCache<K, V>>,
    ObservableCache<K, V> {
  /** Duration applied to every write */
  readonly duration: ExpirationDuration;

  /**
   * Expiration time of a live entry (Unix timestamp ms), or undefined if
   * the key is absent or expired.
   */
  readonly expirationOf: (key: K) => number | undefined;

  /**
   * Evicts every expired entry now.
   * @returns The keys that were evicted
   */
  readonly purgeExpired: () => readonly K[];
}

/**
 * Options for creating an expiring cache.
 */
export interface ExpiringCacheOptions<K, V> extends CacheSeedOptions<K, V>, LoggerOptions {
  /** Lifetime of each entry (default: 1 hour) */
  readonly duration?: ExpirationDuration | undefined;
  /** Clock returning the current time in ms (default: Date.now) */
  readonly now?: (() => number) | undefined;
}

/**
 * Internal entry pairing a value with its expiration time.
 */
export interface ExpiringEntry<V> {
  readonly value: V;
  /** Unix timestamp ms at or after which the entry is expired */
  readonly expiration: number;
}
