import type { LoggerOptions } from '../logging/logger.js';
import type { Cacheable, CacheSeedOptions, ObservableCache } from '../types.js';

/**
 * Thread-safe mapping from key to value with no eviction or expiry
 * policy. Every other cache variant is built on one.
 */
export interface KeyValueStore<K, V>
  extends Cacheable<K, V, KeyValueStore<K, V>>,
    ObservableCache<K, V> {
  /**
   * Removes every entry, publishing a remove change for each.
   */
  readonly clear: () => void;

  /**
   * Number of entries.
   */
  readonly size: () => number;

  /**
   * Snapshot of the keys in insertion order.
   */
  readonly keys: () => readonly K[];
}

/**
 * Options for creating a key-value store.
 */
export interface KeyValueStoreOptions<K, V> extends CacheSeedOptions<K, V>, LoggerOptions {
  /** Name of the store's lock, reported on re-entry (default: 'key-value-store') */
  readonly name?: string | undefined;
}

/**
 * Internal boxed entry.
 */
export interface StoredValue<V> {
  readonly value: V;
}
