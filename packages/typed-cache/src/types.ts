import type { Result } from 'neverthrow';
import type { CacheFailure, MissingKeysError } from './errors.js';
import type { ValueType } from './value-type/value-type.js';

/**
 * Reads a key, optionally as a requested type.
 *
 * Without a descriptor the stored value is returned as is. With one, a
 * present value that the descriptor rejects reads as absent.
 */
export interface CacheGet<K, V> {
  (key: K): V | undefined;
  <T>(key: K, type: ValueType<T>): T | undefined;
}

/**
 * Resolves a key, optionally as a requested type.
 *
 * Unlike {@link CacheGet}, absence and a type mismatch are reported as
 * distinct failures.
 */
export interface CacheResolve<K, V> {
  (key: K): Result<V, CacheFailure<K>>;
  <T>(key: K, type: ValueType<T>): Result<T, CacheFailure<K>>;
}

/**
 * The capability contract shared by every cache variant.
 *
 * `TSelf` is the concrete cache type returned by the `require` gates so
 * that checks can be chained on the cache that was validated.
 */
export interface Cacheable<K, V, TSelf = unknown> {
  /**
   * Gets a value from the cache.
   * @returns The value, or undefined if absent or not of the requested type
   */
  readonly get: CacheGet<K, V>;

  /**
   * Resolves a value from the cache.
   * @returns Result with the value, or a missing key / type mismatch failure
   */
  readonly resolve: CacheResolve<K, V>;

  /**
   * Stores a value, replacing any previous value for the key.
   */
  readonly set: (key: K, value: V) => void;

  /**
   * Removes a key. Removing an absent key does nothing.
   */
  readonly remove: (key: K) => void;

  /**
   * Checks whether the cache holds a value for the key.
   */
  readonly contains: (key: K) => boolean;

  /**
   * Checks that a key is present.
   * @returns Result with the cache itself, or the missing key
   */
  readonly require: (key: K) => Result<TSelf, MissingKeysError<K>>;

  /**
   * Checks that every key is present.
   * @returns Result with the cache itself, or every missing key
   */
  readonly requireKeys: (keys: Iterable<K>) => Result<TSelf, MissingKeysError<K>>;

  /**
   * Snapshot of the entries whose value matches the descriptor.
   */
  readonly valuesOfType: <T>(type: ValueType<T>) => ReadonlyMap<K, T>;

  /**
   * Snapshot of every entry.
   */
  readonly allValues: () => ReadonlyMap<K, V>;
}

/**
 * Options every cache factory accepts for seeding its entries.
 */
export interface CacheSeedOptions<K, V> {
  /** Entries to start with (a Map, or any iterable of pairs) */
  readonly initialValues?: Iterable<readonly [K, V]> | undefined;
}

/**
 * A change applied to a cache, delivered to subscribers.
 */
export type CacheChange<K, V> =
  | { readonly type: 'set'; readonly key: K; readonly value: V }
  | { readonly type: 'remove'; readonly key: K };

/**
 * Listener notified after a change has been committed and the cache's
 * lock released.
 *
 * @param change - The change that was applied
 * @param snapshot - Read-only copy of every entry after the change
 */
export type CacheListener<K, V> = (change: CacheChange<K, V>, snapshot: ReadonlyMap<K, V>) => void;

/**
 * A cache that publishes its changes.
 */
export interface ObservableCache<K, V> {
  /**
   * Registers a change listener.
   * @returns A function that removes the listener
   */
  readonly subscribe: (listener: CacheListener<K, V>) => () => void;
}
