import type { Result } from 'neverthrow';
import type { MissingKeysError } from '../errors.js';
import type { LoggerOptions } from '../logging/logger.js';
import type { Cacheable, CacheSeedOptions, ObservableCache } from '../types.js';
import type { ValueType } from '../value-type/value-type.js';

/**
 * Resolves a required key, throwing when the key is misused.
 */
export interface ResolveRequired<K, V> {
  (key: K): V;
  <T>(key: K, type: ValueType<T>): T;
}

/**
 * Replaces the value of a required key with `fn(current)`.
 */
export interface UpdateRequired<K, V> {
  (key: K, fn: (current: V) => V): V;
  <T>(key: K, type: ValueType<T>, fn: (current: T) => V): V;
}

/**
 * Passes the value of a required key to `fn` and returns its result.
 */
export interface UseRequired<K, V> {
  <R>(key: K, fn: (current: V) => R): R;
  <T, R>(key: K, type: ValueType<T>, fn: (current: T) => R): R;
}

/**
 * Cache with a set of keys that must always be present.
 *
 * Required keys are checked when the cache is created and whenever the
 * set is replaced. `remove` leaves required keys in place.
 */
export interface RequiredKeysCache<K, V>
  extends Cacheable<K, V, RequiredKeysCache<K, V>>,
    ObservableCache<K, V> {
  /** Snapshot of the required keys */
  readonly requiredKeys: () => ReadonlySet<K>;

  /**
   * Replaces the required keys. The set is only replaced when every key
   * in it is present.
   */
  readonly setRequiredKeys: (keys: Iterable<K>) => Result<void, MissingKeysError<K>>;

  /**
   * @throws RequiredKeyError if the key is not required
   * @throws CacheAccessError if the value cannot be resolved as the requested type
   */
  readonly resolveRequired: ResolveRequired<K, V>;

  /**
   * @returns The new value
   * @throws RequiredKeyError or CacheAccessError, as for `resolveRequired`
   */
  readonly update: UpdateRequired<K, V>;

  /**
   * @throws RequiredKeyError or CacheAccessError, as for `resolveRequired`
   */
  readonly use: UseRequired<K, V>;
}

/**
 * Options for creating a required-keys cache.
 */
export interface RequiredKeysCacheOptions<K, V> extends CacheSeedOptions<K, V>, LoggerOptions {
  /** Keys that must be present (default: the keys of the initial values) */
  readonly requiredKeys?: Iterable<K> | undefined;
}
