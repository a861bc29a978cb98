import type { Result } from 'neverthrow';
import {
  CacheAccessError,
  RequiredKeyError,
  type CacheFailure,
  type MissingKeysError,
} from '../errors.js';
import { resolveLogger } from '../logging/logger.js';
import { createKeyValueStore } from '../store/key-value-store.js';
import type { ValueType } from '../value-type/value-type.js';
import type { RequiredKeysCache, RequiredKeysCacheOptions } from './types.js';

/**
 * Creates a cache whose required keys are always present.
 *
 * Fails with every missing key when the initial values do not cover the
 * required keys. Entries live in an inner key-value store; the required
 * key set is the only state of its own.
 *
 * `update` and `use` call `fn` outside any lock, so `fn` may read or write
 * the cache. An update is therefore a resolve followed by a set, not one
 * atomic step.
 *
 * @param options - Required keys, initial values and logger
 * @returns Result with the cache, or the required keys that are missing
 *
 * @example
 * ```typescript
 * const result = createRequiredKeysCache<string, unknown>({
 *   initialValues: [['apiUrl', 'http://localhost:3000'], ['retries', 3]],
 * });
 * if (result.isErr()) {
 *   throw new Error(result.error.message);
 * }
 * const settings = result.value;
 *
 * settings.remove('retries'); // ignored: required
 * settings.update('retries', valueType.number, (retries) => retries + 1); // 4
 * settings.resolveRequired('timeout'); // throws RequiredKeyError
 * ```
 */
export const createRequiredKeysCache = <K, V>(
  options: RequiredKeysCacheOptions<K, V> = {}
): Result<RequiredKeysCache<K, V>, MissingKeysError<K>> => {
  const seed = [...(options.initialValues ?? [])];
  const logger = resolveLogger(options, 'required-keys-cache');
  const store = createKeyValueStore<K, V>({
    name: 'required-keys-cache/store',
    initialValues: seed,
    logger,
  });
  let required: ReadonlySet<K> = new Set(options.requiredKeys ?? seed.map(([key]) => key));

  function resolveRequired(key: K): V;
  function resolveRequired<T>(key: K, type: ValueType<T>): T;
  function resolveRequired<T>(key: K, type?: ValueType<T>): V | T {
    if (!required.has(key)) {
      throw new RequiredKeyError(key);
    }
    const result: Result<V | T, CacheFailure<K>> =
      type === undefined ? store.resolve(key) : store.resolve(key, type);
    if (result.isErr()) {
      throw new CacheAccessError(result.error);
    }
    return result.value;
  }

  function update(key: K, fn: (current: V) => V): V;
  function update<T>(key: K, type: ValueType<T>, fn: (current: T) => V): V;
  function update<T>(
    key: K,
    ...args: [fn: (current: V) => V] | [type: ValueType<T>, fn: (current: T) => V]
  ): V {
    const next =
      args.length === 1 ? args[0](resolveRequired(key)) : args[1](resolveRequired(key, args[0]));
    store.set(key, next);
    return next;
  }

  function use<R>(key: K, fn: (current: V) => R): R;
  function use<T, R>(key: K, type: ValueType<T>, fn: (current: T) => R): R;
  function use<T, R>(
    key: K,
    ...args: [fn: (current: V) => R] | [type: ValueType<T>, fn: (current: T) => R]
  ): R {
    return args.length === 1
      ? args[0](resolveRequired(key))
      : args[1](resolveRequired(key, args[0]));
  }

  const remove = (key: K): void => {
    if (required.has(key)) {
      logger.debug('ignored removal of required key', { key });
      return;
    }
    store.remove(key);
  };

  const setRequiredKeys = (keys: Iterable<K>): Result<void, MissingKeysError<K>> => {
    const next = new Set(keys);
    return store.requireKeys(next).map(() => {
      required = next;
    });
  };

  const cache: RequiredKeysCache<K, V> = {
    get: store.get,
    resolve: store.resolve,
    set: store.set,
    remove,
    contains: store.contains,
    require: (key) => store.require(key).map(() => cache),
    requireKeys: (keys) => store.requireKeys(keys).map(() => cache),
    valuesOfType: store.valuesOfType,
    allValues: store.allValues,
    subscribe: store.subscribe,
    requiredKeys: () => new Set(required),
    setRequiredKeys,
    resolveRequired,
    update,
    use,
  };

  return store.requireKeys(required).map(() => cache);
};
