import type { RequiredKeysCache } from '../required-keys/types.js';
import type { Cacheable } from '../types.js';
import type { ValueType } from '../value-type/value-type.js';
import type { CachedValue, OptionalCachedValue, ResolvedValue } from './types.js';

/**
 * Creates a handle on one key of a cache with a default value.
 *
 * @param cache - Cache holding the value
 * @param key - Key of the value
 * @param type - Descriptor of the value
 * @param defaultValue - Returned while the key is absent or holds another type
 *
 * @example
 * ```typescript
 * const retries = createCachedValue(settings, 'retries', valueType.number, 3);
 * retries.get(); // 3
 * retries.set(5);
 * retries.get(); // 5
 * ```
 */
export const createCachedValue = <K, V, T extends V>(
  cache: Cacheable<K, V>,
  key: K,
  type: ValueType<T>,
  defaultValue: T
): CachedValue<T> => ({
  key,
  get: () => {
    const result = cache.resolve(key, type);
    return result.isOk() ? result.value : defaultValue;
  },
  set: (value) => {
    cache.set(key, value);
  },
});

/**
 * Creates a handle on one optional key of a cache.
 *
 * @example
 * ```typescript
 * const token = createOptionalCachedValue(session, 'token', valueType.string);
 * token.set('test-token');
 * token.set(undefined); // removes 'token'
 * ```
 */
export const createOptionalCachedValue = <K, V, T extends V>(
  cache: Cacheable<K, V>,
  key: K,
  type: ValueType<T>
): OptionalCachedValue<T> => ({
  key,
  get: () => cache.get(key, type),
  set: (value) => {
    if (value === undefined) {
      cache.remove(key);
    } else {
      cache.set(key, value);
    }
  },
});

/**
 * Creates a handle on a required key, read through `resolveRequired`.
 *
 * Reading throws when the key is misused; see `resolveRequired`.
 */
export function createResolvedValue<K, V>(cache: RequiredKeysCache<K, V>, key: K): ResolvedValue<V>;
export function createResolvedValue<K, V, T extends V>(
  cache: RequiredKeysCache<K, V>,
  key: K,
  type: ValueType<T>
): ResolvedValue<T>;
export function createResolvedValue<K, V, T extends V>(
  cache: RequiredKeysCache<K, V>,
  key: K,
  type?: ValueType<T>
): ResolvedValue<V> | ResolvedValue<T> {
  const set = (value: T | V): void => {
    cache.set(key, value);
  };
  if (type === undefined) {
    return { key, get: () => cache.resolveRequired(key), set };
  }
  return { key, get: () => cache.resolveRequired(key, type), set };
}
