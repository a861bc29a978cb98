import type { Result } from 'neverthrow';
import type { CacheFailure } from '../errors.js';
import { resolveLogger, type LoggerOptions } from '../logging/logger.js';
import type { Cacheable } from '../types.js';
import { describeValue, type ValueType } from '../value-type/value-type.js';

/**
 * A cache whose value type has been erased, so caches holding different
 * value types can sit side by side in one pipeline.
 */
export type AnyCacheable<K> = Cacheable<K, unknown, AnyCacheable<K>>;

/**
 * Erases the value type of a cache.
 *
 * Reads pass straight through. A write whose value the descriptor rejects
 * is skipped (and logged at debug), since the wrapped cache cannot hold it.
 * Pass `valueType.unknown` for a cache that already holds `unknown` values.
 *
 * @param cache - The cache to wrap
 * @param valueType - Descriptor of the values the cache holds
 * @param options - Logger for skipped writes
 *
 * @example
 * ```typescript
 * const names = createLruCache<string, string>({ capacity: 100 });
 * const view = eraseCache(names, valueType.string);
 *
 * view.set('a', 'Ada'); // stored
 * view.set('b', 42);    // skipped: not a string
 * ```
 */
export const eraseCache = <K, V>(
  cache: Cacheable<K, V>,
  valueType: ValueType<V>,
  options: LoggerOptions = {}
): AnyCacheable<K> => {
  const logger = resolveLogger(options, 'any-cacheable');

  function get(key: K): unknown;
  function get<T>(key: K, type: ValueType<T>): T | undefined;
  function get<T>(key: K, type?: ValueType<T>): unknown {
    return type === undefined ? cache.get(key) : cache.get(key, type);
  }

  function resolve(key: K): Result<unknown, CacheFailure<K>>;
  function resolve<T>(key: K, type: ValueType<T>): Result<T, CacheFailure<K>>;
  function resolve<T>(key: K, type?: ValueType<T>): Result<unknown, CacheFailure<K>> {
    return type === undefined ? cache.resolve(key) : cache.resolve(key, type);
  }

  const set = (key: K, value: unknown): void => {
    if (!valueType.is(value)) {
      logger.debug('skipped write of incompatible value', {
        key,
        expected: valueType.name,
        actual: describeValue(value),
      });
      return;
    }
    cache.set(key, value);
  };

  const view: AnyCacheable<K> = {
    get,
    resolve,
    set,
    remove: (key) => {
      cache.remove(key);
    },
    contains: (key) => cache.contains(key),
    require: (key) => cache.require(key).map(() => view),
    requireKeys: (keys) => cache.requireKeys(keys).map(() => view),
    valuesOfType: (type) => cache.valuesOfType(type),
    allValues: () => cache.allValues(),
  };

  return view;
};
