import type { Result } from 'neverthrow';
import { lruOptionsSchema } from '../config/options.js';
import type { CacheFailure, MissingKeysError } from '../errors.js';
import { createLock } from '../lock/lock.js';
import { resolveLogger } from '../logging/logger.js';
import { createChangePublisher } from '../store/change-publisher.js';
import { createKeyValueStore } from '../store/key-value-store.js';
import type { CacheChange } from '../types.js';
import type { ValueType } from '../value-type/value-type.js';
import type { LruCache, LruCacheOptions } from './types.js';

/**
 * Creates a capacity-bounded cache that evicts the least recently used key.
 *
 * Recency is tracked in an insertion-ordered set: the head is the least
 * recently used key, the tail the most recent. A use deletes and re-adds
 * the key. The set always holds exactly the keys of the inner store.
 *
 * Each operation holds the LRU lock for its whole read-modify-write
 * sequence and takes the inner store's lock beneath it, never the other
 * way round.
 *
 * @param options - Capacity, initial values and logger
 * @returns An LruCache instance
 * @throws ZodError if capacity is not a non-negative integer
 *
 * @example
 * ```typescript
 * const cache = createLruCache<string, number>({ capacity: 2 });
 * cache.set('a', 1);
 * cache.set('b', 2);
 * cache.get('a');    // promotes 'a'
 * cache.set('c', 3); // evicts 'b'
 * cache.recency();   // ['a', 'c']
 * ```
 */
export const createLruCache = <K, V>(options: LruCacheOptions<K, V> = {}): LruCache<K, V> => {
  const parsed = lruOptionsSchema.parse({ capacity: options.capacity });
  const seed = new Map<K, V>(options.initialValues ?? []);
  const capacity = parsed.capacity ?? seed.size;

  const logger = resolveLogger(options, 'lru-cache');
  const lock = createLock('lru-cache');
  const publisher = createChangePublisher<K, V>();
  const inner = createKeyValueStore<K, V>({ name: 'lru-cache/store', logger });
  const recency = new Set<K>();

  const touch = (key: K): void => {
    recency.delete(key);
    recency.add(key);
  };

  /**
   * Drops least recently used keys until the cache fits its capacity.
   * Removes through the inner store, never through this cache's own `remove`.
   */
  const evictOverflow = (): K[] => {
    const evicted: K[] = [];
    while (recency.size > capacity) {
      const oldest = recency.values().next();
      if (oldest.done === true) {
        break;
      }
      recency.delete(oldest.value);
      inner.remove(oldest.value);
      evicted.push(oldest.value);
      logger.debug('evicted least recently used key', { key: oldest.value, capacity });
    }
    return evicted;
  };

  const takeSnapshot = (): ReadonlyMap<K, V> | undefined =>
    publisher.hasListeners() ? inner.allValues() : undefined;

  for (const [key, value] of seed) {
    inner.set(key, value);
    touch(key);
  }
  evictOverflow();

  function get(key: K): V | undefined;
  function get<T>(key: K, type: ValueType<T>): T | undefined;
  function get<T>(key: K, type?: ValueType<T>): V | T | undefined {
    return lock.withLock(() => {
      const result: Result<V | T, CacheFailure<K>> =
        type === undefined ? inner.resolve(key) : inner.resolve(key, type);
      if (result.isErr()) {
        return undefined;
      }
      touch(key);
      return result.value;
    });
  }

  function resolve(key: K): Result<V, CacheFailure<K>>;
  function resolve<T>(key: K, type: ValueType<T>): Result<T, CacheFailure<K>>;
  function resolve<T>(key: K, type?: ValueType<T>): Result<V | T, CacheFailure<K>> {
    return lock.withLock(() => {
      const result: Result<V | T, CacheFailure<K>> =
        type === undefined ? inner.resolve(key) : inner.resolve(key, type);
      // A present key was used even when its value had the wrong type
      if (result.isOk() || result.error.code === 'type_mismatch') {
        touch(key);
      }
      return result;
    });
  }

  const set = (key: K, value: V): void => {
    const outcome = lock.withLock(() => {
      inner.set(key, value);
      touch(key);
      const evicted = evictOverflow();
      return { evicted, snapshot: takeSnapshot() };
    });
    if (outcome.snapshot !== undefined) {
      publisher.publish(
        [
          { type: 'set', key, value },
          ...outcome.evicted.map((evictedKey): CacheChange<K, V> => ({
            type: 'remove',
            key: evictedKey,
          })),
        ],
        outcome.snapshot
      );
    }
  };

  const remove = (key: K): void => {
    const outcome = lock.withLock(() => {
      inner.remove(key);
      const removed = recency.delete(key);
      return { removed, snapshot: removed ? takeSnapshot() : undefined };
    });
    if (outcome.removed && outcome.snapshot !== undefined) {
      publisher.publish([{ type: 'remove', key }], outcome.snapshot);
    }
  };

  const contains = (key: K): boolean =>
    lock.withLock(() => {
      if (!inner.contains(key)) {
        return false;
      }
      touch(key);
      return true;
    });

  const requireKeys = (keys: Iterable<K>): Result<LruCache<K, V>, MissingKeysError<K>> => {
    const requested = [...keys];
    return lock.withLock(() => inner.requireKeys(requested)).map(() => cache);
  };

  const cache: LruCache<K, V> = {
    capacity,
    get,
    resolve,
    set,
    remove,
    contains,
    require: (key) => requireKeys([key]),
    requireKeys,
    valuesOfType: (type) => lock.withLock(() => inner.valuesOfType(type)),
    allValues: () => lock.withLock(() => inner.allValues()),
    subscribe: publisher.subscribe,
    recency: () => lock.withLock(() => [...recency]),
    size: () => lock.withLock(() => recency.size),
  };

  return cache;
};
