import { err, ok, type Result } from 'neverthrow';
import {
  createMissingKeyError,
  createMissingKeysError,
  createTypeMismatchError,
  type CacheFailure,
  type MissingKeysError,
} from '../errors.js';
import { createLock } from '../lock/lock.js';
import { resolveLogger } from '../logging/logger.js';
import type { CacheChange } from '../types.js';
import { describeValue, type ValueType } from '../value-type/value-type.js';
import { createChangePublisher } from './change-publisher.js';
import type { KeyValueStore, KeyValueStoreOptions, StoredValue } from './types.js';

/**
 * Creates a thread-safe key-value store with no eviction or expiry.
 *
 * Every operation takes the store's lock for a single section. Change
 * listeners run after the lock is released.
 *
 * @param options - Initial values and logger
 * @returns A KeyValueStore instance
 *
 * @example
 * ```typescript
 * const store = createKeyValueStore<string, unknown>({
 *   initialValues: [['port', 8080]],
 * });
 *
 * store.get('port', valueType.number); // 8080
 * store.get('port', valueType.string); // undefined
 *
 * const result = store.resolve('port', valueType.string);
 * if (result.isErr()) {
 *   result.error.code; // 'type_mismatch'
 * }
 * ```
 */
export const createKeyValueStore = <K, V>(
  options: KeyValueStoreOptions<K, V> = {}
): KeyValueStore<K, V> => {
  // Values are boxed so a stored `undefined` is told apart from a missing key in one lookup
  const entries = new Map<K, StoredValue<V>>();
  for (const [key, value] of options.initialValues ?? []) {
    entries.set(key, { value });
  }
  const lock = createLock(options.name ?? 'key-value-store');
  const logger = resolveLogger(options, 'key-value-store');
  const publisher = createChangePublisher<K, V>();

  /**
   * Publishes changes once the lock has been released.
   * The snapshot is taken by the caller inside its lock section.
   */
  const notify = (
    changes: readonly CacheChange<K, V>[],
    snapshot: ReadonlyMap<K, V> | undefined
  ): void => {
    if (snapshot !== undefined && changes.length > 0) {
      publisher.publish(changes, snapshot);
    }
  };

  const unboxAll = (): Map<K, V> => {
    const values = new Map<K, V>();
    for (const [key, entry] of entries) {
      values.set(key, entry.value);
    }
    return values;
  };

  const takeSnapshot = (): ReadonlyMap<K, V> | undefined =>
    publisher.hasListeners() ? unboxAll() : undefined;

  function get(key: K): V | undefined;
  function get<T>(key: K, type: ValueType<T>): T | undefined;
  function get<T>(key: K, type?: ValueType<T>): V | T | undefined {
    return lock.withLock(() => {
      const entry = entries.get(key);
      if (entry === undefined) {
        return undefined;
      }
      if (type === undefined) {
        return entry.value;
      }
      return type.is(entry.value) ? entry.value : undefined;
    });
  }

  function resolve(key: K): Result<V, CacheFailure<K>>;
  function resolve<T>(key: K, type: ValueType<T>): Result<T, CacheFailure<K>>;
  function resolve<T>(key: K, type?: ValueType<T>): Result<V | T, CacheFailure<K>> {
    // One section, one lookup: the outcome is decided from a single snapshot
    return lock.withLock((): Result<V | T, CacheFailure<K>> => {
      const entry = entries.get(key);
      if (entry === undefined) {
        return err(createMissingKeyError(key));
      }
      const { value } = entry;
      if (type === undefined) {
        return ok(value);
      }
      if (!type.is(value)) {
        return err(createTypeMismatchError(key, type.name, describeValue(value)));
      }
      return ok(value);
    });
  }

  const set = (key: K, value: V): void => {
    const snapshot = lock.withLock(() => {
      entries.set(key, { value });
      return takeSnapshot();
    });
    notify([{ type: 'set', key, value }], snapshot);
  };

  const remove = (key: K): void => {
    const outcome = lock.withLock(() => {
      const removed = entries.delete(key);
      return { removed, snapshot: removed ? takeSnapshot() : undefined };
    });
    if (outcome.removed) {
      notify([{ type: 'remove', key }], outcome.snapshot);
    }
  };

  const clear = (): void => {
    const outcome = lock.withLock(() => {
      const keys = [...entries.keys()];
      entries.clear();
      return { keys, snapshot: takeSnapshot() };
    });
    if (outcome.keys.length > 0) {
      logger.debug('cleared store', { count: outcome.keys.length });
    }
    notify(
      outcome.keys.map((key): CacheChange<K, V> => ({ type: 'remove', key })),
      outcome.snapshot
    );
  };

  const contains = (key: K): boolean => lock.withLock(() => entries.has(key));

  const requireKeys = (keys: Iterable<K>): Result<KeyValueStore<K, V>, MissingKeysError<K>> => {
    const requested = [...keys];
    const missing = lock.withLock(() => requested.filter((key) => !entries.has(key)));
    if (missing.length > 0) {
      return err(createMissingKeysError(missing));
    }
    return ok(store);
  };

  const valuesOfType = <T>(type: ValueType<T>): ReadonlyMap<K, T> =>
    lock.withLock(() => {
      const matching = new Map<K, T>();
      for (const [key, { value }] of entries) {
        if (type.is(value)) {
          matching.set(key, value);
        }
      }
      return matching;
    });

  const store: KeyValueStore<K, V> = {
    get,
    resolve,
    set,
    remove,
    contains,
    require: (key) => requireKeys([key]),
    requireKeys,
    valuesOfType,
    allValues: () => lock.withLock(unboxAll),
    subscribe: publisher.subscribe,
    clear,
    size: () => lock.withLock(() => entries.size),
    keys: () => lock.withLock(() => [...entries.keys()]),
  };

  return store;
};
