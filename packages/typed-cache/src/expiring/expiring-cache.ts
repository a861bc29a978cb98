import { err, ok, type Result } from 'neverthrow';
import {
  createExpiredKeyError,
  createMissingKeyError,
  createMissingKeysError,
  createTypeMismatchError,
  type CacheFailure,
  type MissingKeysError,
} from '../errors.js';
import { createLock } from '../lock/lock.js';
import { resolveLogger } from '../logging/logger.js';
import { createChangePublisher } from '../store/change-publisher.js';
import { createKeyValueStore } from '../store/key-value-store.js';
import type { CacheChange } from '../types.js';
import { describeValue, type ValueType } from '../value-type/value-type.js';
import { hours, toMilliseconds } from './duration.js';
import type { ExpiringCache, ExpiringCacheOptions, ExpiringEntry } from './types.js';

/** Default lifetime of an entry: 1 hour */
const DEFAULT_DURATION = hours(1);

/**
 * Outcome of looking a key up with expiry applied.
 */
type Lookup<V> =
  | { readonly state: 'missing' }
  | { readonly state: 'expired'; readonly expiration: number }
  | { readonly state: 'live'; readonly value: V };

/**
 * Creates a cache whose entries expire a fixed duration after each write.
 *
 * An entry written at `t` expires at `t + duration` and is treated as
 * absent from that instant on (`expiration <= now`). There is no timer:
 * expired entries are evicted when a read finds them, or by
 * `purgeExpired`.
 *
 * @param options - Duration, clock, initial values and logger
 * @returns An ExpiringCache instance
 * @throws ZodError if the duration amount is negative or not an integer
 *
 * @example
 * ```typescript
 * const sessions = createExpiringCache<string, Session>({ duration: minutes(30) });
 * sessions.set(sessionId, session);
 *
 * const result = sessions.resolve(sessionId);
 * if (result.isErr() && result.error.code === 'expired_key') {
 *   // existed, but timed out
 * }
 * ```
 */
export const createExpiringCache = <K, V>(
  options: ExpiringCacheOptions<K, V> = {}
): ExpiringCache<K, V> => {
  const duration = options.duration ?? DEFAULT_DURATION;
  const durationMs = toMilliseconds(duration);
  const now = options.now ?? ((): number => Date.now());
  const logger = resolveLogger(options, 'expiring-cache');
  const lock = createLock('expiring-cache');
  const publisher = createChangePublisher<K, V>();

  const seededAt = now();
  const seed: [K, ExpiringEntry<V>][] = [];
  for (const [key, value] of options.initialValues ?? []) {
    seed.push([key, { value, expiration: seededAt + durationMs }]);
  }
  const inner = createKeyValueStore<K, ExpiringEntry<V>>({
    name: 'expiring-cache/store',
    initialValues: seed,
    logger,
  });

  const isExpired = (entry: ExpiringEntry<V>): boolean => entry.expiration <= now();

  const liveValues = (): Map<K, V> => {
    const values = new Map<K, V>();
    for (const [key, entry] of inner.allValues()) {
      if (!isExpired(entry)) {
        values.set(key, entry.value);
      }
    }
    return values;
  };

  /**
   * Runs a section under the lock, then publishes a remove change for every
   * key the section evicted once the lock is released.
   */
  const withEviction = <R>(section: (evicted: K[]) => R): R => {
    const evicted: K[] = [];
    const outcome = lock.withLock(() => {
      const result = section(evicted);
      const snapshot = evicted.length > 0 && publisher.hasListeners() ? liveValues() : undefined;
      return { result, snapshot };
    });
    if (outcome.snapshot !== undefined) {
      publisher.publish(
        evicted.map((key): CacheChange<K, V> => ({ type: 'remove', key })),
        outcome.snapshot
      );
    }
    return outcome.result;
  };

  /**
   * Looks a key up, evicting it if it has expired. Must run under the lock.
   */
  const lookup = (key: K, evicted: K[]): Lookup<V> => {
    const entry = inner.get(key);
    if (entry === undefined) {
      return { state: 'missing' };
    }
    if (isExpired(entry)) {
      inner.remove(key);
      evicted.push(key);
      logger.debug('evicted expired key', { key, expiration: entry.expiration });
      return { state: 'expired', expiration: entry.expiration };
    }
    return { state: 'live', value: entry.value };
  };

  function get(key: K): V | undefined;
  function get<T>(key: K, type: ValueType<T>): T | undefined;
  function get<T>(key: K, type?: ValueType<T>): V | T | undefined {
    return withEviction((evicted) => {
      const found = lookup(key, evicted);
      if (found.state !== 'live') {
        return undefined;
      }
      if (type === undefined) {
        return found.value;
      }
      return type.is(found.value) ? found.value : undefined;
    });
  }

  function resolve(key: K): Result<V, CacheFailure<K>>;
  function resolve<T>(key: K, type: ValueType<T>): Result<T, CacheFailure<K>>;
  function resolve<T>(key: K, type?: ValueType<T>): Result<V | T, CacheFailure<K>> {
    return withEviction((evicted): Result<V | T, CacheFailure<K>> => {
      const found = lookup(key, evicted);
      switch (found.state) {
        case 'missing':
          return err(createMissingKeyError(key));
        case 'expired':
          return err(createExpiredKeyError(key, found.expiration));
        case 'live':
          if (type === undefined) {
            return ok(found.value);
          }
          if (!type.is(found.value)) {
            return err(createTypeMismatchError(key, type.name, describeValue(found.value)));
          }
          return ok(found.value);
      }
    });
  }

  const set = (key: K, value: V): void => {
    const expiration = now() + durationMs;
    const snapshot = lock.withLock(() => {
      inner.set(key, { value, expiration });
      return publisher.hasListeners() ? liveValues() : undefined;
    });
    if (snapshot !== undefined) {
      publisher.publish([{ type: 'set', key, value }], snapshot);
    }
  };

  const remove = (key: K): void => {
    const outcome = lock.withLock(() => {
      const removed = inner.contains(key);
      inner.remove(key);
      return { removed, snapshot: removed && publisher.hasListeners() ? liveValues() : undefined };
    });
    if (outcome.snapshot !== undefined) {
      publisher.publish([{ type: 'remove', key }], outcome.snapshot);
    }
  };

  const contains = (key: K): boolean =>
    withEviction((evicted) => lookup(key, evicted).state === 'live');

  const requireKeys = (keys: Iterable<K>): Result<ExpiringCache<K, V>, MissingKeysError<K>> => {
    const requested = [...keys];
    const missing = withEviction((evicted) =>
      requested.filter((key) => lookup(key, evicted).state !== 'live')
    );
    if (missing.length > 0) {
      return err(createMissingKeysError(missing));
    }
    return ok(cache);
  };

  const valuesOfType = <T>(type: ValueType<T>): ReadonlyMap<K, T> =>
    lock.withLock(() => {
      const matching = new Map<K, T>();
      for (const [key, value] of liveValues()) {
        if (type.is(value)) {
          matching.set(key, value);
        }
      }
      return matching;
    });

  const expirationOf = (key: K): number | undefined =>
    lock.withLock(() => {
      const entry = inner.get(key);
      return entry === undefined || isExpired(entry) ? undefined : entry.expiration;
    });

  const purgeExpired = (): readonly K[] =>
    withEviction((evicted) => {
      for (const [key, entry] of inner.allValues()) {
        if (isExpired(entry)) {
          inner.remove(key);
          evicted.push(key);
        }
      }
      if (evicted.length > 0) {
        logger.debug('purged expired keys', { count: evicted.length });
      }
      return [...evicted];
    });

  const cache: ExpiringCache<K, V> = {
    duration,
    get,
    resolve,
    set,
    remove,
    contains,
    require: (key) => requireKeys([key]),
    requireKeys,
    valuesOfType,
    allValues: () => lock.withLock(liveValues),
    subscribe: publisher.subscribe,
    expirationOf,
    purgeExpired,
  };

  return cache;
};
