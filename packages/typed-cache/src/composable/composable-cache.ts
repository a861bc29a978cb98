import { err, ok, type Result } from 'neverthrow';
import {
  createMissingKeyError,
  createMissingKeysError,
  type CacheFailure,
  type MissingKeysError,
} from '../errors.js';
import { resolveLogger } from '../logging/logger.js';
import { createKeyValueStore } from '../store/key-value-store.js';
import type { ValueType } from '../value-type/value-type.js';
import type { CacheStage, ComposableCache, ComposableCacheOptions } from './types.js';

/**
 * Picks the failure to report when no stage yielded a value.
 * A type mismatch says more than an expiry, and an expiry more than absence.
 */
const pickFailure = <K>(key: K, failures: readonly CacheFailure<K>[]): CacheFailure<K> =>
  failures.find((failure) => failure.code === 'type_mismatch') ??
  failures.find((failure) => failure.code === 'expired_key') ??
  createMissingKeyError(key);

/**
 * Creates a pipeline over an ordered list of caches.
 *
 * `get` and `resolve` query stage 0, then stage 1, and so on. A stage that
 * misses, holds an expired entry or holds a value of the wrong type does
 * not stop the search. `set` and `remove` apply to every stage.
 *
 * The pipeline holds no state beyond its fixed stage list and takes no
 * lock of its own: each stage serializes its own work, so a stage listener
 * may call back into the pipeline.
 *
 * @param options - Stages and logger
 * @returns A ComposableCache instance
 *
 * @example
 * ```typescript
 * const hot = createLruCache<string, unknown>({ capacity: 100 });
 * const warm = createExpiringCache<string, unknown>({ duration: minutes(5) });
 * const cache = createComposableCache({ stages: [hot, warm] });
 *
 * cache.set('user:1', user); // written to both stages
 * cache.get('user:1', userType); // served by `hot` while it holds it
 * ```
 */
export const createComposableCache = <K>(options: ComposableCacheOptions<K>): ComposableCache<K> => {
  const stages = [...options.stages];
  const logger = resolveLogger(options, 'composable-cache');

  /**
   * Reads one stage through its own `get`. An undefined read is a hit only
   * when the stage stores undefined and the requested type admits it.
   */
  const readStage = <T>(
    stage: CacheStage<K>,
    key: K,
    type: ValueType<T> | undefined
  ): { readonly value: unknown } | undefined => {
    const value = type === undefined ? stage.get(key) : stage.get(key, type);
    if (value !== undefined) {
      return { value };
    }
    if (type === undefined) {
      return stage.contains(key) ? { value } : undefined;
    }
    if (!type.is(undefined)) {
      return undefined;
    }
    const result = stage.resolve(key, type);
    return result.isOk() ? { value: result.value } : undefined;
  };

  function get(key: K): unknown;
  function get<T>(key: K, type: ValueType<T>): T | undefined;
  function get<T>(key: K, type?: ValueType<T>): unknown {
    for (const stage of stages) {
      const hit = readStage(stage, key, type);
      if (hit !== undefined) {
        return hit.value;
      }
    }
    return undefined;
  }

  function resolve(key: K): Result<unknown, CacheFailure<K>>;
  function resolve<T>(key: K, type: ValueType<T>): Result<T, CacheFailure<K>>;
  function resolve<T>(key: K, type?: ValueType<T>): Result<unknown, CacheFailure<K>> {
    const failures: CacheFailure<K>[] = [];
    for (const stage of stages) {
      const result: Result<unknown, CacheFailure<K>> =
        type === undefined ? stage.resolve(key) : stage.resolve(key, type);
      if (result.isOk()) {
        return result;
      }
      failures.push(result.error);
    }
    return err(pickFailure(key, failures));
  }

  const set = (key: K, value: unknown): void => {
    for (const stage of stages) {
      stage.set(key, value);
    }
  };

  const remove = (key: K): void => {
    for (const stage of stages) {
      stage.remove(key);
    }
  };

  const contains = (key: K): boolean => stages.some((stage) => stage.contains(key));

  const requireKeys = (keys: Iterable<K>): Result<ComposableCache<K>, MissingKeysError<K>> => {
    const requested = [...keys];
    const missing = new Set<K>();
    for (const stage of stages) {
      const result = stage.requireKeys(requested);
      if (result.isErr()) {
        for (const key of result.error.keys) {
          missing.add(key);
        }
      }
    }
    if (missing.size > 0) {
      logger.debug('pipeline is missing required keys', { count: missing.size });
      return err(createMissingKeysError(missing));
    }
    return ok(cache);
  };

  /**
   * Returns the first non-empty snapshot across stages, or an empty map.
   */
  const firstNonEmpty = <T>(
    snapshotOf: (stage: CacheStage<K>) => ReadonlyMap<K, T>
  ): ReadonlyMap<K, T> => {
    for (const stage of stages) {
      const snapshot = snapshotOf(stage);
      if (snapshot.size > 0) {
        return snapshot;
      }
    }
    return new Map<K, T>();
  };

  const cache: ComposableCache<K> = {
    stages,
    get,
    resolve,
    set,
    remove,
    contains,
    require: (key) => requireKeys([key]),
    requireKeys,
    valuesOfType: (type) => firstNonEmpty((stage) => stage.valuesOfType(type)),
    allValues: () => firstNonEmpty((stage) => stage.allValues()),
  };

  return cache;
};

/**
 * Creates a one-stage pipeline over a fresh key-value store.
 *
 * @param initialValues - Entries to seed the store with
 */
export const createComposableCacheFromValues = <K>(
  initialValues: Iterable<readonly [K, unknown]> = []
): ComposableCache<K> =>
  createComposableCache<K>({
    stages: [createKeyValueStore<K, unknown>({ initialValues })],
  });
