import type { Result } from 'neverthrow';
import { createResolvedValue } from '../accessors/cached-value.js';
import type { ResolvedValue } from '../accessors/types.js';
import { unwrapOrThrow, type MissingKeysError } from '../errors.js';
import type { CacheLogger } from '../logging/logger.js';
import { createRequiredKeysCache } from '../required-keys/required-keys-cache.js';
import type { RequiredKeysCache } from '../required-keys/types.js';
import { createKeyValueStore } from '../store/key-value-store.js';
import type { KeyValueStore } from '../store/types.js';

/**
 * Shared caches an application creates once and passes to whatever needs
 * them. The registry lives as long as the process; it has no teardown.
 */
export interface CacheRegistry {
  /** General purpose shared cache */
  readonly cache: KeyValueStore<unknown, unknown>;
  /** Shared dependencies, resolved by key */
  readonly dependencies: RequiredKeysCache<unknown, unknown>;
  /** Named loggers */
  readonly loggers: RequiredKeysCache<string, CacheLogger>;
}

/**
 * Options for creating a registry.
 */
export interface CacheRegistryOptions {
  /** Dependencies to register; each becomes a required key */
  readonly dependencies?: Iterable<readonly [unknown, unknown]> | undefined;
  /** Loggers to register by name; each becomes a required key */
  readonly loggers?: Iterable<readonly [string, CacheLogger]> | undefined;
}

/**
 * Creates a registry of shared caches.
 *
 * @example
 * ```typescript
 * const registry = createCacheRegistry({
 *   loggers: [['http', createConsoleLogger('http')]],
 * });
 *
 * const server = createServer({ registry });
 * ```
 */
export const createCacheRegistry = (options: CacheRegistryOptions = {}): CacheRegistry => ({
  cache: createKeyValueStore<unknown, unknown>({ name: 'registry/cache' }),
  // Required keys default to the keys given, so creation cannot fail
  dependencies: unwrapOrThrow(
    createRequiredKeysCache<unknown, unknown>({ initialValues: options.dependencies })
  ),
  loggers: unwrapOrThrow(
    createRequiredKeysCache<string, CacheLogger>({ initialValues: options.loggers })
  ),
});

/**
 * Makes a registered logger a required key and returns a handle on it.
 *
 * @returns Result with the handle, or the key if no logger is registered
 * under it
 *
 * @example
 * ```typescript
 * const log = createLoggerAccessor(registry, 'http');
 * if (log.isOk()) {
 *   log.value.get().debug('listening', { port: 8080 });
 * }
 * ```
 */
export const createLoggerAccessor = (
  registry: CacheRegistry,
  key: string
): Result<ResolvedValue<CacheLogger>, MissingKeysError<string>> => {
  const { loggers } = registry;
  return loggers
    .setRequiredKeys([...loggers.requiredKeys(), key])
    .map(() => createResolvedValue(loggers, key));
};
