/**
 * typed-cache - In-process key-value caches with typed reads
 *
 * @packageDocumentation
 */

// Public types
export type * from './types.js';

// ============================================================================
// CORE: Value types and errors
// ============================================================================

export { valueType, describeValue } from './value-type/index.js';
export type { ValueType } from './value-type/index.js';

export {
  createMissingKeyError,
  createMissingKeysError,
  createTypeMismatchError,
  createExpiredKeyError,
  unwrapOrThrow,
  CacheAccessError,
  LockReentryError,
  RequiredKeyError,
} from './errors.js';
export type {
  CacheFailureCode,
  CacheFailure,
  MissingKeyError,
  MissingKeysError,
  TypeMismatchError,
  ExpiredKeyError,
} from './errors.js';

// ============================================================================
// CORE: Key-value store
// ============================================================================

export { createKeyValueStore } from './store/index.js';
export type { KeyValueStore, KeyValueStoreOptions } from './store/index.js';

// ============================================================================
// CORE: Eviction policies
// ============================================================================

export { createLruCache } from './lru/index.js';
export type { LruCache, LruCacheOptions } from './lru/index.js';

export { createExpiringCache, seconds, minutes, hours, toMilliseconds } from './expiring/index.js';
export type {
  DurationUnit,
  ExpirationDuration,
  ExpiringCache,
  ExpiringCacheOptions,
} from './expiring/index.js';

// ============================================================================
// CORE: Composition
// ============================================================================

export {
  eraseCache,
  createComposableCache,
  createComposableCacheFromValues,
} from './composable/index.js';
export type {
  AnyCacheable,
  CacheStage,
  ComposableCache,
  ComposableCacheOptions,
} from './composable/index.js';

// ============================================================================
// Required keys, JSON and persistence
// ============================================================================

export { createRequiredKeysCache } from './required-keys/index.js';
export type {
  RequiredKeysCache,
  RequiredKeysCacheOptions,
  ResolveRequired,
  UpdateRequired,
  UseRequired,
} from './required-keys/index.js';

export { createJsonCache, parseJsonObject, parseJsonArray } from './json/index.js';
export type { JsonCache, JsonParseError, JsonParseErrorCode } from './json/index.js';

export { createPersistableCache, createPersistableValueCache } from './persistence/index.js';
export type {
  PersistableCache,
  PersistableCacheOptions,
  PersistenceCodec,
} from './persistence/index.js';

// ============================================================================
// Accessors and registry
// ============================================================================

export {
  createCachedValue,
  createOptionalCachedValue,
  createResolvedValue,
} from './accessors/index.js';
export type { CachedValue, OptionalCachedValue, ResolvedValue } from './accessors/index.js';

export { createCacheRegistry, createLoggerAccessor } from './registry/index.js';
export type { CacheRegistry, CacheRegistryOptions } from './registry/index.js';

// ============================================================================
// Infrastructure
// ============================================================================

export { createLock } from './lock/index.js';
export type { Lock } from './lock/index.js';

export { createConsoleLogger, resolveLogger, silentLogger } from './logging/index.js';
export type { CacheLogger, LogContext, LoggerOptions } from './logging/index.js';

export { DEBUG_ENV_VAR, readDebugFlag } from './config/index.js';
