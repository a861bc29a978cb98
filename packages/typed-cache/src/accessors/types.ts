/**
 * Read-write handle on one key of a cache, falling back to a default.
 */
export interface CachedValue<T> {
  readonly key: unknown;
  /** The stored value, or the default if absent or of another type */
  readonly get: () => T;
  readonly set: (value: T) => void;
}

/**
 * Read-write handle on one optional key of a cache.
 */
export interface OptionalCachedValue<T> {
  readonly key: unknown;
  /** The stored value, or undefined if absent or of another type */
  readonly get: () => T | undefined;
  /** Stores the value, or removes the key when given undefined */
  readonly set: (value: T | undefined) => void;
}

/**
 * Read-write handle on a required key of a required-keys cache.
 */
export interface ResolvedValue<T> {
  readonly key: unknown;
  /**
   * @throws RequiredKeyError if the key is not required
   * @throws CacheAccessError if the value cannot be resolved as the requested type
   */
  readonly get: () => T;
  readonly set: (value: T) => void;
}
