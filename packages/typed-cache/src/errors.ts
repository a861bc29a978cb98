import type { Result } from 'neverthrow';

/**
 * Error codes for cache read and validation failures.
 */
export type CacheFailureCode = 'missing_key' | 'missing_keys' | 'type_mismatch' | 'expired_key';

/**
 * A resolved key is absent.
 */
export interface MissingKeyError<K> {
  readonly code: 'missing_key';
  readonly message: string;
  readonly key: K;
}

/**
 * One or more required keys are absent.
 */
export interface MissingKeysError<K> {
  readonly code: 'missing_keys';
  readonly message: string;
  /** Every key that was required but absent, not just the first */
  readonly keys: ReadonlySet<K>;
}

/**
 * A key is present but its value does not match the requested type.
 */
export interface TypeMismatchError<K> {
  readonly code: 'type_mismatch';
  readonly message: string;
  readonly key: K;
  /** Name of the requested type */
  readonly expected: string;
  /** Runtime type of the stored value */
  readonly actual: string;
}

/**
 * A key existed but its entry has timed out.
 */
export interface ExpiredKeyError<K> {
  readonly code: 'expired_key';
  readonly message: string;
  readonly key: K;
  /** When the entry expired (Unix timestamp ms) */
  readonly expiration: number;
}

/**
 * Discriminated union of every failure a cache read can report.
 */
export type CacheFailure<K> =
  | MissingKeyError<K>
  | MissingKeysError<K>
  | TypeMismatchError<K>
  | ExpiredKeyError<K>;

const formatKey = (key: unknown): string => {
  if (typeof key === 'string') {
    return key;
  }
  if (typeof key === 'symbol') {
    return key.toString();
  }
  if (typeof key === 'object' && key !== null) {
    try {
      return JSON.stringify(key);
    } catch {
      return Object.prototype.toString.call(key);
    }
  }
  return String(key);
};

/**
 * Creates a MissingKeyError for an absent key.
 */
export const createMissingKeyError = <K>(key: K): MissingKeyError<K> => ({
  code: 'missing_key',
  message: `Missing key: ${formatKey(key)}`,
  key,
});

/**
 * Creates a MissingKeysError listing every absent key.
 */
export const createMissingKeysError = <K>(keys: Iterable<K>): MissingKeysError<K> => {
  const missing = new Set(keys);
  return {
    code: 'missing_keys',
    message: `Missing required keys: ${[...missing].map(formatKey).join(', ')}`,
    keys: missing,
  };
};

/**
 * Creates a TypeMismatchError with both type descriptors.
 */
export const createTypeMismatchError = <K>(
  key: K,
  expected: string,
  actual: string
): TypeMismatchError<K> => ({
  code: 'type_mismatch',
  message: `Invalid type for key ${formatKey(key)}: expected ${expected}, got ${actual}`,
  key,
  expected,
  actual,
});

/**
 * Creates an ExpiredKeyError for an entry that timed out.
 */
export const createExpiredKeyError = <K>(key: K, expiration: number): ExpiredKeyError<K> => ({
  code: 'expired_key',
  message: `Expired key: ${formatKey(key)} (expired at ${new Date(expiration).toISOString()})`,
  key,
  expiration,
});

/**
 * Error thrown when a cache failure is turned into an exception.
 *
 * @example
 * ```typescript
 * try {
 *   const port = unwrapOrThrow(config.resolve('port', valueType.number));
 * } catch (error) {
 *   if (error instanceof CacheAccessError && error.code === 'missing_key') {
 *     // fall back
 *   }
 * }
 * ```
 */
export class CacheAccessError<K = unknown> extends Error {
  /** Error code of the wrapped failure */
  readonly code: CacheFailureCode;

  /** The failure that caused this error */
  readonly failure: CacheFailure<K>;

  constructor(failure: CacheFailure<K>) {
    super(failure.message);
    this.name = 'CacheAccessError';
    this.code = failure.code;
    this.failure = failure;
  }
}

/**
 * Error thrown when a locking operation re-enters the instance whose
 * lock it already holds on the same call stack.
 */
export class LockReentryError extends Error {
  /** Name of the lock that was re-entered */
  readonly lockName: string;

  constructor(lockName: string) {
    super(`Lock "${lockName}" is already held by the current call stack`);
    this.name = 'LockReentryError';
    this.lockName = lockName;
  }
}

/**
 * Error thrown when a key that is not one of a cache's required keys is
 * resolved as one.
 */
export class RequiredKeyError<K = unknown> extends Error {
  readonly key: K;

  constructor(key: K) {
    super(`The key '${formatKey(key)}' is not a required key`);
    this.name = 'RequiredKeyError';
    this.key = key;
  }
}

/**
 * Returns the value of a result or throws its failure as a CacheAccessError.
 */
export const unwrapOrThrow = <T, K>(result: Result<T, CacheFailure<K>>): T => {
  if (result.isErr()) {
    throw new CacheAccessError(result.error);
  }
  return result.value;
};
