import type { Cacheable } from '../types.js';

/**
 * A string-keyed cache over parsed JSON values.
 *
 * Nested objects and arrays of objects can be read back as JSON caches of
 * their own, whether they were stored as parsed values, as JSON text or as
 * JSON caches.
 */
export interface JsonCache extends Cacheable<string, unknown, JsonCache> {
  /**
   * Reads a nested object as a JSON cache.
   * @returns undefined if the key is absent or not an object
   */
  readonly json: (key: string) => JsonCache | undefined;

  /**
   * Reads a nested array as JSON caches, skipping elements that are not
   * objects.
   * @returns undefined if the key is absent or not an array
   */
  readonly array: (key: string) => readonly JsonCache[] | undefined;

  /**
   * Every entry as a plain object, with nested JSON caches expanded.
   */
  readonly toObject: () => Record<string, unknown>;

  /**
   * Encodes every entry as JSON text.
   * @throws TypeError if a value cannot be encoded (a bigint, a cycle)
   */
  readonly toJson: () => string;
}

/**
 * Error codes for JSON parsing failures.
 */
export type JsonParseErrorCode = 'invalid_json' | 'not_an_object';

/**
 * Failure to parse JSON text into a JSON cache.
 */
export interface JsonParseError {
  readonly code: JsonParseErrorCode;
  readonly message: string;
  readonly cause?: unknown;
}
