import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';
import { createKeyValueStore } from '../store/key-value-store.js';
import type { JsonCache, JsonParseError } from './types.js';

const jsonObjectSchema = z.record(z.unknown());

/** Caches created by this module, so nested caches are recognised when read back */
const jsonCaches = new WeakSet<object>();

const isJsonCache = (value: unknown): value is JsonCache =>
  typeof value === 'object' && value !== null && jsonCaches.has(value);

/**
 * Own entries of a JSON object, or undefined for any other value.
 * Entries come from the value itself: a parsed record drops a `__proto__` key.
 */
const objectEntries = (value: unknown): [string, unknown][] | undefined => {
  if (!jsonObjectSchema.safeParse(value).success || typeof value !== 'object' || value === null) {
    return undefined;
  }
  return Object.entries(value);
};

const parseText = (text: string): Result<unknown, JsonParseError> => {
  try {
    const parsed: unknown = JSON.parse(text);
    return ok(parsed);
  } catch (error) {
    return err({
      code: 'invalid_json',
      message: 'Failed to parse JSON text',
      cause: error,
    });
  }
};

/**
 * Turns an element of a nested array into a JSON cache, if it is an object.
 */
const toJsonCache = (value: unknown): JsonCache | undefined => {
  if (isJsonCache(value)) {
    return value;
  }
  const entries = objectEntries(value);
  return entries === undefined ? undefined : createJsonCache(entries);
};

const expand = (value: unknown): unknown => {
  if (isJsonCache(value)) {
    return value.toObject();
  }
  if (Array.isArray(value)) {
    return value.map(expand);
  }
  return value;
};

/**
 * Creates a JSON cache.
 *
 * @param initialValues - Entries to start with
 *
 * @example
 * ```typescript
 * const user = createJsonCache([
 *   ['name', 'Ada'],
 *   ['address', { city: 'London' }],
 * ]);
 *
 * user.json('address')?.get('city', valueType.string); // 'London'
 * user.toJson(); // '{"name":"Ada","address":{"city":"London"}}'
 * ```
 */
export const createJsonCache = (
  initialValues: Iterable<readonly [string, unknown]> = []
): JsonCache => {
  const store = createKeyValueStore<string, unknown>({ name: 'json-cache', initialValues });

  const json = (key: string): JsonCache | undefined => {
    const value = store.get(key);
    if (typeof value === 'string') {
      const parsed = parseJsonObject(value);
      return parsed.isOk() ? parsed.value : undefined;
    }
    return toJsonCache(value);
  };

  const array = (key: string): readonly JsonCache[] | undefined => {
    const value = store.get(key);
    if (typeof value === 'string') {
      return parseJsonArray(value);
    }
    if (!Array.isArray(value)) {
      return undefined;
    }
    const caches: JsonCache[] = [];
    for (const element of value) {
      const nested = toJsonCache(element);
      if (nested !== undefined) {
        caches.push(nested);
      }
    }
    return caches;
  };

  const toObject = (): Record<string, unknown> =>
    Object.fromEntries(
      [...store.allValues()].map(([key, value]): [string, unknown] => [key, expand(value)])
    );

  const cache: JsonCache = {
    get: store.get,
    resolve: store.resolve,
    set: store.set,
    remove: store.remove,
    contains: store.contains,
    require: (key) => store.require(key).map(() => cache),
    requireKeys: (keys) => store.requireKeys(keys).map(() => cache),
    valuesOfType: store.valuesOfType,
    allValues: store.allValues,
    json,
    array,
    toObject,
    toJson: () => JSON.stringify(toObject()),
  };

  jsonCaches.add(cache);
  return cache;
};

/**
 * Parses JSON text holding an object into a JSON cache.
 *
 * @returns Result with the cache, or a failure if the text is not valid
 * JSON or its top level is not an object
 */
export const parseJsonObject = (text: string): Result<JsonCache, JsonParseError> =>
  parseText(text).andThen((parsed): Result<JsonCache, JsonParseError> => {
    const entries = objectEntries(parsed);
    if (entries === undefined) {
      return err({
        code: 'not_an_object',
        message: 'JSON text does not hold an object',
      });
    }
    return ok(createJsonCache(entries));
  });

/**
 * Parses JSON text holding an array of objects into JSON caches.
 *
 * Elements that are not objects are skipped. Text that is not valid JSON,
 * or does not hold an array, yields an empty list.
 */
export const parseJsonArray = (text: string): readonly JsonCache[] => {
  const parsed = parseText(text);
  if (parsed.isErr()) {
    return [];
  }
  const elements = parsed.value;
  if (!Array.isArray(elements)) {
    return [];
  }
  const caches: JsonCache[] = [];
  for (const element of elements) {
    const nested = toJsonCache(element);
    if (nested !== undefined) {
      caches.push(nested);
    }
  }
  return caches;
};
