import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { persistableOptionsSchema } from '../config/options.js';
import { createJsonCache, parseJsonObject } from '../json/json-cache.js';
import { resolveLogger, type CacheLogger } from '../logging/logger.js';
import { createKeyValueStore } from '../store/key-value-store.js';
import type { ValueType } from '../value-type/value-type.js';
import type { PersistableCache, PersistableCacheOptions, PersistenceCodec } from './types.js';

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Reads the cache file. A missing file reads as undefined.
 */
const readCacheFile = async (filePath: string): Promise<string | undefined> => {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    throw error;
  }
};

const loadEntries = async <V, P>(
  filePath: string,
  codec: PersistenceCodec<V, P>,
  logger: CacheLogger
): Promise<[string, V][]> => {
  const text = await readCacheFile(filePath);
  if (text === undefined) {
    return [];
  }

  const parsed = parseJsonObject(text);
  if (parsed.isErr()) {
    logger.warn('ignored unreadable cache file', { filePath, reason: parsed.error.message });
    return [];
  }

  const entries: [string, V][] = [];
  for (const [key, persisted] of parsed.value.valuesOfType(codec.persistedType)) {
    const value = codec.fromPersisted(persisted);
    if (value !== undefined) {
      entries.push([key, value]);
    }
  }
  return entries;
};

/**
 * Loads a cache persisted as a JSON object in `<directory>/<name>`.
 *
 * Values in the file that the codec's `persistedType` rejects are
 * skipped. A missing file starts the cache empty, and a file that is not a
 * JSON object is logged at warn and ignored. `initialValues` are applied
 * on top of the loaded entries.
 *
 * Nothing is written until `save` is called. Read errors other than a
 * missing file, and every write or delete error, are propagated.
 *
 * @param options - File location, codec, initial values and logger
 * @returns Promise resolving to the loaded cache
 * @throws ZodError if the name or directory is invalid
 *
 * @example
 * ```typescript
 * const visits = await createPersistableCache<Date, string>({
 *   name: 'visits.json',
 *   directory: './data',
 *   persistedType: valueType.string,
 *   toPersisted: (date) => date.toISOString(),
 *   fromPersisted: (text) => new Date(text),
 * });
 *
 * visits.set('home', new Date());
 * await visits.save();
 * ```
 */
export const createPersistableCache = async <V, P>(
  options: PersistableCacheOptions<V, P>
): Promise<PersistableCache<V>> => {
  const { name, directory } = persistableOptionsSchema.parse({
    name: options.name,
    directory: options.directory,
  });
  const logger = resolveLogger(options, 'persistable-cache');
  const directoryPath = resolve(directory);
  const filePath = join(directoryPath, name);

  const loaded = await loadEntries(filePath, options, logger);
  if (loaded.length > 0) {
    logger.debug('loaded persisted entries', { filePath, count: loaded.length });
  }

  const store = createKeyValueStore<string, V>({
    name: 'persistable-cache/store',
    initialValues: loaded,
    logger,
  });
  for (const [key, value] of options.initialValues ?? []) {
    store.set(key, value);
  }

  const save = async (): Promise<void> => {
    const persisted: [string, P][] = [];
    for (const [key, value] of store.allValues()) {
      const mapped = options.toPersisted(value);
      if (mapped !== undefined) {
        persisted.push([key, mapped]);
      }
    }
    const text = createJsonCache(persisted).toJson();
    await mkdir(directoryPath, { recursive: true });
    await writeFile(filePath, text, 'utf-8');
    logger.debug('saved cache file', { filePath, count: persisted.length });
  };

  const deleteFile = async (): Promise<void> => {
    await rm(filePath);
    logger.debug('deleted cache file', { filePath });
  };

  const cache: PersistableCache<V> = {
    name,
    filePath,
    get: store.get,
    resolve: store.resolve,
    set: store.set,
    remove: store.remove,
    contains: store.contains,
    require: (key) => store.require(key).map(() => cache),
    requireKeys: (keys) => store.requireKeys(keys).map(() => cache),
    valuesOfType: store.valuesOfType,
    allValues: store.allValues,
    subscribe: store.subscribe,
    save,
    delete: deleteFile,
  };

  return cache;
};

/**
 * Loads a persistable cache whose values are written to disk as they are.
 *
 * @example
 * ```typescript
 * const scores = await createPersistableValueCache({
 *   name: 'scores.json',
 *   directory: './data',
 *   valueType: valueType.number,
 * });
 * ```
 */
export const createPersistableValueCache = <V>(
  options: Omit<PersistableCacheOptions<V, V>, keyof PersistenceCodec<V, V>> & {
    readonly valueType: ValueType<V>;
  }
): Promise<PersistableCache<V>> =>
  createPersistableCache<V, V>({
    ...options,
    persistedType: options.valueType,
    toPersisted: (value) => value,
    fromPersisted: (persisted) => persisted,
  });
