import type { LoggerOptions } from '../logging/logger.js';
import type { Cacheable, CacheSeedOptions, ObservableCache } from '../types.js';
import type { ValueType } from '../value-type/value-type.js';

/**
 * String-keyed cache that can be written to and reloaded from a JSON file.
 */
export interface PersistableCache<V>
  extends Cacheable<string, V, PersistableCache<V>>,
    ObservableCache<string, V> {
  /** File name of the cache within its directory */
  readonly name: string;

  /** Absolute path of the cache file */
  readonly filePath: string;

  /**
   * Writes every entry to the cache file, creating its directory.
   * Entries whose value does not map to a persisted value are left out.
   */
  readonly save: () => Promise<void>;

  /**
   * Deletes the cache file. Entries in memory are kept.
   */
  readonly delete: () => Promise<void>;
}

/**
 * Maps cached values to the JSON values written to disk and back.
 */
export interface PersistenceCodec<V, P> {
  /** Descriptor of the persisted values; other values in the file are skipped */
  readonly persistedType: ValueType<P>;
  /** Returns undefined to leave a value out of the file */
  readonly toPersisted: (value: V) => P | undefined;
  /** Returns undefined to skip a persisted value when loading */
  readonly fromPersisted: (persisted: P) => V | undefined;
}

/**
 * Options for loading a persistable cache.
 */
export interface PersistableCacheOptions<V, P>
  extends PersistenceCodec<V, P>,
    CacheSeedOptions<string, V>,
    LoggerOptions {
  /** File name, without path separators */
  readonly name: string;
  /** Directory holding the file */
  readonly directory: string;
}
