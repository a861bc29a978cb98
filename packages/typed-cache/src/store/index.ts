/**
 * Base key-value store.
 *
 * @packageDocumentation
 */

export { createKeyValueStore } from './key-value-store.js';
export { createChangePublisher } from './change-publisher.js';
export type { KeyValueStore, KeyValueStoreOptions } from './types.js';
export type { ChangePublisher } from './change-publisher.js';
