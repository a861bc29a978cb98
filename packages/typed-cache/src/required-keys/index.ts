/**
 * Cache with keys that must always be present.
 *
 * @packageDocumentation
 */

export { createRequiredKeysCache } from './required-keys-cache.js';
export type {
  RequiredKeysCache,
  RequiredKeysCacheOptions,
  ResolveRequired,
  UpdateRequired,
  UseRequired,
} from './types.js';
