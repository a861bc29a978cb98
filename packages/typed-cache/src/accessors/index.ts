/**
 * Handles on single cache keys.
 *
 * @packageDocumentation
 */

export {
  createCachedValue,
  createOptionalCachedValue,
  createResolvedValue,
} from './cached-value.js';
export type { CachedValue, OptionalCachedValue, ResolvedValue } from './types.js';
