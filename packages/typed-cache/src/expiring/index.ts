/**
 * Time-based expiring cache.
 *
 * @packageDocumentation
 */

export { createExpiringCache } from './expiring-cache.js';
export { seconds, minutes, hours, toMilliseconds } from './duration.js';
export type { DurationUnit, ExpirationDuration } from './duration.js';
export type { ExpiringCache, ExpiringCacheOptions } from './types.js';
