/**
 * JSON-backed caches.
 *
 * @packageDocumentation
 */

export { createJsonCache, parseJsonObject, parseJsonArray } from './json-cache.js';
export type { JsonCache, JsonParseError, JsonParseErrorCode } from './types.js';
