/**
 * Option schemas validated when a cache is constructed.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

/** Environment variable that turns on console debug logging */
export const DEBUG_ENV_VAR = 'TYPED_CACHE_DEBUG';

/**
 * Unit of an expiration duration.
 */
export const durationUnitSchema = z.enum(['seconds', 'minutes', 'hours']);

/**
 * Expiration duration applied to every entry of an expiring cache.
 */
export const expirationDurationSchema = z.object({
  unit: durationUnitSchema,
  amount: z.number().int().nonnegative(),
});

/**
 * Capacity of an LRU cache. Omitted means "as many as the initial values".
 */
export const lruOptionsSchema = z.object({
  capacity: z.number().int().nonnegative().optional(),
});

/**
 * Location of a persisted cache file.
 */
export const persistableOptionsSchema = z.object({
  name: z
    .string()
    .min(1, 'name must not be empty')
    .refine((name) => !/[\\/]/.test(name), 'name must not contain path separators'),
  directory: z.string().min(1, 'directory must not be empty'),
});

/**
 * Reads the debug flag from an environment.
 *
 * @returns true when TYPED_CACHE_DEBUG is "1" or "true" (any case)
 */
export const readDebugFlag = (env: NodeJS.ProcessEnv): boolean => {
  const raw = env[DEBUG_ENV_VAR];
  if (raw === undefined) {
    return false;
  }
  const normalized = raw.trim().toLowerCase();
  return normalized === '1' || normalized === 'true';
};
