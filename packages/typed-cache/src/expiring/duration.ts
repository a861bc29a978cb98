import type { z } from 'zod';
import { expirationDurationSchema, type durationUnitSchema } from '../config/options.js';

/**
 * Unit of an expiration duration.
 */
export type DurationUnit = z.infer<typeof durationUnitSchema>;

/**
 * How long an entry of an expiring cache lives after it is written.
 */
export interface ExpirationDuration {
  readonly unit: DurationUnit;
  readonly amount: number;
}

const MS_PER_UNIT: Record<DurationUnit, number> = {
  seconds: 1000,
  minutes: 60 * 1000,
  hours: 60 * 60 * 1000,
};

/** A duration of `amount` seconds */
export const seconds = (amount: number): ExpirationDuration => ({ unit: 'seconds', amount });

/** A duration of `amount` minutes */
export const minutes = (amount: number): ExpirationDuration => ({ unit: 'minutes', amount });

/** A duration of `amount` hours */
export const hours = (amount: number): ExpirationDuration => ({ unit: 'hours', amount });

/**
 * Converts a duration to milliseconds.
 *
 * @throws ZodError if the amount is negative or not an integer
 */
export const toMilliseconds = (duration: ExpirationDuration): number => {
  const { unit, amount } = expirationDurationSchema.parse(duration);
  return amount * MS_PER_UNIT[unit];
};
