/**
 * Shared test fixtures and constants.
 */

import { valueType, type ValueType } from '../value-type/value-type.js';

// ============================================================================
// Time Constants
// ============================================================================

/** One second in milliseconds */
export const ONE_SECOND_MS = 1000;

/** One minute in milliseconds */
export const ONE_MINUTE_MS = 60 * ONE_SECOND_MS;

/** One hour in milliseconds */
export const ONE_HOUR_MS = 60 * ONE_MINUTE_MS;

/** Fixed start time for fake timers: 2024-01-01T00:00:00.000Z */
export const FIXED_NOW_MS = Date.UTC(2024, 0, 1);

// ============================================================================
// Keys and Values
// ============================================================================

export const KEY_A = 'a';
export const KEY_B = 'b';
export const KEY_C = 'c';
export const KEY_D = 'd';

export const TEST_API_URL = 'http://localhost:3000';
export const TEST_TOKEN = 'test-token';

/**
 * Mixed-type entries for seeding unknown-valued caches.
 */
export const MIXED_ENTRIES: readonly (readonly [string, unknown])[] = [
  ['name', 'Ada'],
  ['age', 36],
  ['admin', true],
  ['tags', ['math', 'engines']],
];

// ============================================================================
// Value Types
// ============================================================================

/**
 * Test domain object stored in caches.
 */
export interface TestUser {
  readonly id: number;
  readonly name: string;
}

export const TEST_USER: TestUser = { id: 1, name: 'Ada' };

export const testUserType: ValueType<TestUser> = {
  name: 'TestUser',
  is: (value: unknown): value is TestUser =>
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    'name' in value &&
    typeof value.id === 'number' &&
    typeof value.name === 'string',
};

export const stringArrayType = valueType.array(valueType.string);
