import type { ZodType } from 'zod';

/**
 * Runtime descriptor for a type a caller wants to read out of a cache.
 *
 * Stored values are untyped at the storage layer. A read names the type
 * it expects with a descriptor, and the cache answers with the value only
 * when `is` accepts it.
 */
export interface ValueType<T> {
  /** Display name used in type mismatch diagnostics */
  readonly name: string;
  /** Returns true when the value can be read as `T` */
  readonly is: (value: unknown) => value is T;
}

/**
 * Constructor accepted by {@link instanceOf}.
 */
type Constructor<T> = abstract new (...args: never[]) => T;

/**
 * Names the runtime type of a value for diagnostics.
 *
 * @example
 * ```typescript
 * describeValue(null);          // 'null'
 * describeValue([1, 2]);        // 'array'
 * describeValue(new Date());    // 'Date'
 * describeValue({ a: 1 });      // 'object'
 * describeValue(42);            // 'number'
 * ```
 */
export const describeValue = (value: unknown): string => {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (typeof value === 'object') {
    const prototype: unknown = Object.getPrototypeOf(value);
    if (prototype === null || prototype === Object.prototype) {
      return 'object';
    }
    const ctor: unknown = 'constructor' in value ? value.constructor : undefined;
    return typeof ctor === 'function' && ctor.name.length > 0 ? ctor.name : 'object';
  }
  return typeof value;
};

const primitive = <T>(name: string, is: (value: unknown) => value is T): ValueType<T> => ({
  name,
  is,
});

const unknownType: ValueType<unknown> = primitive('unknown', (_value): _value is unknown => true);

const stringType = primitive('string', (value): value is string => typeof value === 'string');

const numberType = primitive('number', (value): value is number => typeof value === 'number');

const booleanType = primitive('boolean', (value): value is boolean => typeof value === 'boolean');

const bigintType = primitive('bigint', (value): value is bigint => typeof value === 'bigint');

const symbolType = primitive('symbol', (value): value is symbol => typeof value === 'symbol');

const functionType = primitive(
  'function',
  (value): value is (...args: never[]) => unknown => typeof value === 'function'
);

const recordType = primitive(
  'record',
  (value): value is Readonly<Record<string, unknown>> =>
    typeof value === 'object' && value !== null && !Array.isArray(value)
);

/**
 * Accepts instances of a class (including subclasses).
 */
const instanceOf = <T>(ctor: Constructor<T>): ValueType<T> => ({
  name: ctor.name.length > 0 ? ctor.name : 'anonymous class',
  is: (value): value is T => value instanceof ctor,
});

const dateType = instanceOf(Date);

/**
 * Accepts arrays, optionally checking every element.
 */
const array = <T = unknown>(of?: ValueType<T>): ValueType<readonly T[]> => ({
  name: of === undefined ? 'array' : `array<${of.name}>`,
  is: (value): value is readonly T[] =>
    Array.isArray(value) && (of === undefined || value.every((item) => of.is(item))),
});

/**
 * Accepts exactly the given primitive values.
 */
const literal = <const T extends readonly (string | number | boolean)[]>(
  ...values: T
): ValueType<T[number]> => ({
  name: values.map((v) => JSON.stringify(v)).join(' | '),
  is: (value): value is T[number] => values.some((v) => v === value),
});

/**
 * Widens a descriptor to also accept `undefined`.
 */
const optional = <T>(type: ValueType<T>): ValueType<T | undefined> => ({
  name: `${type.name} | undefined`,
  is: (value): value is T | undefined => value === undefined || type.is(value),
});

/**
 * Adapts a zod schema into a descriptor.
 *
 * Only the check is borrowed from the schema: reads return the stored
 * value itself, not a parsed copy, so transforms and defaults in the
 * schema have no effect on what a cache returns.
 *
 * @example
 * ```typescript
 * const userType = valueType.fromSchema(z.object({ id: z.number() }), 'User');
 * cache.get('user', userType); // { id: number } | undefined
 * ```
 */
const fromSchema = <S extends ZodType>(
  schema: S,
  name: string = schema.description ?? 'schema'
): ValueType<S['_output']> => ({
  name,
  is: (value): value is S['_output'] => schema.safeParse(value).success,
});

/**
 * Built-in descriptors and descriptor combinators.
 */
export const valueType = {
  unknown: unknownType,
  string: stringType,
  number: numberType,
  boolean: booleanType,
  bigint: bigintType,
  symbol: symbolType,
  function: functionType,
  record: recordType,
  date: dateType,
  array,
  instanceOf,
  literal,
  optional,
  fromSchema,
} as const;
