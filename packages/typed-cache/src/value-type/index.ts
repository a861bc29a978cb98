export { valueType, describeValue } from './value-type.js';
export type { ValueType } from './value-type.js';
