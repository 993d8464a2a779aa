import { Decimal, decimalFromNumber, isDecimal } from '../utils/decimal-utils.js';

/**
 * Scalars Money arithmetic accepts. Strings are amounts, not operands: pass
 * them through `new Decimal(...)` first.
 */
export type Numeric = number | bigint | Decimal;

/**
 * Scalar arm of the operand dispatch.
 *
 * - `exact`: integer number, bigint or Decimal
 * - `float`: a number with a fractional part, converted through its decimal
 *   string; arithmetic on it succeeds but raises a deprecation notice
 */
export type ScalarOperand = { kind: 'exact'; value: Decimal } | { kind: 'float'; value: Decimal; raw: number };

/**
 * Classify a non-Money value. Returns undefined when it is not a scalar;
 * NaN and the infinities are not scalars.
 */
export function classifyScalar(value: unknown): ScalarOperand | undefined {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return undefined;
    return Number.isInteger(value)
      ? { kind: 'exact', value: decimalFromNumber(value) }
      : { kind: 'float', value: decimalFromNumber(value), raw: value };
  }
  if (typeof value === 'bigint') {
    return { kind: 'exact', value: new Decimal(value.toString()) };
  }
  if (isDecimal(value)) {
    return { kind: 'exact', value };
  }
  return undefined;
}

/** Short label of a value's runtime type for error messages. */
export function describeOperand(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') {
    const name: unknown = value.constructor?.name;
    return typeof name === 'string' && name !== 'Object' ? name : 'object';
  }
  return typeof value;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled operand: ${JSON.stringify(value)}`);
}
