import { Decimal } from 'decimal.js';

import { InvalidAmountError } from '../errors.js';

// One configuration for every amount in the process
Decimal.set({
  maxE: 9e15,
  minE: -9e15,
  modulo: Decimal.ROUND_HALF_EVEN,
  precision: 28,
  rounding: Decimal.ROUND_HALF_EVEN,
  toExpNeg: -7,
  toExpPos: 21,
});

export { Decimal };

/**
 * Plain decimal or scientific notation. decimal.js also accepts hex, binary,
 * octal and Infinity/NaN literals, none of which are amounts.
 */
const DECIMAL_STRING = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Parse a decimal string exactly.
 * @throws InvalidAmountError when the string is not a decimal or its exponent is out of range
 */
export function parseDecimalString(value: string): Decimal {
  const trimmed = value.trim();
  if (!DECIMAL_STRING.test(trimmed)) {
    throw new InvalidAmountError(value, 'Invalid decimal format');
  }

  const parsed = new Decimal(trimmed);
  // Exponents past maxE/minE overflow to Infinity or underflow to 0
  const [mantissa = ''] = trimmed.split(/e/i);
  if (!parsed.isFinite() || (parsed.isZero() && /[1-9]/.test(mantissa))) {
    throw new InvalidAmountError(value, 'Amount is out of range');
  }
  return parsed;
}

/**
 * Convert a binary float through its shortest round-trip string, so 111.33
 * becomes exactly 111.33 rather than the nearest binary fraction.
 * @throws InvalidAmountError for NaN and infinities
 */
export function decimalFromNumber(value: number): Decimal {
  if (!Number.isFinite(value)) {
    throw new InvalidAmountError(String(value), 'Amount must be a finite number');
  }
  return parseDecimalString(String(value));
}

export function isDecimal(value: unknown): value is Decimal {
  return Decimal.isDecimal(value);
}

/**
 * Canonical text of a decimal: no trailing zeros, no exponent.
 * '2.000' and '2.000000' both give '2'.
 */
export function normalizeDecimal(value: Decimal): string {
  // -0 prints as '0'
  return value.isZero() ? '0' : value.toFixed();
}
