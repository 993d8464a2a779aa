/**
 * Binary and unary operators over Money, including the reflected forms
 * `k * A` and `k % A` that a method on Money cannot express.
 */

import { InvalidOperationError } from '../errors.js';
import type { Decimal } from '../utils/decimal-utils.js';

import { Money, type CurrencyInput, type MoneyOperand } from './money.js';
import { describeOperand, type Numeric } from './operand.js';

export function add<M extends Money>(left: M, right: MoneyOperand): M {
  return left.add(right);
}

export function sub<M extends Money>(left: M, right: MoneyOperand): M {
  return left.subtract(right);
}

/** `A * k` and `k * A`; the result takes the Money operand's class. */
export function mul<M extends Money>(left: M, right: MoneyOperand): M;
export function mul<M extends Money>(left: Numeric, right: M): M;
export function mul(left: MoneyOperand, right: MoneyOperand): Money {
  if (left instanceof Money) {
    return left.multiply(right);
  }
  if (right instanceof Money) {
    return right.multiply(left);
  }
  throw new InvalidOperationError('multiplication', 'two scalars');
}

export function div(left: Money, right: Money): Decimal;
export function div<M extends Money>(left: M, right: Numeric): M;
export function div(left: Money, right: MoneyOperand): Money | Decimal;
export function div(left: Money, right: MoneyOperand): Money | Decimal {
  return left.divide(right);
}

/**
 * `k % A` is k percent of A. Money on the left has no modulo.
 */
export function mod<M extends Money>(left: Numeric, right: M): M;
export function mod(left: Money, right: MoneyOperand): never;
export function mod(left: MoneyOperand, right: MoneyOperand): Money {
  if (left instanceof Money) {
    throw new InvalidOperationError('modulo', describeOperand(right));
  }
  if (right instanceof Money) {
    return right.percentage(left);
  }
  throw new InvalidOperationError('modulo', 'two scalars');
}

export function pos<M extends Money>(value: M): M {
  return value.positive();
}

export function neg<M extends Money>(value: M): M {
  return value.negated();
}

export function abs<M extends Money>(value: M): M {
  return value.abs();
}

export function sum(items: Iterable<Money>, currency?: CurrencyInput): Money {
  return Money.sum(items, currency);
}
