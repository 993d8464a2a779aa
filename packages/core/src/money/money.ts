import { err, ok, type Result } from 'neverthrow';

import { Currency } from '../currency/currency.js';
import { CURRENCIES, DEFAULT_CURRENCY } from '../currency/defaults.js';
import { warnDeprecated } from '../diagnostics/money-diagnostics.js';
import {
  CurrencyMismatchError,
  DivisionByZeroError,
  InvalidAmountError,
  InvalidOperationError,
  MoneyComparisonError,
  MoneyError,
} from '../errors.js';
import { formatMoney } from '../localization/format-money.js';
import { Decimal, decimalFromNumber, isDecimal, normalizeDecimal, parseDecimalString } from '../utils/decimal-utils.js';

import { assertNever, classifyScalar, describeOperand, type Numeric, type ScalarOperand } from './operand.js';

export type AmountInput = number | bigint | string | Decimal;
export type CurrencyInput = Currency | string;
export type MoneyOperand = Money | Numeric;

/**
 * Shape every Money subclass keeps: arithmetic rebuilds results through
 * `new (receiver's class)(amount, currency)`.
 */
export type MoneyConstructor<M extends Money = Money> = new (amount: Decimal, currency: Currency) => M;

/**
 * Full operand dispatch for a receiver: a scalar, Money in the receiver's
 * currency, Money in another currency, or anything else.
 */
type Operand =
  | ScalarOperand
  | { kind: 'same-currency'; value: Money }
  | { kind: 'other-currency'; value: Money }
  | { kind: 'incompatible'; value: unknown };

function toAmount(amount: AmountInput): Decimal {
  if (isDecimal(amount)) {
    if (!amount.isFinite()) {
      throw new InvalidAmountError(amount.toString(), 'Amount must be finite');
    }
    return amount;
  }
  if (typeof amount === 'number') return decimalFromNumber(amount);
  if (typeof amount === 'bigint') return new Decimal(amount.toString());
  return parseDecimalString(amount);
}

function resolveCurrency(currency: CurrencyInput | undefined): Currency {
  if (currency === undefined) return DEFAULT_CURRENCY;
  if (currency instanceof Currency) return currency;
  return CURRENCIES.lookup(currency);
}

function isSameClass<T extends object>(template: T, value: object): value is T {
  return value.constructor === template.constructor;
}

/**
 * An exact decimal amount in a currency.
 *
 * Immutable: every operation returns a new instance of the receiver's own
 * class. Amounts from binary floats go through their decimal string, so
 * `new Money(111.33, 'USD')` holds exactly 111.33.
 *
 * @example
 * const price = new Money('19.99', 'usd');
 * price.multiply(3).toString(); // 'US$59.97'
 */
export class Money {
  readonly amount: Decimal;
  readonly currency: Currency;

  /**
   * @param amount - defaults to 0
   * @param currency - a Currency, a code in any case, or omitted for DEFAULT_CURRENCY
   * @throws InvalidAmountError, CurrencyDoesNotExistError
   */
  constructor(amount: AmountInput = 0, currency?: CurrencyInput) {
    this.amount = toAmount(amount);
    this.currency = resolveCurrency(currency);
  }

  /**
   * Fold with `add`, left to right. The first element seeds the total, so its
   * class is the result's class. An empty iterable gives zero of the class
   * `sum` was called on, in `currency`.
   * @throws CurrencyMismatchError
   */
  static sum<M extends Money>(this: MoneyConstructor<M>, items: Iterable<M>, currency?: CurrencyInput): M {
    let total: M | undefined;
    for (const item of items) {
      total = total === undefined ? item : total.add(item);
    }
    return total ?? new this(new Decimal(0), resolveCurrency(currency));
  }

  add(other: MoneyOperand): this {
    const operand = this.classify(other);
    switch (operand.kind) {
      case 'same-currency':
        return this.withAmount(this.amount.plus(operand.value.amount));
      case 'other-currency':
        throw new CurrencyMismatchError('add', this.currency.code, operand.value.currency.code);
      case 'exact':
      case 'float':
      case 'incompatible':
        throw new InvalidOperationError('addition', describeOperand(other));
      default:
        return assertNever(operand);
    }
  }

  subtract(other: MoneyOperand): this {
    const operand = this.classify(other);
    switch (operand.kind) {
      case 'same-currency':
        return this.withAmount(this.amount.minus(operand.value.amount));
      case 'other-currency':
        throw new CurrencyMismatchError('subtract', this.currency.code, operand.value.currency.code);
      case 'exact':
      case 'float':
      case 'incompatible':
        throw new InvalidOperationError('subtraction', describeOperand(other));
      default:
        return assertNever(operand);
    }
  }

  /**
   * Scale by a scalar. Money times Money is undefined.
   */
  multiply(factor: MoneyOperand): this {
    const operand = this.classify(factor);
    switch (operand.kind) {
      case 'exact':
        return this.withAmount(this.amount.times(operand.value));
      case 'float':
        warnDeprecated('multiply', operand.raw);
        return this.withAmount(this.amount.times(operand.value));
      case 'same-currency':
      case 'other-currency':
      case 'incompatible':
        throw new InvalidOperationError('multiplication', describeOperand(factor));
      default:
        return assertNever(operand);
    }
  }

  /**
   * Divide by a scalar (Money result) or by Money of the same currency (plain
   * Decimal ratio).
   * @throws DivisionByZeroError, CurrencyMismatchError, InvalidOperationError
   */
  divide(divisor: Money): Decimal;
  divide(divisor: Numeric): this;
  divide(divisor: MoneyOperand): this | Decimal;
  divide(divisor: MoneyOperand): this | Decimal {
    const operand = this.classify(divisor);
    switch (operand.kind) {
      case 'exact':
        return this.withAmount(this.amount.dividedBy(nonZero(operand.value)));
      case 'float':
        warnDeprecated('divide', operand.raw);
        return this.withAmount(this.amount.dividedBy(operand.value));
      case 'same-currency':
        return this.amount.dividedBy(nonZero(operand.value.amount));
      case 'other-currency':
        throw new CurrencyMismatchError('divide', this.currency.code, operand.value.currency.code);
      case 'incompatible':
        throw new InvalidOperationError('division', describeOperand(divisor));
      default:
        return assertNever(operand);
    }
  }

  /**
   * `rate` percent of this amount: amount × rate / 100.
   */
  percentage(rate: Numeric): this {
    const operand = this.classify(rate);
    switch (operand.kind) {
      case 'exact':
        return this.withAmount(this.amount.times(operand.value).dividedBy(100));
      case 'float':
        warnDeprecated('percentage', operand.raw);
        return this.withAmount(this.amount.times(operand.value).dividedBy(100));
      case 'same-currency':
      case 'other-currency':
      case 'incompatible':
        throw new InvalidOperationError('percentage', describeOperand(rate));
      default:
        return assertNever(operand);
    }
  }

  positive(): this {
    return this.withAmount(this.amount);
  }

  negated(): this {
    return this.withAmount(this.amount.negated());
  }

  abs(): this {
    return this.withAmount(this.amount.abs());
  }

  /** Round half-even to `decimalPlaces`. */
  round(decimalPlaces = 0): this {
    return this.withAmount(this.amount.toDecimalPlaces(decimalPlaces, Decimal.ROUND_HALF_EVEN));
  }

  /**
   * @returns -1, 0 or 1
   * @throws MoneyComparisonError unless `other` is Money in the same currency
   */
  compareTo(other: MoneyOperand): -1 | 0 | 1 {
    const operand = this.classify(other);
    switch (operand.kind) {
      case 'same-currency': {
        const order = this.amount.comparedTo(operand.value.amount);
        return order < 0 ? -1 : order > 0 ? 1 : 0;
      }
      case 'other-currency':
        throw new MoneyComparisonError(`Money in ${operand.value.currency.code} (have ${this.currency.code})`);
      case 'exact':
      case 'float':
      case 'incompatible':
        throw new MoneyComparisonError(describeOperand(other));
      default:
        return assertNever(operand);
    }
  }

  lessThan(other: MoneyOperand): boolean {
    return this.compareTo(other) < 0;
  }

  lessThanOrEqual(other: MoneyOperand): boolean {
    return this.compareTo(other) <= 0;
  }

  greaterThan(other: MoneyOperand): boolean {
    return this.compareTo(other) > 0;
  }

  greaterThanOrEqual(other: MoneyOperand): boolean {
    return this.compareTo(other) >= 0;
  }

  /**
   * Same currency and numerically equal amount. Never throws; false for
   * anything that is not Money, including a bare Decimal.
   */
  equals(other: unknown): boolean {
    return other instanceof Money && other.currency.equals(this.currency) && other.amount.equals(this.amount);
  }

  /**
   * Key shared by every pair of equal values, e.g. for Map lookups.
   */
  hashKey(): string {
    return `${normalizeDecimal(this.amount)}:${this.currency.code}`;
  }

  isZero(): boolean {
    return this.amount.isZero();
  }

  isPositive(): boolean {
    return this.amount.greaterThan(0);
  }

  isNegative(): boolean {
    return this.amount.lessThan(0);
  }

  /**
   * `<amount> <code>` with trailing zeros stripped: '2.000' and '2.000000'
   * PLN both give '2 PLN'.
   */
  toDebugString(): string {
    return `${normalizeDecimal(this.amount)} ${this.currency.code}`;
  }

  /** Formatted for the default locale with two decimal places. */
  toString(): string {
    return formatMoney(this);
  }

  toJSON(): { amount: string; currency: string } {
    return { amount: normalizeDecimal(this.amount), currency: this.currency.code };
  }

  /**
   * Build a value of the receiver's runtime class with a new amount and the
   * same currency.
   */
  protected withAmount(amount: Decimal): this {
    const created: unknown = Reflect.construct(this.constructor, [amount, this.currency]);
    if (created instanceof Money && isSameClass(this, created)) {
      return created;
    }
    throw new TypeError(`${this.constructor.name} must be constructible as (amount, currency)`);
  }

  private classify(other: unknown): Operand {
    if (other instanceof Money) {
      return other.currency.equals(this.currency)
        ? { kind: 'same-currency', value: other }
        : { kind: 'other-currency', value: other };
    }
    return classifyScalar(other) ?? { kind: 'incompatible', value: other };
  }
}

function nonZero(divisor: Decimal): Decimal {
  if (divisor.isZero()) {
    throw new DivisionByZeroError();
  }
  return divisor;
}

/**
 * Result-returning constructor for untrusted input.
 */
export function parseMoney(amount: AmountInput, currency?: CurrencyInput): Result<Money, MoneyError> {
  try {
    return ok(new Money(amount, currency));
  } catch (error) {
    if (error instanceof MoneyError) {
      return err(error);
    }
    throw error;
  }
}
