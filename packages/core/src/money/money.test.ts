import { initLogger, MemorySink } from '@moneta/logger';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { CAD, DEFAULT_CURRENCY, USD } from '../currency/defaults.js';
import { onMoneyDiagnostic, type MoneyDiagnostic } from '../diagnostics/money-diagnostics.js';
import {
  CurrencyDoesNotExistError,
  CurrencyMismatchError,
  DivisionByZeroError,
  InvalidAmountError,
  InvalidOperationError,
  MoneyComparisonError,
  MoneyTypeError,
} from '../errors.js';
import { Decimal } from '../utils/decimal-utils.js';

import { Money, parseMoney } from './money.js';

const ONE_MILLION = new Decimal('1000000');

describe('Money', () => {
  let oneMillionBucks: Money;
  let diagnostics: MoneyDiagnostic[];
  let unsubscribe: () => void;

  beforeEach(() => {
    oneMillionBucks = new Money(ONE_MILLION, USD);
    diagnostics = [];
    unsubscribe = onMoneyDiagnostic((diagnostic) => diagnostics.push(diagnostic));
  });

  afterEach(() => {
    unsubscribe();
    initLogger({ sinks: [] });
  });

  const messages = (): string[] => diagnostics.map((d) => d.message);

  describe('construction', () => {
    it('should keep an exact Decimal amount and a Currency', () => {
      expect(oneMillionBucks.amount.equals(ONE_MILLION)).toBe(true);
      expect(oneMillionBucks.currency).toBe(USD);
    });

    it('should resolve a currency code case-insensitively', () => {
      const money = new Money(ONE_MILLION, 'usd');

      expect(money.amount.equals(ONE_MILLION)).toBe(true);
      expect(money.currency).toBe(USD);
    });

    it('should fall back to the default currency', () => {
      const money = new Money(ONE_MILLION);

      expect(money.currency).toBe(DEFAULT_CURRENCY);
      expect(new Money().isZero()).toBe(true);
    });

    it('should convert floats through their decimal string', () => {
      expect(new Money(1000000.0).amount.equals(ONE_MILLION)).toBe(true);
      expect(new Money(111.33, USD).amount.toFixed()).toBe('111.33');
      expect(new Money(0.1 + 0.2, USD).amount.toFixed()).toBe('0.30000000000000004');
    });

    it('should accept strings and bigints without precision loss', () => {
      expect(new Money('0.000000000000000000000000000001', USD).amount.toFixed()).toBe(
        '0.000000000000000000000000000001'
      );
      expect(new Money(10n ** 30n, USD).toDebugString()).toBe('1000000000000000000000000000000 USD');
    });

    it('should reject amounts that are not finite decimals', () => {
      expect(() => new Money(Number.NaN, USD)).toThrow(InvalidAmountError);
      expect(() => new Money('12,50', USD)).toThrow('Invalid amount "12,50": Invalid decimal format');
      expect(() => new Money(new Decimal(Infinity), USD)).toThrow('Invalid amount "Infinity": Amount must be finite');
    });

    it('should reject amount strings whose exponent is out of range', () => {
      expect(() => new Money('1e9999999999999999', USD)).toThrow(InvalidAmountError);
      expect(parseMoney('1e-9999999999999999', USD)._unsafeUnwrapErr().code).toBe('INVALID_AMOUNT');
    });

    it('should reject unknown currency codes', () => {
      expect(() => new Money(1, 'ABC')).toThrow(CurrencyDoesNotExistError);
    });
  });

  describe('parseMoney', () => {
    it('should wrap valid input in Ok', () => {
      const result = parseMoney('12.50', 'eur');

      expect(result.isOk()).toBe(true);
      expect(result._unsafeUnwrap().toDebugString()).toBe('12.5 EUR');
    });

    it('should return amount and currency failures as Err', () => {
      expect(parseMoney('abc', 'USD')._unsafeUnwrapErr()).toBeInstanceOf(InvalidAmountError);
      expect(parseMoney(1, 'ABC')._unsafeUnwrapErr().code).toBe('CURRENCY_DOES_NOT_EXIST');
    });
  });

  describe('string forms', () => {
    it('should render a debug string with trailing zeros stripped', () => {
      expect(oneMillionBucks.toDebugString()).toBe('1000000 USD');
      expect(new Money(new Decimal('2.000'), 'PLN').toDebugString()).toBe('2 PLN');
      expect(new Money(new Decimal('2.000'), 'PLN').toDebugString()).toBe(
        new Money(new Decimal('2.000000'), 'PLN').toDebugString()
      );
    });

    it('should format toString with the default locale and two places', () => {
      expect(oneMillionBucks.toString()).toBe('US$1,000,000.00');
      expect(`${new Money('-5.5', USD)}`).toBe('-US$5.50');
    });

    it('should serialize to JSON as amount string and code', () => {
      expect(JSON.stringify(new Money('12.50', USD))).toBe('{"amount":"12.5","currency":"USD"}');
    });
  });

  describe('addition and subtraction', () => {
    it('should add Money of the same currency', () => {
      expect(oneMillionBucks.add(oneMillionBucks).equals(new Money('2000000', USD))).toBe(true);
    });

    it('should refuse to add a non-Money value', () => {
      expect(() => new Money(1000).add(123)).toThrow(InvalidOperationError);
      expect(() => new Money(1000).add(123)).toThrow('Unsupported operand for Money addition: number');
      expect(() => new Money(1000).add(new Decimal(1))).toThrow(MoneyTypeError);
    });

    it('should subtract Money of the same currency', () => {
      expect(oneMillionBucks.subtract(oneMillionBucks).equals(new Money(0, USD))).toBe(true);
    });

    it('should refuse to subtract a non-Money value', () => {
      expect(() => new Money(1000).subtract(123)).toThrow(InvalidOperationError);
    });

    it('should treat NaN and infinities as unsupported operands', () => {
      expect(() => oneMillionBucks.add(Number.NaN)).toThrow('Unsupported operand for Money addition: number');
      expect(() => oneMillionBucks.subtract(Number.NaN)).toThrow(InvalidOperationError);
      expect(() => oneMillionBucks.multiply(Number.POSITIVE_INFINITY)).toThrow(
        'Unsupported operand for Money multiplication: number'
      );
      expect(() => oneMillionBucks.divide(Number.NEGATIVE_INFINITY)).toThrow(InvalidOperationError);
      expect(() => oneMillionBucks.percentage(Number.NaN)).toThrow(InvalidOperationError);
      expect(diagnostics).toHaveLength(0);
    });

    it('should refuse to combine different currencies', () => {
      const dollars = new Money(1, USD);
      const loonies = new Money(1, CAD);

      expect(() => dollars.add(loonies)).toThrow(CurrencyMismatchError);
      expect(() => dollars.subtract(loonies)).toThrow('Cannot subtract Money with different currencies: USD and CAD');
      expect(() => dollars.add(loonies)).toThrow(MoneyTypeError);
    });

    it('should satisfy m + m == 2m and m - m == 0 for sample amounts', () => {
      for (const amount of ['0', '1', '-3.5', '111.33', '0.0001', '123456789.987654321']) {
        const m = new Money(amount, USD);

        expect(m.add(m).equals(new Money(m.amount.times(2), m.currency))).toBe(true);
        expect(m.subtract(m).equals(new Money(0, m.currency))).toBe(true);
      }
    });
  });

  describe('multiplication', () => {
    it('should multiply by an integer exactly', () => {
      const x = new Money(111.33, USD);

      expect(x.multiply(3).equals(new Money(333.99, USD))).toBe(true);
      expect(messages()).toEqual([]);
    });

    it('should multiply by bigint and Decimal factors without a notice', () => {
      const x = new Money('10', USD);

      expect(x.multiply(3n).toDebugString()).toBe('30 USD');
      expect(x.multiply(new Decimal('0.5')).toDebugString()).toBe('5 USD');
      expect(diagnostics).toHaveLength(0);
    });

    it('should multiply by a float and raise a deprecation notice', () => {
      const result = new Money('10').multiply(1.2);

      expect(result.equals(new Money(12))).toBe(true);
      expect(diagnostics).toEqual([
        {
          type: 'deprecation',
          operation: 'multiply',
          message: 'Multiplying Money instances with floats is deprecated',
          operand: 1.2,
        },
      ]);
    });

    it('should log the deprecation at warn level under the money category', () => {
      const sink = new MemorySink();
      initLogger({ level: 'warn', sinks: [sink] });

      new Money('10').divide(2.5);

      expect(sink.entries).toHaveLength(1);
      expect(sink.entries[0]).toMatchObject({
        level: 'warn',
        category: 'money',
        msg: 'Dividing Money instances by floats is deprecated',
        context: { operation: 'divide', operand: 2.5 },
      });
    });

    it('should refuse Money times Money', () => {
      expect(() => oneMillionBucks.multiply(oneMillionBucks)).toThrow(InvalidOperationError);
      expect(() => oneMillionBucks.multiply(oneMillionBucks)).toThrow(
        'Unsupported operand for Money multiplication: Money'
      );
    });

    it('should refuse operands of other runtime types', () => {
      const untypedCall = (operand: unknown): unknown =>
        Reflect.apply(oneMillionBucks.multiply, oneMillionBucks, [operand]);

      expect(() => untypedCall('3')).toThrow('Unsupported operand for Money multiplication: string');
      expect(() => untypedCall(null)).toThrow('Unsupported operand for Money multiplication: null');
    });
  });

  describe('division', () => {
    it('should give a plain Decimal ratio for Money of the same currency', () => {
      const ratio = new Money(50, USD).divide(new Money(2, USD));

      expect(ratio).toBeInstanceOf(Decimal);
      expect(ratio.equals(25)).toBe(true);
    });

    it('should refuse Money of a different currency', () => {
      expect(() => new Money(50, USD).divide(new Money(2, CAD))).toThrow(CurrencyMismatchError);
    });

    it('should divide by a scalar', () => {
      expect(new Money(50, USD).divide(2).equals(new Money(25, USD))).toBe(true);
      expect(diagnostics).toHaveLength(0);
    });

    it('should divide by a float and raise a deprecation notice', () => {
      const result = new Money('10').divide(1.2);

      expect(result.amount.toFixed(2)).toBe('8.33');
      expect(messages()).toEqual(['Dividing Money instances by floats is deprecated']);
    });

    it('should refuse division by zero', () => {
      expect(() => new Money(50, USD).divide(0)).toThrow(DivisionByZeroError);
      expect(() => new Money(50, USD).divide(new Money(0, USD))).toThrow('Cannot divide Money by zero');
    });
  });

  describe('percentage', () => {
    it('should take k percent of the amount', () => {
      expect(oneMillionBucks.percentage(1).equals(new Money(10000, USD))).toBe(true);
      expect(new Money(4, USD).percentage(50).equals(new Money(2, USD))).toBe(true);
    });

    it('should raise a deprecation notice for a float rate', () => {
      const result = new Money('10').percentage(2.5);

      expect(result.toDebugString()).toBe('0.25 XYZ');
      expect(messages()).toEqual(['Calculating percentages of Money instances using floats is deprecated']);
    });
  });

  describe('equality and hashing', () => {
    it('should be equal when amount and currency match', () => {
      expect(new Money('2.000', 'PLN').equals(new Money('2', 'PLN'))).toBe(true);
      expect(oneMillionBucks.equals(new Money(1, USD))).toBe(false);
      expect(new Money(1, USD).equals(new Money(1, CAD))).toBe(false);
    });

    it('should not be equal to other types and never throw', () => {
      const zero = new Money(0, USD);

      expect(zero.equals(null)).toBe(false);
      expect(zero.equals(undefined)).toBe(false);
      expect(zero.equals({})).toBe(false);
      expect(zero.equals(0)).toBe(false);
      expect(oneMillionBucks.equals(ONE_MILLION)).toBe(false);
    });

    it('should share a hash key between equal values', () => {
      const a = new Money(new Decimal('2.000'), 'PLN');
      const b = new Money(new Decimal('2.000000'), 'PLN');
      const totals = new Map<string, string>([[a.hashKey(), 'two zloty']]);

      expect(a.hashKey()).toBe('2:PLN');
      expect(b.hashKey()).toBe(a.hashKey());
      expect(totals.get(b.hashKey())).toBe('two zloty');
      expect(new Money(2, USD).hashKey()).not.toBe(a.hashKey());
    });
  });

  describe('ordering', () => {
    it('should order Money of the same currency', () => {
      const one = new Money(1, USD);

      expect(one.lessThan(oneMillionBucks)).toBe(true);
      expect(oneMillionBucks.greaterThan(one)).toBe(true);
      expect(one.lessThanOrEqual(new Money('1.00', USD))).toBe(true);
      expect(one.greaterThanOrEqual(oneMillionBucks)).toBe(false);
      expect(one.compareTo(new Money(1, USD))).toBe(0);
      expect(oneMillionBucks.compareTo(one)).toBe(1);
      expect(one.compareTo(oneMillionBucks)).toBe(-1);
    });

    it('should raise MoneyComparisonError against a plain number', () => {
      expect(() => oneMillionBucks.lessThan(1.0)).toThrow(MoneyComparisonError);
      expect(() => oneMillionBucks.greaterThan(1.5)).toThrow('Cannot order Money against number');
    });

    it('should raise MoneyComparisonError against NaN and infinities', () => {
      expect(() => oneMillionBucks.lessThan(Number.NaN)).toThrow(MoneyComparisonError);
      expect(() => oneMillionBucks.greaterThan(Number.POSITIVE_INFINITY)).toThrow(
        'Cannot order Money against number'
      );
      expect(() => oneMillionBucks.lessThanOrEqual(Number.NEGATIVE_INFINITY)).toThrow(MoneyComparisonError);
    });

    it('should raise MoneyComparisonError rather than a type error across currencies', () => {
      let caught: unknown;
      try {
        new Money(1, USD).lessThan(new Money(1, CAD));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(MoneyComparisonError);
      expect(caught).not.toBeInstanceOf(MoneyTypeError);
    });
  });

  describe('unary operations and rounding', () => {
    it('should take the absolute value', () => {
      expect(new Money(-1, USD).abs().equals(new Money(1, USD))).toBe(true);
      expect(new Money(1, USD).abs().equals(new Money(1, USD))).toBe(true);
    });

    it('should negate and keep positive values', () => {
      expect(new Money('2.5', USD).negated().toDebugString()).toBe('-2.5 USD');
      expect(new Money('2.5', USD).positive().equals(new Money('2.5', USD))).toBe(true);
    });

    it('should round half to even', () => {
      expect(new Money('2.675', USD).round(2).toDebugString()).toBe('2.68 USD');
      expect(new Money('2.665', USD).round(2).toDebugString()).toBe('2.66 USD');
      expect(new Money('2.5', USD).round().toDebugString()).toBe('2 USD');
    });

    it('should report sign', () => {
      expect(new Money(0, USD).isZero()).toBe(true);
      expect(new Money(0, USD).isPositive()).toBe(false);
      expect(new Money('-0.01', USD).isNegative()).toBe(true);
      expect(new Money('0.01', USD).isPositive()).toBe(true);
    });
  });

  describe('sum', () => {
    it('should add up Money of one currency', () => {
      expect(Money.sum([new Money(1, USD), new Money(2, USD)]).equals(new Money(3, USD))).toBe(true);
    });

    it('should give zero for an empty iterable', () => {
      expect(Money.sum([]).equals(new Money(0))).toBe(true);
      expect(Money.sum([], 'usd').equals(new Money(0, USD))).toBe(true);
    });

    it('should accept any iterable', () => {
      function* wallet(): Generator<Money> {
        yield new Money('0.10', USD);
        yield new Money('0.20', USD);
      }

      expect(Money.sum(wallet()).toDebugString()).toBe('0.3 USD');
    });

    it('should refuse mixed currencies', () => {
      expect(() => Money.sum([new Money(1, USD), new Money(2, CAD)])).toThrow(CurrencyMismatchError);
    });
  });
});
