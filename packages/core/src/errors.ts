/**
 * Error hierarchy for money and currency operations.
 *
 * Every error carries a stable `code`. Arithmetic that cannot be performed is a
 * `MoneyTypeError`; ordering across currencies or against non-Money values is a
 * `MoneyComparisonError`, kept outside that family so callers can catch an
 * undefined ordering separately from undefined arithmetic.
 */

export abstract class MoneyError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      name: this.name,
    };
  }
}

export class CurrencyDoesNotExistError extends MoneyError {
  readonly code = 'CURRENCY_DOES_NOT_EXIST';

  constructor(readonly lookup: string) {
    super(`Currency "${lookup}" does not exist`);
  }
}

export class InvalidAmountError extends MoneyError {
  readonly code = 'INVALID_AMOUNT';

  constructor(value: string, reason: string) {
    super(`Invalid amount "${value}": ${reason}`);
  }
}

export class DivisionByZeroError extends MoneyError {
  readonly code = 'DIVISION_BY_ZERO';

  constructor() {
    super('Cannot divide Money by zero');
  }
}

/**
 * Seed data (currency table, locale tables) that failed validation.
 */
export class InvalidTableError extends MoneyError {
  readonly code = 'INVALID_TABLE';

  constructor(
    readonly table: 'currency' | 'locale',
    readonly issues: string[]
  ) {
    super(`Invalid ${table} table:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
  }
}

/**
 * Arithmetic that is undefined for the given operands.
 */
export abstract class MoneyTypeError extends MoneyError {}

export class InvalidOperationError extends MoneyTypeError {
  readonly code = 'INVALID_OPERATION';

  constructor(
    readonly operation: string,
    operandDescription: string
  ) {
    super(`Unsupported operand for Money ${operation}: ${operandDescription}`);
  }
}

export class CurrencyMismatchError extends MoneyTypeError {
  readonly code = 'CURRENCY_MISMATCH';

  constructor(
    readonly operation: string,
    readonly left: string,
    readonly right: string
  ) {
    super(`Cannot ${operation} Money with different currencies: ${left} and ${right}`);
  }
}

export class MoneyComparisonError extends MoneyError {
  readonly code = 'MONEY_COMPARISON';

  constructor(operandDescription: string) {
    super(`Cannot order Money against ${operandDescription}`);
  }
}
