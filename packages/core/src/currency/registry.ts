import { getLogger } from '@moneta/logger';
import { err, ok, type Result } from 'neverthrow';

import { CurrencyDoesNotExistError } from '../errors.js';

import { Currency, normalizeNumericCode } from './currency.js';
import type { CurrencyRecord } from './currency-table.js';

const logger = getLogger('currency-registry');

/**
 * Code and numeric-code index of known currencies.
 *
 * Seeded once (`register`, last write wins on a code collision), then frozen.
 * Lookups accept a code in any case, or a numeric code as an integer or a
 * digit string.
 */
export class CurrencyRegistry {
  private readonly byCode = new Map<string, Currency>();
  private readonly byNumeric = new Map<string, Currency>();
  private frozen = false;

  get size(): number {
    return this.byCode.size;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  register(currency: Currency): Currency {
    if (this.frozen) {
      throw new Error(`Currency registry is frozen; cannot register ${currency.code}`);
    }

    const previous = this.byCode.get(currency.code);
    if (previous && this.byNumeric.get(previous.numeric) === previous) {
      this.byNumeric.delete(previous.numeric);
    }

    this.byCode.set(currency.code, currency);
    this.byNumeric.set(currency.numeric, currency);
    return currency;
  }

  /** Stop accepting registrations. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  find(codeOrNumeric: string | number): Result<Currency, CurrencyDoesNotExistError> {
    const currency = this.resolve(codeOrNumeric);
    return currency ? ok(currency) : err(new CurrencyDoesNotExistError(String(codeOrNumeric)));
  }

  /**
   * @throws CurrencyDoesNotExistError for an unknown code or numeric code
   */
  lookup(codeOrNumeric: string | number): Currency {
    const currency = this.resolve(codeOrNumeric);
    if (!currency) {
      throw new CurrencyDoesNotExistError(String(codeOrNumeric));
    }
    return currency;
  }

  has(codeOrNumeric: string | number): boolean {
    return this.resolve(codeOrNumeric) !== undefined;
  }

  /** All currencies ordered by code. */
  list(): Currency[] {
    return [...this.byCode.values()].sort((a, b) => a.code.localeCompare(b.code));
  }

  private resolve(codeOrNumeric: string | number): Currency | undefined {
    const numeric = normalizeNumericCode(codeOrNumeric);
    if (numeric !== undefined) {
      return this.byNumeric.get(numeric);
    }
    if (typeof codeOrNumeric !== 'string') {
      return undefined;
    }
    return this.byCode.get(codeOrNumeric.trim().toUpperCase());
  }
}

/**
 * Build and freeze a registry from validated seed rows.
 */
export function createCurrencyRegistry(records: readonly CurrencyRecord[]): CurrencyRegistry {
  const registry = new CurrencyRegistry();
  for (const record of records) {
    registry.register(new Currency(record));
  }
  logger.debug({ currencies: registry.size }, 'Currency registry seeded');
  return registry.freeze();
}
