import { getDefaultCurrencyCode } from '@moneta/env';

import { readDataFile } from '../utils/data-files.js';

import type { Currency } from './currency.js';
import { parseCurrencyTable } from './currency-table.js';
import { createCurrencyRegistry, type CurrencyRegistry } from './registry.js';

const table = parseCurrencyTable(readDataFile('currencies.json'));
if (table.isErr()) {
  throw table.error;
}

/**
 * Process-wide registry seeded from data/currencies.json. Frozen.
 */
export const CURRENCIES: CurrencyRegistry = createCurrencyRegistry(table.value);

/**
 * Currency used when Money is built without one. Read once from
 * MONETA_DEFAULT_CURRENCY (default XYZ).
 */
export const DEFAULT_CURRENCY: Currency = CURRENCIES.lookup(getDefaultCurrencyCode());

export const USD: Currency = CURRENCIES.lookup('USD');
export const EUR: Currency = CURRENCIES.lookup('EUR');
export const PLN: Currency = CURRENCIES.lookup('PLN');
export const CAD: Currency = CURRENCIES.lookup('CAD');
export const XYZ: Currency = CURRENCIES.lookup('XYZ');

/**
 * Resolve a currency by code, case-insensitively.
 * @throws CurrencyDoesNotExistError
 */
export function getCurrency(code: string): Currency {
  return CURRENCIES.lookup(code);
}

/**
 * Resolve a currency by ISO numeric code (840, '840', '008', 8).
 * @throws CurrencyDoesNotExistError
 */
export function getCurrencyByIso(numeric: string | number): Currency {
  return CURRENCIES.lookup(numeric);
}
