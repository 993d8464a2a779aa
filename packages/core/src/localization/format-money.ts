import { getDefaultLocale } from '@moneta/env';

import type { Money } from '../money/money.js';
import { readDataFile } from '../utils/data-files.js';

import { CurrencyFormatter, type FormatOptions } from './currency-formatter.js';
import { parseLocaleTables } from './locale-tables.js';

const tables = parseLocaleTables(readDataFile('locales.json'));
if (tables.isErr()) {
  throw tables.error;
}

/** Formatter over data/locales.json */
export const defaultFormatter: CurrencyFormatter = CurrencyFormatter.fromTables(tables.value);

/**
 * Format with the bundled locale tables. The locale defaults to MONETA_DEFAULT_LOCALE.
 *
 * @example
 * formatMoney(new Money(1000000, 'USD')); // 'US$1,000,000.00'
 * formatMoney(new Money(1000000, 'PLN'), { locale: 'pl_PL', decimalPlaces: 0 }); // '1 000 000 zł'
 */
export function formatMoney(money: Money, options: FormatOptions = {}): string {
  return defaultFormatter.format(money, { ...options, locale: options.locale ?? getDefaultLocale() });
}
