export * from './errors.js';
export { Decimal, normalizeDecimal } from './utils/decimal-utils.js';

export { Currency, normalizeNumericCode, type CurrencyInit } from './currency/currency.js';
export {
  CurrencyRecordSchema,
  CurrencyTableSchema,
  parseCurrencyTable,
  type CurrencyRecord,
} from './currency/currency-table.js';
export { CurrencyRegistry, createCurrencyRegistry } from './currency/registry.js';
export {
  CAD,
  CURRENCIES,
  DEFAULT_CURRENCY,
  EUR,
  getCurrency,
  getCurrencyByIso,
  PLN,
  USD,
  XYZ,
} from './currency/defaults.js';

export { DiagnosticChannel, type DiagnosticChannelOptions } from './diagnostics/diagnostic-channel.js';
export {
  DEPRECATION_MESSAGES,
  moneyDiagnostics,
  onMoneyDiagnostic,
  type DeprecatedOperation,
  type DeprecationDiagnostic,
  type MoneyDiagnostic,
} from './diagnostics/money-diagnostics.js';

export {
  Money,
  parseMoney,
  type AmountInput,
  type CurrencyInput,
  type MoneyConstructor,
  type MoneyOperand,
} from './money/money.js';
export type { Numeric } from './money/operand.js';
export { abs, add, div, mod, mul, neg, pos, sub, sum } from './money/operators.js';

export { CurrencyFormatter, type FormatOptions } from './localization/currency-formatter.js';
export { defaultFormatter, formatMoney } from './localization/format-money.js';
export {
  DEFAULT_LOCALE,
  normalizeLocale,
  parseLocaleTables,
  ROUNDING_MODES,
  type FormattingDefinition,
  type FormattingDefinitionInput,
  type LocaleTables,
  type RoundingName,
  type SignDefinition,
  type SignDefinitionInput,
} from './localization/locale-tables.js';
