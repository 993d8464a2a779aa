import type { Money } from '../money/money.js';

import {
  DEFAULT_LOCALE,
  FormattingDefinitionSchema,
  normalizeLocale,
  ROUNDING_MODES,
  SignDefinitionSchema,
  type FormattingDefinition,
  type FormattingDefinitionInput,
  type LocaleTables,
  type RoundingName,
  type SignDefinition,
  type SignDefinitionInput,
} from './locale-tables.js';

export interface FormatOptions {
  /** Defaults to DEFAULT */
  locale?: string | undefined;
  /** Digits after the decimal point; 0 drops the point. Defaults to 2. */
  decimalPlaces?: number | undefined;
  includeSymbol?: boolean | undefined;
  /** Overrides the locale's rounding */
  rounding?: RoundingName | undefined;
}

const FALLBACK_FORMATTING: FormattingDefinition = Object.freeze(
  FormattingDefinitionSchema.parse({ groupSize: 3, groupSeparator: ',', decimalPoint: '.' })
);

function groupDigits(digits: string, size: number, separator: string): string {
  const groups: string[] = [];
  for (let end = digits.length; end > 0; end -= size) {
    groups.unshift(digits.slice(Math.max(0, end - size), end));
  }
  return groups.join(separator);
}

/**
 * Renders Money by per-locale separators and per-locale currency signs.
 *
 * Lookup rules:
 * - a locale with no formatting definition uses DEFAULT's
 * - a locale with no sign table uses DEFAULT's sign table
 * - a currency missing from the sign table gets suffix ' <CODE>'
 *
 * Instances never change; the `with*` methods return a new formatter.
 */
export class CurrencyFormatter {
  private constructor(
    private readonly formatting: ReadonlyMap<string, FormattingDefinition>,
    private readonly signs: ReadonlyMap<string, ReadonlyMap<string, SignDefinition>>
  ) {}

  static fromTables(tables: LocaleTables): CurrencyFormatter {
    return new CurrencyFormatter(new Map(tables.formatting), new Map(tables.signs));
  }

  withFormattingDefinition(locale: string, definition: FormattingDefinitionInput): CurrencyFormatter {
    const formatting = new Map(this.formatting);
    formatting.set(normalizeLocale(locale), Object.freeze(FormattingDefinitionSchema.parse(definition)));
    return new CurrencyFormatter(formatting, this.signs);
  }

  withSignDefinition(locale: string, currencyCode: string, sign: SignDefinitionInput): CurrencyFormatter {
    const key = normalizeLocale(locale);
    const table = new Map(this.signs.get(key));
    table.set(currencyCode.toUpperCase(), Object.freeze(SignDefinitionSchema.parse(sign)));

    const signs = new Map(this.signs);
    signs.set(key, table);
    return new CurrencyFormatter(this.formatting, signs);
  }

  getFormattingDefinition(locale: string = DEFAULT_LOCALE): FormattingDefinition {
    return (
      this.formatting.get(normalizeLocale(locale)) ?? this.formatting.get(DEFAULT_LOCALE) ?? FALLBACK_FORMATTING
    );
  }

  getSignDefinition(currencyCode: string, locale: string = DEFAULT_LOCALE): SignDefinition {
    const code = currencyCode.toUpperCase();
    const table = this.signs.get(normalizeLocale(locale)) ?? this.signs.get(DEFAULT_LOCALE);
    return table?.get(code) ?? { prefix: '', suffix: ` ${code}` };
  }

  format(money: Money, options: FormatOptions = {}): string {
    const locale = options.locale ?? DEFAULT_LOCALE;
    const places = options.decimalPlaces ?? 2;
    if (!Number.isInteger(places) || places < 0) {
      throw new RangeError(`decimalPlaces must be a non-negative integer, received: ${String(places)}`);
    }

    const definition = this.getFormattingDefinition(locale);
    const sign =
      options.includeSymbol === false ? { prefix: '', suffix: '' } : this.getSignDefinition(money.currency.code, locale);

    const rounded = money.amount.toDecimalPlaces(places, ROUNDING_MODES[options.rounding ?? definition.rounding]);
    const negative = rounded.isNegative() && !rounded.isZero();
    const [integerDigits = '0', fractionDigits = ''] = rounded.abs().toFixed(places).split('.');

    const grouped = groupDigits(integerDigits, definition.groupSize, definition.groupSeparator);
    const number = places > 0 ? `${grouped}${definition.decimalPoint}${fractionDigits}` : grouped;

    return [
      negative ? definition.negativeSign : definition.positiveSign,
      sign.prefix,
      number,
      sign.suffix,
      negative ? definition.trailingNegativeSign : definition.trailingPositiveSign,
    ].join('');
  }
}
