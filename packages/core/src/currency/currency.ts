/**
 * Currency value object
 *
 * Identity is the upper-case code; numeric code, name and countries are
 * descriptive. Instances are frozen once built.
 *
 * Examples: USD (840), EUR (978), PLN (985)
 */

/**
 * Normalize an ISO 4217 numeric code to its three-digit, zero-padded form.
 * 8, '8' and '008' all give '008'. Returns undefined for anything that is not
 * a non-negative integer of at most three digits.
 */
export function normalizeNumericCode(numeric: string | number): string | undefined {
  const text = typeof numeric === 'number' ? String(numeric) : numeric.trim();
  if (!/^\d{1,3}$/.test(text)) {
    return undefined;
  }
  return text.padStart(3, '0');
}

export interface CurrencyInit {
  code: string;
  numeric: string | number;
  name: string;
  countries?: readonly string[] | undefined;
}

export class Currency {
  readonly code: string;
  readonly numeric: string;
  readonly name: string;
  readonly countries: readonly string[];

  constructor(init: CurrencyInit) {
    const code = init.code.trim().toUpperCase();
    if (code.length === 0) {
      throw new Error('Currency code cannot be empty');
    }

    const numeric = normalizeNumericCode(init.numeric);
    if (numeric === undefined) {
      throw new Error(`Invalid numeric code for ${code}: "${String(init.numeric)}"`);
    }

    this.code = code;
    this.numeric = numeric;
    this.name = init.name;
    this.countries = Object.freeze([...(init.countries ?? [])]);
    Object.freeze(this);
  }

  /**
   * Same currency code; other fields are ignored.
   */
  equals(other: unknown): boolean {
    return other instanceof Currency && other.code === this.code;
  }

  toString(): string {
    return this.code;
  }

  toJSON(): string {
    return this.code;
  }
}
