import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { InvalidTableError } from '../errors.js';
import { Decimal } from '../utils/decimal-utils.js';

export const DEFAULT_LOCALE = 'DEFAULT';

export const ROUNDING_MODES = {
  ROUND_UP: Decimal.ROUND_UP,
  ROUND_DOWN: Decimal.ROUND_DOWN,
  ROUND_CEIL: Decimal.ROUND_CEIL,
  ROUND_FLOOR: Decimal.ROUND_FLOOR,
  ROUND_HALF_UP: Decimal.ROUND_HALF_UP,
  ROUND_HALF_DOWN: Decimal.ROUND_HALF_DOWN,
  ROUND_HALF_EVEN: Decimal.ROUND_HALF_EVEN,
} as const satisfies Record<string, Decimal.Rounding>;

export const RoundingNameSchema = z.enum([
  'ROUND_UP',
  'ROUND_DOWN',
  'ROUND_CEIL',
  'ROUND_FLOOR',
  'ROUND_HALF_UP',
  'ROUND_HALF_DOWN',
  'ROUND_HALF_EVEN',
]);

export type RoundingName = z.infer<typeof RoundingNameSchema>;

export const FormattingDefinitionSchema = z.object({
  groupSize: z.number().int().positive(),
  groupSeparator: z.string(),
  decimalPoint: z.string().min(1),
  positiveSign: z.string().default(''),
  trailingPositiveSign: z.string().default(''),
  negativeSign: z.string().default('-'),
  trailingNegativeSign: z.string().default(''),
  rounding: RoundingNameSchema.default('ROUND_HALF_EVEN'),
});

export const SignDefinitionSchema = z.object({
  prefix: z.string().default(''),
  suffix: z.string().default(''),
});

export const LocaleTablesSchema = z.object({
  formatting: z
    .record(FormattingDefinitionSchema)
    .refine((table) => Object.keys(table).some((locale) => normalizeLocale(locale) === DEFAULT_LOCALE), {
      message: `A ${DEFAULT_LOCALE} formatting definition is required`,
    }),
  signs: z.record(z.record(SignDefinitionSchema)).default({}),
});

/** Input shape: optional fields may be left out. */
export type FormattingDefinitionInput = z.input<typeof FormattingDefinitionSchema>;
export type FormattingDefinition = Readonly<z.output<typeof FormattingDefinitionSchema>>;
export type SignDefinitionInput = z.input<typeof SignDefinitionSchema>;
export type SignDefinition = Readonly<z.output<typeof SignDefinitionSchema>>;

export interface LocaleTables {
  /** Keyed by normalized locale */
  formatting: ReadonlyMap<string, FormattingDefinition>;
  /** Normalized locale → currency code → sign */
  signs: ReadonlyMap<string, ReadonlyMap<string, SignDefinition>>;
}

/**
 * 'pl-PL', 'pl_pl' and 'PL_PL' all name the same locale.
 */
export function normalizeLocale(locale: string): string {
  return locale.trim().replace(/-/g, '_').toUpperCase();
}

/**
 * Validate raw locale tables and index them by normalized locale and upper-case currency code.
 */
export function parseLocaleTables(raw: unknown): Result<LocaleTables, InvalidTableError> {
  const result = LocaleTablesSchema.safeParse(raw);
  if (!result.success) {
    return err(new InvalidTableError('locale', result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`)));
  }

  const formatting = new Map<string, FormattingDefinition>();
  for (const [locale, definition] of Object.entries(result.data.formatting)) {
    formatting.set(normalizeLocale(locale), Object.freeze(definition));
  }

  const signs = new Map<string, ReadonlyMap<string, SignDefinition>>();
  for (const [locale, table] of Object.entries(result.data.signs)) {
    const byCurrency = new Map<string, SignDefinition>();
    for (const [code, sign] of Object.entries(table)) {
      byCurrency.set(code.toUpperCase(), Object.freeze(sign));
    }
    signs.set(normalizeLocale(locale), byCurrency);
  }

  return ok({ formatting, signs });
}
