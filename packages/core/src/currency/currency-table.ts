import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { InvalidTableError } from '../errors.js';

import { normalizeNumericCode } from './currency.js';

export const CurrencyRecordSchema = z.object({
  code: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{3}$/, { message: 'Currency code must be 3 letters' })
    .transform((val) => val.toUpperCase()),
  numeric: z
    .union([z.string(), z.number().int().nonnegative()])
    .refine((val) => normalizeNumericCode(val) !== undefined, { message: 'Numeric code must have 1 to 3 digits' }),
  name: z.string().trim().min(1, { message: 'Currency name must not be empty' }),
  countries: z.array(z.string().min(1)).default([]),
});

export const CurrencyTableSchema = z.array(CurrencyRecordSchema);

export type CurrencyRecord = z.infer<typeof CurrencyRecordSchema>;

/**
 * Validate seed rows `(code, numeric, name, countries)` from an external ISO 4217 source.
 */
export function parseCurrencyTable(raw: unknown): Result<CurrencyRecord[], InvalidTableError> {
  const result = CurrencyTableSchema.safeParse(raw);
  if (!result.success) {
    return err(new InvalidTableError('currency', result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`)));
  }
  return ok(result.data);
}
