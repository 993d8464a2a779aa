import { z } from 'zod';

const envSchema = z.object({
  MONETA_DEFAULT_CURRENCY: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{3}$/, { message: 'Expected a 3-letter currency code' })
    .transform((val: string) => val.toUpperCase())
    .default('XYZ'),
  MONETA_DEFAULT_LOCALE: z.string().trim().min(1, { message: 'Invalid locale' }).default('DEFAULT'),
});

export type MonetaEnv = z.infer<typeof envSchema>;

let validatedEnv: MonetaEnv | undefined;

/**
 * Parse an environment record without touching the cache.
 * @throws Error listing every invalid variable
 */
export function parseEnv(source: NodeJS.ProcessEnv): MonetaEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Validates process.env on first access and caches the result.
 */
function validateEnv(): MonetaEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

/**
 * Code of the currency used when Money is built without one.
 */
export function getDefaultCurrencyCode(): string {
  return validateEnv().MONETA_DEFAULT_CURRENCY;
}

/**
 * Locale used for formatting when the caller passes none.
 */
export function getDefaultLocale(): string {
  return validateEnv().MONETA_DEFAULT_LOCALE;
}

/**
 * Drop the cached environment so the next read validates process.env again.
 * Tests only; the package index does not export it.
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}
