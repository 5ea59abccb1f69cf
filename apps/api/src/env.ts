import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .optional()
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().optional(),

  // Positivity is checked when the rental config is built, as an InvalidRateError.
  EXCHANGE_RATE_GHS_PER_USD: z
    .string({ required_error: 'EXCHANGE_RATE_GHS_PER_USD is required (cedis per US dollar)' })
    .trim()
    .min(1, 'EXCHANGE_RATE_GHS_PER_USD is required (cedis per US dollar)')
    .pipe(z.coerce.number({ invalid_type_error: 'EXCHANGE_RATE_GHS_PER_USD must be a number' })),
  TARGET_CURRENCY: z.enum(['GHS', 'USD']).default('GHS'),
  RESULT_CAP: z.coerce.number().int().positive().default(50),
  LOCATIONS_PATH: z.string().optional(),

  LISTINGS_BASE_URL: z.string().url().default('https://www.meqasa.com'),
  SCRAPE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  SNAPSHOTS_ENABLED: booleanFlag,
  FIREBASE_PROJECT_ID: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_JSON: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_PATH: z.string().optional()
});

export type Env = z.infer<typeof envSchema>;

export function getEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new Error(`Invalid environment variables: ${parsed.error.message}`);
  }
  return parsed.data;
}
