import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

/** Unset and blank values both mean "not configured". */
const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(4000),

  // Bhuvan (geocode + land use / land cover)
  BHUVAN_BASE_URL: z.string().url().default('https://bhuvan-app3.nrsc.gov.in/api'),
  BHUVAN_GEOCODE_TOKEN: optionalSecret,
  BHUVAN_LULC_TOKEN: optionalSecret,

  // ISRIC SoilGrids (keyless, so access is a switch)
  SOILGRIDS_BASE_URL: z.string().url().default('https://rest.isric.org/soilgrids/v2.0'),
  SOILGRIDS_ENABLED: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),

  EXTERNAL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // Recommendation cache
  REDIS_URL: z.string().default('redis://localhost:6379'),
  CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(86_400),

  // Identity (tokens are issued by the identity provider, verified here)
  JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters'),

  // Seed file for the in-memory farmer profile store
  FARMER_PROFILES_PATH: optionalSecret,

  // Rate limiting
  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60_000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(100),

  // CORS
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    console.error('Invalid environment variables:');
    console.error(parsed.error.flatten().fieldErrors);
    process.exit(1);
  }
  return parsed.data;
}

export const env = loadEnv();
