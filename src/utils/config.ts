/**
 * Proxy Sheets – Environment Configuration
 *
 * Loads `.env` through dotenv and validates process.env once with zod.
 * Every module reads settings through getEnv(); nothing else touches process.env.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { fromError } from 'zod-validation-error';

import { ConfigError } from './errors';

dotenv.config();

const booleanSchema = z.enum(['true', 'false']).transform((value) => value === 'true');

const envSchema = z.object({
  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FILE: z.string().min(1).optional(),
  LOG_SILENT: booleanSchema.default('false'),

  // HTTP service
  PORT: z.coerce.number().int().positive().default(3000),
  MANIFEST_PATH: z.string().min(1).default('data/manifest.yaml'),

  // Sheet generation
  CARD_IMAGE_URL_ROOT: z
    .string()
    .url()
    .default('https://nro-public.s3.nl-ams.scw.cloud/nro/card-printings/v2/webp'),
  FETCH_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(6),
  FETCH_TIMEOUT_MS: z.coerce.number().int().min(100).default(20000),
  PRINT_DPI: z.coerce.number().int().min(72).max(1200).default(300),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

export function getEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new ConfigError(`Environment validation failed: ${fromError(parsed.error).message}`, {
      cause: parsed.error,
    });
  }

  cachedEnv = parsed.data;
  return cachedEnv;
}
