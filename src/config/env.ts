import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

// ============================================
// Environment Schema
// ============================================

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('localhost'),
  API_PREFIX: z.string().startsWith('/').default('/api/v1'),
  CORS_ORIGIN: z
    .string()
    .default('*')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    ),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),

  // Redis (OPTIONAL - jobs run in process without it)
  REDIS_ENABLED: booleanFlag.default('false'),
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),

  UPLOAD_DIR: z.string().default('uploads'),
  OUTPUT_DIR: z.string().default('outputs'),
  MAX_UPLOAD_SIZE_MB: z.coerce.number().positive().default(50),
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(2),
  RECONCILIATION_CONFIG_PATH: z.string().default('config/reconciliation.json'),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Parses process.env once at startup. Invalid values stop the process
 * before anything else is wired.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const fieldErrors = result.error.flatten().fieldErrors;
    throw new Error(`Invalid environment variables: ${JSON.stringify(fieldErrors)}`);
  }

  return result.data;
}

export const env: EnvConfig = loadEnv();

export default env;
