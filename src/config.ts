import dotenv from 'dotenv';
import { z } from 'zod';
import { TOKEN_ALGORITHMS } from './domain/auth/tokenCodec.js';

const seconds = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1).optional(),
  JWT_SECRET: z.string().min(1, 'JWT_SECRET environment variable is required'),
  JWT_ALGORITHM: z.enum(TOKEN_ALGORITHMS, {
    errorMap: () => ({ message: 'JWT_ALGORITHM must be HS256 or HS512' }),
  }).default('HS256'),
  ACCESS_TOKEN_TTL: seconds(15 * 60),
  REFRESH_TOKEN_TTL: seconds(7 * 24 * 60 * 60),
  EMAIL_TOKEN_TTL: seconds(24 * 60 * 60),
  IDENTITY_CACHE_TTL: seconds(5 * 60),
  REDIS_URL: z.string().min(1).optional(),
  PUBLIC_BASE_URL: z.string().url().default('http://localhost:3000'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Parse and validate configuration. Throws a ZodError listing every bad key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return envSchema.parse(env);
}

/**
 * Load `.env` into process.env, then validate.
 */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
