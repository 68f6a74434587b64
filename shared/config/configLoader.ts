/**
 * Centralized Configuration Loader with Zod Validation
 * Services compose the schemas they need and get back a typed, validated object.
 */

import { z } from 'zod';

// Base configuration schema
export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  SERVICE_NAME: z.string().min(1),
  PORT: z.coerce.number().int().positive().default(8000),
});

// Accept a direct URL (POSTGRES_URL / POSTGRES_URI / DATABASE_URL)
export const PostgresConfigSchema = z.object({
  POSTGRES_URL: z.string().optional(),
  POSTGRES_URI: z.string().optional(),
  DATABASE_URL: z.string().optional(),
  POSTGRES_SSL: z
    .enum(['true', 'false'])
    .default('false')
    .transform((val) => val === 'true'),
  POSTGRES_POOL_MAX: z.coerce.number().int().positive().default(10),
});

export const CorsConfigSchema = z.object({
  CORS_ORIGIN: z
    .string()
    .default('*')
    .transform((val) => val.split(',').map((origin) => origin.trim()).filter(Boolean)),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;
export type PostgresConfig = z.infer<typeof PostgresConfigSchema>;
export type CorsConfig = z.infer<typeof CorsConfigSchema>;

/**
 * Pick the first configured Postgres connection string.
 */
export function resolvePostgresUrl(config: PostgresConfig): string | undefined {
  return config.POSTGRES_URL || config.POSTGRES_URI || config.DATABASE_URL;
}

/**
 * Load and validate configuration for a service.
 * Throws one error listing every invalid or missing variable.
 */
export function loadServiceConfig<S extends z.ZodTypeAny>(
  serviceName: string,
  schema: S,
  env: NodeJS.ProcessEnv = process.env
): z.output<S> {
  const result = schema.safeParse({ ...env, SERVICE_NAME: serviceName });
  if (!result.success) {
    const problems = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
    throw new Error(`Configuration validation failed for ${serviceName}:\n${problems.join('\n')}`);
  }
  return result.data;
}
