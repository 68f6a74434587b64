/**
 * cbt-service configuration.
 * Built once at start-up and passed to whatever needs it; nothing else reads process.env.
 */

import { z } from 'zod';
import {
  BaseConfigSchema,
  CorsConfigSchema,
  PostgresConfigSchema,
  loadServiceConfig,
  resolvePostgresUrl,
  SigningAlgorithm,
} from '@cbt/shared';

export const SERVICE_NAME = 'cbt-service';

const CbtEnvSchema = z.object({
  API_PREFIX: z.string().default('/api/v1'),
  SECRET_KEY: z.string().min(1).default('your-secret-key-change-in-production'),
  ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
  // 8 days
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(60 * 24 * 8),
  BCRYPT_SALT_ROUNDS: z.coerce.number().int().min(10).max(15).default(12),
  UPLOAD_DIR: z.string().default('uploads/explanation_images'),
  QUESTION_IMAGE_DIR: z.string().default('uploads/question_images'),
  FORUM_IMAGE_DIR: z.string().default('uploads/forum_images'),
  MAX_FILE_SIZE: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  ALLOWED_IMAGE_EXTENSIONS: z
    .string()
    .default('.jpg,.jpeg,.png,.gif,.webp')
    .transform((val) => val.split(',').map((ext) => ext.trim().toLowerCase()).filter(Boolean)),
  ADMIN_USERNAME: z.string().min(1).default('admin'),
  ADMIN_PASSWORD: z.string().min(1).default('admin123'),
  ADMIN_EMAIL: z.string().email().default('admin@cbt.com'),
});

const CbtConfigSchema = BaseConfigSchema.merge(PostgresConfigSchema)
  .merge(CorsConfigSchema)
  .merge(CbtEnvSchema)
  .refine((env) => resolvePostgresUrl(env) !== undefined, {
    message: 'Postgres requires POSTGRES_URL (or POSTGRES_URI or DATABASE_URL)',
    path: ['DATABASE_URL'],
  });

export interface AuthConfig {
  secretKey: string;
  algorithm: SigningAlgorithm;
  accessTokenExpireMinutes: number;
  refreshGraceMinutes: number;
  bcryptSaltRounds: number;
}

export interface UploadConfig {
  explanationImageDir: string;
  questionImageDir: string;
  forumImageDir: string;
  maxFileSize: number;
  allowedExtensions: string[];
}

export interface CbtConfig {
  serviceName: string;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  port: number;
  apiPrefix: string;
  corsOrigin: string[];
  database: {
    connectionString: string;
    ssl: boolean;
    poolMax: number;
  };
  auth: AuthConfig;
  uploads: UploadConfig;
  admin: {
    username: string;
    password: string;
    email: string;
  };
}

/**
 * Tokens that expired at most this long ago can still be refreshed.
 */
export const REFRESH_GRACE_MINUTES = 10;

export function loadCbtConfig(env: NodeJS.ProcessEnv = process.env): CbtConfig {
  const raw = loadServiceConfig(SERVICE_NAME, CbtConfigSchema, env);

  return {
    serviceName: raw.SERVICE_NAME,
    nodeEnv: raw.NODE_ENV,
    logLevel: raw.LOG_LEVEL,
    port: raw.PORT,
    apiPrefix: raw.API_PREFIX,
    corsOrigin: raw.CORS_ORIGIN,
    database: {
      connectionString: resolvePostgresUrl(raw) ?? '',
      ssl: raw.POSTGRES_SSL,
      poolMax: raw.POSTGRES_POOL_MAX,
    },
    auth: {
      secretKey: raw.SECRET_KEY,
      algorithm: raw.ALGORITHM,
      accessTokenExpireMinutes: raw.ACCESS_TOKEN_EXPIRE_MINUTES,
      refreshGraceMinutes: REFRESH_GRACE_MINUTES,
      bcryptSaltRounds: raw.BCRYPT_SALT_ROUNDS,
    },
    uploads: {
      explanationImageDir: raw.UPLOAD_DIR,
      questionImageDir: raw.QUESTION_IMAGE_DIR,
      forumImageDir: raw.FORUM_IMAGE_DIR,
      maxFileSize: raw.MAX_FILE_SIZE,
      allowedExtensions: raw.ALLOWED_IMAGE_EXTENSIONS,
    },
    admin: {
      username: raw.ADMIN_USERNAME,
      password: raw.ADMIN_PASSWORD,
      email: raw.ADMIN_EMAIL,
    },
  };
}
