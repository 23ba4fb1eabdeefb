/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, backend/.env is loaded via dotenv.
 * - In prod, the platform injects env vars (no file).
 * - buildConfig() runs once in index.ts; the result is passed explicitly,
 *   never read back from a global.
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), so invalid values
 *   ('prod', 'staging') fail at startup instead of falling through.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),

  DATABASE_URL: z.string().min(1),
  // Empty/absent → revoked tokens live in process memory only.
  REDIS_URL: z
    .string()
    .optional()
    .transform((v) => (v && v.trim() ? v.trim() : null)),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('auth-core-backend'),

  BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

  // Access tokens
  JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters'),
  JWT_MAXAGE: z.coerce
    .number()
    .int()
    .min(1)
    .max(60 * 24 * 30)
    .default(60),

  // DEV seed bootstrap (idempotent)
  SEED_ADMIN_ON_START: BooleanFlagSchema,
  SEED_ADMIN_EMAIL: z.string().email().default('admin@example.com'),
  SEED_ADMIN_PASSWORD: z.string().min(8).default('change-me-please'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string | null;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  jwt: {
    secret: string;
    /** Default token lifetime, in minutes. */
    maxAgeMinutes: number;
  };

  seed: {
    enabled: boolean;
    adminEmail: string;
    adminPassword: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    jwt: {
      secret: parsed.JWT_SECRET,
      maxAgeMinutes: parsed.JWT_MAXAGE,
    },

    seed: {
      enabled: parsed.SEED_ADMIN_ON_START,
      adminEmail: parsed.SEED_ADMIN_EMAIL,
      adminPassword: parsed.SEED_ADMIN_PASSWORD,
    },
  };
}
