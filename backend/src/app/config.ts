/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 * - Built ONCE at startup and passed down; nothing else reads process.env
 *   for behaviour (the token service gets `config.jwt`).
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string,
 *   so invalid values ('prod', 'staging') are caught at startup by Zod.
 */

import 'dotenv/config';
import { z } from 'zod';

import { JWT_ALGORITHMS, type JwtConfig } from '../modules/auth/token.service';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),

  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('punchcard-backend'),

  BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

  // Bearer tokens
  JWT_SECRET: z.string().min(16),
  JWT_ALGORITHM: z.enum(JWT_ALGORITHMS).default('HS256'),
  JWT_EXPIRE_MINUTES: z.coerce.number().int().min(1).max(24 * 60).default(60),

  // Enrollment QR artifacts
  QR_STORAGE_DIR: z.string().min(1).default('qrcodes'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  jwt: JwtConfig;

  qrStorageDir: string;
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
      algorithm: parsed.JWT_ALGORITHM,
      ttlMinutes: parsed.JWT_EXPIRE_MINUTES,
    },

    qrStorageDir: parsed.QR_STORAGE_DIR,
  };
}
