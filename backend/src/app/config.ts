/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv and storeDriver are unions, not plain strings. Invalid values
 *   ('prod', 'mysql') are caught at startup by Zod rather than silently
 *   falling through to the wrong branch in di.ts.
 * - databaseUrl is null only when storeDriver is 'memory'.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');
const StoreDriverSchema = z.enum(['postgres', 'memory']).default('postgres');

// z.coerce.boolean() would turn the string "false" into true.
const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),

    STORE_DRIVER: StoreDriverSchema,
    DATABASE_URL: z.string().min(1).optional(),

    // Logging / service identity
    LOG_LEVEL: z
      .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
      .default('info'),
    SERVICE_NAME: z.string().default('row-scope-backend'),

    // DEV seed bootstrap (idempotent)
    SEED_ON_START: BooleanFlagSchema,
  })
  .superRefine((env, ctx) => {
    if (env.STORE_DRIVER === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when STORE_DRIVER=postgres',
      });
    }
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type StoreDriver = z.infer<typeof StoreDriverSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;

  storeDriver: StoreDriver;
  databaseUrl: string | null;

  logLevel: string;
  serviceName: string;

  seed: {
    enabled: boolean;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,

    storeDriver: parsed.STORE_DRIVER,
    databaseUrl: parsed.DATABASE_URL ?? null,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    seed: {
      enabled: parsed.SEED_ON_START,
    },
  };
}
