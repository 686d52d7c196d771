import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';

/**
 * WHY:
 * - Build a Fastify app for E2E-style tests using app.inject().
 * - Keeps tests clean: build once, inject, close.
 *
 * RULES:
 * - Seed is OFF by default.
 * - In-memory store: no database, every app starts empty.
 */
export async function buildTestApp(overrides: Partial<AppConfig> = {}) {
  const baseConfig: AppConfig = {
    nodeEnv: 'test',
    port: 0,

    storeDriver: 'memory',
    databaseUrl: null,

    logLevel: process.env.LOG_LEVEL ?? 'error',
    serviceName: 'row-scope-backend',

    seed: {
      enabled: false, // IMPORTANT: OFF in tests by default
    },
  };

  const config: AppConfig = {
    ...baseConfig,
    ...overrides,
    seed: {
      ...baseConfig.seed,
      ...(overrides.seed ?? {}),
    },
  };

  const built = await buildApp(config);

  return {
    app: built.app,
    deps: built.deps,
    close: built.close,
  };
}
