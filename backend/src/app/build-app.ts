/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { runDevSeed } from '../shared/db/seed/dev-seed';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig) {
  const deps = await buildDeps(config);
  const app = await buildServer();

  registerRoutes(app, { config, deps });

  // DEV-only seed bootstrap
  if (config.seed.enabled) {
    if (config.nodeEnv === 'production') {
      logger.warn('seed.skipped_in_production', { flow: 'seed.dev' });
    } else {
      await runDevSeed({ store: deps.store, scope: deps.scope });
    }
  }

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
