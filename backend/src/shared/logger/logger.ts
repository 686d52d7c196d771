/**
 * backend/src/shared/logger/logger.ts
 *
 * Process-wide winston logger for the row-scope backend. Every line is JSON
 * carrying `service` and `env`.
 *
 * - Request handlers log through `withRequestContext(req)`, which adds the
 *   requestId and the tenantId taken from x-tenant-id.
 * - Services log each operation with the active scope (`scopeTenantId`, null when
 *   unrestricted), so a line can be traced to the rows it could see.
 * - Pass errors as `{ err }` so the stack survives serialisation.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'row-scope-backend';
const level = process.env.LOG_LEVEL ?? 'info';

export const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [new winston.transports.Console()],
});

export type Logger = winston.Logger;
