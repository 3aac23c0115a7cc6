/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - Central logger instance (structured JSON logs).
 * - Keeps logging consistent across app/modules.
 * - Adds stable metadata (service, env) to every line.
 *
 * HOW TO USE:
 * - Import `logger` anywhere you need logs.
 * - Prefer `withRequestContext(req)` when logging inside request handlers.
 * - Do not log raw Error objects only: pass `{ err }` so stack/message is preserved.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'punchcard-backend';
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

export type Logger = typeof logger;

/**
 * Applies the validated AppConfig to the shared instance.
 * Called once by the composition root; env defaults above cover import time.
 */
export function configureLogger(opts: { level: string; service: string; nodeEnv: string }): void {
  logger.level = opts.level;
  logger.defaultMeta = { service: opts.service, env: opts.nodeEnv };
}
