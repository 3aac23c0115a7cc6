/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts.
 * - Global request + auth context are attached here; module routes are added
 *   afterwards by app/routes.ts.
 */

import Fastify from 'fastify';

import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';

export async function buildServer() {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    ignoreTrailingSlash: true,
  });

  registerRequestContext(app);
  registerAuthContext(app);
  registerErrorHandler(app);

  app.addHook('onRequest', (req, _reply, done) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      host: req.requestContext.host,
    });
    done();
  });

  app.addHook('onResponse', (req, reply, done) => {
    logger.info('response', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      vendorId: req.authContext.vendor?.id ?? null,
      statusCode: reply.statusCode,
      durationMs: Math.round(reply.elapsedTime),
    });
    done();
  });

  return app;
}
