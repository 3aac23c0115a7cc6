/**
 * backend/src/shared/http/request-meta.ts
 *
 * Request facts that services need for audit + logs, extracted once by controllers
 * so services stay free of Fastify types.
 */

import type { FastifyRequest } from 'fastify';

export type RequestMeta = {
  requestId: string;
  ip: string;
  userAgent: string | null;
};

export function requestMeta(req: FastifyRequest): RequestMeta {
  return {
    requestId: req.requestContext.requestId,
    ip: req.ip,
    userAgent: req.headers['user-agent'] ?? null,
  };
}
