/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Orchestrates vendor login: rate limit -> credential check -> token issue.
 *
 * RULES:
 * - Rate limit at the start of the flow (before any DB work).
 * - Failure audit is written for invalid credentials; the response stays generic.
 * - Never log raw emails or passwords (email domain + hashed key only).
 */

import type { Logger } from '../../shared/logger/logger';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import { AuditWriter } from '../../shared/audit/audit.writer';
import { AppError } from '../../shared/http/errors';
import type { RequestMeta } from '../../shared/http/request-meta';

import { emailDomain, type VendorService } from '../vendors/vendor.service';
import type { Vendor } from '../vendors';
import { auditLoginFailed, auditLoginSuccess } from './auth.audit';
import type { IssuedAccessToken, TokenService } from './token.service';

const LOGIN_LIMIT_PER_EMAIL = { limit: 5, windowSeconds: 900 };
const LOGIN_LIMIT_PER_IP = { limit: 20, windowSeconds: 900 };

export type LoginParams = {
  email: string;
  password: string;
  request: RequestMeta;
};

export type LoginResult = {
  vendor: Vendor;
  accessToken: IssuedAccessToken;
};

function failureReason(err: AppError): string {
  const reason = err.meta?.reason;
  return typeof reason === 'string' ? reason : 'invalid_credentials';
}

export class AuthService {
  constructor(
    private readonly deps: {
      vendorService: VendorService;
      tokenService: TokenService;
      tokenHasher: TokenHasher;
      rateLimiter: RateLimiter;
      auditRepo: AuditRepo;
      logger: Logger;
    },
  ) {}

  async login(params: LoginParams): Promise<LoginResult> {
    const email = params.email.toLowerCase();
    const emailKey = this.deps.tokenHasher.hash(email);

    this.deps.logger.info('auth.login.start', {
      flow: 'auth.login',
      requestId: params.request.requestId,
      emailDomain: emailDomain(email),
      emailKey,
    });

    await this.deps.rateLimiter.hitOrThrow({
      key: `login:email:${emailKey}`,
      ...LOGIN_LIMIT_PER_EMAIL,
    });
    await this.deps.rateLimiter.hitOrThrow({
      key: `login:ip:${params.request.ip}`,
      ...LOGIN_LIMIT_PER_IP,
    });

    const audit = new AuditWriter(this.deps.auditRepo, {
      requestId: params.request.requestId,
      ip: params.request.ip,
      userAgent: params.request.userAgent,
    });

    let vendor: Vendor;
    try {
      vendor = await this.deps.vendorService.authenticateVendor(email, params.password);
    } catch (err) {
      if (err instanceof AppError && err.code === 'UNAUTHORIZED') {
        await auditLoginFailed(audit, { emailKey, reason: failureReason(err) });
      }
      throw err;
    }

    const accessToken = this.deps.tokenService.issue(vendor.id, vendor.email);

    await auditLoginSuccess(audit.withContext({ vendorId: vendor.id }), { vendorId: vendor.id });

    this.deps.logger.info('auth.login.success', {
      flow: 'auth.login',
      requestId: params.request.requestId,
      vendorId: vendor.id,
    });

    return { vendor, accessToken };
  }
}
