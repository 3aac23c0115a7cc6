/**
 * backend/src/modules/vendors/vendor.service.ts
 *
 * WHY:
 * - Vendor half of the tenant registry: registration, credential check,
 *   profile read + partial update.
 *
 * RULES:
 * - Passwords are hashed by the PasswordHasher; only the hash is persisted.
 * - authenticateVendor collapses "no such email" and "wrong password" into one error,
 *   and runs one password verification in both cases.
 * - Never log raw emails or passwords (email domain only).
 */

import { randomUUID } from 'node:crypto';

import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { DbExecutor } from '../../shared/db/db';
import type { Transactor } from '../../shared/db/transactor';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { RequestMeta } from '../../shared/http/request-meta';

import type { VendorRepo } from './dal/vendor.repo';
import { VendorErrors } from './vendor.errors';
import { auditVendorProfileUpdated, auditVendorRegistered } from './vendor.audit';
import type { Vendor, VendorUpdateSet } from './vendor.types';

export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}

export type RegisterVendorParams = {
  name: string;
  email: string;
  password: string;
  businessName: string;
  request: RequestMeta;
};

// compared against when the email is unknown; never matches a real password
const DUMMY_PASSWORD = 'punchcard-unknown-vendor';

export class VendorService {
  private dummyHash: Promise<string> | null = null;

  constructor(
    private readonly deps: {
      vendorRepo: VendorRepo;
      passwordHasher: PasswordHasher;
      auditRepo: AuditRepo;
      transactor: Transactor;
      logger: Logger;
      now: () => Date;
    },
  ) {}

  async registerVendor(params: RegisterVendorParams): Promise<Vendor> {
    const email = params.email.toLowerCase();

    this.deps.logger.info('vendors.register.start', {
      flow: 'vendors.register',
      requestId: params.request.requestId,
      emailDomain: emailDomain(email),
    });

    // fast path; the unique constraint below is what actually guarantees uniqueness
    const existing = await this.deps.vendorRepo.findCredentialsByEmail(email);
    if (existing) throw VendorErrors.emailAlreadyRegistered();

    const passwordHash = await this.deps.passwordHasher.hash(params.password);

    const vendor = await this.deps.transactor.transaction(async (trx) => {
      const inserted = await this.deps.vendorRepo.withDb(trx).insertVendor({
        id: randomUUID(),
        email,
        passwordHash,
        name: params.name,
        businessName: params.businessName,
        now: this.deps.now(),
      });
      if (!inserted) throw VendorErrors.emailAlreadyRegistered();

      await auditVendorRegistered(this.auditFor(trx, params.request, inserted.id), inserted);
      return inserted;
    });

    this.deps.logger.info('vendors.register.success', {
      flow: 'vendors.register',
      requestId: params.request.requestId,
      vendorId: vendor.id,
    });

    return vendor;
  }

  /**
   * Returns the vendor when the password matches; otherwise throws invalidCredentials.
   * The failure reason rides in error meta for audit; the response body never carries it.
   */
  async authenticateVendor(email: string, password: string): Promise<Vendor> {
    const credentials = await this.deps.vendorRepo.findCredentialsByEmail(email.toLowerCase());
    if (!credentials) {
      await this.deps.passwordHasher.verify(password, await this.unknownVendorHash());
      throw VendorErrors.invalidCredentials({ reason: 'vendor_not_found' });
    }

    const valid = await this.deps.passwordHasher.verify(password, credentials.passwordHash);
    if (!valid) {
      throw VendorErrors.invalidCredentials({ reason: 'wrong_password', vendorId: credentials.id });
    }

    const { passwordHash: _passwordHash, ...vendor } = credentials;
    return vendor;
  }

  private unknownVendorHash(): Promise<string> {
    this.dummyHash ??= this.deps.passwordHasher.hash(DUMMY_PASSWORD);
    return this.dummyHash;
  }

  async getVendor(vendorId: string): Promise<Vendor> {
    const vendor = await this.deps.vendorRepo.findById(vendorId);
    if (!vendor) throw VendorErrors.vendorNotFound({ vendorId });
    return vendor;
  }

  /**
   * Partial profile update. An empty set is a no-op that returns the current profile
   * (updated_at untouched); any supplied field refreshes updated_at.
   */
  async updateVendor(vendor: Vendor, set: VendorUpdateSet, request: RequestMeta): Promise<Vendor> {
    if (set.name === undefined && set.businessName === undefined) {
      return vendor;
    }

    return this.deps.transactor.transaction(async (trx) => {
      const updated = await this.deps.vendorRepo
        .withDb(trx)
        .updateVendor(vendor.id, set, this.deps.now());
      if (!updated) throw VendorErrors.vendorNotFound({ vendorId: vendor.id });

      await auditVendorProfileUpdated(this.auditFor(trx, request, vendor.id), updated, set);
      return updated;
    });
  }

  private auditFor(trx: DbExecutor, request: RequestMeta, vendorId: string): AuditWriter {
    return new AuditWriter(this.deps.auditRepo.withDb(trx), {
      vendorId,
      requestId: request.requestId,
      ip: request.ip,
      userAgent: request.userAgent,
    });
  }
}
