/**
 * backend/src/modules/customers/customer.service.ts
 *
 * WHY:
 * - Customer half of the tenant registry: enrollment (with QR), read, update, delete.
 *
 * RULES:
 * - Every lookup by id checks existence, then ownership, before anything else.
 * - Enrollment renders the QR first and inserts the row with its reference;
 *   a failed insert (or audit append) removes the artifact again.
 * - Row changes and their audit events share one transaction.
 * - Deletion is not blocked by a failure to remove the QR artifact; the
 *   artifact is removed only after the delete has committed.
 */

import { randomUUID } from 'node:crypto';

import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { DbExecutor } from '../../shared/db/db';
import type { Transactor } from '../../shared/db/transactor';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { RequestMeta } from '../../shared/http/request-meta';
import type { EnrollmentQrStore } from '../../shared/qr/enrollment-qr-store';
import type { Vendor } from '../vendors';

import type { CustomerRepo } from './dal/customer.repo';
import { CustomerErrors } from './customer.errors';
import { assertCustomerAccessible } from './policies/customer-access.policy';
import {
  auditCustomerDeleted,
  auditCustomerRegistered,
  auditCustomerUpdated,
} from './customer.audit';
import type { Customer, CustomerUpdateSet } from './customer.types';

export type RegisterCustomerParams = {
  vendor: Vendor;
  name: string;
  email?: string | null;
  phone?: string | null;
  request: RequestMeta;
};

function hasUpdates(set: CustomerUpdateSet): boolean {
  return set.name !== undefined || set.email !== undefined || set.phone !== undefined;
}

export class CustomerService {
  constructor(
    private readonly deps: {
      customerRepo: CustomerRepo;
      qrStore: EnrollmentQrStore;
      auditRepo: AuditRepo;
      transactor: Transactor;
      logger: Logger;
      now: () => Date;
    },
  ) {}

  async registerCustomer(params: RegisterCustomerParams): Promise<Customer> {
    const customerId = randomUUID();
    const vendorId = params.vendor.id;

    this.deps.logger.info('customers.register.start', {
      flow: 'customers.register',
      requestId: params.request.requestId,
      vendorId,
      customerId,
    });

    const qrCode = await this.deps.qrStore.create({ customerId, vendorId });

    let customer: Customer;
    try {
      customer = await this.deps.transactor.transaction(async (trx) => {
        const inserted = await this.deps.customerRepo.withDb(trx).insertCustomer({
          id: customerId,
          vendorId,
          name: params.name,
          email: params.email ?? null,
          phone: params.phone ?? null,
          qrCode,
          now: this.deps.now(),
        });

        await auditCustomerRegistered(this.auditFor(trx, params.request, vendorId), inserted);
        return inserted;
      });
    } catch (err) {
      await this.discardQr(qrCode, { requestId: params.request.requestId, customerId });
      throw err;
    }

    this.deps.logger.info('customers.register.success', {
      flow: 'customers.register',
      requestId: params.request.requestId,
      vendorId,
      customerId,
    });

    return customer;
  }

  listCustomers(vendor: Vendor): Promise<Customer[]> {
    return this.deps.customerRepo.listByVendor(vendor.id);
  }

  async getCustomer(vendor: Vendor, customerId: string): Promise<Customer> {
    const customer = await this.deps.customerRepo.findById(customerId);
    assertCustomerAccessible(customer, vendor, 'access');
    return customer;
  }

  async updateCustomer(
    vendor: Vendor,
    customerId: string,
    set: CustomerUpdateSet,
    request: RequestMeta,
  ): Promise<Customer> {
    const customer = await this.deps.customerRepo.findById(customerId);
    assertCustomerAccessible(customer, vendor, 'update');

    if (!hasUpdates(set)) throw CustomerErrors.noFieldsToUpdate({ customerId });

    return this.deps.transactor.transaction(async (trx) => {
      const updated = await this.deps.customerRepo.withDb(trx).updateCustomer(customerId, set);
      if (!updated) throw CustomerErrors.customerNotFound({ customerId });

      await auditCustomerUpdated(this.auditFor(trx, request, vendor.id), updated, set);
      return updated;
    });
  }

  async deleteCustomer(vendor: Vendor, customerId: string, request: RequestMeta): Promise<void> {
    const customer = await this.deps.customerRepo.findById(customerId);
    assertCustomerAccessible(customer, vendor, 'delete');

    const deleted = await this.deps.transactor.transaction(async (trx) => {
      const removed = await this.deps.customerRepo.withDb(trx).deleteCustomerWithCards(customerId);
      if (!removed) throw CustomerErrors.customerNotFound({ customerId });

      await auditCustomerDeleted(this.auditFor(trx, request, vendor.id), {
        customerId,
        deletedCards: removed.deletedCards,
      });
      return removed;
    });

    if (customer.qrCode) {
      await this.discardQr(customer.qrCode, { requestId: request.requestId, customerId });
    }

    this.deps.logger.info('customers.delete.success', {
      flow: 'customers.delete',
      requestId: request.requestId,
      vendorId: vendor.id,
      customerId,
      deletedCards: deleted.deletedCards,
    });
  }

  private async discardQr(
    reference: string,
    ctx: { requestId: string; customerId: string },
  ): Promise<void> {
    try {
      await this.deps.qrStore.remove(reference);
    } catch (err) {
      this.deps.logger.warn('customers.qr.remove_failed', {
        flow: 'customers.qr',
        ...ctx,
        reference,
        message: err instanceof Error ? err.message : String(err),
      });
    }
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
