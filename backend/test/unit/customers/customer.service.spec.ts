import { describe, it, expect, vi } from 'vitest';
import { randomUUID } from 'node:crypto';
import { CustomerService } from '../../../src/modules/customers';
import type { Vendor } from '../../../src/modules/vendors';
import type { RequestMeta } from '../../../src/shared/http/request-meta';
import { logger } from '../../../src/shared/logger/logger';
import { FakeQrStore } from '../../helpers/fake-qr-store';
import {
  InMemAuditRepo,
  InMemCustomerRepo,
  InMemStore,
  InMemTransactor,
} from '../../helpers/in-memory-repos';
import { TestClock } from '../../helpers/test-clock';

const request: RequestMeta = { requestId: 'req-1', ip: '127.0.0.1', userAgent: 'vitest' };

function setup() {
  const clock = new TestClock();
  const store = new InMemStore();
  const customerRepo = new InMemCustomerRepo(store);
  const qrStore = new FakeQrStore();
  const auditRepo = new InMemAuditRepo(store);

  const vendor: Vendor = {
    id: randomUUID(),
    email: 'cafe@example.com',
    name: 'Cafe',
    businessName: 'Cafe',
    createdAt: clock.now(),
    updatedAt: clock.now(),
  };

  const service = new CustomerService({
    customerRepo,
    qrStore,
    auditRepo,
    transactor: new InMemTransactor(store),
    logger,
    now: clock.now,
  });

  return { store, customerRepo, auditRepo, qrStore, vendor, service };
}

describe('CustomerService', () => {
  it('stores the QR reference on the customer and audits the enrollment', async () => {
    const { store, qrStore, vendor, service } = setup();

    const customer = await service.registerCustomer({ vendor, name: 'Alice', request });

    expect(customer.qrCode).toBe(`qrcodes/customer_${customer.id}.png`);
    expect(qrStore.artifacts.get(`qrcodes/customer_${customer.id}.png`)).toBe(
      `${customer.id}:${vendor.id}`,
    );
    expect(store.auditEvents).toEqual([
      {
        vendorId: vendor.id,
        requestId: 'req-1',
        ip: '127.0.0.1',
        userAgent: 'vitest',
        action: 'customer.registered',
        metadata: { customerId: customer.id },
      },
    ]);
  });

  it('rethrows the insert error after removing the QR artifact', async () => {
    const { customerRepo, qrStore, vendor, service } = setup();
    customerRepo.failNextInsert = true;

    await expect(service.registerCustomer({ vendor, name: 'Alice', request })).rejects.toThrow(
      'insert failed',
    );
    expect(qrStore.artifacts.size).toBe(0);
  });

  it('rolls back the insert and removes the QR artifact when the enrollment cannot be audited', async () => {
    const { store, auditRepo, qrStore, vendor, service } = setup();
    auditRepo.failOn = 'customer.registered';

    await expect(service.registerCustomer({ vendor, name: 'Alice', request })).rejects.toThrow(
      'audit append failed',
    );
    expect(store.customers.size).toBe(0);
    expect(qrStore.artifacts.size).toBe(0);
  });

  it('keeps the customer, its cards and its QR artifact when the delete cannot be audited', async () => {
    const { store, auditRepo, qrStore, vendor, service } = setup();
    const customer = await service.registerCustomer({ vendor, name: 'Alice', request });
    store.cards.set('card-1', {
      id: 'card-1',
      vendorId: vendor.id,
      customerId: customer.id,
      punches: 2,
      rewardThreshold: 5,
      rewardClaimed: false,
      createdAt: customer.createdAt,
      updatedAt: customer.createdAt,
    });
    auditRepo.failOn = 'customer.deleted';

    await expect(service.deleteCustomer(vendor, customer.id, request)).rejects.toThrow(
      'audit append failed',
    );
    expect(store.customers.has(customer.id)).toBe(true);
    expect(store.cards.get('card-1')?.punches).toBe(2);
    expect(qrStore.removed).toEqual([]);
  });

  it('leaves the customer unchanged when the update cannot be audited', async () => {
    const { store, auditRepo, vendor, service } = setup();
    const customer = await service.registerCustomer({ vendor, name: 'Alice', request });
    auditRepo.failOn = 'customer.updated';

    await expect(
      service.updateCustomer(vendor, customer.id, { name: 'Alicia' }, request),
    ).rejects.toThrow('audit append failed');
    expect(store.customers.get(customer.id)?.name).toBe('Alice');
  });

  it('logs a warning when the QR artifact cannot be removed on delete', async () => {
    const { store, qrStore, vendor, service } = setup();
    const warn = vi.spyOn(logger, 'warn');

    const customer = await service.registerCustomer({ vendor, name: 'Alice', request });
    qrStore.failRemove = true;

    await service.deleteCustomer(vendor, customer.id, request);

    expect(store.customers.size).toBe(0);
    expect(warn).toHaveBeenCalledWith(
      'customers.qr.remove_failed',
      expect.objectContaining({ customerId: customer.id, reference: customer.qrCode }),
    );
  });

  it('distinguishes absent fields from explicit null on update', async () => {
    const { vendor, service } = setup();
    const customer = await service.registerCustomer({
      vendor,
      name: 'Alice',
      email: 'alice@example.com',
      phone: '+15550001',
      request,
    });

    const updated = await service.updateCustomer(vendor, customer.id, { email: null }, request);

    expect(updated.email).toBeNull();
    expect(updated.phone).toBe('+15550001');
    expect(updated.name).toBe('Alice');
  });

  it('rejects an update set where every field is absent', async () => {
    const { vendor, service } = setup();
    const customer = await service.registerCustomer({ vendor, name: 'Alice', request });

    await expect(
      service.updateCustomer(vendor, customer.id, { name: undefined }, request),
    ).rejects.toMatchObject({ status: 400, message: 'No fields to update' });
  });
});
