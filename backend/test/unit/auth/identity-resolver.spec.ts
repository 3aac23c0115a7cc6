import { describe, it, expect } from 'vitest';
import { randomUUID } from 'node:crypto';
import { IdentityResolver, parseBearerToken } from '../../../src/modules/auth/identity-resolver';
import { TokenService } from '../../../src/modules/auth/token.service';
import { InMemStore, InMemVendorRepo } from '../../helpers/in-memory-repos';
import { TestClock } from '../../helpers/test-clock';

describe('parseBearerToken', () => {
  it.each([
    ['Bearer abc.def.ghi', 'abc.def.ghi'],
    ['bearer abc.def.ghi', 'abc.def.ghi'],
    ['BEARER   abc.def.ghi  ', 'abc.def.ghi'],
  ])('extracts the token from %j', (header, expected) => {
    expect(parseBearerToken(header)).toBe(expected);
  });

  it.each([undefined, '', 'Bearer', 'Bearer ', 'Basic abc', 'Token abc', 'Bearer a b'])(
    'returns null for %j',
    (header) => {
      expect(parseBearerToken(header)).toBeNull();
    },
  );
});

describe('IdentityResolver', () => {
  async function setup() {
    const clock = new TestClock();
    const store = new InMemStore();
    const vendorRepo = new InMemVendorRepo(store);
    const tokenService = new TokenService(
      { secret: 'test-secret-for-tokens', algorithm: 'HS256', ttlMinutes: 60 },
      clock.now,
    );

    const vendor = await vendorRepo.insertVendor({
      id: randomUUID(),
      email: 'owner@example.com',
      passwordHash: 'hash',
      name: 'Owner',
      businessName: 'Corner Coffee',
      now: clock.now(),
    });
    if (!vendor) throw new Error('seed vendor failed');

    const resolver = new IdentityResolver({ tokenService, vendorRepo });
    return { clock, store, tokenService, resolver, vendor };
  }

  it('resolves a bearer token to its vendor', async () => {
    const { tokenService, resolver, vendor } = await setup();
    const { token } = tokenService.issue(vendor.id, vendor.email);

    await expect(resolver.resolve(`Bearer ${token}`)).resolves.toEqual(vendor);
  });

  it('rejects a missing header with 401', async () => {
    const { resolver } = await setup();

    await expect(resolver.resolve(undefined)).rejects.toMatchObject({
      status: 401,
      message: 'Authentication required',
    });
  });

  it('rejects an expired token with 401', async () => {
    const { clock, tokenService, resolver, vendor } = await setup();
    const { token } = tokenService.issue(vendor.id, vendor.email);

    clock.advanceMinutes(61);

    await expect(resolver.resolve(`Bearer ${token}`)).rejects.toMatchObject({
      status: 401,
      message: 'Token expired',
    });
  });

  it('answers 404 once the vendor is gone', async () => {
    const { store, tokenService, resolver, vendor } = await setup();
    const { token } = tokenService.issue(vendor.id, vendor.email);

    store.vendors.delete(vendor.id);

    await expect(resolver.resolve(`Bearer ${token}`)).rejects.toMatchObject({
      status: 404,
      message: 'Vendor not found',
    });
  });
});
