import { describe, it, expect } from 'vitest';
import { VendorService } from '../../../src/modules/vendors/vendor.service';
import type { PasswordHasher } from '../../../src/shared/security/password-hasher';
import type { RequestMeta } from '../../../src/shared/http/request-meta';
import { logger } from '../../../src/shared/logger/logger';
import { captureAsyncAppError } from '../../helpers/capture-error';
import {
  InMemAuditRepo,
  InMemStore,
  InMemTransactor,
  InMemVendorRepo,
} from '../../helpers/in-memory-repos';
import { TestClock } from '../../helpers/test-clock';

/** Records every call; "hashes" by prefixing. */
class RecordingHasher implements PasswordHasher {
  readonly hashed: string[] = [];
  readonly verified: Array<[string, string]> = [];

  hash(plain: string): Promise<string> {
    this.hashed.push(plain);
    return Promise.resolve(`hashed:${plain}`);
  }

  verify(plain: string, hash: string): Promise<boolean> {
    this.verified.push([plain, hash]);
    return Promise.resolve(hash === `hashed:${plain}`);
  }
}

const request: RequestMeta = { requestId: 'req-1', ip: '127.0.0.1', userAgent: null };

function setup() {
  const clock = new TestClock();
  const store = new InMemStore();
  const passwordHasher = new RecordingHasher();
  const service = new VendorService({
    vendorRepo: new InMemVendorRepo(store),
    passwordHasher,
    auditRepo: new InMemAuditRepo(store),
    transactor: new InMemTransactor(store),
    logger,
    now: clock.now,
  });
  return { passwordHasher, service };
}

describe('VendorService.authenticateVendor', () => {
  it('verifies a password for an unknown email too, against one reused hash', async () => {
    const { passwordHasher, service } = setup();

    for (const attempt of ['first-guess', 'second-guess']) {
      const err = await captureAsyncAppError(() =>
        service.authenticateVendor('nobody@example.com', attempt),
      );
      expect(err.status).toBe(401);
      expect(err.meta).toEqual({ reason: 'vendor_not_found' });
    }

    expect(passwordHasher.hashed).toHaveLength(1);
    expect(passwordHasher.verified).toHaveLength(2);
    expect(passwordHasher.verified.map(([plain]) => plain)).toEqual([
      'first-guess',
      'second-guess',
    ]);
  });

  it('runs exactly one verification for a wrong password', async () => {
    const { passwordHasher, service } = setup();
    await service.registerVendor({
      name: 'Dana',
      email: 'owner@example.com',
      password: 'test-password',
      businessName: 'Corner Coffee',
      request,
    });

    const err = await captureAsyncAppError(() =>
      service.authenticateVendor('owner@example.com', 'wrong-password'),
    );

    expect(err.meta).toMatchObject({ reason: 'wrong_password' });
    expect(passwordHasher.verified).toEqual([['wrong-password', 'hashed:test-password']]);
  });
});
