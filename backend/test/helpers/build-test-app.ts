import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';
import { InMemCache } from '../../src/shared/cache/inmem-cache';
import { BcryptPasswordHasher } from '../../src/shared/security/bcrypt-password-hasher';
import { FakeQrStore } from './fake-qr-store';
import {
  InMemAuditRepo,
  InMemCustomerRepo,
  InMemLoyaltyCardRepo,
  InMemStore,
  InMemTransactor,
  InMemVendorRepo,
} from './in-memory-repos';
import { TestClock } from './test-clock';

export const TEST_JWT_SECRET = 'test-secret-for-tokens';

/**
 * WHY:
 * - Build the real Fastify app for E2E-style tests using app.inject().
 * - Keeps tests clean: build once, inject, close.
 *
 * RULES:
 * - No Postgres / Redis: in-memory repos, InMemCache and a fake QR store are
 *   handed to the composition root as its infra bundle.
 * - One TestClock drives the app clock and the cache clock.
 * - Rate limiting is off (nodeEnv 'test') unless a test overrides nodeEnv.
 */
export async function buildTestApp(
  overrides: Partial<AppConfig> = {},
  opts: { clock?: TestClock } = {},
) {
  const baseConfig: AppConfig = {
    nodeEnv: 'test',
    port: 0,

    databaseUrl: 'postgres://unused-in-tests',
    redisUrl: 'redis://unused-in-tests',

    logLevel: process.env.LOG_LEVEL ?? 'error',
    serviceName: 'punchcard-backend',

    bcryptCost: 10,

    jwt: {
      secret: TEST_JWT_SECRET,
      algorithm: 'HS256',
      ttlMinutes: 60,
    },

    qrStorageDir: 'qrcodes',
  };

  const config: AppConfig = {
    ...baseConfig,
    ...overrides,
    // ensure nested objects merge correctly
    jwt: {
      ...baseConfig.jwt,
      ...(overrides.jwt ?? {}),
    },
  };

  const clock = opts.clock ?? new TestClock();
  const store = new InMemStore();
  const cache = new InMemCache(clock.nowMs);
  const qrStore = new FakeQrStore();
  const customerRepo = new InMemCustomerRepo(store);
  const auditRepo = new InMemAuditRepo(store);

  const built = await buildApp(config, {
    cache,
    vendorRepo: new InMemVendorRepo(store),
    customerRepo,
    cardRepo: new InMemLoyaltyCardRepo(store),
    auditRepo,
    transactor: new InMemTransactor(store),
    qrStore,
    // bcrypt's minimum cost keeps the suite fast
    passwordHasher: new BcryptPasswordHasher({ cost: 4 }),
    now: clock.now,
    close: () => cache.close(),
  });

  return {
    app: built.app,
    deps: built.deps,
    store,
    qrStore,
    customerRepo,
    auditRepo,
    clock,
    close: built.close,
  };
}

export type TestApp = Awaited<ReturnType<typeof buildTestApp>>;
