/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis, QR storage) and shares them safely.
 * - Infra is a separate bundle so tests can hand in in-memory repos + fakes.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import { KyselyTransactor, type Transactor } from '../shared/db/transactor';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import type { TokenHasher } from '../shared/security/token-hasher';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { configureLogger, logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { KyselyAuditRepo, type AuditRepo } from '../shared/audit/audit.repo';
import type { EnrollmentQrStore } from '../shared/qr/enrollment-qr-store';
import { QrCodeFileStore } from '../shared/qr/qrcode-file-store';

import { KyselyVendorRepo, type VendorRepo } from '../modules/vendors/dal/vendor.repo';
import { KyselyCustomerRepo, type CustomerRepo } from '../modules/customers/dal/customer.repo';
import {
  KyselyLoyaltyCardRepo,
  type LoyaltyCardRepo,
} from '../modules/loyalty-cards/dal/loyalty-card.repo';

import { createVendorModule, type VendorModule } from '../modules/vendors/vendor.module';
import { createAuthModule, type AuthModule } from '../modules/auth/auth.module';
import { createCustomerModule, type CustomerModule } from '../modules/customers/customer.module';
import {
  createLoyaltyCardModule,
  type LoyaltyCardModule,
} from '../modules/loyalty-cards/loyalty-card.module';

/**
 * Everything that talks to the outside world.
 * Production: Postgres (Kysely) repos, Redis cache, PNG files on disk.
 */
export type AppInfra = {
  cache: Cache;
  vendorRepo: VendorRepo;
  customerRepo: CustomerRepo;
  cardRepo: LoyaltyCardRepo;
  auditRepo: AuditRepo;
  transactor: Transactor;
  qrStore: EnrollmentQrStore;
  passwordHasher?: PasswordHasher;
  now?: () => Date;
  close: () => Promise<void>;
};

export type AppDeps = {
  cache: Cache;

  logger: Logger;

  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;

  auditRepo: AuditRepo;
  qrStore: EnrollmentQrStore;

  // modules
  vendors: VendorModule;
  auth: AuthModule;
  customers: CustomerModule;
  loyaltyCards: LoyaltyCardModule;

  // lifecycle
  close: () => Promise<void>;
};

export async function createInfra(config: AppConfig): Promise<AppInfra> {
  const db = createDb(config.databaseUrl);

  // Redis is mandatory (dev + prod)
  const redis = await RedisCache.connect(config.redisUrl);

  return {
    cache: redis,
    vendorRepo: new KyselyVendorRepo(db),
    customerRepo: new KyselyCustomerRepo(db),
    cardRepo: new KyselyLoyaltyCardRepo(db),
    auditRepo: new KyselyAuditRepo(db),
    transactor: new KyselyTransactor(db),
    qrStore: new QrCodeFileStore(config.qrStorageDir),
    close: async () => {
      await redis.close();
      await db.destroy();
    },
  };
}

export async function buildDeps(config: AppConfig, infra?: AppInfra): Promise<AppDeps> {
  configureLogger({
    level: config.logLevel,
    service: config.serviceName,
    nodeEnv: config.nodeEnv,
  });

  const io = infra ?? (await createInfra(config));
  const now = io.now ?? (() => new Date());

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher: PasswordHasher =
    io.passwordHasher ?? new BcryptPasswordHasher({ cost: config.bcryptCost });

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(io.cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  // modules (no HTTP / no business logic here)
  const vendors = createVendorModule({
    vendorRepo: io.vendorRepo,
    passwordHasher,
    auditRepo: io.auditRepo,
    transactor: io.transactor,
    logger,
    now,
  });

  const auth = createAuthModule({
    jwt: config.jwt,
    vendorRepo: vendors.vendorRepo,
    vendorService: vendors.vendorService,
    tokenHasher,
    rateLimiter,
    auditRepo: io.auditRepo,
    logger,
    now,
  });

  const customers = createCustomerModule({
    customerRepo: io.customerRepo,
    qrStore: io.qrStore,
    auditRepo: io.auditRepo,
    transactor: io.transactor,
    logger,
    now,
    authenticate: auth.authenticate,
  });

  const loyaltyCards = createLoyaltyCardModule({
    cardRepo: io.cardRepo,
    customerRepo: io.customerRepo,
    auditRepo: io.auditRepo,
    transactor: io.transactor,
    logger,
    now,
    authenticate: auth.authenticate,
  });

  return {
    cache: io.cache,
    logger,
    rateLimiter,
    tokenHasher,
    passwordHasher,
    auditRepo: io.auditRepo,
    qrStore: io.qrStore,
    vendors,
    auth,
    customers,
    loyaltyCards,
    close: io.close,
  };
}
