/**
 * backend/src/modules/vendors/dal/vendor.repo.ts
 *
 * WHY:
 * - Vendor persistence behind an interface, so services can run against
 *   Postgres (Kysely) in production and an in-memory store in tests.
 *
 * RULES:
 * - No AppError, no policies.
 * - No transactions started here (service owns tx); withDb() binds a trx.
 * - Emails are stored and matched lowercase.
 * - insertVendor returns null when the email is taken (unique constraint),
 *   so the service can report CONFLICT even when two registrations race.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { VendorsTable } from '../../../shared/db/db.schema';
import { isUniqueViolation } from '../../../shared/db/pg-errors';
import type { Vendor, VendorCredentials, VendorUpdateSet } from '../vendor.types';

export type InsertVendorParams = {
  id: string;
  email: string;
  passwordHash: string;
  name: string;
  businessName: string;
  now: Date;
};

export interface VendorRepo {
  withDb(db: DbExecutor): VendorRepo;
  findById(vendorId: string): Promise<Vendor | undefined>;
  findCredentialsByEmail(email: string): Promise<VendorCredentials | undefined>;
  insertVendor(params: InsertVendorParams): Promise<Vendor | null>;
  updateVendor(vendorId: string, set: VendorUpdateSet, now: Date): Promise<Vendor | undefined>;
}

type VendorRow = Selectable<VendorsTable>;

function toVendor(row: VendorRow): Vendor {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    businessName: row.business_name,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class KyselyVendorRepo implements VendorRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): VendorRepo {
    return new KyselyVendorRepo(db);
  }

  async findById(vendorId: string): Promise<Vendor | undefined> {
    const row = await this.db
      .selectFrom('vendors')
      .selectAll()
      .where('id', '=', vendorId)
      .executeTakeFirst();

    return row ? toVendor(row) : undefined;
  }

  async findCredentialsByEmail(email: string): Promise<VendorCredentials | undefined> {
    const row = await this.db
      .selectFrom('vendors')
      .selectAll()
      .where('email', '=', email.toLowerCase())
      .executeTakeFirst();

    return row ? { ...toVendor(row), passwordHash: row.password_hash } : undefined;
  }

  async insertVendor(params: InsertVendorParams): Promise<Vendor | null> {
    try {
      const row = await this.db
        .insertInto('vendors')
        .values({
          id: params.id,
          email: params.email.toLowerCase(),
          password_hash: params.passwordHash,
          name: params.name,
          business_name: params.businessName,
          created_at: params.now,
          updated_at: params.now,
        })
        .returningAll()
        .executeTakeFirstOrThrow();

      return toVendor(row);
    } catch (err) {
      if (isUniqueViolation(err, 'vendors_email_unique')) return null;
      throw err;
    }
  }

  async updateVendor(
    vendorId: string,
    set: VendorUpdateSet,
    now: Date,
  ): Promise<Vendor | undefined> {
    const row = await this.db
      .updateTable('vendors')
      .set({
        ...(set.name !== undefined ? { name: set.name } : {}),
        ...(set.businessName !== undefined ? { business_name: set.businessName } : {}),
        updated_at: now,
      })
      .where('id', '=', vendorId)
      .returningAll()
      .executeTakeFirst();

    return row ? toVendor(row) : undefined;
  }
}
