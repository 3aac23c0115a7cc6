/**
 * backend/src/modules/customers/dal/customer.repo.ts
 *
 * WHY:
 * - Customer persistence behind an interface (Kysely in production,
 *   in-memory in tests).
 *
 * RULES:
 * - No AppError, no policies: callers decide what "not found" means.
 * - Lookups are by id only; ownership is checked by the service.
 * - No transactions started here (service owns tx); withDb() binds a trx.
 * - Deleting a customer removes its loyalty cards; run it inside the caller's trx.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { CustomersTable } from '../../../shared/db/db.schema';
import type { Customer, CustomerUpdateSet } from '../customer.types';

export type InsertCustomerParams = {
  id: string;
  vendorId: string;
  name: string;
  email: string | null;
  phone: string | null;
  qrCode: string;
  now: Date;
};

export interface CustomerRepo {
  withDb(db: DbExecutor): CustomerRepo;
  findById(customerId: string): Promise<Customer | undefined>;
  /** Oldest first (registration order). */
  listByVendor(vendorId: string): Promise<Customer[]>;
  insertCustomer(params: InsertCustomerParams): Promise<Customer>;
  updateCustomer(customerId: string, set: CustomerUpdateSet): Promise<Customer | undefined>;
  /** Returns the number of cards removed with the customer, or null if no customer row matched. */
  deleteCustomerWithCards(customerId: string): Promise<{ deletedCards: number } | null>;
}

type CustomerRow = Selectable<CustomersTable>;

function toCustomer(row: CustomerRow): Customer {
  return {
    id: row.id,
    vendorId: row.vendor_id,
    name: row.name,
    email: row.email,
    phone: row.phone,
    qrCode: row.qr_code,
    createdAt: row.created_at,
  };
}

export class KyselyCustomerRepo implements CustomerRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): CustomerRepo {
    return new KyselyCustomerRepo(db);
  }

  async findById(customerId: string): Promise<Customer | undefined> {
    const row = await this.db
      .selectFrom('customers')
      .selectAll()
      .where('id', '=', customerId)
      .executeTakeFirst();

    return row ? toCustomer(row) : undefined;
  }

  async listByVendor(vendorId: string): Promise<Customer[]> {
    const rows = await this.db
      .selectFrom('customers')
      .selectAll()
      .where('vendor_id', '=', vendorId)
      .orderBy('created_at', 'asc')
      .orderBy('id', 'asc')
      .execute();

    return rows.map(toCustomer);
  }

  async insertCustomer(params: InsertCustomerParams): Promise<Customer> {
    const row = await this.db
      .insertInto('customers')
      .values({
        id: params.id,
        vendor_id: params.vendorId,
        name: params.name,
        email: params.email,
        phone: params.phone,
        qr_code: params.qrCode,
        created_at: params.now,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toCustomer(row);
  }

  async updateCustomer(customerId: string, set: CustomerUpdateSet): Promise<Customer | undefined> {
    const row = await this.db
      .updateTable('customers')
      .set({
        ...(set.name !== undefined ? { name: set.name } : {}),
        ...(set.email !== undefined ? { email: set.email } : {}),
        ...(set.phone !== undefined ? { phone: set.phone } : {}),
      })
      .where('id', '=', customerId)
      .returningAll()
      .executeTakeFirst();

    return row ? toCustomer(row) : undefined;
  }

  async deleteCustomerWithCards(customerId: string): Promise<{ deletedCards: number } | null> {
    const cards = await this.db
      .deleteFrom('loyalty_cards')
      .where('customer_id', '=', customerId)
      .executeTakeFirst();

    const customer = await this.db
      .deleteFrom('customers')
      .where('id', '=', customerId)
      .executeTakeFirst();

    if (customer.numDeletedRows === 0n) return null;

    return { deletedCards: Number(cards.numDeletedRows) };
  }
}
