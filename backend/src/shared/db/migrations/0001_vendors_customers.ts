/**
 * src/shared/db/migrations/0001_vendors_customers.ts
 *
 * Tenant registry tables: vendors (tenant root) and their customers.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('vendors')
    .addColumn('id', 'uuid', (col) => col.primaryKey())
    .addColumn('email', 'text', (col) => col.notNull())
    .addColumn('password_hash', 'text', (col) => col.notNull())
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('business_name', 'text', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addUniqueConstraint('vendors_email_unique', ['email'])
    .execute();

  await db.schema
    .createTable('customers')
    .addColumn('id', 'uuid', (col) => col.primaryKey())
    .addColumn('vendor_id', 'uuid', (col) =>
      col.notNull().references('vendors.id').onDelete('cascade'),
    )
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('email', 'text')
    .addColumn('phone', 'text')
    // enrollment QR reference (storage path); null only for legacy rows
    .addColumn('qr_code', 'text')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('customers_vendor_id_created_at_idx')
    .on('customers')
    .columns(['vendor_id', 'created_at'])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('customers').ifExists().execute();
  await db.schema.dropTable('vendors').ifExists().execute();
}
