/**
 * src/shared/db/migrations/0002_loyalty_cards.ts
 *
 * One card per (vendor, customer) is enforced by loyalty_cards_vendor_customer_unique;
 * the service maps its violation to CONFLICT.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('loyalty_cards')
    .addColumn('id', 'uuid', (col) => col.primaryKey())
    .addColumn('vendor_id', 'uuid', (col) =>
      col.notNull().references('vendors.id').onDelete('cascade'),
    )
    .addColumn('customer_id', 'uuid', (col) =>
      col.notNull().references('customers.id').onDelete('cascade'),
    )
    .addColumn('punches', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('reward_threshold', 'integer', (col) => col.notNull())
    .addColumn('reward_claimed', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addUniqueConstraint('loyalty_cards_vendor_customer_unique', ['vendor_id', 'customer_id'])
    .execute();

  await sql`
    ALTER TABLE loyalty_cards
      ADD CONSTRAINT loyalty_cards_punches_check
      CHECK (punches >= 0 AND punches <= reward_threshold);
  `.execute(db);

  await sql`
    ALTER TABLE loyalty_cards
      ADD CONSTRAINT loyalty_cards_threshold_check
      CHECK (reward_threshold > 0);
  `.execute(db);

  // Claimed implies threshold met
  await sql`
    ALTER TABLE loyalty_cards
      ADD CONSTRAINT loyalty_cards_claim_check
      CHECK (reward_claimed = false OR punches >= reward_threshold);
  `.execute(db);

  await db.schema
    .createIndex('loyalty_cards_vendor_id_created_at_idx')
    .on('loyalty_cards')
    .columns(['vendor_id', 'created_at'])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('loyalty_cards').ifExists().execute();
}
