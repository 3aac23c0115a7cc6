/**
 * backend/src/shared/db/db.schema.ts
 *
 * WHY:
 * - Kysely needs a typed view of the tables created by ./migrations.
 * - Column semantics (Generated, JSON) live here, next to db.ts.
 *
 * RULES:
 * - Keep aligned with migrations (one interface per table).
 * - snake_case mirrors the DB; modules map rows into camelCase domain types.
 */

import type { ColumnType, Generated } from 'kysely';

export type Timestamp = ColumnType<Date, Date | string, Date | string>;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface VendorsTable {
  id: string;
  email: string;
  password_hash: string;
  name: string;
  business_name: string;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface CustomersTable {
  id: string;
  vendor_id: string;
  name: string;
  email: string | null;
  phone: string | null;
  qr_code: string | null;
  created_at: Timestamp;
}

export interface LoyaltyCardsTable {
  id: string;
  vendor_id: string;
  customer_id: string;
  punches: Generated<number>;
  reward_threshold: number;
  reward_claimed: Generated<boolean>;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface AuditEventsTable {
  id: Generated<string>;
  vendor_id: string | null;
  action: string;
  request_id: string | null;
  ip: string | null;
  user_agent: string | null;
  metadata: ColumnType<JsonValue, string, string>;
  created_at: Generated<Timestamp>;
}

export interface DB {
  vendors: VendorsTable;
  customers: CustomersTable;
  loyalty_cards: LoyaltyCardsTable;
  audit_events: AuditEventsTable;
}
