/**
 * src/shared/audit/audit.types.ts
 *
 * WHY:
 * - Central audit event types (append-only trail stored in DB).
 * - AuditContext groups the request-level fields that repeat on every event.
 * - AuditAction is a closed union so typos fail at compile time.
 *
 * RULES:
 * - Metadata is a plain object (repo serializes to JSON for DB).
 * - Never import module types here (shared must stay module-agnostic).
 */

export type AuditAction =
  // Vendors / auth
  | 'vendor.registered'
  | 'vendor.profile.updated'
  | 'auth.login.success'
  | 'auth.login.failed'
  // Customers
  | 'customer.registered'
  | 'customer.updated'
  | 'customer.deleted'
  // Loyalty cards
  | 'loyalty_card.created'
  | 'loyalty_card.punched'
  | 'loyalty_card.redeemed';

export type AuditMetadata = Record<string, unknown>;

/**
 * Request-level context identical across every audit event of one request.
 * vendorId is null until the acting vendor is known (e.g. failed login).
 */
export type AuditContext = {
  vendorId: string | null;

  requestId: string | null;
  ip: string | null;
  userAgent: string | null;
};

export type AuditEventInsert = AuditContext & {
  action: AuditAction;
  metadata?: AuditMetadata;
};
