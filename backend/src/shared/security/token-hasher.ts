/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Rate-limit keys and operational logs must not carry raw emails.
 * - We key them by a one-way hash instead.
 *
 * NOTE:
 * - Interface so callers depend on an abstraction (DIP).
 */

export interface TokenHasher {
  hash(rawValue: string): string;
}
