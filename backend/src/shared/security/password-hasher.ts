/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Vendor credentials are stored as hashes only; the hashing primitive is an
 *   external concern.
 * - Services depend on this interface (DIP), not bcrypt directly.
 *
 * HOW TO USE:
 * - const hash = await hasher.hash(password)
 * - const ok = await hasher.verify(password, hash)
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
