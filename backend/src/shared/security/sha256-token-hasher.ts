/**
 * backend/src/shared/security/sha256-token-hasher.ts
 *
 * Concrete TokenHasher using SHA-256 (hex digest).
 */

import { createHash } from 'node:crypto';
import type { TokenHasher } from './token-hasher';

export class Sha256TokenHasher implements TokenHasher {
  hash(rawValue: string): string {
    return createHash('sha256').update(rawValue).digest('hex');
  }
}
