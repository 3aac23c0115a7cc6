/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Enforces brute-force limits on credential endpoints (vendor login).
 * - Uses Redis in prod, but depends only on Cache (DIP).
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { prefix: "rl" })
 * - await limiter.hitOrThrow({ key: "login:ip:1.2.3.4", limit: 20, windowSeconds: 900 })
 *
 * ATOMICITY:
 * - INCR-then-check, not check-then-INCR. INCR is atomic in Redis; the request
 *   that pushes the counter over the limit gets back a value > limit and is rejected.
 *
 * DISABLING:
 * - Pass `disabled: true` in opts to skip all checks.
 * - Never check NODE_ENV here; that decision belongs to the composition root.
 */

import type { Cache } from '../cache/cache';

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly limit: number,
    public readonly windowSeconds: number,
  ) {
    super('Rate limit exceeded');
    this.name = 'RateLimitError';
  }
}

export class RateLimiter {
  constructor(
    private readonly cache: Cache,
    private readonly opts?: { prefix?: string; disabled?: boolean },
  ) {}

  private buildKey(key: string): string {
    return this.opts?.prefix ? `${this.opts.prefix}:${key}` : key;
  }

  /**
   * Increments the counter for `key`.
   * Throws RateLimitError if the counter exceeds `limit`.
   */
  async hitOrThrow(input: { key: string; limit: number; windowSeconds: number }): Promise<void> {
    if (this.opts?.disabled) return;

    const fullKey = this.buildKey(input.key);
    const current = await this.cache.incr(fullKey, { ttlSeconds: input.windowSeconds });

    if (current > input.limit) {
      throw new RateLimitError(fullKey, input.limit, input.windowSeconds);
    }
  }
}
