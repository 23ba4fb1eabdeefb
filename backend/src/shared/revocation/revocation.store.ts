/**
 * src/shared/revocation/revocation.store.ts
 *
 * WHY:
 * - Logout must invalidate a token before its natural expiry.
 * - Entries carry a TTL so the backend evicts them once the token could no
 *   longer verify (Redis expires keys, InMemCache sweeps on write).
 *
 * TTL RULE:
 * - Tokens carry `exp` in whole seconds and stay valid while now <= exp,
 *   i.e. until (exp + 1) * 1000 ms. The entry TTL is rounded up to reach
 *   that instant, so a live entry is never pruned early.
 * - A token that already expired is not written at all.
 *
 * RULES:
 * - Depends only on Cache (DIP). InMemCache by default, Redis when configured.
 * - No HTTP concerns.
 */

import type { Cache } from '../cache/cache';
import { REVOCATION_KEY_PREFIX } from './revocation.types';
import type { RevocationStore } from './revocation.types';

export class CacheRevocationStore implements RevocationStore {
  private readonly now: () => number;

  constructor(
    private readonly cache: Cache,
    opts?: { now?: () => number },
  ) {
    this.now = opts?.now ?? Date.now;
  }

  private key(tokenId: string): string {
    return `${REVOCATION_KEY_PREFIX}:${tokenId}`;
  }

  async revoke(tokenId: string, expiresAt: Date): Promise<void> {
    const validUntilMs = expiresAt.getTime() + 1000;
    const ttlSeconds = Math.ceil((validUntilMs - this.now()) / 1000);
    if (ttlSeconds <= 0) return;

    await this.cache.set(this.key(tokenId), '1', { ttlSeconds });
  }

  async isRevoked(tokenId: string): Promise<boolean> {
    return (await this.cache.get(this.key(tokenId))) !== null;
  }
}
