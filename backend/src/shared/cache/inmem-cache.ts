/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Default store when REDIS_URL is not configured, and the store used by tests.
 *
 * EXPIRY:
 * - get() drops the entry it finds expired.
 * - set() sweeps every expired entry once per SWEEP_EVERY_WRITES writes, so keys
 *   that are never read again (a logged-out token is rarely presented twice)
 *   still leave the map. Memory stays bounded by live entries plus one sweep window.
 * - An entry is never dropped before its expiry instant.
 *
 * CONCURRENCY:
 * - Each method runs to completion on the event loop, so Map reads never
 *   observe a half-written entry and never block each other.
 */

import type { Cache, CacheSetOptions } from './cache';

type Entry = { value: string; expiresAtMs: number | null };

const SWEEP_EVERY_WRITES = 100;

export class InMemCache implements Cache {
  private readonly store = new Map<string, Entry>();
  private readonly now: () => number;
  private writesSinceSweep = 0;

  constructor(opts?: { now?: () => number }) {
    this.now = opts?.now ?? Date.now;
  }

  private isExpired(entry: Entry, nowMs: number): boolean {
    return entry.expiresAtMs !== null && entry.expiresAtMs <= nowMs;
  }

  private sweep(): void {
    const nowMs = this.now();
    for (const [key, entry] of this.store) {
      if (this.isExpired(entry, nowMs)) this.store.delete(key);
    }
  }

  get(key: string): Promise<string | null> {
    const entry = this.store.get(key);
    if (!entry) return Promise.resolve(null);

    if (this.isExpired(entry, this.now())) {
      this.store.delete(key);
      return Promise.resolve(null);
    }

    return Promise.resolve(entry.value);
  }

  set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    this.writesSinceSweep += 1;
    if (this.writesSinceSweep >= SWEEP_EVERY_WRITES) {
      this.writesSinceSweep = 0;
      this.sweep();
    }

    const expiresAtMs = opts?.ttlSeconds ? this.now() + opts.ttlSeconds * 1000 : null;
    this.store.set(key, { value, expiresAtMs });
    return Promise.resolve();
  }

  /** Entries currently held, expired ones included until a read or sweep drops them. */
  size(): number {
    return this.store.size;
  }
}
