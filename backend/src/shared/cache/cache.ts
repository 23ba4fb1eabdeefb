/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Short-lived security state (revoked tokens) must be fast and can be externalized.
 * - We depend on an abstraction so the process can run on memory alone and
 *   switch to Redis by configuration.
 *
 * HOW TO USE:
 * - cache.get(key)
 * - cache.set(key, value, { ttlSeconds })
 *
 * Entries are never deleted explicitly; they expire.
 */

export interface CacheSetOptions {
  /** Key disappears after this many seconds. Omit for no expiry. */
  ttlSeconds?: number;
}

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
}
