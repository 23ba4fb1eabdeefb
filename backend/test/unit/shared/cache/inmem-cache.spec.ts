import { describe, it, expect } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { createTestClock } from '../../../helpers/test-clock';

describe('InMemCache', () => {
  it('keeps entries without a ttl', async () => {
    const clock = createTestClock();
    const cache = new InMemCache({ now: clock.now });

    await cache.set('k', 'v');
    clock.advance(365 * 24 * 3600 * 1000);

    expect(await cache.get('k')).toBe('v');
  });

  it('drops an entry at its expiry instant, not before', async () => {
    const clock = createTestClock();
    const cache = new InMemCache({ now: clock.now });

    await cache.set('k', 'v', { ttlSeconds: 5 });

    clock.advance(4_999);
    expect(await cache.get('k')).toBe('v');

    clock.advance(1);
    expect(await cache.get('k')).toBeNull();
    expect(cache.size()).toBe(0);
  });

  it('overwrites an existing key and its ttl', async () => {
    const clock = createTestClock();
    const cache = new InMemCache({ now: clock.now });

    await cache.set('k', 'v1', { ttlSeconds: 1 });
    await cache.set('k', 'v2', { ttlSeconds: 10 });
    clock.advance(5_000);

    expect(await cache.get('k')).toBe('v2');
  });

  it('sweeps expired entries on write without touching live ones', async () => {
    const clock = createTestClock();
    const cache = new InMemCache({ now: clock.now });

    await cache.set('expired', 'v', { ttlSeconds: 1 });
    await cache.set('live', 'v', { ttlSeconds: 3600 });
    clock.advance(2_000);

    // writes 3..100; the 100th triggers the sweep before it is stored
    for (let i = 3; i <= 100; i++) {
      await cache.set(`fresh-${i}`, 'v');
    }

    // 'expired' was never read again, so only the sweep can have removed it
    expect(cache.size()).toBe(99);
    expect(await cache.get('live')).toBe('v');
    expect(await cache.get('fresh-3')).toBe('v');
  });

  it('does not sweep before the write interval is reached', async () => {
    const clock = createTestClock();
    const cache = new InMemCache({ now: clock.now });

    await cache.set('expired', 'v', { ttlSeconds: 1 });
    clock.advance(2_000);
    await cache.set('other', 'v');

    expect(cache.size()).toBe(2);
  });
});
