import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryIdentityCache } from '../memoryIdentityCache.js';
import { Principal } from '../../../domain/auth/principal.js';
import { ManualClock } from '../../../application/auth/__tests__/fakes.js';

const alice: Principal = {
  id: 'user-1',
  username: 'alice',
  email: 'a@x.com',
  passwordHash: 'hash',
  refreshToken: null,
  confirmed: true,
};

describe('MemoryIdentityCache', () => {
  let clock: ManualClock;
  let cache: MemoryIdentityCache;

  beforeEach(() => {
    clock = new ManualClock();
    cache = new MemoryIdentityCache(clock.now);
  });

  it('should return null on a miss', async () => {
    expect(await cache.get('a@x.com')).toBeNull();
  });

  it('should return a stored principal within its TTL', async () => {
    await cache.put('a@x.com', alice, 300);
    clock.advanceSeconds(299);

    expect(await cache.get('a@x.com')).toEqual(alice);
  });

  it('should treat an expired entry as absent and drop it', async () => {
    await cache.put('a@x.com', alice, 300);
    clock.advanceSeconds(300);

    expect(await cache.get('a@x.com')).toBeNull();
    expect(cache.size).toBe(0);
  });

  it('should overwrite an existing entry and restart its TTL', async () => {
    await cache.put('a@x.com', alice, 300);
    clock.advanceSeconds(200);
    await cache.put('a@x.com', { ...alice, confirmed: false }, 300);
    clock.advanceSeconds(200);

    expect(await cache.get('a@x.com')).toEqual({ ...alice, confirmed: false });
  });

  it('should remove an entry immediately on invalidate', async () => {
    await cache.put('a@x.com', alice, 300);
    await cache.invalidate('a@x.com');

    expect(await cache.get('a@x.com')).toBeNull();
  });

  it('should hand out copies rather than the stored object', async () => {
    const mutable = { ...alice, confirmed: true };
    await cache.put('a@x.com', mutable, 300);
    mutable.confirmed = false;

    const first = await cache.get('a@x.com');
    const second = await cache.get('a@x.com');
    expect(first?.confirmed).toBe(true);
    expect(first).not.toBe(second);
  });

  it('should empty itself on close', async () => {
    await cache.put('a@x.com', alice, 300);
    await cache.close();

    expect(cache.size).toBe(0);
  });
});
