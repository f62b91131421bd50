import { describe, it, expect } from 'vitest';
import { createIdentityCache } from '../createIdentityCache.js';
import { MemoryIdentityCache } from '../memoryIdentityCache.js';
import { createLogger } from '../../logger.js';

describe('createIdentityCache', () => {
  it('should fall back to the in-process cache without a Redis URL', async () => {
    const cache = createIdentityCache(undefined, createLogger({ level: 'silent' }));

    expect(cache).toBeInstanceOf(MemoryIdentityCache);
    await cache.close();
  });
});
