import { Redis } from 'ioredis';
import { IdentityCache } from '../../application/auth/identityCache.js';
import type { Logger } from '../logger.js';
import { MemoryIdentityCache } from './memoryIdentityCache.js';
import { ioredisClient, RedisIdentityCache } from './redisIdentityCache.js';

/**
 * Build the process-wide identity cache: Redis when a URL is configured,
 * otherwise an in-process map. Call close() on shutdown.
 */
export function createIdentityCache(redisUrl: string | undefined, logger: Logger): IdentityCache {
  if (!redisUrl) {
    logger.info('Using in-process identity cache');
    return new MemoryIdentityCache();
  }

  const redis = new Redis(redisUrl, {
    // Exponential back-off capped at 10 s
    retryStrategy: (times: number) => Math.min(times * 100, 10_000),
    enableReadyCheck: true,
    maxRetriesPerRequest: 3,
    lazyConnect: false,
  });
  redis.on('error', (err) => {
    logger.error({ err }, 'Redis identity cache error');
  });

  logger.info('Using Redis identity cache');
  return new RedisIdentityCache(ioredisClient(redis), logger);
}
