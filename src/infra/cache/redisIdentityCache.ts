import { Redis } from 'ioredis';
import { IdentityCache } from '../../application/auth/identityCache.js';
import { Principal, principalSchema } from '../../domain/auth/principal.js';
import type { Logger } from '../logger.js';

/**
 * The handful of Redis commands the identity cache needs.
 * Kept narrow so tests can supply an in-process stand-in.
 */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(key: string): Promise<void>;
  quit(): Promise<void>;
}

export function ioredisClient(redis: Redis): KeyValueClient {
  return {
    get: (key) => redis.get(key),
    setWithTtl: async (key, value, ttlSeconds) => {
      await redis.set(key, value, 'EX', ttlSeconds);
    },
    del: async (key) => {
      await redis.del(key);
    },
    quit: async () => {
      await redis.quit();
    },
  };
}

const KEY_PREFIX = 'identity:';

/**
 * Identity cache shared between processes through Redis.
 * Expiry is delegated to Redis (SET .. EX).
 */
export class RedisIdentityCache implements IdentityCache {
  constructor(
    private readonly client: KeyValueClient,
    private readonly logger: Logger
  ) {}

  async get(email: string): Promise<Principal | null> {
    const key = KEY_PREFIX + email;
    let raw: string | null;
    try {
      raw = await this.client.get(key);
    } catch (err) {
      // Served from the store instead
      this.logger.warn({ err, key }, 'Identity cache read failed; treating as a miss');
      return null;
    }
    if (raw === null) {
      return null;
    }

    const parsed = principalSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      this.logger.warn({ key }, 'Discarding unreadable identity cache entry');
      await this.client.del(key);
      return null;
    }
    return parsed.data;
  }

  async put(email: string, principal: Principal, ttlSeconds: number): Promise<void> {
    // Redis EX takes whole seconds
    const ttl = Math.max(1, Math.ceil(ttlSeconds));
    try {
      await this.client.setWithTtl(KEY_PREFIX + email, JSON.stringify(principal), ttl);
    } catch (err) {
      this.logger.warn({ err, email }, 'Identity cache write failed; entry not cached');
    }
  }

  async invalidate(email: string): Promise<void> {
    await this.client.del(KEY_PREFIX + email);
  }

  async close(): Promise<void> {
    this.logger.info('Closing Redis identity cache connection');
    await this.client.quit();
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
