import { IdentityCache } from '../../application/auth/identityCache.js';
import { Principal, principalSchema } from '../../domain/auth/principal.js';

interface Entry {
  value: string;
  expiresAt: number;
}

/**
 * In-process identity cache. Expiry is checked on read; there is no sweeper.
 * Entries are stored serialized so callers never share mutable state with the cache.
 */
export class MemoryIdentityCache implements IdentityCache {
  private readonly entries = new Map<string, Entry>();

  /** @param now milliseconds since epoch */
  constructor(private readonly now: () => number = Date.now) {}

  async get(email: string): Promise<Principal | null> {
    const entry = this.entries.get(email);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(email);
      return null;
    }
    return principalSchema.parse(JSON.parse(entry.value));
  }

  async put(email: string, principal: Principal, ttlSeconds: number): Promise<void> {
    this.entries.set(email, {
      value: JSON.stringify(principal),
      expiresAt: this.now() + ttlSeconds * 1000,
    });
  }

  async invalidate(email: string): Promise<void> {
    this.entries.delete(email);
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
