import { Principal } from '../../domain/auth/principal.js';

/**
 * Short-lived email -> principal cache in front of the user store.
 * Never the source of truth: a miss means "ask the store", nothing more.
 */
export interface IdentityCache {
  /** Cached principal, or null when absent or expired. */
  get(email: string): Promise<Principal | null>;
  /** Insert or overwrite. */
  put(email: string, principal: Principal, ttlSeconds: number): Promise<void>;
  invalidate(email: string): Promise<void>;
  /** Release connections/timers at shutdown. */
  close(): Promise<void>;
}
