import { Principal } from '../../domain/auth/principal.js';

export interface NewPrincipal {
  username: string;
  email: string;
  passwordHash: string;
}

/**
 * Persistence port for principals, keyed by email.
 */
export interface UserStore {
  findByEmail(email: string): Promise<Principal | null>;
  create(input: NewPrincipal): Promise<Principal>;
  /** Overwrite username, password hash and confirmation flag of an existing principal. */
  save(principal: Principal): Promise<void>;
  /** Unconditionally set (or clear, with null) the stored refresh token. */
  setRefreshToken(email: string, token: string | null): Promise<void>;
  /**
   * Atomically replace the stored refresh token with `next` if and only if it
   * currently equals `expected`. Returns whether the swap happened.
   * Of two concurrent calls with the same `expected`, at most one returns true.
   */
  compareAndSetRefreshToken(email: string, expected: string, next: string | null): Promise<boolean>;
}
