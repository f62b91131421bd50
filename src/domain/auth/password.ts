import { argon2id, hash, verify, type Options } from 'argon2';

export interface PasswordHasher {
  hash(plainPassword: string): Promise<string>;
  verify(plainPassword: string, passwordHash: string): Promise<boolean>;
}

export type Argon2CostOptions = Pick<Options, 'timeCost' | 'memoryCost' | 'parallelism'>;

/**
 * Password hashing using Argon2id.
 * Each hash gets a fresh random salt and encodes its own parameters,
 * so cost changes do not invalidate existing hashes.
 */
export class Argon2PasswordHasher implements PasswordHasher {
  constructor(private readonly cost: Argon2CostOptions = {}) {}

  async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword, { ...this.cost, type: argon2id });
  }

  /**
   * Verify a plain password against a hash.
   * Malformed hashes verify as false instead of throwing.
   */
  async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      return false;
    }
  }
}
