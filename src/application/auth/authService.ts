import { randomUUID } from 'crypto';
import {
  InvalidCredentialsError,
  InvalidScopeError,
  RevokedTokenError,
  UnknownPrincipalError,
} from '../../domain/auth/errors.js';
import { PasswordHasher } from '../../domain/auth/password.js';
import { Principal } from '../../domain/auth/principal.js';
import { SinglePurposeScope, TokenCodec } from '../../domain/auth/tokenCodec.js';
import type { Logger } from '../../infra/logger.js';
import { IdentityCache } from './identityCache.js';
import { UserStore } from './userStore.js';

/** Lifetimes in seconds. */
export interface AuthTtls {
  accessToken: number;
  refreshToken: number;
  emailToken: number;
  identityCache: number;
}

export const DEFAULT_TTLS: AuthTtls = {
  accessToken: 15 * 60,
  refreshToken: 7 * 24 * 60 * 60,
  emailToken: 24 * 60 * 60,
  identityCache: 5 * 60,
};

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
}

/**
 * Orchestrates login, refresh-token rotation, principal resolution and
 * single-purpose (emailed) tokens.
 *
 * Holds no per-session state: everything lives in the tokens, the user store
 * and the identity cache, so one instance serves concurrent requests.
 */
export class AuthService {
  private dummyHash: Promise<string> | undefined;

  constructor(
    private readonly userStore: UserStore,
    private readonly identityCache: IdentityCache,
    private readonly passwordHasher: PasswordHasher,
    private readonly tokenCodec: TokenCodec,
    private readonly logger: Logger,
    private readonly ttls: AuthTtls = DEFAULT_TTLS
  ) {}

  async login(email: string, password: string): Promise<TokenPair> {
    const principal = await this.userStore.findByEmail(email);
    if (!principal) {
      // Spend the same hashing time as a real check so unknown emails cannot be timed
      await this.passwordHasher.verify(password, await this.getDummyHash());
      throw new InvalidCredentialsError();
    }

    const isValid = await this.passwordHasher.verify(password, principal.passwordHash);
    if (!isValid) {
      throw new InvalidCredentialsError();
    }

    // Invalidate before committing so a cache failure leaves the stored token untouched
    await this.identityCache.invalidate(principal.email);
    const pair = this.issuePair(principal.email);
    await this.userStore.setRefreshToken(principal.email, pair.refreshToken);
    return pair;
  }

  /**
   * Rotate a refresh token. Each refresh token works once: presenting one that
   * is no longer the stored token revokes the whole session lineage.
   */
  async refresh(refreshToken: string): Promise<TokenPair> {
    const claims = this.tokenCodec.decode(refreshToken);
    if (claims.scope !== 'refresh') {
      throw new InvalidScopeError();
    }

    const principal = await this.userStore.findByEmail(claims.subject);
    if (!principal) {
      throw new UnknownPrincipalError();
    }

    // A failure here must not follow the swap: the client would retry with a
    // token that no longer matches and trip reuse detection.
    await this.identityCache.invalidate(principal.email);
    const pair = this.issuePair(principal.email);
    const rotated = await this.userStore.compareAndSetRefreshToken(
      principal.email,
      refreshToken,
      pair.refreshToken
    );

    if (!rotated) {
      this.logger.warn(
        { email: principal.email, tokenId: claims.tokenId },
        'Stale refresh token presented; revoking sessions'
      );
      await this.revokeSessions(principal.email);
      throw new RevokedTokenError();
    }

    return pair;
  }

  /**
   * Resolve the principal behind an access token, serving from the identity
   * cache when possible.
   */
  async resolvePrincipal(accessToken: string): Promise<Principal> {
    const claims = this.tokenCodec.decode(accessToken);
    if (claims.scope !== 'access') {
      throw new InvalidScopeError();
    }

    const cached = await this.identityCache.get(claims.subject);
    if (cached) {
      return cached;
    }

    const principal = await this.userStore.findByEmail(claims.subject);
    if (!principal) {
      throw new UnknownPrincipalError();
    }

    await this.identityCache.put(claims.subject, principal, this.ttls.identityCache);
    return principal;
  }

  issueSinglePurposeToken(
    email: string,
    purpose: SinglePurposeScope,
    ttlSeconds: number = this.ttls.emailToken
  ): string {
    return this.tokenCodec.encode({ subject: email, scope: purpose }, ttlSeconds);
  }

  /**
   * Returns the email the token was issued for.
   * One-time use is up to the caller (e.g. flipping `confirmed`); the token
   * stays valid until it expires.
   */
  consumeSinglePurposeToken(token: string, purpose: SinglePurposeScope): string {
    const claims = this.tokenCodec.decode(token);
    if (claims.scope !== purpose) {
      throw new InvalidScopeError();
    }
    return claims.subject;
  }

  /** Clear the stored refresh token so no outstanding refresh token works. */
  async revokeSessions(email: string): Promise<void> {
    await this.userStore.setRefreshToken(email, null);
    await this.identityCache.invalidate(email);
  }

  async logout(email: string): Promise<void> {
    await this.revokeSessions(email);
    this.logger.info({ email }, 'Logged out');
  }

  /** Drop the cached copy after the principal changed in the store. */
  async invalidateIdentity(email: string): Promise<void> {
    await this.identityCache.invalidate(email);
  }

  private issuePair(email: string): TokenPair {
    return {
      accessToken: this.tokenCodec.encode(
        { subject: email, scope: 'access' },
        this.ttls.accessToken
      ),
      refreshToken: this.tokenCodec.encode(
        { subject: email, scope: 'refresh' },
        this.ttls.refreshToken
      ),
      tokenType: 'bearer',
    };
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = this.passwordHasher.hash(randomUUID()).catch((err: unknown) => {
        this.dummyHash = undefined;
        throw err;
      });
    }
    return this.dummyHash;
  }
}
