import jwt, { type JwtPayload } from 'jsonwebtoken';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  InvalidSignatureError,
  MalformedTokenError,
  TokenExpiredError,
} from './errors.js';

export const TOKEN_ALGORITHMS = ['HS256', 'HS512'] as const;
export type TokenAlgorithm = (typeof TOKEN_ALGORITHMS)[number];

export const TOKEN_SCOPES = ['access', 'refresh', 'email_verification', 'password_reset'] as const;
export type TokenScope = (typeof TOKEN_SCOPES)[number];

/** Scopes of tokens that are mailed to the user for a single action. */
export type SinglePurposeScope = Extract<TokenScope, 'email_verification' | 'password_reset'>;

export interface TokenClaims {
  /** Email of the principal. */
  readonly subject: string;
  readonly scope: TokenScope;
  /** Random id (jti); keeps tokens minted in the same second distinct. */
  readonly tokenId: string;
  /** Seconds since epoch. */
  readonly issuedAt: number;
  /** Seconds since epoch. */
  readonly expiresAt: number;
}

export interface TokenCodecOptions {
  secret: string;
  algorithm: TokenAlgorithm;
  /** Milliseconds since epoch. Defaults to Date.now. */
  now?: () => number;
}

const payloadSchema = z.object({
  sub: z.string().min(1),
  scope: z.enum(TOKEN_SCOPES),
  jti: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
});

/**
 * Signs and verifies compact JWTs with a shared secret.
 *
 * The algorithm is pinned at construction; tokens whose header names any other
 * algorithm fail verification with {@link InvalidSignatureError}.
 */
export class TokenCodec {
  private readonly secret: string;
  private readonly algorithm: TokenAlgorithm;
  private readonly now: () => number;

  constructor(options: TokenCodecOptions) {
    if (!options.secret) {
      throw new Error('Token secret must not be empty');
    }
    if (!TOKEN_ALGORITHMS.includes(options.algorithm)) {
      throw new Error(`Unsupported token algorithm: ${String(options.algorithm)}`);
    }
    this.secret = options.secret;
    this.algorithm = options.algorithm;
    this.now = options.now ?? Date.now;
  }

  encode(claims: Pick<TokenClaims, 'subject' | 'scope'>, ttlSeconds: number): string {
    if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
      throw new RangeError('Token TTL must be a positive number of seconds');
    }

    const issuedAt = this.nowSeconds();
    return jwt.sign(
      {
        sub: claims.subject,
        scope: claims.scope,
        jti: randomUUID(),
        iat: issuedAt,
        exp: issuedAt + Math.ceil(ttlSeconds),
      },
      this.secret,
      { algorithm: this.algorithm }
    );
  }

  /**
   * Verify signature, then expiry, then claim shape.
   * @throws InvalidSignatureError | TokenExpiredError | MalformedTokenError
   */
  decode(token: string): TokenClaims {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.secret, {
        algorithms: [this.algorithm],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (error) {
      throw mapVerifyError(error);
    }

    const parsed = payloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw new MalformedTokenError();
    }

    return {
      subject: parsed.data.sub,
      scope: parsed.data.scope,
      tokenId: parsed.data.jti,
      issuedAt: parsed.data.iat,
      expiresAt: parsed.data.exp,
    };
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }
}

const SIGNATURE_FAILURES = new Set([
  'invalid signature',
  'invalid algorithm',
  'jwt signature is required',
]);

function mapVerifyError(error: unknown): Error {
  // TokenExpiredError and NotBeforeError both extend JsonWebTokenError
  if (error instanceof jwt.TokenExpiredError) {
    return new TokenExpiredError();
  }
  if (error instanceof jwt.JsonWebTokenError) {
    return SIGNATURE_FAILURES.has(error.message)
      ? new InvalidSignatureError()
      : new MalformedTokenError();
  }
  return error instanceof Error ? error : new MalformedTokenError();
}
