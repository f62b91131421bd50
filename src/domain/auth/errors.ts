export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type AuthErrorCode =
  | 'INVALID_CREDENTIALS'
  | 'INVALID_SCOPE'
  | 'TOKEN_EXPIRED'
  | 'INVALID_SIGNATURE'
  | 'MALFORMED_TOKEN'
  | 'REVOKED_TOKEN'
  | 'UNKNOWN_PRINCIPAL';

/**
 * Base class for every authentication failure.
 * The HTTP layer maps all of them to 401.
 */
export abstract class AuthError extends DomainError {
  abstract readonly code: AuthErrorCode;
}

/**
 * Unknown email and wrong password share this error and message.
 */
export class InvalidCredentialsError extends AuthError {
  readonly code = 'INVALID_CREDENTIALS';

  constructor(message = 'Invalid email or password') {
    super(message);
  }
}

export class InvalidScopeError extends AuthError {
  readonly code = 'INVALID_SCOPE';

  constructor(message = 'Invalid scope for token') {
    super(message);
  }
}

export class TokenExpiredError extends AuthError {
  readonly code = 'TOKEN_EXPIRED';

  constructor(message = 'Token has expired') {
    super(message);
  }
}

export class InvalidSignatureError extends AuthError {
  readonly code = 'INVALID_SIGNATURE';

  constructor(message = 'Could not validate credentials') {
    super(message);
  }
}

export class MalformedTokenError extends AuthError {
  readonly code = 'MALFORMED_TOKEN';

  constructor(message = 'Malformed token') {
    super(message);
  }
}

export class RevokedTokenError extends AuthError {
  readonly code = 'REVOKED_TOKEN';

  constructor(message = 'Invalid refresh token') {
    super(message);
  }
}

export class UnknownPrincipalError extends AuthError {
  readonly code = 'UNKNOWN_PRINCIPAL';

  constructor(message = 'Could not validate credentials') {
    super(message);
  }
}
