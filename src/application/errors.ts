/**
 * Application-level errors for HTTP layer mapping.
 * Authentication failures are domain errors (see domain/auth/errors.ts);
 * these cover the account flows around them.
 */
export class ConflictError extends Error {
  constructor(message = 'Conflict') {
    super(message);
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * An emailed token (verification or password reset) could not be used.
 * Mapped to 422 rather than 401: the caller is not authenticating.
 */
export class InvalidEmailTokenError extends Error {
  constructor(message = 'Invalid token for email verification') {
    super(message);
    this.name = 'InvalidEmailTokenError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
