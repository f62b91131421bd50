import type { Request, RequestHandler } from 'express';
import { AuthService } from '../../../application/auth/authService.js';
import { MalformedTokenError, UnknownPrincipalError } from '../../../domain/auth/errors.js';
import { Principal } from '../../../domain/auth/principal.js';
import { asyncHandler } from './asyncHandler.js';

export interface AuthRequest extends Request {
  principal?: Principal;
}

/**
 * Pull the token out of `Authorization: Bearer <token>`.
 */
export function extractBearerToken(header: string | undefined): string {
  const match = header?.match(/^Bearer\s+(\S+)\s*$/i);
  if (!match) {
    throw new MalformedTokenError('Missing or invalid authorization header');
  }
  return match[1];
}

/**
 * Resolve the access token into `req.principal`. Failures reach the error handler as 401.
 */
export function authMiddleware(authService: AuthService): RequestHandler {
  return asyncHandler(async (req: AuthRequest, _res, next) => {
    const token = extractBearerToken(req.headers.authorization);
    req.principal = await authService.resolvePrincipal(token);
    next();
  });
}

/** The principal `authMiddleware` attached; only valid on routes mounted behind it. */
export function requirePrincipal(req: AuthRequest): Principal {
  if (!req.principal) {
    throw new UnknownPrincipalError();
  }
  return req.principal;
}
