import type { Request } from 'express';
import type { AuthService } from '../../../application/auth/authService.js';
import { InvalidTokenError } from '../../../application/errors.js';
import type { Profile } from '../../../domain/auth/user.js';
import { asyncHandler } from './asyncHandler.js';

export interface AuthRequest extends Request {
  profile?: Profile;
}

const BEARER_PREFIX = /^Bearer\s+(\S+)$/i;

/**
 * Token from an `Authorization: Bearer <token>` header, or null.
 */
export function bearerToken(header: string | undefined): string | null {
  const match = header?.trim().match(BEARER_PREFIX);
  return match ? match[1] : null;
}

/**
 * Resolve the bearer token to a profile and attach it as `req.profile`.
 */
export function authMiddleware(authService: AuthService) {
  return asyncHandler(async (req: AuthRequest, _res, next) => {
    const token = bearerToken(req.headers.authorization);
    if (token === null) {
      throw new InvalidTokenError('Missing or invalid authorization header');
    }

    req.profile = await authService.resolveProfile(token);
    next();
  });
}
