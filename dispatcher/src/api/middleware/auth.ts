import { createHash, timingSafeEqual } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';
import { APIError } from './error.js';

const BEARER = /^Bearer\s+(\S+)$/i;

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Constant-time comparison of a presented secret against the accepted ones
 */
export function secretMatches(presented: string | undefined, accepted: readonly string[]): boolean {
  if (presented === undefined) {
    return false;
  }
  const candidate = digest(presented);
  return accepted.some(secret => timingSafeEqual(candidate, digest(secret)));
}

/**
 * Bearer-token guard for /api
 *
 * An empty or missing token list disables authentication.
 */
export function createAuthMiddleware(authTokens: readonly string[] = []) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (authTokens.length === 0) {
      next();
      return;
    }

    const header = req.get('Authorization');
    if (!header) {
      next(new APIError(401, 'Missing Authorization header'));
      return;
    }

    const token = BEARER.exec(header)?.[1];
    if (token === undefined) {
      next(new APIError(401, 'Invalid Authorization header format. Expected: Bearer <token>'));
      return;
    }

    if (!secretMatches(token, authTokens)) {
      next(new APIError(401, 'Invalid authentication token'));
      return;
    }

    next();
  };
}
