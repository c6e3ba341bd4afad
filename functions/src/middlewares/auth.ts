import { Request, Response, NextFunction } from 'express';
import * as functions from 'firebase-functions';
import { getTokenService, TokenError } from '../services/tokenService';
import { setUser } from '../utils/sentry';

export interface AuthenticatedUser {
  uid: string;
  email: string | null;
}

export interface AuthRequest extends Request {
  user?: AuthenticatedUser;
}

export function readBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return null;
  }
  const token = authHeader.slice('Bearer '.length).trim();
  return token.length > 0 ? token : null;
}

/**
 * Middleware to verify the session JWT issued by /auth/apple
 */
export async function requireAuth(
  req: AuthRequest,
  res: Response,
  next: NextFunction
): Promise<void> {
  const token = readBearerToken(req);

  if (!token) {
    res.status(401).json({
      code: 'unauthorized',
      message: 'Missing or invalid authorization header',
    });
    return;
  }

  try {
    const claims = getTokenService().verify(token);
    req.user = { uid: claims.uid, email: claims.email };
    setUser(claims.uid);
    next();
  } catch (error) {
    const reason = error instanceof TokenError ? error.code : 'token_invalid';
    functions.logger.warn(`[auth] Rejected token: ${reason}`);
    res.status(401).json({
      code: 'unauthorized',
      message: reason === 'token_expired' ? 'Token has expired' : 'Invalid or expired token',
    });
  }
}

/**
 * Attaches the user when a valid token is present; anonymous requests pass through.
 */
export async function optionalAuth(
  req: AuthRequest,
  _res: Response,
  next: NextFunction
): Promise<void> {
  const token = readBearerToken(req);
  if (token) {
    try {
      const claims = getTokenService().verify(token);
      req.user = { uid: claims.uid, email: claims.email };
    } catch {
      functions.logger.info('[auth] Ignoring invalid token on optional-auth route');
    }
  }
  next();
}
