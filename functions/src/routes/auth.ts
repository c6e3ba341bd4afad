import { Router } from 'express';
import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { AuthRequest, readBearerToken, requireAuth } from '../middlewares/auth';
import { sendRouteError } from '../middlewares/errorHandler';
import { authLimiter } from '../middlewares/rateLimit';
import { createDomainServiceContainer } from '../services/domain/serviceContainer';
import type { UserRecord } from '../services/repositories/users/UserRepository';
import { AppleIdentity, getAppleIdentityVerifier, IdentityTokenError } from '../services/appleIdentity';
import { getTokenService, TokenError } from '../services/tokenService';
import { sanitizePlainText } from '../utils/inputSanitization';

export const authRouter = Router();

const getDb = () => admin.firestore();
const getServices = () => createDomainServiceContainer({ db: getDb() });

const appleSignInSchema = z.object({
  identityToken: z.string().min(1),
  userIdentifier: z.string().min(1).max(200),
  email: z.string().email().nullable().optional(),
  firstName: z.string().max(100).nullable().optional(),
  lastName: z.string().max(100).nullable().optional(),
});

const cleanName = (value: string | null | undefined): string | null => {
  if (!value) return null;
  const cleaned = sanitizePlainText(value, 100);
  return cleaned.length > 0 ? cleaned : null;
};

function sessionResponse(user: UserRecord) {
  const issued = getTokenService().issue({ id: user.id, email: user.email });
  return {
    jwtToken: issued.token,
    user,
    expiresAt: issued.expiresAt,
  };
}

/**
 * POST /v1/auth/apple
 * Exchanges a Sign in with Apple credential for an API session token
 */
authRouter.post('/apple', authLimiter, async (req, res) => {
  try {
    const body = appleSignInSchema.parse(req.body ?? {});

    let identity: AppleIdentity;
    try {
      identity = await getAppleIdentityVerifier().verify(body.identityToken);
    } catch (error) {
      if (!(error instanceof IdentityTokenError)) throw error;
      functions.logger.warn(`[auth] ${error.message}`);
      res.status(401).json({
        code: 'invalid_identity_token',
        message: 'Identity token could not be verified',
      });
      return;
    }

    if (identity.subject !== body.userIdentifier) {
      functions.logger.warn('[auth] Identity token subject does not match userIdentifier');
      res.status(401).json({
        code: 'invalid_identity_token',
        message: 'Identity token does not match the user',
      });
      return;
    }

    const userService = getServices().userService;
    const existing = await userService.getById(body.userIdentifier);

    // Apple only sends the name and email on the first sign-in
    const firstName = cleanName(body.firstName) ?? existing?.firstName ?? null;
    const lastName = cleanName(body.lastName) ?? existing?.lastName ?? null;
    const email = body.email ?? identity.email ?? existing?.email ?? null;
    const fullName =
      existing?.fullName ||
      [firstName, lastName].filter(Boolean).join(' ').trim() ||
      email ||
      'User';

    const user = await userService.upsertById(
      body.userIdentifier,
      { email, firstName, lastName, fullName },
      new Date(),
    );

    functions.logger.info(`[auth] Signed in user ${user.id}${existing ? '' : ' (new)'}`);
    res.json(sessionResponse(user));
  } catch (error) {
    sendRouteError(res, error, { tag: 'auth', message: 'Failed to sign in' });
  }
});

/**
 * GET /v1/auth/validate
 */
authRouter.get('/validate', (req, res) => {
  const token = readBearerToken(req);
  if (!token) {
    res.json({ valid: false });
    return;
  }

  try {
    getTokenService().verify(token);
    res.json({ valid: true });
  } catch (error) {
    if (!(error instanceof TokenError)) {
      sendRouteError(res, error, { tag: 'auth', message: 'Failed to validate token' });
      return;
    }
    res.json({ valid: false });
  }
});

/**
 * POST /v1/auth/refresh
 * Issues a fresh token for a valid or recently expired one
 */
authRouter.post('/refresh', authLimiter, async (req, res) => {
  const token = readBearerToken(req);
  if (!token) {
    res.status(401).json({
      code: 'unauthorized',
      message: 'Missing or invalid authorization header',
    });
    return;
  }

  try {
    const claims = getTokenService().verifyForRefresh(token);
    const user = await getServices().userService.getById(claims.uid);

    if (!user) {
      res.status(401).json({
        code: 'unauthorized',
        message: 'User no longer exists',
      });
      return;
    }

    res.json(sessionResponse(user));
  } catch (error) {
    if (error instanceof TokenError) {
      res.status(401).json({
        code: 'unauthorized',
        message: error.message,
      });
      return;
    }
    sendRouteError(res, error, { tag: 'auth', message: 'Failed to refresh token' });
  }
});

/**
 * POST /v1/auth/logout
 * Tokens are stateless; the client drops its copy
 */
authRouter.post('/logout', requireAuth, (req: AuthRequest, res) => {
  functions.logger.info(`[auth] User ${req.user!.uid} signed out`);
  res.json({ status: 'ok' });
});

/**
 * DELETE /v1/auth/delete-account
 * Removes the user's profile and everything they own
 */
authRouter.delete('/delete-account', requireAuth, async (req: AuthRequest, res) => {
  try {
    const userId = req.user!.uid;
    const deleted = await getServices().userService.deleteAccountData(userId);

    functions.logger.info(`[auth] Deleted account ${userId} (${deleted} documents)`);
    res.json({ status: 'ok' });
  } catch (error) {
    sendRouteError(res, error, { tag: 'auth', message: 'Failed to delete account' });
  }
});
