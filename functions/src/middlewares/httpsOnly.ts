import { Request, Response, NextFunction, RequestHandler } from 'express';
import * as functions from 'firebase-functions';
import { securityConfig } from '../config';

export type HttpsGuardOptions = {
  enforce: boolean;
  /** Paths answered over plain http, e.g. load balancer health checks. */
  exemptPaths?: readonly string[];
};

/**
 * Cloud Functions terminates TLS in front of the app and reports the client
 * scheme in `x-forwarded-proto`; the emulator does not set it.
 */
export function createHttpsGuard(options: HttpsGuardOptions): RequestHandler {
  const exemptPaths = new Set(options.exemptPaths ?? []);

  return (req: Request, res: Response, next: NextFunction) => {
    if (!options.enforce || exemptPaths.has(req.path) || req.headers['x-forwarded-proto'] === 'https') {
      next();
      return;
    }

    functions.logger.warn(`[https] Rejected plain http request to ${req.method} ${req.path}`);
    res.status(403).json({
      code: 'https_required',
      message: 'HTTPS is required',
    });
  };
}

export const requireHttps = createHttpsGuard({
  enforce: securityConfig.enforceHttps,
  exemptPaths: ['/api/v1/health'],
});
