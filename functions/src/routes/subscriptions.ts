import { Router } from 'express';
import * as admin from 'firebase-admin';
import { AuthRequest, requireAuth } from '../middlewares/auth';
import { sendRouteError } from '../middlewares/errorHandler';
import { createDomainServiceContainer } from '../services/domain/serviceContainer';

export const subscriptionsRouter = Router();

const getDb = () => admin.firestore();
const getServices = () => createDomainServiceContainer({ db: getDb() });

/**
 * GET /v1/subscription/status
 */
subscriptionsRouter.get('/status', requireAuth, async (req: AuthRequest, res) => {
  try {
    const status = await getServices().userService.getSubscriptionStatus(req.user!.uid, new Date());
    res.json(status);
  } catch (error) {
    sendRouteError(res, error, { tag: 'subscription', message: 'Failed to fetch subscription status' });
  }
});
