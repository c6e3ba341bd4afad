import { Router } from 'express';
import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { AuthRequest, optionalAuth, requireAuth } from '../middlewares/auth';
import { sendRouteError } from '../middlewares/errorHandler';
import { compare } from '../services/astro/matchService';
import { createDomainServiceContainer } from '../services/domain/serviceContainer';
import { DEFAULT_PAGE_LIMIT } from '../services/repositories/common/pagination';
import { parseBirthData } from '../utils/birthData';
import { sanitizePlainText } from '../utils/inputSanitization';

export const matchRouter = Router();

const getDb = () => admin.firestore();
const getServices = () => createDomainServiceContainer({ db: getDb() });

const birthDetailsSchema = z
  .object({
    date: z.string().optional(),
    birthDate: z.string().optional(),
    time: z.string().optional(),
    birthTime: z.string().optional(),
    timezone: z.string().optional(),
    latitude: z.number().optional(),
    longitude: z.number().optional(),
  })
  .passthrough();

const matchRequestSchema = z.object({
  user: birthDetailsSchema.optional(),
  partner: birthDetailsSchema.extend({
    name: z.string().min(1).max(100),
  }),
  save: z.boolean().optional(),
});

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().optional(),
  cursor: z.string().optional(),
});

/**
 * POST /v1/match
 * Scores two birth moments; `save: true` stores the result for the signed-in user
 */
matchRouter.post('/', optionalAuth, async (req: AuthRequest, res) => {
  try {
    const body = matchRequestSchema.parse(req.body ?? {});
    const userId = req.user?.uid ?? null;

    if (body.save && !userId) {
      res.status(401).json({
        code: 'unauthorized',
        message: 'Sign in to save matches',
      });
      return;
    }

    let myDetails: unknown = body.user;
    if (!myDetails && userId) {
      const profile = await getServices().userService.getById(userId);
      if (profile?.birthDate) {
        myDetails = {
          date: profile.birthDate,
          time: profile.birthTime ?? undefined,
          timezone: profile.timezone ?? undefined,
        };
      }
    }
    if (!myDetails) {
      res.status(400).json({
        code: 'missing_birth_data',
        message: 'Your birth details are required',
      });
      return;
    }

    const mine = parseBirthData({ birthData: myDetails }, { requireCoords: false });
    const partner = parseBirthData({ birthData: body.partner }, { requireCoords: false });
    const partnerName = sanitizePlainText(body.partner.name, 100) || 'Partner';

    const result = compare(mine.instant, partner.instant, partnerName, partner.date);

    if (body.save && userId) {
      const saved = await getServices().matchService.saveForUser(userId, result);
      functions.logger.info(`[match] Saved match ${saved.id} for user ${userId}`);
      res.status(201).json(saved);
      return;
    }

    res.json(result);
  } catch (error) {
    sendRouteError(res, error, { tag: 'match', message: 'Failed to compute match' });
  }
});

/**
 * GET /v1/match/history
 */
matchRouter.get('/history', requireAuth, async (req: AuthRequest, res) => {
  try {
    const userId = req.user!.uid;
    const query = historyQuerySchema.parse(req.query);
    const page = await getServices().matchService.listForUser(userId, {
      limit: query.limit ?? DEFAULT_PAGE_LIMIT,
      cursor: query.cursor,
    });

    if (page.nextCursor) {
      res.set('X-Next-Cursor', page.nextCursor);
    }
    res.json(page.items);
  } catch (error) {
    sendRouteError(res, error, { tag: 'match', message: 'Failed to fetch match history' });
  }
});

/**
 * DELETE /v1/match/:id
 */
matchRouter.delete('/:id', requireAuth, async (req: AuthRequest, res) => {
  try {
    const userId = req.user!.uid;
    const deleted = await getServices().matchService.deleteForUser(userId, req.params.id);

    if (!deleted) {
      res.status(404).json({
        code: 'not_found',
        message: 'Match not found',
      });
      return;
    }

    res.status(204).send();
  } catch (error) {
    sendRouteError(res, error, { tag: 'match', message: 'Failed to delete match' });
  }
});
