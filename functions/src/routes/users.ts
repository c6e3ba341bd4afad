import { Router } from 'express';
import * as admin from 'firebase-admin';
import { z } from 'zod';
import { AuthRequest, requireAuth } from '../middlewares/auth';
import { sendRouteError } from '../middlewares/errorHandler';
import { createDomainServiceContainer } from '../services/domain/serviceContainer';
import type { UserProfileUpdate } from '../services/repositories/users/UserRepository';
import { isValidTimezone } from '../utils/birthData';
import { sanitizePlainText } from '../utils/inputSanitization';

export const usersRouter = Router();

const getDb = () => admin.firestore();
const getServices = () => createDomainServiceContainer({ db: getDb() });

const optionalText = (max: number) =>
  z
    .string()
    .max(max)
    .nullable()
    .optional()
    .transform((value) => (typeof value === 'string' ? sanitizePlainText(value, max) || null : value));

const updateProfileSchema = z
  .object({
    fullName: optionalText(200),
    firstName: optionalText(100),
    lastName: optionalText(100),
    email: z.string().email().nullable().optional(),
    birthDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'birthDate must be YYYY-MM-DD').nullable().optional(),
    birthTime: z.string().regex(/^\d{1,2}:\d{2}$/, 'birthTime must be HH:MM').nullable().optional(),
    birthPlace: optionalText(200),
    birthLatitude: z.number().min(-90).max(90).nullable().optional(),
    birthLongitude: z.number().min(-180).max(180).nullable().optional(),
    timezone: z
      .string()
      .refine(isValidTimezone, 'timezone must be an IANA timezone')
      .nullable()
      .optional(),
  })
  .strict();

/**
 * GET /v1/users/me
 */
usersRouter.get('/me', requireAuth, async (req: AuthRequest, res) => {
  try {
    const userId = req.user!.uid;
    const user = await getServices().userService.getById(userId);

    if (!user) {
      res.status(404).json({
        code: 'not_found',
        message: 'User profile not found',
      });
      return;
    }

    res.json(user);
  } catch (error) {
    sendRouteError(res, error, { tag: 'users', message: 'Failed to fetch profile' });
  }
});

/**
 * PATCH /v1/users/me
 * Updates profile fields; sun, moon and rising signs are recomputed
 */
usersRouter.patch('/me', requireAuth, async (req: AuthRequest, res) => {
  try {
    const userId = req.user!.uid;
    const updates: UserProfileUpdate = updateProfileSchema.parse(req.body ?? {});
    const user = await getServices().userService.updateProfile(userId, updates, new Date());
    res.json(user);
  } catch (error) {
    sendRouteError(res, error, { tag: 'users', message: 'Failed to update profile' });
  }
});
