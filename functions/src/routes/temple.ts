import { Router } from 'express';
import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { AuthRequest, requireAuth } from '../middlewares/auth';
import { sendRouteError } from '../middlewares/errorHandler';
import { createDomainServiceContainer } from '../services/domain/serviceContainer';
import { isBookingStatus } from '../services/repositories/templeBookings/TempleBookingRepository';
import { findPoojaType, listPoojaTypes } from '../services/templeCatalog';
import { isValidTimezone, parseDateOnly } from '../utils/birthData';
import { filterContactDetails, sanitizeSharedText } from '../utils/inputSanitization';

export const templeRouter = Router();

const getDb = () => admin.firestore();
const getServices = () => createDomainServiceContainer({ db: getDb() });

const createBookingSchema = z.object({
  poojaTypeId: z.string().min(1),
  scheduledDate: z.string().refine((value) => parseDateOnly(value) !== null, {
    message: 'scheduledDate must be YYYY-MM-DD',
  }),
  scheduledTime: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'scheduledTime must be HH:MM'),
  timezone: z.string().refine(isValidTimezone, 'timezone must be an IANA timezone').optional(),
  sankalp: z
    .object({
      name: z.string().max(200).optional(),
      gotra: z.string().max(200).optional(),
      nakshatra: z.string().max(200).optional(),
    })
    .optional(),
  specialRequests: z.string().max(2000).optional(),
});

function countFilteredContacts(...values: Array<string | undefined>): number {
  return values.reduce(
    (total, value) => total + (value ? filterContactDetails(value).matches.length : 0),
    0,
  );
}

/**
 * GET /v1/temple/poojas
 */
templeRouter.get('/poojas', (_req, res) => {
  res.json({ poojas: listPoojaTypes() });
});

/**
 * GET /v1/temple/poojas/:id
 */
templeRouter.get('/poojas/:id', (req, res) => {
  const pooja = findPoojaType(req.params.id);

  if (!pooja) {
    res.status(404).json({
      code: 'not_found',
      message: 'Pooja not found',
    });
    return;
  }

  res.json(pooja);
});

/**
 * POST /v1/temple/bookings
 * Books a pooja; sankalp details and special requests have contact details removed
 */
templeRouter.post('/bookings', requireAuth, async (req: AuthRequest, res) => {
  try {
    const userId = req.user!.uid;
    const body = createBookingSchema.parse(req.body ?? {});

    const pooja = findPoojaType(body.poojaTypeId);
    if (!pooja) {
      res.status(400).json({
        code: 'invalid_pooja',
        message: 'Invalid pooja type',
      });
      return;
    }

    const filtered = countFilteredContacts(
      body.sankalp?.name,
      body.sankalp?.gotra,
      body.sankalp?.nakshatra,
      body.specialRequests,
    );
    if (filtered > 0) {
      functions.logger.info(`[temple] Removed ${filtered} contact detail(s) from booking input for user ${userId}`);
    }

    const booking = await getServices().templeBookingService.createForUser(
      userId,
      {
        poojaTypeId: pooja.id,
        scheduledDate: body.scheduledDate,
        scheduledTime: body.scheduledTime,
        timezone: body.timezone ?? 'Asia/Kolkata',
        sankalp: {
          name: sanitizeSharedText(body.sankalp?.name, 200),
          gotra: sanitizeSharedText(body.sankalp?.gotra, 200),
          nakshatra: sanitizeSharedText(body.sankalp?.nakshatra, 200),
        },
        specialRequests: sanitizeSharedText(body.specialRequests, 2000),
        amountDue: pooja.basePrice,
      },
      new Date(),
    );

    functions.logger.info(
      `[temple] Booking ${booking.id} created (status=pending, pooja=${pooja.id}) for user ${userId}`,
    );

    res.status(201).json({
      bookingId: booking.id,
      status: booking.status,
      scheduledDate: booking.scheduledDate,
      scheduledTime: booking.scheduledTime,
      amountDue: booking.amountDue,
      message: 'Booking created. Complete payment to confirm.',
    });
  } catch (error) {
    sendRouteError(res, error, { tag: 'temple', message: 'Failed to create booking' });
  }
});

/**
 * GET /v1/temple/bookings[?status=]
 */
templeRouter.get('/bookings', requireAuth, async (req: AuthRequest, res) => {
  try {
    const status = req.query.status;
    if (status !== undefined && !isBookingStatus(status)) {
      res.status(400).json({
        code: 'invalid_status',
        message: 'status must be one of pending, confirmed, cancelled or completed',
      });
      return;
    }

    const bookings = await getServices().templeBookingService.listForUser(req.user!.uid, status);
    res.json({ bookings });
  } catch (error) {
    sendRouteError(res, error, { tag: 'temple', message: 'Failed to fetch bookings' });
  }
});

/**
 * GET /v1/temple/bookings/:id
 */
templeRouter.get('/bookings/:id', requireAuth, async (req: AuthRequest, res) => {
  try {
    const booking = await getServices().templeBookingService.getForUser(req.user!.uid, req.params.id);

    if (!booking) {
      res.status(404).json({
        code: 'not_found',
        message: 'Booking not found',
      });
      return;
    }

    res.json({ ...booking, pooja: findPoojaType(booking.poojaTypeId) });
  } catch (error) {
    sendRouteError(res, error, { tag: 'temple', message: 'Failed to fetch booking' });
  }
});

/**
 * POST /v1/temple/bookings/:id/cancel
 */
templeRouter.post('/bookings/:id/cancel', requireAuth, async (req: AuthRequest, res) => {
  try {
    const result = await getServices().templeBookingService.cancelForUser(
      req.user!.uid,
      req.params.id,
      new Date(),
    );

    if (result.outcome === 'not_found') {
      res.status(404).json({
        code: 'not_found',
        message: 'Booking not found',
      });
      return;
    }

    if (result.outcome === 'invalid_status') {
      res.status(400).json({
        code: 'invalid_status',
        message: `Cannot cancel booking with status: ${result.status}`,
      });
      return;
    }

    functions.logger.info(`[temple] Booking ${result.bookingId} cancelled`);
    res.json({
      bookingId: result.bookingId,
      status: 'cancelled',
      message: 'Booking cancelled',
    });
  } catch (error) {
    sendRouteError(res, error, { tag: 'temple', message: 'Failed to cancel booking' });
  }
});
