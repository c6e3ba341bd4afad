import { Router } from 'express';
import { isHoroscopeType } from '../services/astro/horoscope';
import { getDiscoverService } from '../services/discoverService';
import { sendRouteError } from '../middlewares/errorHandler';
import { parseDateOnly } from '../utils/birthData';

export const discoverRouter = Router();

/**
 * GET /v1/discover/snapshot?sign=&date=
 * The daily check-in payload; clients cache it until cacheHints.nextRefresh
 */
discoverRouter.get('/snapshot', (req, res) => {
  try {
    const sign = typeof req.query.sign === 'string' ? req.query.sign : 'aries';
    const type = typeof req.query.type === 'string' ? req.query.type.toLowerCase() : 'daily';

    if (!isHoroscopeType(type)) {
      res.status(400).json({
        code: 'invalid_type',
        message: 'type must be one of daily, weekly or monthly',
      });
      return;
    }

    let date = new Date();
    if (req.query.date !== undefined) {
      const parsed = parseDateOnly(req.query.date);
      if (!parsed) {
        res.status(400).json({ code: 'invalid_date', message: 'Invalid date format, use YYYY-MM-DD' });
        return;
      }
      date = parsed;
    }

    const snapshot = getDiscoverService().buildSnapshot(sign, date, type);
    if (!snapshot) {
      res.status(400).json({ code: 'invalid_sign', message: 'Invalid zodiac sign' });
      return;
    }

    res.set('Cache-Control', `public, max-age=${snapshot.cacheHints.ttlSeconds}`);
    res.json(snapshot);
  } catch (error) {
    sendRouteError(res, error, { tag: 'discover', message: 'Failed to build snapshot' });
  }
});
