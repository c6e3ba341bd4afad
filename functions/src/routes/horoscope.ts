import { Request, Response, Router } from 'express';
import { HoroscopeType, generateHoroscope, isHoroscopeType } from '../services/astro/horoscope';
import { findSign } from '../services/astro/zodiac';
import { sendRouteError } from '../middlewares/errorHandler';
import { parseDateOnly } from '../utils/birthData';

export const horoscopeRouter = Router();

function respondWithHoroscope(req: Request, res: Response, forcedType?: HoroscopeType): void {
  const signParam = typeof req.query.sign === 'string' ? req.query.sign : 'aries';
  const sign = findSign(signParam);
  if (!sign) {
    res.status(400).json({ code: 'invalid_sign', message: 'Invalid zodiac sign' });
    return;
  }

  const typeParam = typeof req.query.type === 'string' ? req.query.type.toLowerCase() : 'daily';
  const type = forcedType ?? typeParam;
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

  res.json(generateHoroscope(sign.id, date, type));
}

/**
 * GET /v1/horoscope?sign=&type=&date=
 */
horoscopeRouter.get('/', (req, res) => {
  try {
    respondWithHoroscope(req, res);
  } catch (error) {
    sendRouteError(res, error, { tag: 'horoscope', message: 'Failed to generate horoscope' });
  }
});

/**
 * GET /v1/horoscope/daily?sign=&date=
 */
horoscopeRouter.get('/daily', (req, res) => {
  try {
    respondWithHoroscope(req, res, 'daily');
  } catch (error) {
    sendRouteError(res, error, { tag: 'horoscope', message: 'Failed to generate horoscope' });
  }
});
