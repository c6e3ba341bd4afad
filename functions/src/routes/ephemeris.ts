import { Router } from 'express';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { getEphemerisService } from '../services/astro/ephemeris';
import { toPlanetEntries } from '../services/astro/planetEntries';
import { normalizeSystem } from '../services/astro/zodiac';
import { sendRouteError } from '../middlewares/errorHandler';
import { parseDateOnly } from '../utils/birthData';

export const ephemerisRouter = Router();

export const locationQuerySchema = z.object({
  lat: z.coerce.number().min(-90).max(90).optional(),
  lon: z.coerce.number().min(-180).max(180).optional(),
  system: z.string().optional(),
});

/**
 * GET /v1/ephemeris/current
 * Planet positions right now; houses and the ascendant when lat and lon are given
 */
ephemerisRouter.get('/current', (req, res) => {
  try {
    const query = locationQuerySchema.parse(req.query);
    const chart = getEphemerisService().getCurrentPositions({
      latitude: query.lat,
      longitude: query.lon,
      system: normalizeSystem(query.system),
    });

    res.json({
      planets: toPlanetEntries(chart),
      timestamp: chart.timestamp,
      has_rising_sign: query.lat !== undefined && query.lon !== undefined,
    });
  } catch (error) {
    sendRouteError(res, error, { tag: 'ephemeris', message: 'Failed to get current positions' });
  }
});

/**
 * GET /v1/ephemeris/at?date=YYYY-MM-DD
 * Planet positions at UTC midnight of the given date
 */
ephemerisRouter.get('/at', (req, res) => {
  try {
    if (req.query.date === undefined) {
      res.status(400).json({
        code: 'missing_date',
        message: 'date parameter required (YYYY-MM-DD)',
      });
      return;
    }

    const date = parseDateOnly(req.query.date);
    if (!date) {
      res.status(400).json({
        code: 'invalid_date',
        message: 'Invalid date format, use YYYY-MM-DD',
      });
      return;
    }

    const query = locationQuerySchema.parse(req.query);
    const chart = getEphemerisService().getPositions(date, {
      latitude: query.lat,
      longitude: query.lon,
      system: normalizeSystem(query.system),
    });

    functions.logger.debug(`[ephemeris] Positions for ${chart.timestamp} (${chart.system})`);

    res.json({
      planets: toPlanetEntries(chart),
      timestamp: chart.timestamp,
      has_rising_sign: query.lat !== undefined && query.lon !== undefined,
    });
  } catch (error) {
    sendRouteError(res, error, { tag: 'ephemeris', message: 'Failed to get positions' });
  }
});
