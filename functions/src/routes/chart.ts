import { randomUUID } from 'crypto';
import { Router } from 'express';
import { z } from 'zod';
import { computeAspects } from '../services/astro/aspects';
import { ChartPositions, getEphemerisService } from '../services/astro/ephemeris';
import { toNamedPositions } from '../services/astro/planetEntries';
import { sendRouteError } from '../middlewares/errorHandler';
import { parseBirthData, parseDateOnly } from '../utils/birthData';

export const chartRouter = Router();

const generateChartSchema = z.object({
  chartType: z.string().min(1).max(40).optional(),
});

const aspectsFor = (chart: ChartPositions) =>
  computeAspects(chart.bodies.map((body) => ({ id: body.id, longitude: body.longitude })));

/**
 * POST /v1/chart/generate
 * Western and vedic positions for a birth moment plus the western aspects
 */
chartRouter.post('/generate', (req, res) => {
  try {
    const { chartType } = generateChartSchema.parse(req.body ?? {});
    const birth = parseBirthData(req.body, { key: 'birthData', requireCoords: true });
    const location = { latitude: birth.latitude ?? undefined, longitude: birth.longitude ?? undefined };

    const ephemeris = getEphemerisService();
    const western = ephemeris.getPositions(birth.instant, { ...location, system: 'western' });
    const vedic = ephemeris.getPositions(birth.instant, { ...location, system: 'vedic' });

    res.json({
      chartId: randomUUID(),
      charts: {
        western: { positions: toNamedPositions(western) },
        vedic: { positions: toNamedPositions(vedic) },
      },
      type: chartType ?? 'natal',
      aspects: aspectsFor(western),
    });
  } catch (error) {
    sendRouteError(res, error, { tag: 'chart', message: 'Failed to generate chart' });
  }
});

/**
 * GET /v1/chart/aspects?date=YYYY-MM-DD
 * Aspects between the planets at UTC midnight of the date
 */
chartRouter.get('/aspects', (req, res) => {
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

    res.json(aspectsFor(getEphemerisService().getPositions(date)));
  } catch (error) {
    sendRouteError(res, error, { tag: 'chart', message: 'Failed to compute aspects' });
  }
});

/**
 * POST /v1/chart/aspects
 * Aspects for a birth moment; without birth details, for the current sky
 */
chartRouter.post('/aspects', (req, res) => {
  try {
    const body: unknown = req.body;
    const hasBirthDetails =
      typeof body === 'object' && body !== null && ('birthData' in body || 'date' in body);

    const ephemeris = getEphemerisService();
    const chart = hasBirthDetails
      ? ephemeris.getPositions(parseBirthData(body, { requireCoords: false }).instant)
      : ephemeris.getCurrentPositions();

    res.json(aspectsFor(chart));
  } catch (error) {
    sendRouteError(res, error, { tag: 'chart', message: 'Failed to compute aspects' });
  }
});
