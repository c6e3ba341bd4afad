import { Router } from 'express';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import {
  buildCompleteResponse,
  buildPeriodNarrative,
  buildTransitionResponse,
  describeDashaLevel,
  explainDashaCalculation,
  isDashaError,
  toIsoDate,
} from '../services/astro/dashaAssembler';
import { VIMSHOTTARI_SEQUENCE } from '../services/astro/dashaTimeline';
import { getEphemerisService } from '../services/astro/ephemeris';
import { toNamedPositions } from '../services/astro/planetEntries';
import { lordAnnotation } from '../services/astro/zodiac';
import { sendRouteError } from '../middlewares/errorHandler';
import { parseBirthData, parseDateOnly } from '../utils/birthData';

export const astrologyRouter = Router();

export const DISCLAIMER = 'For entertainment purposes only. Not professional advice.';

const FLAG_VALUES = ['1', 'true', 'yes'];

const readFlag = (value: unknown): boolean =>
  typeof value === 'string' && FLAG_VALUES.includes(value.toLowerCase());

const completeDashaSchema = z.object({
  targetDate: z.string().optional(),
  includeTransitions: z.boolean().optional(),
  includeEducation: z.boolean().optional(),
});

/**
 * GET /v1/astrology/positions
 * Current tropical positions keyed by body name
 */
astrologyRouter.get('/positions', (_req, res) => {
  try {
    res.json(toNamedPositions(getEphemerisService().getCurrentPositions()));
  } catch (error) {
    sendRouteError(res, error, { tag: 'astrology', message: 'Failed to get positions' });
  }
});

/**
 * GET /v1/astrology/dashas
 * Active mahadasha and antardasha for a target date
 */
astrologyRouter.get('/dashas', (req, res) => {
  try {
    if (req.query.birth_date === undefined || req.query.target_date === undefined) {
      res.status(400).json({
        code: 'missing_parameters',
        message: 'birth_date and target_date required',
      });
      return;
    }

    const targetDate = parseDateOnly(req.query.target_date);
    if (!targetDate) {
      res.status(400).json({
        code: 'invalid_date',
        message: 'Invalid target_date, use YYYY-MM-DD',
      });
      return;
    }

    const birth = parseBirthData(req.query, { requireCoords: false });
    const moonLongitude = getEphemerisService().getSiderealMoonLongitude(birth.instant);
    const dasha = buildCompleteResponse(birth.instant, moonLongitude, targetDate, false, 0);

    if (isDashaError(dasha)) {
      res.status(400).json({ code: dasha.error, message: dasha.message });
      return;
    }

    const maha = dasha.mahadasha;
    const antar = dasha.antardasha ?? maha;
    const body: Record<string, unknown> = {
      mahadasha: {
        lord: maha.lord,
        start: maha.start,
        end: maha.end,
        annotation: lordAnnotation(maha.lord),
      },
      antardasha: {
        lord: antar.lord,
        start: antar.start,
        end: antar.end,
        annotation: lordAnnotation(antar.lord),
      },
    };

    if (readFlag(req.query.include_boundaries) && dasha.all_antardashas.length > 0) {
      body.boundaries = {
        mahadasha: { lord: maha.lord, start: maha.start, end: maha.end },
        antardasha: dasha.all_antardashas.map((period) => ({
          lord: period.lord,
          start: period.start,
          end: period.end,
          annotation: lordAnnotation(period.lord),
        })),
        breakpoints: dasha.all_antardashas.map((period) => period.start),
      };
    }

    if (readFlag(req.query.debug)) {
      const balance = dasha.starting_dasha.balance_years;
      const wholeYears = Math.trunc(balance);
      body.debug = {
        start_lord: dasha.starting_dasha.lord,
        start_balance_years: balance,
        start_balance_years_int: wholeYears,
        start_balance_months_approx: Math.round((balance - wholeYears) * 12),
        mahadasha_order: VIMSHOTTARI_SEQUENCE.map((entry) => entry.lord),
      };
    }

    body.disclaimer = DISCLAIMER;
    res.json(body);
  } catch (error) {
    sendRouteError(res, error, { tag: 'astrology', message: 'Failed to calculate dasha' });
  }
});

/**
 * POST /v1/astrology/dashas/complete
 * Full dasha breakdown with narrative, optional transitions and education
 */
astrologyRouter.post('/dashas/complete', (req, res) => {
  try {
    const options = completeDashaSchema.parse(req.body ?? {});
    const birth = parseBirthData(req.body, { key: 'birthData', requireCoords: true });

    let targetDate = new Date();
    if (options.targetDate) {
      const parsed = parseDateOnly(options.targetDate);
      if (!parsed) {
        res.status(400).json({
          code: 'invalid_date',
          message: 'Invalid targetDate format, use YYYY-MM-DD',
        });
        return;
      }
      targetDate = parsed;
    }

    if (targetDate.getTime() < birth.instant.getTime()) {
      res.status(400).json({
        code: 'target_before_birth',
        message: 'target_date cannot be before birth_date',
        details: `Birth date is ${toIsoDate(birth.instant)}, but target date is ${toIsoDate(targetDate)}. Dasha periods start from birth.`,
      });
      return;
    }

    const moonLongitude = getEphemerisService().getSiderealMoonLongitude(birth.instant);
    const dasha = buildCompleteResponse(birth.instant, moonLongitude, targetDate, true, 3);

    if (isDashaError(dasha)) {
      res.status(400).json({ code: dasha.error, message: dasha.message });
      return;
    }

    const mahaLord = dasha.mahadasha.lord;
    const antarLord = dasha.antardasha?.lord ?? mahaLord;
    const pratyantarLord = dasha.pratyantardasha?.lord ?? null;

    const body: Record<string, unknown> = {
      dasha,
      current_period: {
        mahadasha: dasha.mahadasha,
        antardasha: dasha.antardasha,
        pratyantardasha: dasha.pratyantardasha,
        narrative: buildPeriodNarrative(mahaLord, antarLord, pratyantarLord),
      },
    };

    if (options.includeTransitions) {
      body.transitions = {
        timing: buildTransitionResponse(birth.instant, moonLongitude, targetDate),
      };
    }

    if (options.includeEducation) {
      body.education = {
        calculation_explanation: explainDashaCalculation(
          moonLongitude,
          dasha.starting_dasha.lord,
          dasha.starting_dasha.balance_years,
        ),
        mahadasha_guide: describeDashaLevel(mahaLord, 'mahadasha'),
        antardasha_guide: describeDashaLevel(antarLord, 'antardasha'),
      };
    }

    body.disclaimer = DISCLAIMER;
    functions.logger.info(`[astrology] Complete dasha for ${toIsoDate(targetDate)}: ${mahaLord}/${antarLord}`);
    res.json(body);
  } catch (error) {
    sendRouteError(res, error, { tag: 'astrology', message: 'Failed to calculate dasha' });
  }
});
