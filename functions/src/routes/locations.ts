import { Router } from 'express';
import { z } from 'zod';
import { searchLocations } from '../services/locationService';
import { sendRouteError } from '../middlewares/errorHandler';

export const locationsRouter = Router();

const searchQuerySchema = z.object({
  q: z.string().max(100).optional(),
  limit: z.coerce.number().int().optional(),
});

/**
 * GET /v1/location/search?q=&limit=
 */
locationsRouter.get('/search', (req, res) => {
  try {
    const query = searchQuerySchema.parse(req.query);
    res.json({ locations: searchLocations(query.q ?? '', query.limit) });
  } catch (error) {
    sendRouteError(res, error, { tag: 'location', message: 'Failed to search locations' });
  }
});
