import { Router } from 'express';
import * as admin from 'firebase-admin';
import { z } from 'zod';
import { AuthRequest, requireAuth } from '../middlewares/auth';
import { sendRouteError } from '../middlewares/errorHandler';
import { createDomainServiceContainer } from '../services/domain/serviceContainer';
import { DEFAULT_PAGE_LIMIT } from '../services/repositories/common/pagination';
import { sanitizePlainText } from '../utils/inputSanitization';

export const bookmarksRouter = Router();

const getDb = () => admin.firestore();
const getServices = () => createDomainServiceContainer({ db: getDb() });

const createBookmarkSchema = z.object({
  readingDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'readingDate must be YYYY-MM-DD'),
  type: z.string().min(1).max(40),
  title: z.string().min(1).max(200),
  content: z.string().min(1).max(10000),
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().optional(),
  cursor: z.string().optional(),
});

/**
 * GET /v1/bookmarks
 */
bookmarksRouter.get('/', requireAuth, async (req: AuthRequest, res) => {
  try {
    const query = listQuerySchema.parse(req.query);
    const page = await getServices().bookmarkService.listForUser(req.user!.uid, {
      limit: query.limit ?? DEFAULT_PAGE_LIMIT,
      cursor: query.cursor,
    });

    if (page.nextCursor) {
      res.set('X-Next-Cursor', page.nextCursor);
    }
    res.json(page.items);
  } catch (error) {
    sendRouteError(res, error, { tag: 'bookmarks', message: 'Failed to fetch bookmarks' });
  }
});

/**
 * POST /v1/bookmarks
 */
bookmarksRouter.post('/', requireAuth, async (req: AuthRequest, res) => {
  try {
    const body = createBookmarkSchema.parse(req.body ?? {});
    const bookmark = await getServices().bookmarkService.createForUser(
      req.user!.uid,
      {
        readingDate: body.readingDate,
        type: sanitizePlainText(body.type, 40),
        title: sanitizePlainText(body.title, 200),
        content: sanitizePlainText(body.content),
      },
      new Date(),
    );

    res.status(201).json(bookmark);
  } catch (error) {
    sendRouteError(res, error, { tag: 'bookmarks', message: 'Failed to save bookmark' });
  }
});

/**
 * DELETE /v1/bookmarks/:id
 */
bookmarksRouter.delete('/:id', requireAuth, async (req: AuthRequest, res) => {
  try {
    const deleted = await getServices().bookmarkService.deleteForUser(req.user!.uid, req.params.id);

    if (!deleted) {
      res.status(404).json({
        code: 'not_found',
        message: 'Bookmark not found',
      });
      return;
    }

    res.status(204).send();
  } catch (error) {
    sendRouteError(res, error, { tag: 'bookmarks', message: 'Failed to delete bookmark' });
  }
});
