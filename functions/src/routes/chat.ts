import { Router } from 'express';
import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { AuthRequest, requireAuth } from '../middlewares/auth';
import { sendRouteError } from '../middlewares/errorHandler';
import { getChatService } from '../services/chatService';
import { createDomainServiceContainer } from '../services/domain/serviceContainer';
import { DEFAULT_PAGE_LIMIT } from '../services/repositories/common/pagination';
import { sanitizePlainText } from '../utils/inputSanitization';

export const chatRouter = Router();

const getDb = () => admin.firestore();
const getServices = () => createDomainServiceContainer({ db: getDb() });

const MESSAGE_MAX_LENGTH = 2000;
const MESSAGES_PAGE_LIMIT = 50;

const sendMessageSchema = z.object({
  message: z.string().min(1).max(MESSAGE_MAX_LENGTH * 2),
  conversationId: z.string().min(1).optional(),
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().optional(),
  cursor: z.string().optional(),
});

/**
 * POST /v1/chat
 * Sends a message to the astrologer and stores both sides of the exchange
 */
chatRouter.post('/', requireAuth, async (req: AuthRequest, res) => {
  try {
    const userId = req.user!.uid;
    const body = sendMessageSchema.parse(req.body ?? {});
    const message = sanitizePlainText(body.message, MESSAGE_MAX_LENGTH);

    if (!message) {
      res.status(400).json({
        code: 'validation_failed',
        message: 'Message is empty',
      });
      return;
    }

    const services = getServices();
    const now = new Date();
    const conversation = await services.conversationService.resolveForMessage(
      userId,
      body.conversationId,
      message,
      now,
    );

    if (!conversation) {
      res.status(404).json({
        code: 'not_found',
        message: 'Conversation not found',
      });
      return;
    }

    const [history, profile] = await Promise.all([
      services.conversationService.recentHistory(conversation.id),
      services.userService.getById(userId),
    ]);

    await services.conversationService.appendMessage(conversation.id, 'user', message, now);

    const reply = await getChatService().generateReply({
      message,
      history,
      birthContext: profile
        ? {
            sunSign: profile.sunSign,
            moonSign: profile.moonSign,
            risingSign: profile.risingSign,
            birthDate: profile.birthDate,
          }
        : null,
    });

    const stored = await services.conversationService.appendMessage(
      conversation.id,
      'assistant',
      reply.reply,
      new Date(),
    );

    functions.logger.info(
      `[chat] Replied in conversation ${conversation.id} for user ${userId} (${reply.source})`,
    );

    res.json({
      reply: reply.reply,
      messageId: stored.id,
      conversationId: conversation.id,
      suggestedFollowUps: reply.suggestedFollowUps,
    });
  } catch (error) {
    sendRouteError(res, error, { tag: 'chat', message: 'Failed to send message' });
  }
});

/**
 * GET /v1/chat/conversations
 */
chatRouter.get('/conversations', requireAuth, async (req: AuthRequest, res) => {
  try {
    const userId = req.user!.uid;
    const query = listQuerySchema.parse(req.query);
    const page = await getServices().conversationService.listForUser(userId, {
      limit: query.limit ?? DEFAULT_PAGE_LIMIT,
      cursor: query.cursor,
    });

    if (page.nextCursor) {
      res.set('X-Next-Cursor', page.nextCursor);
    }
    res.json(page.items);
  } catch (error) {
    sendRouteError(res, error, { tag: 'chat', message: 'Failed to fetch conversations' });
  }
});

/**
 * GET /v1/chat/conversations/:id/messages
 * Oldest first, capped to the most recent page
 */
chatRouter.get('/conversations/:id/messages', requireAuth, async (req: AuthRequest, res) => {
  try {
    const userId = req.user!.uid;
    const query = listQuerySchema.parse(req.query);
    const limit = Math.min(Math.max(query.limit ?? MESSAGES_PAGE_LIMIT, 1), MESSAGES_PAGE_LIMIT * 2);

    const messages = await getServices().conversationService.listMessagesForUser(
      userId,
      req.params.id,
      limit,
    );

    if (!messages) {
      res.status(404).json({
        code: 'not_found',
        message: 'Conversation not found',
      });
      return;
    }

    res.json(messages);
  } catch (error) {
    sendRouteError(res, error, { tag: 'chat', message: 'Failed to fetch messages' });
  }
});
