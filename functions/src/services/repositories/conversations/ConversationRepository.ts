import type { ChatRole } from '../../chatService';
import type { CursorPageRequest, CursorPageResult } from '../common/pagination';

export type ConversationRecord = {
  id: string;
  userId: string;
  title: string;
  lastMessageAt: string | null;
  createdAt: string | null;
};

export type MessageRecord = {
  id: string;
  conversationId: string;
  role: ChatRole;
  content: string;
  createdAt: string | null;
};

export interface ConversationRepository {
  create(userId: string, title: string, now: Date): Promise<ConversationRecord>;
  getById(conversationId: string): Promise<ConversationRecord | null>;
  listByUser(
    userId: string,
    options: CursorPageRequest,
  ): Promise<CursorPageResult<ConversationRecord>>;
  /** Stores a message and moves the conversation's `lastMessageAt`. */
  appendMessage(
    conversationId: string,
    message: { role: ChatRole; content: string },
    now: Date,
  ): Promise<MessageRecord>;
  /** The most recent `limit` messages, oldest first. */
  listRecentMessages(conversationId: string, limit: number): Promise<MessageRecord[]>;
}
