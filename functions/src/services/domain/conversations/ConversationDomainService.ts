import type { ChatHistoryEntry, ChatRole } from '../../chatService';
import type { CursorPageRequest } from '../../repositories/common/pagination';
import type {
  ConversationRecord,
  ConversationRepository,
  MessageRecord,
} from '../../repositories/conversations/ConversationRepository';

const TITLE_MAX_LENGTH = 60;
const HISTORY_LIMIT = 10;

export function conversationTitleFor(message: string): string {
  const firstLine = message.split('\n')[0].trim();
  if (firstLine.length <= TITLE_MAX_LENGTH) {
    return firstLine || 'New conversation';
  }
  return `${firstLine.slice(0, TITLE_MAX_LENGTH - 3).trimEnd()}...`;
}

export class ConversationDomainService {
  constructor(private readonly conversationRepository: ConversationRepository) {}

  async getForUser(userId: string, conversationId: string): Promise<ConversationRecord | null> {
    const conversation = await this.conversationRepository.getById(conversationId);

    if (!conversation || conversation.userId !== userId) {
      return null;
    }

    return conversation;
  }

  /**
   * Returns the user's conversation, or starts a new one titled after the
   * first message when no id is given. Null when the id is not the user's.
   */
  async resolveForMessage(
    userId: string,
    conversationId: string | undefined,
    message: string,
    now: Date,
  ): Promise<ConversationRecord | null> {
    if (conversationId) {
      return this.getForUser(userId, conversationId);
    }
    return this.conversationRepository.create(userId, conversationTitleFor(message), now);
  }

  async listForUser(userId: string, options: CursorPageRequest) {
    return this.conversationRepository.listByUser(userId, options);
  }

  async listMessagesForUser(
    userId: string,
    conversationId: string,
    limit: number,
  ): Promise<MessageRecord[] | null> {
    const conversation = await this.getForUser(userId, conversationId);
    if (!conversation) {
      return null;
    }
    return this.conversationRepository.listRecentMessages(conversationId, limit);
  }

  async recentHistory(conversationId: string): Promise<ChatHistoryEntry[]> {
    const messages = await this.conversationRepository.listRecentMessages(
      conversationId,
      HISTORY_LIMIT,
    );
    return messages.map((message) => ({ role: message.role, content: message.content }));
  }

  async appendMessage(
    conversationId: string,
    role: ChatRole,
    content: string,
    now: Date,
  ): Promise<MessageRecord> {
    return this.conversationRepository.appendMessage(conversationId, { role, content }, now);
  }
}
