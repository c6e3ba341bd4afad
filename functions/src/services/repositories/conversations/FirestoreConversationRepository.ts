import type { ChatRole } from '../../chatService';
import { readString, readTimestamp } from '../common/fields';
import {
  CursorPageRequest,
  CursorPageResult,
  normalizeLimit,
  normalizeSortDirection,
  toCursorPage,
  startAfterCursor,
} from '../common/pagination';
import type {
  ConversationRecord,
  ConversationRepository,
  MessageRecord,
} from './ConversationRepository';

function mapConversationData(id: string, data: FirebaseFirestore.DocumentData): ConversationRecord {
  return {
    id,
    userId: readString(data, 'userId') ?? '',
    title: readString(data, 'title') ?? '',
    lastMessageAt: readTimestamp(data, 'lastMessageAt'),
    createdAt: readTimestamp(data, 'createdAt'),
  };
}

function readRole(data: FirebaseFirestore.DocumentData): ChatRole {
  return data.role === 'assistant' ? 'assistant' : 'user';
}

export class FirestoreConversationRepository implements ConversationRepository {
  constructor(private readonly db: FirebaseFirestore.Firestore) {}

  private messages(conversationId: string): FirebaseFirestore.CollectionReference {
    return this.db.collection('conversations').doc(conversationId).collection('messages');
  }

  async create(userId: string, title: string, now: Date): Promise<ConversationRecord> {
    const docRef = await this.db.collection('conversations').add({
      userId,
      title,
      lastMessageAt: now,
      createdAt: now,
    });

    return {
      id: docRef.id,
      userId,
      title,
      lastMessageAt: now.toISOString(),
      createdAt: now.toISOString(),
    };
  }

  async getById(conversationId: string): Promise<ConversationRecord | null> {
    const doc = await this.db.collection('conversations').doc(conversationId).get();
    if (!doc.exists) {
      return null;
    }
    return mapConversationData(doc.id, doc.data() ?? {});
  }

  async listByUser(
    userId: string,
    options: CursorPageRequest,
  ): Promise<CursorPageResult<ConversationRecord>> {
    const limit = normalizeLimit(options.limit);
    let query = this.db
      .collection('conversations')
      .where('userId', '==', userId)
      .orderBy('lastMessageAt', normalizeSortDirection(options.sortDirection))
      .limit(limit + 1);

    query = await startAfterCursor(query, this.db.collection('conversations'), options.cursor, userId);

    const snapshot = await query.get();
    return toCursorPage(snapshot.docs, limit, (doc) => mapConversationData(doc.id, doc.data()));
  }

  async appendMessage(
    conversationId: string,
    message: { role: ChatRole; content: string },
    now: Date,
  ): Promise<MessageRecord> {
    const docRef = await this.messages(conversationId).add({
      role: message.role,
      content: message.content,
      createdAt: now,
    });
    await this.db
      .collection('conversations')
      .doc(conversationId)
      .set({ lastMessageAt: now }, { merge: true });

    return {
      id: docRef.id,
      conversationId,
      role: message.role,
      content: message.content,
      createdAt: now.toISOString(),
    };
  }

  async listRecentMessages(conversationId: string, limit: number): Promise<MessageRecord[]> {
    const snapshot = await this.messages(conversationId)
      .orderBy('createdAt', 'desc')
      .limit(normalizeLimit(limit))
      .get();

    return snapshot.docs
      .map((doc) => {
        const data = doc.data();
        return {
          id: doc.id,
          conversationId,
          role: readRole(data),
          content: readString(data, 'content') ?? '',
          createdAt: readTimestamp(data, 'createdAt'),
        };
      })
      .reverse();
  }
}
