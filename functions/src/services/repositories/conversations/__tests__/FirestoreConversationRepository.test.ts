import { InvalidCursorError } from '../../common/pagination';
import { InMemoryFirestore } from '../../__tests__/inMemoryFirestore';
import { FirestoreConversationRepository } from '../FirestoreConversationRepository';

describe('FirestoreConversationRepository', () => {
  it('creates a conversation and appends messages', async () => {
    const harness = new InMemoryFirestore();
    const repository = new FirestoreConversationRepository(harness.asFirestore());

    const conversation = await repository.create('user-1', 'Career questions', new Date('2024-01-01T00:00:00Z'));
    const message = await repository.appendMessage(
      conversation.id,
      { role: 'user', content: 'What about my job?' },
      new Date('2024-01-02T00:00:00Z'),
    );

    expect(conversation).toEqual({
      id: 'conversations-1',
      userId: 'user-1',
      title: 'Career questions',
      lastMessageAt: '2024-01-01T00:00:00.000Z',
      createdAt: '2024-01-01T00:00:00.000Z',
    });
    expect(message).toEqual({
      id: 'messages-2',
      conversationId: 'conversations-1',
      role: 'user',
      content: 'What about my job?',
      createdAt: '2024-01-02T00:00:00.000Z',
    });
    await expect(repository.getById('conversations-1')).resolves.toMatchObject({
      lastMessageAt: '2024-01-02T00:00:00.000Z',
    });
  });

  it('returns the latest messages oldest first', async () => {
    const harness = new InMemoryFirestore();
    ['a', 'b', 'c', 'd'].forEach((id, index) => {
      harness.seed(`conversations/conv-1/messages/${id}`, {
        role: index % 2 === 0 ? 'user' : 'assistant',
        content: `message ${id}`,
        createdAt: new Date(Date.UTC(2024, 0, index + 1)),
      });
    });
    const repository = new FirestoreConversationRepository(harness.asFirestore());

    const messages = await repository.listRecentMessages('conv-1', 3);

    expect(messages.map((message) => message.id)).toEqual(['b', 'c', 'd']);
    expect(messages.map((message) => message.role)).toEqual(['assistant', 'user', 'assistant']);
  });

  it('lists only the caller conversations by recent activity', async () => {
    const harness = new InMemoryFirestore();
    harness.seed('conversations/old', { userId: 'user-1', title: 'Old', lastMessageAt: new Date('2024-01-01') });
    harness.seed('conversations/new', { userId: 'user-1', title: 'New', lastMessageAt: new Date('2024-02-01') });
    harness.seed('conversations/other', { userId: 'user-2', title: 'Other', lastMessageAt: new Date('2024-03-01') });
    const repository = new FirestoreConversationRepository(harness.asFirestore());

    const page = await repository.listByUser('user-1', { limit: 10 });

    expect(page.items.map((item) => item.title)).toEqual(['New', 'Old']);
    await expect(repository.listByUser('user-1', { limit: 10, cursor: 'other' })).rejects.toBeInstanceOf(
      InvalidCursorError,
    );
  });
});
