import { InMemoryFirestore } from '../../__tests__/inMemoryFirestore';
import { FirestoreBookmarkRepository } from '../FirestoreBookmarkRepository';

describe('FirestoreBookmarkRepository', () => {
  it('creates, lists and deletes bookmarks under the user', async () => {
    const harness = new InMemoryFirestore();
    const repository = new FirestoreBookmarkRepository(harness.asFirestore());

    const saved = await repository.create(
      'user-1',
      { readingDate: '2024-03-01', type: 'daily', title: 'Leo today', content: 'Shine.' },
      new Date('2024-03-01T08:00:00Z'),
    );

    expect(saved).toEqual({
      id: 'bookmarks-1',
      readingDate: '2024-03-01',
      type: 'daily',
      title: 'Leo today',
      content: 'Shine.',
      createdAt: '2024-03-01T08:00:00.000Z',
    });
    expect(harness.read('users/user-1/bookmarks/bookmarks-1')).toBeDefined();

    const page = await repository.listByUser('user-1', { limit: 5 });
    expect(page.items).toEqual([saved]);

    await expect(repository.delete('user-1', saved.id)).resolves.toBe(true);
    await expect(repository.delete('user-1', saved.id)).resolves.toBe(false);
  });
});
