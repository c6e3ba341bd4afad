import { InMemoryFirestore } from '../../__tests__/inMemoryFirestore';
import { FirestoreUserRepository } from '../FirestoreUserRepository';

const NOW = new Date('2024-04-01T12:00:00.000Z');

describe('FirestoreUserRepository', () => {
  it('returns null for unknown users', async () => {
    const repository = new FirestoreUserRepository(new InMemoryFirestore().asFirestore());

    await expect(repository.getById('missing')).resolves.toBeNull();
  });

  it('creates the profile with timestamps on first upsert', async () => {
    const harness = new InMemoryFirestore();
    const repository = new FirestoreUserRepository(harness.asFirestore());

    const user = await repository.upsertById(
      'user-1',
      { email: 'user@example.com', fullName: 'Test User', birthPlace: undefined },
      { now: NOW },
    );

    expect(user).toMatchObject({
      id: 'user-1',
      email: 'user@example.com',
      fullName: 'Test User',
      birthPlace: null,
      createdAt: '2024-04-01T12:00:00.000Z',
      updatedAt: '2024-04-01T12:00:00.000Z',
    });
    expect(harness.read('users/user-1')).not.toHaveProperty('birthPlace');
  });

  it('merges later updates and keeps createdAt', async () => {
    const harness = new InMemoryFirestore();
    harness.seed('users/user-1', {
      email: 'user@example.com',
      birthDate: '1990-04-15',
      createdAt: new Date('2023-01-01T00:00:00.000Z'),
    });
    const repository = new FirestoreUserRepository(harness.asFirestore());

    const user = await repository.upsertById('user-1', { birthTime: '06:30' }, { now: NOW });

    expect(user.birthDate).toBe('1990-04-15');
    expect(user.birthTime).toBe('06:30');
    expect(user.createdAt).toBe('2023-01-01T00:00:00.000Z');
    expect(user.updatedAt).toBe('2024-04-01T12:00:00.000Z');
  });

  it('deletes the profile, its subcollections and owned documents', async () => {
    const harness = new InMemoryFirestore();
    harness.seed('users/user-1', { email: 'user@example.com' });
    harness.seed('users/user-1/matches/match-1', { partnerName: 'Asha' });
    harness.seed('users/user-1/bookmarks/bookmark-1', { title: 'Saved' });
    harness.seed('conversations/conv-1', { userId: 'user-1' });
    harness.seed('conversations/conv-1/messages/msg-1', { role: 'user', content: 'Hi' });
    harness.seed('conversations/conv-2', { userId: 'user-2' });
    harness.seed('reports/report-1', { userId: 'user-1' });
    harness.seed('templeBookings/booking-1', { userId: 'user-1' });
    const repository = new FirestoreUserRepository(harness.asFirestore());

    const deleted = await repository.deleteAccountData('user-1');

    expect(deleted).toBe(7);
    expect(Array.from(harness.store.keys())).toEqual(['conversations/conv-2']);
  });
});
