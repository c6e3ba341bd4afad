import { EphemerisService } from '../astro/ephemeris';
import { ConversationDomainService, conversationTitleFor } from '../domain/conversations/ConversationDomainService';
import { MatchDomainService } from '../domain/matches/MatchDomainService';
import { ReportDomainService } from '../domain/reports/ReportDomainService';
import { TempleBookingDomainService } from '../domain/templeBookings/TempleBookingDomainService';
import { UserDomainService } from '../domain/users/UserDomainService';
import type { ConversationRepository } from '../repositories/conversations/ConversationRepository';
import type { MatchRepository } from '../repositories/matches/MatchRepository';
import type { ReportRepository } from '../repositories/reports/ReportRepository';
import type {
  TempleBookingRecord,
  TempleBookingRepository,
} from '../repositories/templeBookings/TempleBookingRepository';
import type { UserRecord, UserRepository } from '../repositories/users/UserRepository';

const NOW = new Date('2024-04-01T00:00:00.000Z');

function userRecord(overrides: Partial<UserRecord> = {}): UserRecord {
  return {
    id: 'user-1',
    email: 'user@example.com',
    firstName: null,
    lastName: null,
    fullName: 'Test User',
    birthDate: null,
    birthTime: null,
    birthPlace: null,
    birthLatitude: null,
    birthLongitude: null,
    timezone: null,
    sunSign: null,
    moonSign: null,
    risingSign: null,
    subscriptionExpiresAt: null,
    createdAt: null,
    updatedAt: null,
    ...overrides,
  };
}

function userRepository(user: UserRecord | null) {
  const repository = {
    getById: jest.fn().mockResolvedValue(user),
    upsertById: jest.fn().mockImplementation(async (id: string, updates: Partial<UserRecord>) =>
      userRecord({ ...user, ...updates, id }),
    ),
    deleteAccountData: jest.fn().mockResolvedValue(4),
  };
  return repository satisfies UserRepository;
}

function conversationRepository(owner = 'user-1') {
  const repository = {
    create: jest.fn().mockImplementation(async (userId: string, title: string) => ({
      id: 'conv-new',
      userId,
      title,
      lastMessageAt: NOW.toISOString(),
      createdAt: NOW.toISOString(),
    })),
    getById: jest.fn().mockImplementation(async (id: string) =>
      id === 'conv-1'
        ? { id, userId: owner, title: 'Love', lastMessageAt: null, createdAt: null }
        : null,
    ),
    listByUser: jest.fn().mockResolvedValue({ items: [], hasMore: false, nextCursor: null }),
    appendMessage: jest.fn(),
    listRecentMessages: jest.fn().mockResolvedValue([
      { id: 'm1', conversationId: 'conv-1', role: 'user', content: 'Hi', createdAt: null },
      { id: 'm2', conversationId: 'conv-1', role: 'assistant', content: 'Hello', createdAt: null },
    ]),
  };
  return repository satisfies ConversationRepository;
}

function booking(overrides: Partial<TempleBookingRecord> = {}): TempleBookingRecord {
  return {
    id: 'booking-1',
    userId: 'user-1',
    poojaTypeId: 'pooja_ganesh',
    scheduledDate: '2024-06-01',
    scheduledTime: '09:00',
    timezone: 'Asia/Kolkata',
    sankalp: { name: null, gotra: null, nakshatra: null },
    specialRequests: null,
    status: 'pending',
    amountDue: 1100,
    createdAt: null,
    updatedAt: null,
    ...overrides,
  };
}

describe('Domain services', () => {
  describe('UserDomainService', () => {
    const ephemeris = new EphemerisService();

    it('recomputes signs from the merged birth details', async () => {
      const repository = userRepository(userRecord({ birthDate: '2000-01-01', timezone: 'UTC' }));
      const service = new UserDomainService(repository, ephemeris);

      await service.updateProfile('user-1', { birthTime: '12:00' }, NOW);

      expect(repository.upsertById).toHaveBeenCalledWith(
        'user-1',
        { birthTime: '12:00', sunSign: 'Capricorn', moonSign: 'Scorpio', risingSign: null },
        { now: NOW },
      );
    });

    it('derives a rising sign only with coordinates', () => {
      const service = new UserDomainService(userRepository(null), ephemeris);

      expect(service.deriveSigns({})).toEqual({ sunSign: null, moonSign: null, risingSign: null });
      expect(
        service.deriveSigns({
          birthDate: '2000-01-01',
          birthTime: '12:00',
          timezone: 'UTC',
          birthLatitude: 51.5,
          birthLongitude: -0.13,
        }).risingSign,
      ).toEqual(expect.any(String));
    });

    it('reports an active subscription until it expires', async () => {
      const active = new UserDomainService(
        userRepository(userRecord({ subscriptionExpiresAt: '2024-05-01T00:00:00.000Z' })),
        ephemeris,
      );
      const lapsed = new UserDomainService(
        userRepository(userRecord({ subscriptionExpiresAt: '2024-03-01T00:00:00.000Z' })),
        ephemeris,
      );

      await expect(active.getSubscriptionStatus('user-1', NOW)).resolves.toEqual({
        isActive: true,
        expiresAt: '2024-05-01T00:00:00.000Z',
      });
      await expect(lapsed.getSubscriptionStatus('user-1', NOW)).resolves.toEqual({
        isActive: false,
        expiresAt: '2024-03-01T00:00:00.000Z',
      });
      await expect(
        new UserDomainService(userRepository(null), ephemeris).getSubscriptionStatus('user-1', NOW),
      ).resolves.toEqual({ isActive: false, expiresAt: null });
    });

    it('forwards account deletion', async () => {
      const repository = userRepository(userRecord());

      await expect(new UserDomainService(repository, ephemeris).deleteAccountData('user-1')).resolves.toBe(4);
      expect(repository.deleteAccountData).toHaveBeenCalledWith('user-1');
    });
  });

  describe('ConversationDomainService', () => {
    it('titles conversations after the first line of the message', () => {
      expect(conversationTitleFor('What does Saturn mean?\nAnd Mars?')).toBe('What does Saturn mean?');
      expect(conversationTitleFor('   ')).toBe('New conversation');
      expect(conversationTitleFor('x'.repeat(80))).toBe(`${'x'.repeat(57)}...`);
    });

    it('starts a new conversation when no id is given', async () => {
      const repository = conversationRepository();
      const service = new ConversationDomainService(repository);

      const conversation = await service.resolveForMessage('user-1', undefined, 'Tell me about love', NOW);

      expect(conversation?.id).toBe('conv-new');
      expect(repository.create).toHaveBeenCalledWith('user-1', 'Tell me about love', NOW);
    });

    it('hides conversations owned by someone else', async () => {
      const service = new ConversationDomainService(conversationRepository('user-2'));

      await expect(service.resolveForMessage('user-1', 'conv-1', 'Hi', NOW)).resolves.toBeNull();
      await expect(service.listMessagesForUser('user-1', 'conv-1', 20)).resolves.toBeNull();
    });

    it('maps recent messages to chat history', async () => {
      const repository = conversationRepository();
      const service = new ConversationDomainService(repository);

      await expect(service.recentHistory('conv-1')).resolves.toEqual([
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello' },
      ]);
      expect(repository.listRecentMessages).toHaveBeenCalledWith('conv-1', 10);
    });
  });

  describe('TempleBookingDomainService', () => {
    function bookingRepository(record: TempleBookingRecord | null) {
      const repository = {
        create: jest.fn(),
        getById: jest.fn().mockResolvedValue(record),
        listByUser: jest.fn().mockResolvedValue([]),
        updateStatus: jest.fn().mockResolvedValue(undefined),
      };
      return repository satisfies TempleBookingRepository;
    }

    it('cancels pending bookings', async () => {
      const repository = bookingRepository(booking());
      const service = new TempleBookingDomainService(repository);

      await expect(service.cancelForUser('user-1', 'booking-1', NOW)).resolves.toEqual({
        outcome: 'cancelled',
        bookingId: 'booking-1',
      });
      expect(repository.updateStatus).toHaveBeenCalledWith('booking-1', 'cancelled', NOW);
    });

    it('refuses to cancel completed or cancelled bookings', async () => {
      const repository = bookingRepository(booking({ status: 'completed' }));
      const service = new TempleBookingDomainService(repository);

      await expect(service.cancelForUser('user-1', 'booking-1', NOW)).resolves.toEqual({
        outcome: 'invalid_status',
        status: 'completed',
      });
      expect(repository.updateStatus).not.toHaveBeenCalled();
    });

    it('treats other users bookings as missing', async () => {
      const service = new TempleBookingDomainService(bookingRepository(booking({ userId: 'user-2' })));

      await expect(service.getForUser('user-1', 'booking-1')).resolves.toBeNull();
      await expect(service.cancelForUser('user-1', 'booking-1', NOW)).resolves.toEqual({ outcome: 'not_found' });
    });

    it('passes the status filter only when given', async () => {
      const repository = bookingRepository(null);
      const service = new TempleBookingDomainService(repository);

      await service.listForUser('user-1');
      await service.listForUser('user-1', 'confirmed');

      expect(repository.listByUser).toHaveBeenNthCalledWith(1, 'user-1', {});
      expect(repository.listByUser).toHaveBeenNthCalledWith(2, 'user-1', { status: 'confirmed' });
    });
  });

  describe('ReportDomainService', () => {
    it('stores the generated content when completing', async () => {
      const update = jest.fn().mockResolvedValue(null);
      const repository: ReportRepository = {
        create: jest.fn(),
        getById: jest.fn().mockResolvedValue(null),
        update,
        listByUser: jest.fn(),
      };
      const service = new ReportDomainService(repository);

      await service.complete(
        'report-1',
        {
          reportType: 'year_ahead',
          title: 'Year Ahead Overview',
          summary: 'A steady year.',
          keyInsights: ['Plan in seasons'],
          content: '{}',
        },
        NOW,
      );

      expect(update).toHaveBeenCalledWith(
        'report-1',
        {
          status: 'completed',
          summary: 'A steady year.',
          keyInsights: ['Plan in seasons'],
          content: '{}',
          generatedAt: NOW,
        },
        NOW,
      );
    });

    it('returns null for reports of other users', async () => {
      const repository: ReportRepository = {
        create: jest.fn(),
        getById: jest.fn().mockResolvedValue({ id: 'report-1', userId: 'user-2' }),
        update: jest.fn(),
        listByUser: jest.fn(),
      };

      await expect(new ReportDomainService(repository).getForUser('user-1', 'report-1')).resolves.toBeNull();
    });
  });

  describe('MatchDomainService', () => {
    it('saves only the match fields', async () => {
      const create = jest.fn().mockResolvedValue({ id: 'match-1' });
      const repository: MatchRepository = { create, listByUser: jest.fn(), delete: jest.fn() };
      const aspects = { varna: 1, vashya: 2, tara: 3, yoni: 4, maitri: 5, gana: 6, bhakoot: 7, nadi: 0 };

      await new MatchDomainService(repository).saveForUser('user-1', {
        partnerName: 'Asha',
        partnerDOB: '1991-02-03',
        scoreTotal: 28,
        aspects,
        aspectJSON: '{}',
        createdAt: NOW.toISOString(),
      });

      expect(create).toHaveBeenCalledWith('user-1', {
        partnerName: 'Asha',
        partnerDOB: '1991-02-03',
        scoreTotal: 28,
        aspects,
        aspectJSON: '{}',
        createdAt: '2024-04-01T00:00:00.000Z',
      });
    });
  });
});
