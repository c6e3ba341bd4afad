import { BookmarkDomainService } from '../domain/bookmarks/BookmarkDomainService';
import { ConversationDomainService } from '../domain/conversations/ConversationDomainService';
import { MatchDomainService } from '../domain/matches/MatchDomainService';
import { ReportDomainService } from '../domain/reports/ReportDomainService';
import { createDomainServiceContainer } from '../domain/serviceContainer';
import { TempleBookingDomainService } from '../domain/templeBookings/TempleBookingDomainService';
import { UserDomainService } from '../domain/users/UserDomainService';
import { FirestoreBookmarkRepository } from '../repositories/bookmarks/FirestoreBookmarkRepository';
import { FirestoreConversationRepository } from '../repositories/conversations/FirestoreConversationRepository';
import { FirestoreMatchRepository } from '../repositories/matches/FirestoreMatchRepository';
import { FirestoreReportRepository } from '../repositories/reports/FirestoreReportRepository';
import { FirestoreTempleBookingRepository } from '../repositories/templeBookings/FirestoreTempleBookingRepository';
import { FirestoreUserRepository } from '../repositories/users/FirestoreUserRepository';
import type { UserRepository } from '../repositories/users/UserRepository';

describe('createDomainServiceContainer', () => {
  const db = {} as unknown as FirebaseFirestore.Firestore;

  it('wires Firestore repositories by default', () => {
    const container = createDomainServiceContainer({ db });

    expect(container.bookmarkRepository).toBeInstanceOf(FirestoreBookmarkRepository);
    expect(container.conversationRepository).toBeInstanceOf(FirestoreConversationRepository);
    expect(container.matchRepository).toBeInstanceOf(FirestoreMatchRepository);
    expect(container.reportRepository).toBeInstanceOf(FirestoreReportRepository);
    expect(container.templeBookingRepository).toBeInstanceOf(FirestoreTempleBookingRepository);
    expect(container.userRepository).toBeInstanceOf(FirestoreUserRepository);
    expect(container.bookmarkService).toBeInstanceOf(BookmarkDomainService);
    expect(container.conversationService).toBeInstanceOf(ConversationDomainService);
    expect(container.matchService).toBeInstanceOf(MatchDomainService);
    expect(container.reportService).toBeInstanceOf(ReportDomainService);
    expect(container.templeBookingService).toBeInstanceOf(TempleBookingDomainService);
    expect(container.userService).toBeInstanceOf(UserDomainService);
  });

  it('uses injected repositories', async () => {
    const userRepository: UserRepository = {
      getById: jest.fn().mockResolvedValue(null),
      upsertById: jest.fn(),
      deleteAccountData: jest.fn(),
    };

    const container = createDomainServiceContainer({ db, userRepository });

    expect(container.userRepository).toBe(userRepository);
    await expect(container.userService.getById('user-1')).resolves.toBeNull();
    expect(userRepository.getById).toHaveBeenCalledWith('user-1');
  });
});
