import { BookmarkDomainService } from './bookmarks/BookmarkDomainService';
import { ConversationDomainService } from './conversations/ConversationDomainService';
import { MatchDomainService } from './matches/MatchDomainService';
import { ReportDomainService } from './reports/ReportDomainService';
import { TempleBookingDomainService } from './templeBookings/TempleBookingDomainService';
import { UserDomainService } from './users/UserDomainService';
import { FirestoreBookmarkRepository } from '../repositories/bookmarks/FirestoreBookmarkRepository';
import type { BookmarkRepository } from '../repositories/bookmarks/BookmarkRepository';
import { FirestoreConversationRepository } from '../repositories/conversations/FirestoreConversationRepository';
import type { ConversationRepository } from '../repositories/conversations/ConversationRepository';
import { FirestoreMatchRepository } from '../repositories/matches/FirestoreMatchRepository';
import type { MatchRepository } from '../repositories/matches/MatchRepository';
import { FirestoreReportRepository } from '../repositories/reports/FirestoreReportRepository';
import type { ReportRepository } from '../repositories/reports/ReportRepository';
import { FirestoreTempleBookingRepository } from '../repositories/templeBookings/FirestoreTempleBookingRepository';
import type { TempleBookingRepository } from '../repositories/templeBookings/TempleBookingRepository';
import { FirestoreUserRepository } from '../repositories/users/FirestoreUserRepository';
import type { UserRepository } from '../repositories/users/UserRepository';

export type DomainServiceContainer = {
  bookmarkRepository: BookmarkRepository;
  conversationRepository: ConversationRepository;
  matchRepository: MatchRepository;
  reportRepository: ReportRepository;
  templeBookingRepository: TempleBookingRepository;
  userRepository: UserRepository;
  bookmarkService: BookmarkDomainService;
  conversationService: ConversationDomainService;
  matchService: MatchDomainService;
  reportService: ReportDomainService;
  templeBookingService: TempleBookingDomainService;
  userService: UserDomainService;
};

export type CreateDomainServiceContainerOptions = {
  db: FirebaseFirestore.Firestore;
  bookmarkRepository?: BookmarkRepository;
  conversationRepository?: ConversationRepository;
  matchRepository?: MatchRepository;
  reportRepository?: ReportRepository;
  templeBookingRepository?: TempleBookingRepository;
  userRepository?: UserRepository;
};

export function createDomainServiceContainer(
  options: CreateDomainServiceContainerOptions,
): DomainServiceContainer {
  const bookmarkRepository =
    options.bookmarkRepository ?? new FirestoreBookmarkRepository(options.db);
  const conversationRepository =
    options.conversationRepository ?? new FirestoreConversationRepository(options.db);
  const matchRepository = options.matchRepository ?? new FirestoreMatchRepository(options.db);
  const reportRepository = options.reportRepository ?? new FirestoreReportRepository(options.db);
  const templeBookingRepository =
    options.templeBookingRepository ?? new FirestoreTempleBookingRepository(options.db);
  const userRepository = options.userRepository ?? new FirestoreUserRepository(options.db);

  return {
    bookmarkRepository,
    conversationRepository,
    matchRepository,
    reportRepository,
    templeBookingRepository,
    userRepository,
    bookmarkService: new BookmarkDomainService(bookmarkRepository),
    conversationService: new ConversationDomainService(conversationRepository),
    matchService: new MatchDomainService(matchRepository),
    reportService: new ReportDomainService(reportRepository),
    templeBookingService: new TempleBookingDomainService(templeBookingRepository),
    userService: new UserDomainService(userRepository),
  };
}
