import type {
  BookmarkRecord,
  BookmarkRepository,
  CreateBookmarkInput,
} from '../../repositories/bookmarks/BookmarkRepository';
import type { CursorPageRequest } from '../../repositories/common/pagination';

export class BookmarkDomainService {
  constructor(private readonly bookmarkRepository: BookmarkRepository) {}

  async createForUser(userId: string, input: CreateBookmarkInput, now: Date): Promise<BookmarkRecord> {
    return this.bookmarkRepository.create(userId, input, now);
  }

  async listForUser(userId: string, options: CursorPageRequest) {
    return this.bookmarkRepository.listByUser(userId, options);
  }

  async deleteForUser(userId: string, bookmarkId: string): Promise<boolean> {
    return this.bookmarkRepository.delete(userId, bookmarkId);
  }
}
