import type { CursorPageRequest, CursorPageResult } from '../common/pagination';

export type BookmarkRecord = {
  id: string;
  readingDate: string;
  type: string;
  title: string;
  content: string;
  createdAt: string | null;
};

export type CreateBookmarkInput = {
  readingDate: string;
  type: string;
  title: string;
  content: string;
};

export interface BookmarkRepository {
  create(userId: string, input: CreateBookmarkInput, now: Date): Promise<BookmarkRecord>;
  listByUser(userId: string, options: CursorPageRequest): Promise<CursorPageResult<BookmarkRecord>>;
  delete(userId: string, bookmarkId: string): Promise<boolean>;
}
