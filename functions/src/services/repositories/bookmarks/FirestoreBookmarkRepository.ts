import { readString, readTimestamp } from '../common/fields';
import {
  CursorPageRequest,
  CursorPageResult,
  normalizeLimit,
  normalizeSortDirection,
  toCursorPage,
  startAfterCursor,
} from '../common/pagination';
import type { BookmarkRecord, BookmarkRepository, CreateBookmarkInput } from './BookmarkRepository';

function mapBookmarkDoc(
  doc: FirebaseFirestore.QueryDocumentSnapshot<FirebaseFirestore.DocumentData>,
): BookmarkRecord {
  const data = doc.data();
  return {
    id: doc.id,
    readingDate: readString(data, 'readingDate') ?? '',
    type: readString(data, 'type') ?? '',
    title: readString(data, 'title') ?? '',
    content: readString(data, 'content') ?? '',
    createdAt: readTimestamp(data, 'createdAt'),
  };
}

export class FirestoreBookmarkRepository implements BookmarkRepository {
  constructor(private readonly db: FirebaseFirestore.Firestore) {}

  private collection(userId: string): FirebaseFirestore.CollectionReference {
    return this.db.collection('users').doc(userId).collection('bookmarks');
  }

  async create(userId: string, input: CreateBookmarkInput, now: Date): Promise<BookmarkRecord> {
    const docRef = await this.collection(userId).add({ ...input, createdAt: now });
    return { id: docRef.id, ...input, createdAt: now.toISOString() };
  }

  async listByUser(
    userId: string,
    options: CursorPageRequest,
  ): Promise<CursorPageResult<BookmarkRecord>> {
    const limit = normalizeLimit(options.limit);
    let query = this.collection(userId)
      .orderBy('createdAt', normalizeSortDirection(options.sortDirection))
      .limit(limit + 1);

    query = await startAfterCursor(query, this.collection(userId), options.cursor);

    const snapshot = await query.get();
    return toCursorPage(snapshot.docs, limit, mapBookmarkDoc);
  }

  async delete(userId: string, bookmarkId: string): Promise<boolean> {
    const docRef = this.collection(userId).doc(bookmarkId);
    const doc = await docRef.get();
    if (!doc.exists) {
      return false;
    }
    await docRef.delete();
    return true;
  }
}
