export type SortDirection = 'asc' | 'desc';

export type CursorPageRequest = {
  limit: number;
  cursor?: string | null;
  sortDirection?: SortDirection;
};

export type CursorPageResult<TRecord> = {
  items: TRecord[];
  hasMore: boolean;
  nextCursor: string | null;
};

export class InvalidCursorError extends Error {
  readonly code = 'invalid_cursor' as const;

  constructor(readonly cursor: string) {
    super('Invalid cursor');
    this.name = 'InvalidCursorError';
  }
}

export const DEFAULT_PAGE_LIMIT = 50;
export const MAX_PAGE_LIMIT = 100;

export function normalizeLimit(limit: number): number {
  if (!Number.isFinite(limit) || limit <= 0) {
    return DEFAULT_PAGE_LIMIT;
  }

  return Math.min(Math.floor(limit), MAX_PAGE_LIMIT);
}

export function normalizeSortDirection(value: SortDirection | undefined): SortDirection {
  return value === 'asc' ? 'asc' : 'desc';
}

export function normalizeCursor(cursor: string | null | undefined): string | null {
  return typeof cursor === 'string' && cursor.trim().length > 0 ? cursor.trim() : null;
}

/**
 * Runs a query fetched with `limit + 1` and splits it into a page.
 */
export function toCursorPage<TRecord>(
  docs: FirebaseFirestore.QueryDocumentSnapshot<FirebaseFirestore.DocumentData>[],
  limit: number,
  map: (doc: FirebaseFirestore.QueryDocumentSnapshot<FirebaseFirestore.DocumentData>) => TRecord,
): CursorPageResult<TRecord> {
  const hasMore = docs.length > limit;
  const pageDocs = hasMore ? docs.slice(0, limit) : docs;

  return {
    items: pageDocs.map(map),
    hasMore,
    nextCursor: hasMore && pageDocs.length > 0 ? pageDocs[pageDocs.length - 1].id : null,
  };
}

/**
 * Continues `query` after the cursor document. The cursor has to name a
 * document in `collection` and, when `ownerId` is set, one whose `userId`
 * matches.
 */
export async function startAfterCursor(
  query: FirebaseFirestore.Query,
  collection: FirebaseFirestore.CollectionReference,
  rawCursor: string | null | undefined,
  ownerId?: string,
): Promise<FirebaseFirestore.Query> {
  const cursor = normalizeCursor(rawCursor);
  if (!cursor) {
    return query;
  }

  const cursorDoc = await collection.doc(cursor).get();
  if (!cursorDoc.exists || (ownerId !== undefined && cursorDoc.data()?.userId !== ownerId)) {
    throw new InvalidCursorError(cursor);
  }
  return query.startAfter(cursorDoc);
}
