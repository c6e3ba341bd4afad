import {
  CATEGORY_WEIGHTS,
  MATCH_CATEGORIES,
  MatchCategory,
  computeSubScores,
} from '../../astro/matchService';
import { readNumber, readString, readTimestamp } from '../common/fields';
import {
  CursorPageRequest,
  CursorPageResult,
  normalizeLimit,
  normalizeSortDirection,
  toCursorPage,
  startAfterCursor,
} from '../common/pagination';
import type { CreateMatchInput, MatchRecord, MatchRepository } from './MatchRepository';

function readAspects(data: FirebaseFirestore.DocumentData): Record<MatchCategory, number> {
  const raw: unknown = data.aspects;
  const source: Record<string, unknown> =
    raw && typeof raw === 'object' && !Array.isArray(raw) ? { ...raw } : {};

  const aspects = { ...CATEGORY_WEIGHTS };
  MATCH_CATEGORIES.forEach((category) => {
    const value = source[category];
    aspects[category] = typeof value === 'number' ? value : 0;
  });
  return aspects;
}

function mapMatchDoc(
  doc: FirebaseFirestore.QueryDocumentSnapshot<FirebaseFirestore.DocumentData>,
): MatchRecord {
  const data = doc.data();
  const aspects = readAspects(data);

  return {
    id: doc.id,
    partnerName: readString(data, 'partnerName') ?? '',
    partnerDOB: readString(data, 'partnerDOB') ?? '',
    scoreTotal: readNumber(data, 'scoreTotal') ?? 0,
    aspects,
    aspectJSON: readString(data, 'aspectJSON') ?? JSON.stringify(aspects),
    createdAt: readTimestamp(data, 'createdAt') ?? '',
    subScores: computeSubScores(aspects),
  };
}

export class FirestoreMatchRepository implements MatchRepository {
  constructor(private readonly db: FirebaseFirestore.Firestore) {}

  private collection(userId: string): FirebaseFirestore.CollectionReference {
    return this.db.collection('users').doc(userId).collection('matches');
  }

  async create(userId: string, match: CreateMatchInput): Promise<MatchRecord> {
    const docRef = await this.collection(userId).add({
      partnerName: match.partnerName,
      partnerDOB: match.partnerDOB,
      scoreTotal: match.scoreTotal,
      aspects: match.aspects,
      aspectJSON: match.aspectJSON,
      createdAt: new Date(match.createdAt),
    });

    return {
      id: docRef.id,
      ...match,
      subScores: computeSubScores(match.aspects),
    };
  }

  async listByUser(
    userId: string,
    options: CursorPageRequest,
  ): Promise<CursorPageResult<MatchRecord>> {
    const limit = normalizeLimit(options.limit);
    let query = this.collection(userId)
      .orderBy('createdAt', normalizeSortDirection(options.sortDirection))
      .limit(limit + 1);

    query = await startAfterCursor(query, this.collection(userId), options.cursor);

    const snapshot = await query.get();
    return toCursorPage(snapshot.docs, limit, mapMatchDoc);
  }

  async delete(userId: string, matchId: string): Promise<boolean> {
    const docRef = this.collection(userId).doc(matchId);
    const doc = await docRef.get();
    if (!doc.exists) {
      return false;
    }
    await docRef.delete();
    return true;
  }
}
