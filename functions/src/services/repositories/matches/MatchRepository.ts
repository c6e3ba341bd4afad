import type { KundaliMatch, SubScores } from '../../astro/matchService';
import type { CursorPageRequest, CursorPageResult } from '../common/pagination';

export type MatchRecord = KundaliMatch & {
  id: string;
  subScores: SubScores;
};

export type CreateMatchInput = KundaliMatch;

export interface MatchRepository {
  create(userId: string, match: CreateMatchInput): Promise<MatchRecord>;
  listByUser(userId: string, options: CursorPageRequest): Promise<CursorPageResult<MatchRecord>>;
  /** Returns false when the match does not exist. */
  delete(userId: string, matchId: string): Promise<boolean>;
}
