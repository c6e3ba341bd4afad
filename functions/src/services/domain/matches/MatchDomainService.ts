import type { KundaliMatch } from '../../astro/matchService';
import type { CursorPageRequest } from '../../repositories/common/pagination';
import type { MatchRecord, MatchRepository } from '../../repositories/matches/MatchRepository';

export class MatchDomainService {
  constructor(private readonly matchRepository: MatchRepository) {}

  async saveForUser(userId: string, match: KundaliMatch): Promise<MatchRecord> {
    return this.matchRepository.create(userId, {
      partnerName: match.partnerName,
      partnerDOB: match.partnerDOB,
      scoreTotal: match.scoreTotal,
      aspects: match.aspects,
      aspectJSON: match.aspectJSON,
      createdAt: match.createdAt,
    });
  }

  async listForUser(userId: string, options: CursorPageRequest) {
    return this.matchRepository.listByUser(userId, options);
  }

  async deleteForUser(userId: string, matchId: string): Promise<boolean> {
    return this.matchRepository.delete(userId, matchId);
  }
}
