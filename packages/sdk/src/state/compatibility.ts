/**
 * Compatibility overview scores shown on the match screen.
 */

import type { KundaliMatch, MatchCategory, SubScoreName, SubScores } from '../models';

export const MAX_MATCH_SCORE = 36;

const CATEGORY_WEIGHTS: Record<MatchCategory, number> = {
  varna: 1,
  vashya: 2,
  tara: 3,
  yoni: 4,
  maitri: 5,
  gana: 6,
  bhakoot: 7,
  nadi: 8,
};

const SUB_SCORE_GROUPS: Record<SubScoreName, readonly MatchCategory[]> = {
  emotional: ['yoni', 'bhakoot'],
  mental: ['varna', 'maitri', 'gana'],
  physical: ['nadi'],
  spiritual: ['vashya', 'tara'],
};

const SUB_SCORE_NAMES: readonly SubScoreName[] = ['emotional', 'mental', 'physical', 'spiritual'];

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max);

function groupScore(
  aspects: Partial<Record<MatchCategory, number>>,
  group: readonly MatchCategory[],
): number {
  const max = group.reduce((acc, category) => acc + CATEGORY_WEIGHTS[category], 0);
  const points = group.reduce(
    (acc, category) => acc + clamp(aspects[category] ?? 0, 0, CATEGORY_WEIGHTS[category]),
    0,
  );
  return Math.round((points / max) * 10);
}

/**
 * Each sub-score is 0-10. With per-category aspects every score comes from
 * its own category group; otherwise all four scale the overall total.
 */
export function deriveOverviewScores(match: Pick<KundaliMatch, 'scoreTotal' | 'aspects'>): SubScores {
  const aspects = match.aspects && Object.keys(match.aspects).length > 0 ? match.aspects : null;
  const overall = clamp(Math.round((match.scoreTotal / MAX_MATCH_SCORE) * 10), 0, 10);

  return SUB_SCORE_NAMES.reduce<SubScores>(
    (scores, name) => {
      scores[name] = aspects ? groupScore(aspects, SUB_SCORE_GROUPS[name]) : overall;
      return scores;
    },
    { emotional: 0, mental: 0, physical: 0, spiritual: 0 },
  );
}
