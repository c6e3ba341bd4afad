/**
 * Compatibility Match Model
 */

import type { BirthDataInput } from './astrology';

export type MatchCategory =
  | 'varna'
  | 'vashya'
  | 'tara'
  | 'yoni'
  | 'maitri'
  | 'gana'
  | 'bhakoot'
  | 'nadi';

export type SubScoreName = 'emotional' | 'mental' | 'physical' | 'spiritual';

export type SubScores = Record<SubScoreName, number>;

export interface KundaliMatch {
  id?: string;
  partnerName: string;
  partnerDOB: string;
  scoreTotal: number;
  aspects?: Partial<Record<MatchCategory, number>>;
  aspectJSON?: string;
  subScores?: SubScores;
  createdAt: string;
}

export interface MatchRequest {
  /** Omit to use the signed-in user's stored birth details. */
  user?: BirthDataInput;
  partner: BirthDataInput & { name: string };
  save?: boolean;
}
