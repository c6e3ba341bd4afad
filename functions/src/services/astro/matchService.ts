/**
 * KundaliMatch compatibility scoring
 *
 * Eight Ashtakoota categories over the Sun and Moon signs of both partners.
 * Each category is a pass/fail test worth its traditional weight, so the
 * total lands in [0, 36].
 */

import { julianDay, moonLongitude, sunLongitude } from './ephemeris';
import { signIndexForLongitude } from './zodiac';

export type MatchCategory =
    | 'varna'
    | 'vashya'
    | 'tara'
    | 'yoni'
    | 'maitri'
    | 'gana'
    | 'bhakoot'
    | 'nadi';

export const CATEGORY_WEIGHTS: Record<MatchCategory, number> = {
    varna: 1,
    vashya: 2,
    tara: 3,
    yoni: 4,
    maitri: 5,
    gana: 6,
    bhakoot: 7,
    nadi: 8,
};

export const MATCH_CATEGORIES: readonly MatchCategory[] = [
    'varna',
    'vashya',
    'tara',
    'yoni',
    'maitri',
    'gana',
    'bhakoot',
    'nadi',
];

export const MAX_MATCH_SCORE = 36;

export type SubScoreName = 'emotional' | 'mental' | 'physical' | 'spiritual';

export const SUB_SCORE_GROUPS: Record<SubScoreName, readonly MatchCategory[]> = {
    emotional: ['yoni', 'bhakoot'],
    mental: ['varna', 'maitri', 'gana'],
    physical: ['nadi'],
    spiritual: ['vashya', 'tara'],
};

export type SubScores = Record<SubScoreName, number>;

export type SignPair = {
    sun: number;
    moon: number;
};

export interface KundaliMatch {
    partnerName: string;
    partnerDOB: string;
    scoreTotal: number;
    aspects: Record<MatchCategory, number>;
    aspectJSON: string;
    createdAt: string;
}

export interface MatchResult extends KundaliMatch {
    subScores: SubScores;
}

/** Tropical Sun and Moon sign indices at a UTC instant. */
export function signPairAt(instant: Date): SignPair {
    const jd = julianDay(instant);
    return {
        sun: signIndexForLongitude(sunLongitude(jd)),
        moon: signIndexForLongitude(moonLongitude(jd)),
    };
}

export function scoreCategories(mine: SignPair, partner: SignPair): Record<MatchCategory, number> {
    const s1 = mine.sun;
    const s2 = partner.sun;
    const m1 = mine.moon;
    const m2 = partner.moon;

    const passes: Record<MatchCategory, boolean> = {
        varna: s1 % 4 === s2 % 4,
        vashya: m1 % 3 === m2 % 3,
        tara: s1 % 9 === s2 % 9,
        yoni: m1 % 2 === m2 % 2,
        maitri: Math.abs(s1 - s2) <= 1,
        gana: s1 % 3 === s2 % 3,
        bhakoot: s1 === s2,
        nadi: s1 % 3 !== s2 % 3,
    };

    const aspects = { ...CATEGORY_WEIGHTS };
    MATCH_CATEGORIES.forEach((category) => {
        aspects[category] = passes[category] ? CATEGORY_WEIGHTS[category] : 0;
    });
    return aspects;
}

export function totalScore(aspects: Record<MatchCategory, number>): number {
    const sum = MATCH_CATEGORIES.reduce((acc, category) => acc + (aspects[category] ?? 0), 0);
    return Math.min(Math.max(sum, 0), MAX_MATCH_SCORE);
}

/**
 * Each sub-score is the share of its category group's available points,
 * scaled to 0-10.
 */
export function computeSubScores(aspects: Record<MatchCategory, number>): SubScores {
    const score = (group: readonly MatchCategory[]) => {
        const max = group.reduce((acc, category) => acc + CATEGORY_WEIGHTS[category], 0);
        const points = group.reduce(
            (acc, category) => acc + Math.min(Math.max(aspects[category] ?? 0, 0), CATEGORY_WEIGHTS[category]),
            0,
        );
        return Math.round((points / max) * 10);
    };

    return {
        emotional: score(SUB_SCORE_GROUPS.emotional),
        mental: score(SUB_SCORE_GROUPS.mental),
        physical: score(SUB_SCORE_GROUPS.physical),
        spiritual: score(SUB_SCORE_GROUPS.spiritual),
    };
}

export function compare(
    myBirth: Date,
    partnerBirth: Date,
    partnerName: string,
    partnerDOB: string,
    now: Date = new Date(),
): MatchResult {
    const aspects = scoreCategories(signPairAt(myBirth), signPairAt(partnerBirth));
    return {
        partnerName,
        partnerDOB,
        scoreTotal: totalScore(aspects),
        aspects,
        aspectJSON: JSON.stringify(aspects),
        createdAt: now.toISOString(),
        subScores: computeSubScores(aspects),
    };
}
