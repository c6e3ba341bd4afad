import { SIGNS, SignInfo, findSign } from './zodiac';

export type HoroscopeType = 'daily' | 'weekly' | 'monthly';

export const HOROSCOPE_TYPES: readonly HoroscopeType[] = ['daily', 'weekly', 'monthly'];

export const GUIDANCE_THEMES: readonly string[] = [
    'Focus on steady progress and small wins.',
    'Be open to new ideas and connections.',
    'Trust your intuition and set clear boundaries.',
    'Take action on one meaningful goal today.',
    'Reflect, recharge, and plan your next step.',
];

export interface LuckyElements {
    color: string;
    number: number;
    element: string;
}

export interface Horoscope {
    id: string;
    sign: string;
    date: string;
    type: HoroscopeType;
    content: string;
    luckyElements: LuckyElements;
}

export function isHoroscopeType(value: string): value is HoroscopeType {
    return HOROSCOPE_TYPES.some((type) => type === value);
}

export function dayOfYear(date: Date): number {
    const startOfYear = Date.UTC(date.getUTCFullYear(), 0, 1);
    const startOfDay = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
    return Math.round((startOfDay - startOfYear) / 86_400_000) + 1;
}

export function luckyElementsFor(sign: SignInfo): LuckyElements {
    return {
        color: sign.luckyColor,
        number: sign.luckyNumber,
        element: sign.element,
    };
}

/**
 * Deterministic guidance: the same sign, day and type always pick the same theme.
 */
export function generateHoroscope(signId: string, date: Date, type: HoroscopeType): Horoscope | null {
    const sign = findSign(signId);
    if (!sign) {
        return null;
    }

    const signIndex = SIGNS.indexOf(sign);
    const seed = (signIndex + dayOfYear(date) + type.length) % GUIDANCE_THEMES.length;
    const isoDate = date.toISOString().slice(0, 10);

    return {
        id: `${sign.id}-${isoDate.replace(/-/g, '')}-${type}`,
        sign: sign.id,
        date: isoDate,
        type,
        content: `${sign.name} — ${GUIDANCE_THEMES[seed]}`,
        luckyElements: luckyElementsFor(sign),
    };
}
