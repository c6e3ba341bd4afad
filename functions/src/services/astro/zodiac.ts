import signData from '../../data/astro/signs.json';
import bodyData from '../../data/astro/bodies.json';

export type ZodiacSystem = 'western' | 'vedic';

export type BodyId =
    | 'sun'
    | 'moon'
    | 'mercury'
    | 'venus'
    | 'mars'
    | 'jupiter'
    | 'saturn'
    | 'uranus'
    | 'neptune'
    | 'pluto'
    | 'rahu'
    | 'ketu';

export const BODY_IDS: readonly BodyId[] = [
    'sun',
    'moon',
    'mercury',
    'venus',
    'mars',
    'jupiter',
    'saturn',
    'uranus',
    'neptune',
    'pluto',
    'rahu',
    'ketu',
];

export interface SignInfo {
    id: string;
    name: string;
    vedicName: string;
    element: string;
    modality: string;
    ruler: string;
    luckyColor: string;
    luckyNumber: number;
    keywords: string[];
}

export const SIGNS: readonly SignInfo[] = signData.signs;

export const WESTERN_SIGN_NAMES = SIGNS.map((sign) => sign.name);
export const VEDIC_SIGN_NAMES = SIGNS.map((sign) => sign.vedicName);

const BODY_META = new Map(bodyData.bodies.map((body) => [body.id, body]));
const LORD_ANNOTATIONS: Record<string, string> = bodyData.dashaLordAnnotations;

export function normalizeDegrees(value: number): number {
    const result = value % 360;
    return result < 0 ? result + 360 : result;
}

export function roundTo(value: number, decimals: number): number {
    const factor = 10 ** decimals;
    return Math.round(value * factor) / factor;
}

/**
 * Maps the free-form `system` query values the clients send onto the two zodiacs we compute.
 */
export function normalizeSystem(value: unknown, fallback: ZodiacSystem = 'western'): ZodiacSystem {
    if (typeof value !== 'string') return fallback;
    const normalized = value.trim().toLowerCase();
    if (normalized === 'tropical' || normalized === 'western') return 'western';
    if (normalized === 'sidereal' || normalized === 'kundali' || normalized === 'vedic') return 'vedic';
    return fallback;
}

export function signIndexForLongitude(longitude: number): number {
    return Math.floor(normalizeDegrees(longitude) / 30) % 12;
}

export function signNameFor(index: number, system: ZodiacSystem): string {
    const names = system === 'vedic' ? VEDIC_SIGN_NAMES : WESTERN_SIGN_NAMES;
    return names[((index % 12) + 12) % 12];
}

export function findSign(value: string): SignInfo | undefined {
    const needle = value.trim().toLowerCase();
    return SIGNS.find(
        (sign) => sign.id === needle || sign.vedicName.toLowerCase() === needle,
    );
}

export function bodySymbol(id: string): string {
    return BODY_META.get(id.toLowerCase())?.symbol ?? '⭐';
}

export function bodySignificance(id: string): string {
    return BODY_META.get(id.toLowerCase())?.significance ?? 'Cosmic influence';
}

export function lordAnnotation(lord: string): string {
    return LORD_ANNOTATIONS[lord] ?? 'Period of karmic development and learning.';
}

export function titleCase(value: string): string {
    return value.length === 0 ? value : value[0].toUpperCase() + value.slice(1).toLowerCase();
}
