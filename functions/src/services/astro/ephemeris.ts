/**
 * Analytic Ephemeris
 *
 * Low-precision planetary positions computed from mean orbital elements
 * (good to roughly a degree for the inner planets over a few centuries).
 * Sun and Moon use truncated series; Rahu is the mean lunar node.
 */

import orbitalElementData from '../../data/astro/orbitalElements.json';
import {
    BODY_IDS,
    BodyId,
    ZodiacSystem,
    normalizeDegrees,
    roundTo,
    signIndexForLongitude,
    signNameFor,
} from './zodiac';
import {
    PositionsCache,
    buildPositionsCacheKey,
    positionsCacheTtlSeconds,
} from './positionsCache';

// =============================================================================
// Constants
// =============================================================================

export const J2000 = 2451545.0;
const DAYS_PER_CENTURY = 36525.0;
const OBLIQUITY_J2000 = 23.43929111;
const RAD = Math.PI / 180;
const DEG = 180 / Math.PI;

type OrbitalElements = {
    name: string;
    a: number[];
    e: number[];
    i: number[];
    L: number[];
    w: number[];
    O: number[];
};

const ORBITAL_ELEMENTS = new Map<string, OrbitalElements>(
    orbitalElementData.bodies.map((body) => [body.name, body]),
);

// =============================================================================
// Types
// =============================================================================

export interface BodyPosition {
    id: BodyId | 'ascendant';
    longitude: number;
    sign: string;
    degree: number;
    speed: number;
    retrograde: boolean;
    house: number | null;
}

export interface ChartPositions {
    timestamp: string;
    system: ZodiacSystem;
    ayanamsa: number | null;
    bodies: BodyPosition[];
    ascendant: BodyPosition | null;
    houseCusps: number[] | null;
}

export interface PositionOptions {
    latitude?: number | null;
    longitude?: number | null;
    system?: ZodiacSystem;
}

// =============================================================================
// Time
// =============================================================================

export function julianDay(date: Date): number {
    const year = date.getUTCFullYear();
    const month = date.getUTCMonth() + 1;
    const day = date.getUTCDate();

    const a = Math.floor((14 - month) / 12);
    const y = year + 4800 - a;
    const m = month + 12 * a - 3;

    const dayNumber =
        day +
        Math.floor((153 * m + 2) / 5) +
        365 * y +
        Math.floor(y / 4) -
        Math.floor(y / 100) +
        Math.floor(y / 400) -
        32045;

    const fractionOfDay =
        (date.getUTCHours() - 12) / 24 +
        date.getUTCMinutes() / 1440 +
        (date.getUTCSeconds() + date.getUTCMilliseconds() / 1000) / 86400;

    return dayNumber + fractionOfDay;
}

export function centuriesSinceJ2000(jd: number): number {
    return (jd - J2000) / DAYS_PER_CENTURY;
}

/** Greenwich mean sidereal time, in degrees. */
export function greenwichSiderealTime(jd: number): number {
    const T = centuriesSinceJ2000(jd);
    const gmst =
        280.46061837 +
        360.98564736629 * (jd - J2000) +
        T * T * (0.000387933 - T / 38710000.0);
    return normalizeDegrees(gmst);
}

/** Lahiri-style ayanamsa, linear in time around J2000. */
export function ayanamsa(jd: number): number {
    return 23.85305 + 1.39697 * centuriesSinceJ2000(jd);
}

// =============================================================================
// Geocentric tropical longitudes
// =============================================================================

export function sunLongitude(jd: number): number {
    const T = centuriesSinceJ2000(jd);
    const L0 = 280.46646 + 36000.76983 * T + 0.0003032 * T * T;
    const M = (357.52911 + 35999.05029 * T - 0.0001537 * T * T) * RAD;
    const C =
        (1.914602 - 0.004817 * T - 0.000014 * T * T) * Math.sin(M) +
        (0.019993 - 0.000101 * T) * Math.sin(2 * M) +
        0.000289 * Math.sin(3 * M);
    return normalizeDegrees(L0 + C);
}

export function moonLongitude(jd: number): number {
    const d = jd - J2000;
    const L = 218.316 + 13.176396 * d;
    const M = normalizeDegrees(134.963 + 13.064993 * d) * RAD;
    const F = normalizeDegrees(93.272 + 13.22935 * d) * RAD;

    const correction =
        6.289 * Math.sin(M) +
        1.274 * Math.sin(2 * F - M) +
        0.658 * Math.sin(2 * F) +
        0.214 * Math.sin(2 * M) -
        0.186 * Math.sin(M - 2 * F) -
        0.114 * Math.sin(2 * F);

    return normalizeDegrees(L + correction);
}

export function meanNodeLongitude(jd: number): number {
    const T = centuriesSinceJ2000(jd);
    return normalizeDegrees(125.04452 - 1934.136261 * T);
}

function solveKepler(meanAnomaly: number, eccentricity: number): number {
    let E = meanAnomaly + eccentricity * Math.sin(meanAnomaly);
    for (let iteration = 0; iteration < 30; iteration++) {
        const delta = (E - eccentricity * Math.sin(E) - meanAnomaly) / (1 - eccentricity * Math.cos(E));
        E -= delta;
        if (Math.abs(delta) < 1e-10) break;
    }
    return E;
}

function heliocentricVector(name: string, jd: number): [number, number, number] {
    const elements = ORBITAL_ELEMENTS.get(name);
    if (!elements) {
        throw new Error(`No orbital elements for ${name}`);
    }

    const T = centuriesSinceJ2000(jd);
    const at = (pair: number[]) => pair[0] + pair[1] * T;

    const a = at(elements.a);
    const e = at(elements.e);
    const i = at(elements.i) * RAD;
    const L = normalizeDegrees(at(elements.L));
    const w = normalizeDegrees(at(elements.w));
    const O = normalizeDegrees(at(elements.O));

    const M = normalizeDegrees(L - w) * RAD;
    const E = solveKepler(M, e);
    const trueAnomaly = 2 * Math.atan(Math.sqrt((1 + e) / (1 - e)) * Math.tan(E / 2));
    const r = a * (1 - e * Math.cos(E));

    // argument of latitude = true anomaly + argument of perihelion
    const u = trueAnomaly + (w - O) * RAD;
    const node = O * RAD;

    return [
        r * (Math.cos(node) * Math.cos(u) - Math.sin(node) * Math.sin(u) * Math.cos(i)),
        r * (Math.sin(node) * Math.cos(u) + Math.cos(node) * Math.sin(u) * Math.cos(i)),
        r * Math.sin(u) * Math.sin(i),
    ];
}

export function planetLongitude(name: string, jd: number): number {
    const [xp, yp] = heliocentricVector(name, jd);
    const [xe, ye] = heliocentricVector('earth', jd);
    return normalizeDegrees(Math.atan2(yp - ye, xp - xe) * DEG);
}

export function tropicalLongitude(body: BodyId, jd: number): number {
    switch (body) {
        case 'sun':
            return sunLongitude(jd);
        case 'moon':
            return moonLongitude(jd);
        case 'rahu':
            return meanNodeLongitude(jd);
        case 'ketu':
            return normalizeDegrees(meanNodeLongitude(jd) + 180);
        default:
            return planetLongitude(body, jd);
    }
}

/** Signed daily motion in degrees, wrapped into (-180, 180]. */
function dailyMotion(body: BodyId, jd: number): number {
    const delta = tropicalLongitude(body, jd + 1) - tropicalLongitude(body, jd);
    return normalizeDegrees(delta + 180) - 180;
}

// =============================================================================
// Angles and houses
// =============================================================================

export function ascendantLongitude(jd: number, latitude: number, longitude: number): number {
    const lst = normalizeDegrees(greenwichSiderealTime(jd) + longitude) * RAD;
    const epsilon = OBLIQUITY_J2000 * RAD;
    const phi = latitude * RAD;
    const asc = Math.atan2(
        Math.cos(lst),
        -(Math.sin(lst) * Math.cos(epsilon) + Math.tan(phi) * Math.sin(epsilon)),
    );
    return normalizeDegrees(asc * DEG);
}

export function midheavenLongitude(jd: number, longitude: number): number {
    const lst = normalizeDegrees(greenwichSiderealTime(jd) + longitude) * RAD;
    const epsilon = OBLIQUITY_J2000 * RAD;
    return normalizeDegrees(Math.atan2(Math.sin(lst), Math.cos(lst) * Math.cos(epsilon)) * DEG);
}

/**
 * Quadrant trisection: the angles fix houses 1/4/7/10 and each quadrant
 * between them is divided into three equal arcs.
 */
export function houseCusps(ascendant: number, midheaven: number): number[] {
    const ic = normalizeDegrees(midheaven + 180);
    const descendant = normalizeDegrees(ascendant + 180);
    const cusps = new Array<number>(12).fill(0);

    const quadrants: Array<[number, number, number]> = [
        [0, ascendant, ic],
        [3, ic, descendant],
        [6, descendant, midheaven],
        [9, midheaven, ascendant],
    ];

    for (const [index, start, end] of quadrants) {
        const arc = normalizeDegrees(end - start);
        cusps[index] = start;
        cusps[index + 1] = normalizeDegrees(start + arc / 3);
        cusps[index + 2] = normalizeDegrees(start + (2 * arc) / 3);
    }

    return cusps;
}

export function houseForLongitude(longitude: number, cusps: number[]): number {
    const value = normalizeDegrees(longitude);
    for (let index = 0; index < 12; index++) {
        const current = cusps[index];
        const next = cusps[(index + 1) % 12];
        if (current < next) {
            if (value >= current && value < next) return index + 1;
        } else if (value >= current || value < next) {
            return index + 1;
        }
    }
    return 1;
}

// =============================================================================
// Service
// =============================================================================

function buildPosition(
    id: BodyPosition['id'],
    longitude: number,
    speed: number,
    retrograde: boolean,
    system: ZodiacSystem,
): BodyPosition {
    const normalized = normalizeDegrees(longitude);
    return {
        id,
        longitude: roundTo(normalized, 2),
        sign: signNameFor(signIndexForLongitude(normalized), system),
        degree: roundTo(normalized % 30, 2),
        speed: roundTo(speed, 4),
        retrograde,
        house: null,
    };
}

export class EphemerisService {
    constructor(
        private readonly cache = new PositionsCache<ChartPositions>(),
        private readonly now: () => Date = () => new Date(),
    ) {}

    getCurrentPositions(options: PositionOptions = {}): ChartPositions {
        return this.getPositions(this.now(), options);
    }

    getPositions(date: Date, options: PositionOptions = {}): ChartPositions {
        const system = options.system ?? 'western';
        const latitude = typeof options.latitude === 'number' ? options.latitude : null;
        const longitude = typeof options.longitude === 'number' ? options.longitude : null;

        const cacheKey = buildPositionsCacheKey({ date, latitude, longitude, system });
        const cached = this.cache.get(cacheKey);
        if (cached) {
            return cached;
        }

        const jd = julianDay(date);
        const offset = system === 'vedic' ? ayanamsa(jd) : 0;

        const bodies = BODY_IDS.map((body) => {
            const speed = dailyMotion(body, jd);
            const retrograde = body === 'rahu' || body === 'ketu' ? true : speed < 0;
            return buildPosition(body, tropicalLongitude(body, jd) - offset, speed, retrograde, system);
        });

        let ascendant: BodyPosition | null = null;
        let cusps: number[] | null = null;

        if (latitude !== null && longitude !== null) {
            const asc = normalizeDegrees(ascendantLongitude(jd, latitude, longitude) - offset);
            const mc = normalizeDegrees(midheavenLongitude(jd, longitude) - offset);
            cusps = houseCusps(asc, mc).map((cusp) => roundTo(cusp, 2));
            ascendant = { ...buildPosition('ascendant', asc, 0, false, system), house: 1 };
            for (const body of bodies) {
                body.house = houseForLongitude(body.longitude, cusps);
            }
        }

        const payload: ChartPositions = {
            timestamp: date.toISOString(),
            system,
            ayanamsa: system === 'vedic' ? roundTo(offset, 6) : null,
            bodies,
            ascendant,
            houseCusps: cusps,
        };

        this.cache.set(cacheKey, payload, positionsCacheTtlSeconds(date, this.now()));
        return payload;
    }

    /** Sidereal Moon longitude, the input to the Vimshottari dasha timeline. */
    getSiderealMoonLongitude(date: Date): number {
        const jd = julianDay(date);
        return normalizeDegrees(moonLongitude(jd) - ayanamsa(jd));
    }
}

// =============================================================================
// Singleton Instance
// =============================================================================

let ephemerisServiceInstance: EphemerisService | null = null;

export const getEphemerisService = (): EphemerisService => {
    if (!ephemerisServiceInstance) {
        ephemerisServiceInstance = new EphemerisService();
    }
    return ephemerisServiceInstance;
};
