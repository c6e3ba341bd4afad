import { roundTo } from './zodiac';

export type AspectName = 'conjunction' | 'sextile' | 'square' | 'trine' | 'opposition';

export const ASPECT_ANGLES: Record<AspectName, number> = {
    conjunction: 0,
    sextile: 60,
    square: 90,
    trine: 120,
    opposition: 180,
};

const ASPECT_NAMES: readonly AspectName[] = ['conjunction', 'sextile', 'square', 'trine', 'opposition'];

export const DEFAULT_ORB = 6;

export interface Aspect {
    planet1: string;
    planet2: string;
    aspect: AspectName;
    orb: number;
}

export type BodyLongitude = {
    id: string;
    longitude: number;
};

/** Shortest angular separation in [0, 180]. */
export function angularSeparation(a: number, b: number): number {
    const wrapped = (((a - b + 180) % 360) + 360) % 360;
    return Math.abs(wrapped - 180);
}

/**
 * Pairs every body with every later body and reports the first major aspect
 * within orb. Output follows the input body order.
 */
export function computeAspects(
    bodies: BodyLongitude[],
    orbs: Partial<Record<AspectName, number>> = {},
): Aspect[] {
    const aspects: Aspect[] = [];

    for (let i = 0; i < bodies.length; i++) {
        for (let j = i + 1; j < bodies.length; j++) {
            const separation = angularSeparation(bodies[i].longitude, bodies[j].longitude);
            for (const name of ASPECT_NAMES) {
                const delta = Math.abs(separation - ASPECT_ANGLES[name]);
                if (delta <= (orbs[name] ?? DEFAULT_ORB)) {
                    aspects.push({
                        planet1: bodies[i].id,
                        planet2: bodies[j].id,
                        aspect: name,
                        orb: roundTo(delta, 2),
                    });
                    break;
                }
            }
        }
    }

    return aspects;
}
