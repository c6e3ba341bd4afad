/**
 * Discover snapshot
 *
 * One payload for the daily check-in screen: the sky's energy state, how
 * active each life domain is, a couple of suggested actions and the
 * horoscope theme for the sign.
 */

import { BodyPosition, EphemerisService, getEphemerisService } from './astro/ephemeris';
import { HoroscopeType, generateHoroscope } from './astro/horoscope';
import { BodyId, findSign, normalizeDegrees, roundTo } from './astro/zodiac';

export type EnergyState = 'flowing' | 'intense' | 'quiet' | 'volatile';
export type DiscoverDomain = 'self' | 'love' | 'work' | 'mind';

const DISCOVER_DOMAINS: readonly DiscoverDomain[] = ['self', 'love', 'work', 'mind'];

const DOMAIN_PLANETS: Record<DiscoverDomain, readonly BodyId[]> = {
    self: ['sun', 'mars'],
    love: ['venus', 'moon'],
    work: ['saturn', 'jupiter'],
    mind: ['mercury', 'uranus'],
};

const ENERGY_STATES: Record<EnergyState, { description: string; icon: string; action: string }> = {
    flowing: { description: 'High-frequency vibrations, natural ease', icon: 'wind', action: 'Start a new project' },
    intense: { description: 'Amplified energy frequency, powerful focus', icon: 'flame.fill', action: 'Focus on one priority' },
    quiet: { description: 'Low-frequency attunement, inward resonance', icon: 'moon.stars', action: 'Reflect and journal' },
    volatile: { description: 'Shifting frequencies, stay attuned', icon: 'bolt.fill', action: 'Stay flexible with plans' },
};

const DOMAIN_ACTIONS: Record<DiscoverDomain, { do: string; avoid: string }> = {
    self: { do: 'Invest in personal growth', avoid: 'Overcommitting to others' },
    love: { do: 'Reach out to someone you care about', avoid: 'Forcing difficult conversations' },
    work: { do: 'Tackle your most important task', avoid: 'Procrastinating on deadlines' },
    mind: { do: 'Learn something new', avoid: 'Information overload' },
};

export const SNAPSHOT_TTL_SECONDS = 3600;

export interface DiscoverAction {
    id: string;
    text: string;
    type: 'do' | 'avoid';
}

export interface DiscoverSnapshot {
    date: string;
    sign: string;
    personalized: false;
    now: {
        theme: string;
        actions: DiscoverAction[];
    };
    lens: {
        energyState: { id: EnergyState; label: string; description: string; icon: string };
        domainWeights: Record<DiscoverDomain, number>;
        moonPhase: number;
        activations: Array<{ planet: string; sign: string; speed: number; retrograde: boolean }>;
    };
    lucky: { color: string; number: number; element: string };
    keywords: string[];
    cacheHints: { ttlSeconds: number; nextRefresh: string };
}

/** 0 at new moon, 0.5 at full moon. */
export function moonPhase(bodies: BodyPosition[]): number {
    const sun = bodies.find((body) => body.id === 'sun');
    const moon = bodies.find((body) => body.id === 'moon');
    if (!sun || !moon) {
        return 0.5;
    }
    return normalizeDegrees(moon.longitude - sun.longitude) / 360;
}

export function calculateEnergyState(bodies: BodyPosition[], phase: number): EnergyState {
    // the nodes are always retrograde, so they don't count
    const retrogrades = bodies.filter(
        (body) => body.retrograde && body.id !== 'rahu' && body.id !== 'ketu',
    ).length;

    if (retrogrades >= 3) return 'volatile';
    if (phase >= 0.45 && phase <= 0.55) return 'intense';
    if (phase < 0.1 || phase > 0.9) return 'quiet';
    return 'flowing';
}

export function calculateDomainWeights(bodies: BodyPosition[]): Record<DiscoverDomain, number> {
    const speeds = new Map(bodies.map((body) => [body.id, Math.abs(body.speed)]));
    const raw = { self: 0, love: 0, work: 0, mind: 0 };

    DISCOVER_DOMAINS.forEach((domain) => {
        const activity = DOMAIN_PLANETS[domain].reduce(
            (sum, planet) => sum + Math.min(speeds.get(planet) ?? 0.5, 1),
            0,
        );
        raw[domain] = 0.15 + activity * 0.2;
    });

    const total = DISCOVER_DOMAINS.reduce((sum, domain) => sum + raw[domain], 0);
    return {
        self: roundTo(raw.self / total, 2),
        love: roundTo(raw.love / total, 2),
        work: roundTo(raw.work / total, 2),
        mind: roundTo(raw.mind / total, 2),
    };
}

export function topDomain(weights: Record<DiscoverDomain, number>): DiscoverDomain {
    return DISCOVER_DOMAINS.reduce((best, domain) => (weights[domain] > weights[best] ? domain : best));
}

export function generateActions(
    energyState: EnergyState,
    weights: Record<DiscoverDomain, number>,
): DiscoverAction[] {
    const domain = topDomain(weights);
    return [
        { id: 'act_1', text: ENERGY_STATES[energyState].action, type: 'do' },
        { id: 'act_2', text: DOMAIN_ACTIONS[domain].do, type: 'do' },
        { id: 'act_3', text: DOMAIN_ACTIONS[domain].avoid, type: 'avoid' },
    ];
}

export class DiscoverService {
    constructor(private readonly ephemeris: EphemerisService = getEphemerisService()) {}

    buildSnapshot(signId: string, date: Date, type: HoroscopeType = 'daily'): DiscoverSnapshot | null {
        const sign = findSign(signId);
        const horoscope = generateHoroscope(signId, date, type);
        if (!sign || !horoscope) {
            return null;
        }

        const { bodies } = this.ephemeris.getPositions(date);
        const phase = moonPhase(bodies);
        const energyState = calculateEnergyState(bodies, phase);
        const domainWeights = calculateDomainWeights(bodies);
        const meta = ENERGY_STATES[energyState];

        return {
            date: date.toISOString().slice(0, 10),
            sign: sign.id,
            personalized: false,
            now: {
                theme: horoscope.content,
                actions: generateActions(energyState, domainWeights),
            },
            lens: {
                energyState: {
                    id: energyState,
                    label: energyState[0].toUpperCase() + energyState.slice(1),
                    description: meta.description,
                    icon: meta.icon,
                },
                domainWeights,
                moonPhase: roundTo(phase, 3),
                activations: bodies
                    .filter((body) => ['sun', 'moon', 'mercury', 'venus', 'mars'].includes(body.id))
                    .map((body) => ({
                        planet: body.id,
                        sign: body.sign,
                        speed: body.speed,
                        retrograde: body.retrograde,
                    })),
            },
            lucky: horoscope.luckyElements,
            keywords: [...sign.keywords],
            cacheHints: {
                ttlSeconds: SNAPSHOT_TTL_SECONDS,
                nextRefresh: new Date(date.getTime() + SNAPSHOT_TTL_SECONDS * 1000).toISOString(),
            },
        };
    }
}

let discoverServiceInstance: DiscoverService | null = null;

export const getDiscoverService = (): DiscoverService => {
    if (!discoverServiceInstance) {
        discoverServiceInstance = new DiscoverService();
    }
    return discoverServiceInstance;
};
