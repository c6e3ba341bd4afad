import type { BodyPosition, ChartPositions } from './ephemeris';
import { bodySignificance, bodySymbol, titleCase } from './zodiac';

export interface PlanetEntry {
    id: string;
    symbol: string;
    name: string;
    sign: string;
    degree: number;
    retrograde: boolean;
    house: number | null;
    significance: string;
}

export type NamedPositions = Record<string, { degree: number; sign: string }>;

function chartBodies(chart: ChartPositions): BodyPosition[] {
    return chart.ascendant ? [...chart.bodies, chart.ascendant] : chart.bodies;
}

/** Client-facing planet list; the ascendant is appended when the chart has one. */
export function toPlanetEntries(chart: ChartPositions): PlanetEntry[] {
    return chartBodies(chart).map((body) => ({
        id: body.id,
        symbol: bodySymbol(body.id),
        name: titleCase(body.id),
        sign: body.sign,
        degree: body.degree,
        retrograde: body.retrograde,
        house: body.house,
        significance: bodySignificance(body.id),
    }));
}

/** `{ Sun: { degree, sign }, ... }` keyed by title-cased body name. */
export function toNamedPositions(chart: ChartPositions): NamedPositions {
    const result: NamedPositions = {};
    chartBodies(chart).forEach((body) => {
        result[titleCase(body.id)] = { degree: body.degree, sign: body.sign };
    });
    return result;
}
