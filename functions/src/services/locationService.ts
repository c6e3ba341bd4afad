/**
 * Location search over the bundled city list.
 */

import cityData from '../data/locations/cities.json';

export interface LocationResult {
    name: string;
    displayName: string;
    latitude: number;
    longitude: number;
    state: string | null;
    country: string;
    timezone: string;
}

export const DEFAULT_LOCATION_LIMIT = 10;
export const MAX_LOCATION_LIMIT = 50;

const LOCATIONS: readonly LocationResult[] = cityData.locations;

export function clampLimit(limit: number | undefined): number {
    if (limit === undefined || !Number.isFinite(limit)) {
        return DEFAULT_LOCATION_LIMIT;
    }
    return Math.min(Math.max(Math.trunc(limit), 1), MAX_LOCATION_LIMIT);
}

export function searchLocations(query: string, limit?: number): LocationResult[] {
    const max = clampLimit(limit);
    const needle = query.trim().toLowerCase();

    if (!needle) {
        return LOCATIONS.slice(0, max);
    }

    return LOCATIONS.filter(
        (location) =>
            location.name.toLowerCase().includes(needle) ||
            location.displayName.toLowerCase().includes(needle),
    ).slice(0, max);
}
