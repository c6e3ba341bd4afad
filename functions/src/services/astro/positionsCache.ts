import type { ZodiacSystem } from './zodiac';

const TODAY_TTL_SECONDS = 300;
const HISTORICAL_TTL_SECONDS = 86400;
export const POSITIONS_CACHE_MAX_ENTRIES = 256;

type CacheEntry<T> = {
    payload: T;
    expiresAt: number;
};

export type PositionsCacheKeyParts = {
    date: Date;
    latitude: number | null;
    longitude: number | null;
    system: ZodiacSystem;
};

/**
 * Buckets the timestamp to the minute so repeated lookups within a minute share an entry.
 */
export function buildPositionsCacheKey(parts: PositionsCacheKeyParts): string {
    const bucket = new Date(parts.date.getTime());
    bucket.setUTCSeconds(0, 0);
    return [bucket.toISOString(), parts.latitude ?? '-', parts.longitude ?? '-', parts.system].join('|');
}

export function positionsCacheTtlSeconds(date: Date, now: Date): number {
    return date.toISOString().slice(0, 10) === now.toISOString().slice(0, 10)
        ? TODAY_TTL_SECONDS
        : HISTORICAL_TTL_SECONDS;
}

export class PositionsCache<T> {
    private readonly entries = new Map<string, CacheEntry<T>>();

    constructor(
        private readonly maxEntries = POSITIONS_CACHE_MAX_ENTRIES,
        private readonly now: () => Date = () => new Date(),
    ) {}

    get size(): number {
        return this.entries.size;
    }

    get(key: string): T | null {
        const entry = this.entries.get(key);
        if (!entry) return null;
        if (entry.expiresAt <= this.now().getTime()) {
            this.entries.delete(key);
            return null;
        }
        return entry.payload;
    }

    set(key: string, payload: T, ttlSeconds: number): void {
        this.entries.set(key, {
            payload,
            expiresAt: this.now().getTime() + ttlSeconds * 1000,
        });

        if (this.entries.size > this.maxEntries) {
            let oldestKey: string | null = null;
            let oldestExpiry = Number.POSITIVE_INFINITY;
            for (const [entryKey, entry] of this.entries) {
                if (entry.expiresAt < oldestExpiry) {
                    oldestExpiry = entry.expiresAt;
                    oldestKey = entryKey;
                }
            }
            if (oldestKey !== null) {
                this.entries.delete(oldestKey);
            }
        }
    }

    clear(): void {
        this.entries.clear();
    }
}
