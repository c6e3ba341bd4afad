import { PositionsCache, buildPositionsCacheKey, positionsCacheTtlSeconds } from '../positionsCache';

describe('buildPositionsCacheKey', () => {
    it('buckets the timestamp to the minute', () => {
        const key = buildPositionsCacheKey({
            date: new Date('2024-03-10T08:30:59.999Z'),
            latitude: 12.5,
            longitude: null,
            system: 'vedic',
        });

        expect(key).toBe('2024-03-10T08:30:00.000Z|12.5|-|vedic');
    });
});

describe('positionsCacheTtlSeconds', () => {
    it('keeps today short and history long', () => {
        const now = new Date('2024-03-10T20:00:00Z');

        expect(positionsCacheTtlSeconds(new Date('2024-03-10T01:00:00Z'), now)).toBe(300);
        expect(positionsCacheTtlSeconds(new Date('1990-05-01T01:00:00Z'), now)).toBe(86400);
    });
});

describe('PositionsCache', () => {
    it('expires entries after their ttl', () => {
        let current = new Date('2024-03-10T00:00:00Z');
        const cache = new PositionsCache<string>(10, () => current);

        cache.set('a', 'payload', 60);
        expect(cache.get('a')).toBe('payload');

        current = new Date('2024-03-10T00:01:00Z');
        expect(cache.get('a')).toBeNull();
        expect(cache.size).toBe(0);
    });

    it('evicts the entry closest to expiry when full', () => {
        const cache = new PositionsCache<number>(2, () => new Date('2024-03-10T00:00:00Z'));

        cache.set('short', 1, 10);
        cache.set('long', 2, 1000);
        cache.set('medium', 3, 100);

        expect(cache.size).toBe(2);
        expect(cache.get('short')).toBeNull();
        expect(cache.get('long')).toBe(2);
        expect(cache.get('medium')).toBe(3);
    });
});
