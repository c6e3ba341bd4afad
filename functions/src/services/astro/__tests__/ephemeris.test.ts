import {
    EphemerisService,
    J2000,
    ayanamsa,
    houseCusps,
    houseForLongitude,
    julianDay,
    meanNodeLongitude,
    sunLongitude,
} from '../ephemeris';
import { PositionsCache } from '../positionsCache';

const J2000_DATE = new Date('2000-01-01T12:00:00Z');

describe('julianDay', () => {
    it('returns the J2000 epoch for noon on 2000-01-01', () => {
        expect(julianDay(J2000_DATE)).toBe(J2000);
    });

    it('counts fractional days from noon', () => {
        expect(julianDay(new Date('2000-01-01T00:00:00Z'))).toBe(J2000 - 0.5);
        expect(julianDay(new Date('2000-01-02T18:00:00Z'))).toBe(J2000 + 1.25);
    });
});

describe('analytic longitudes', () => {
    it('places the Sun early in Capricorn at J2000', () => {
        expect(sunLongitude(J2000)).toBeCloseTo(280.38, 1);
    });

    it('starts the mean node in Leo at J2000', () => {
        expect(meanNodeLongitude(J2000)).toBeCloseTo(125.04452, 5);
    });

    it('grows the ayanamsa by about 1.4 degrees per century', () => {
        expect(ayanamsa(J2000)).toBeCloseTo(23.85305, 5);
        expect(ayanamsa(J2000 + 36525)).toBeCloseTo(25.25002, 5);
    });
});

describe('houses', () => {
    it('fixes the angles and trisects each quadrant', () => {
        const cusps = houseCusps(0, 270);

        expect(cusps).toEqual([0, 30, 60, 90, 120, 150, 180, 210, 240, 270, 300, 330]);
    });

    it('finds the house for a longitude, across the 0 degree wrap', () => {
        const cusps = [350, 20, 50, 80, 110, 140, 170, 200, 230, 260, 290, 320];

        expect(houseForLongitude(355, cusps)).toBe(1);
        expect(houseForLongitude(5, cusps)).toBe(1);
        expect(houseForLongitude(20, cusps)).toBe(2);
        expect(houseForLongitude(325, cusps)).toBe(12);
    });
});

describe('EphemerisService', () => {
    const now = () => new Date('2024-06-01T00:00:00Z');

    it('returns twelve bodies without houses when no location is given', () => {
        const service = new EphemerisService(new PositionsCache(), now);
        const chart = service.getPositions(J2000_DATE);

        expect(chart.system).toBe('western');
        expect(chart.ayanamsa).toBeNull();
        expect(chart.ascendant).toBeNull();
        expect(chart.houseCusps).toBeNull();
        expect(chart.bodies.map((body) => body.id)).toEqual([
            'sun', 'moon', 'mercury', 'venus', 'mars', 'jupiter',
            'saturn', 'uranus', 'neptune', 'pluto', 'rahu', 'ketu',
        ]);
        expect(chart.bodies.every((body) => body.house === null)).toBe(true);
    });

    it('names western signs for the Sun, Moon and nodes at J2000', () => {
        const service = new EphemerisService(new PositionsCache(), now);
        const bodies = new Map(service.getPositions(J2000_DATE).bodies.map((body) => [body.id, body]));

        expect(bodies.get('sun')?.sign).toBe('Capricorn');
        expect(bodies.get('moon')?.sign).toBe('Scorpio');
        expect(bodies.get('rahu')?.sign).toBe('Leo');
        expect(bodies.get('ketu')?.sign).toBe('Aquarius');
        expect(bodies.get('rahu')?.retrograde).toBe(true);
        expect(bodies.get('ketu')?.retrograde).toBe(true);
        expect(bodies.get('sun')?.retrograde).toBe(false);
    });

    it('shifts vedic positions by the ayanamsa and uses vedic sign names', () => {
        const service = new EphemerisService(new PositionsCache(), now);
        const chart = service.getPositions(J2000_DATE, { system: 'vedic' });
        const sun = chart.bodies.find((body) => body.id === 'sun');

        expect(chart.ayanamsa).toBeCloseTo(23.85305, 5);
        expect(sun?.sign).toBe('Dhanu');
        expect(sun?.longitude).toBeCloseTo(256.53, 1);
    });

    it('adds the ascendant and house cusps when a location is given', () => {
        const service = new EphemerisService(new PositionsCache(), now);
        const chart = service.getPositions(J2000_DATE, { latitude: 51.5, longitude: -0.12 });

        expect(chart.ascendant?.id).toBe('ascendant');
        expect(chart.ascendant?.house).toBe(1);
        expect(chart.houseCusps).toHaveLength(12);
        expect(chart.houseCusps?.[0]).toBeCloseTo(chart.ascendant?.longitude ?? -1, 1);
        chart.bodies.forEach((body) => {
            expect(body.house).toBeGreaterThanOrEqual(1);
            expect(body.house).toBeLessThanOrEqual(12);
        });
    });

    it('serves repeated lookups within the same minute from the cache', () => {
        const service = new EphemerisService(new PositionsCache(), now);

        const first = service.getPositions(new Date('2024-06-01T10:15:05Z'));
        const second = service.getPositions(new Date('2024-06-01T10:15:40Z'));
        const otherSystem = service.getPositions(new Date('2024-06-01T10:15:40Z'), { system: 'vedic' });

        expect(second).toBe(first);
        expect(otherSystem).not.toBe(first);
    });

    it('uses the injected clock for current positions', () => {
        const service = new EphemerisService(new PositionsCache(), now);

        expect(service.getCurrentPositions().timestamp).toBe('2024-06-01T00:00:00.000Z');
    });

    it('computes the sidereal Moon used by the dasha timeline', () => {
        const service = new EphemerisService(new PositionsCache(), now);
        const tropicalMoon = service.getPositions(J2000_DATE).bodies.find((body) => body.id === 'moon');

        expect(service.getSiderealMoonLongitude(J2000_DATE)).toBeCloseTo(
            (tropicalMoon?.longitude ?? 0) - 23.85305,
            1,
        );
    });
});
