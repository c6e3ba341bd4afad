import type { ChartPositions } from '../ephemeris';
import { toNamedPositions, toPlanetEntries } from '../planetEntries';

const chart: ChartPositions = {
    timestamp: '2024-01-01T00:00:00.000Z',
    system: 'western',
    ayanamsa: null,
    bodies: [
        { id: 'sun', longitude: 280.5, sign: 'Capricorn', degree: 10.5, speed: 1.02, retrograde: false, house: 4 },
        { id: 'mercury', longitude: 262.1, sign: 'Sagittarius', degree: 22.1, speed: -0.3, retrograde: true, house: 3 },
    ],
    ascendant: { id: 'ascendant', longitude: 185.25, sign: 'Libra', degree: 5.25, speed: 0, retrograde: false, house: 1 },
    houseCusps: null,
};

describe('toPlanetEntries', () => {
    it('decorates bodies and appends the ascendant', () => {
        const entries = toPlanetEntries(chart);

        expect(entries).toHaveLength(3);
        expect(entries[0]).toEqual({
            id: 'sun',
            symbol: '☉',
            name: 'Sun',
            sign: 'Capricorn',
            degree: 10.5,
            retrograde: false,
            house: 4,
            significance: 'Core identity and vitality',
        });
        expect(entries[2].name).toBe('Ascendant');
        expect(entries[2].significance).toBe('Rising sign and outer personality');
    });
});

describe('toNamedPositions', () => {
    it('keys positions by title-cased name', () => {
        expect(toNamedPositions({ ...chart, ascendant: null })).toEqual({
            Sun: { degree: 10.5, sign: 'Capricorn' },
            Mercury: { degree: 22.1, sign: 'Sagittarius' },
        });
    });
});
