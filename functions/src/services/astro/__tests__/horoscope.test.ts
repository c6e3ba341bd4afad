import { GUIDANCE_THEMES, dayOfYear, generateHoroscope, isHoroscopeType } from '../horoscope';

describe('dayOfYear', () => {
    it('counts from 1 and includes leap days', () => {
        expect(dayOfYear(new Date('2024-01-01T23:00:00Z'))).toBe(1);
        expect(dayOfYear(new Date('2024-03-01T00:00:00Z'))).toBe(61);
        expect(dayOfYear(new Date('2023-12-31T00:00:00Z'))).toBe(365);
    });
});

describe('generateHoroscope', () => {
    it('picks the theme from sign, day and type', () => {
        expect(generateHoroscope('aries', new Date('2024-01-01T00:00:00Z'), 'daily')).toEqual({
            id: 'aries-20240101-daily',
            sign: 'aries',
            date: '2024-01-01',
            type: 'daily',
            content: `Aries — ${GUIDANCE_THEMES[1]}`,
            luckyElements: { color: 'Red', number: 9, element: 'Fire' },
        });
    });

    it('varies with the type', () => {
        const monthly = generateHoroscope('taurus', new Date('2024-01-01T00:00:00Z'), 'monthly');

        expect(monthly?.content).toBe(`Taurus — ${GUIDANCE_THEMES[4]}`);
        expect(monthly?.luckyElements).toEqual({ color: 'Green', number: 6, element: 'Earth' });
    });

    it('accepts vedic sign names and is deterministic', () => {
        const date = new Date('2024-03-01T00:00:00Z');
        const first = generateHoroscope('Simha', date, 'weekly');

        expect(first?.sign).toBe('leo');
        expect(first?.content).toBe(`Leo — ${GUIDANCE_THEMES[1]}`);
        expect(generateHoroscope('leo', date, 'weekly')).toEqual(first);
    });

    it('returns null for an unknown sign', () => {
        expect(generateHoroscope('ophiuchus', new Date(), 'daily')).toBeNull();
    });
});

describe('isHoroscopeType', () => {
    it('accepts the three periods only', () => {
        expect(isHoroscopeType('weekly')).toBe(true);
        expect(isHoroscopeType('yearly')).toBe(false);
    });
});
