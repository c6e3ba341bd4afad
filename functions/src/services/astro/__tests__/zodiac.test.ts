import { findSign, normalizeDegrees, normalizeSystem, signIndexForLongitude, signNameFor } from '../zodiac';

describe('zodiac helpers', () => {
    it('normalizes degrees into [0, 360)', () => {
        expect(normalizeDegrees(-30)).toBe(330);
        expect(normalizeDegrees(725)).toBe(5);
    });

    it('maps longitudes to signs for both zodiacs', () => {
        expect(signIndexForLongitude(359.99)).toBe(11);
        expect(signNameFor(signIndexForLongitude(95), 'western')).toBe('Cancer');
        expect(signNameFor(signIndexForLongitude(95), 'vedic')).toBe('Karka');
    });

    it('reads the system aliases the clients send', () => {
        expect(normalizeSystem('Sidereal')).toBe('vedic');
        expect(normalizeSystem('kundali')).toBe('vedic');
        expect(normalizeSystem('tropical')).toBe('western');
        expect(normalizeSystem('chinese', 'vedic')).toBe('vedic');
        expect(normalizeSystem(undefined)).toBe('western');
    });

    it('finds signs by id or vedic name', () => {
        expect(findSign(' Pisces ')?.id).toBe('pisces');
        expect(findSign('vrischika')?.id).toBe('scorpio');
        expect(findSign('Scorpion')).toBeUndefined();
    });
});
