import {
    NAKSHATRA_SPAN,
    addYearsMonthsDays,
    calculateAntardasha,
    calculatePratyantardasha,
    calculateStartingDasha,
    distributeByLargestRemainder,
    findActivePeriod,
    generateMahadashaTimeline,
} from '../dashaTimeline';

const iso = (date: Date) => date.toISOString().slice(0, 10);

describe('calculateStartingDasha', () => {
    it('starts with the full Ketu period at 0 degrees', () => {
        expect(calculateStartingDasha(0)).toEqual({ lord: 'Ketu', balanceYears: 7 });
    });

    it('leaves half the period when the Moon is mid-nakshatra', () => {
        const starting = calculateStartingDasha(NAKSHATRA_SPAN * 1.5);

        expect(starting.lord).toBe('Venus');
        expect(starting.balanceYears).toBeCloseTo(10, 10);
    });

    it('maps the last nakshatra to Mercury and wraps negative longitudes', () => {
        expect(calculateStartingDasha(359).lord).toBe('Mercury');
        expect(calculateStartingDasha(359).balanceYears).toBeCloseTo(1.275, 6);
        expect(calculateStartingDasha(-1).lord).toBe('Mercury');
    });
});

describe('addYearsMonthsDays', () => {
    it('clamps the day to the target month', () => {
        expect(iso(addYearsMonthsDays(new Date('2023-01-31T00:00:00Z'), 0, 1, 0))).toBe('2023-02-28');
        expect(iso(addYearsMonthsDays(new Date('2020-11-15T00:00:00Z'), 1, 3, 5))).toBe('2022-02-20');
    });
});

describe('distributeByLargestRemainder', () => {
    it('hands leftover units to the largest fractions', () => {
        expect(distributeByLargestRemainder([1.5, 1.5, 2], 5)).toEqual([2, 1, 2]);
        expect(distributeByLargestRemainder([0.2, 0.7, 2.1], 3)).toEqual([0, 1, 2]);
    });
});

describe('generateMahadashaTimeline', () => {
    it('runs the balance first, then full periods in sequence', () => {
        const timeline = generateMahadashaTimeline(new Date('2000-01-01T00:00:00Z'), 'Ketu', 7, 3);

        expect(timeline.map((period) => [period.lord, iso(period.start), iso(period.end)])).toEqual([
            ['Ketu', '2000-01-01', '2007-01-01'],
            ['Venus', '2007-01-01', '2027-01-01'],
            ['Sun', '2027-01-01', '2033-01-01'],
        ]);
    });

    it('converts a fractional balance into months', () => {
        const [first] = generateMahadashaTimeline(new Date('2000-01-01T00:00:00Z'), 'Venus', 10.5, 1);

        expect(iso(first.end)).toBe('2010-07-01');
        expect(first.durationYears).toBe(10.5);
    });
});

describe('sub-periods', () => {
    const start = new Date('2007-01-01T00:00:00Z');
    const end = new Date('2027-01-01T00:00:00Z');

    it('splits a mahadasha into nine contiguous antardashas starting with its own lord', () => {
        const periods = calculateAntardasha('Venus', start, end);

        expect(periods.map((period) => period.lord)).toEqual([
            'Venus', 'Sun', 'Moon', 'Mars', 'Rahu', 'Jupiter', 'Saturn', 'Mercury', 'Ketu',
        ]);
        expect(periods[0].start).toEqual(start);
        expect(periods[8].end).toEqual(end);
        periods.slice(1).forEach((period, index) => {
            expect(period.start).toEqual(periods[index].end);
        });
    });

    it('splits an antardasha into whole-day pratyantardashas', () => {
        const periods = calculatePratyantardasha('Sun', new Date('2020-01-01T00:00:00Z'), new Date('2021-01-01T00:00:00Z'));
        const totalDays = periods.reduce((sum, period) => sum + period.durationDays, 0);

        expect(periods[0].lord).toBe('Sun');
        expect(totalDays).toBe(366);
        expect(periods[8].end).toEqual(new Date('2021-01-01T00:00:00Z'));
    });

    it('finds the active period and treats the final end as inclusive', () => {
        const periods = calculateAntardasha('Venus', start, end);

        expect(findActivePeriod(periods, new Date('2008-01-01T00:00:00Z'))?.lord).toBe('Venus');
        expect(findActivePeriod(periods, end)?.lord).toBe('Ketu');
        expect(findActivePeriod(periods, new Date('2030-01-01T00:00:00Z'))).toBeNull();
    });
});
