/**
 * Vimshottari dasha timeline
 *
 * Mahadasha periods follow the nakshatra of the sidereal Moon at birth.
 * Sub-periods split their parent proportionally to each lord's years.
 */

export type DashaLord =
    | 'Ketu'
    | 'Venus'
    | 'Sun'
    | 'Moon'
    | 'Mars'
    | 'Rahu'
    | 'Jupiter'
    | 'Saturn'
    | 'Mercury';

export const VIMSHOTTARI_SEQUENCE: ReadonlyArray<{ lord: DashaLord; years: number }> = [
    { lord: 'Ketu', years: 7 },
    { lord: 'Venus', years: 20 },
    { lord: 'Sun', years: 6 },
    { lord: 'Moon', years: 10 },
    { lord: 'Mars', years: 7 },
    { lord: 'Rahu', years: 18 },
    { lord: 'Jupiter', years: 16 },
    { lord: 'Saturn', years: 19 },
    { lord: 'Mercury', years: 17 },
];

export const TOTAL_CYCLE_YEARS = 120;
export const NAKSHATRA_SPAN = 40 / 3;
const DAYS_PER_MONTH = 30.4375;
const MS_PER_DAY = 86_400_000;

const LORD_ORDER: readonly DashaLord[] = VIMSHOTTARI_SEQUENCE.map((entry) => entry.lord);
const LORD_YEARS = new Map<DashaLord, number>(
    VIMSHOTTARI_SEQUENCE.map((entry) => [entry.lord, entry.years]),
);

export function lordYears(lord: DashaLord): number {
    return LORD_YEARS.get(lord) ?? 0;
}

export interface DashaPeriod {
    lord: DashaLord;
    start: Date;
    end: Date;
}

export interface MahadashaPeriod extends DashaPeriod {
    durationYears: number;
}

export interface AntardashaPeriod extends DashaPeriod {
    durationMonths: number;
}

export interface PratyantardashaPeriod extends DashaPeriod {
    durationDays: number;
}

export interface StartingDasha {
    lord: DashaLord;
    balanceYears: number;
}

function rotateFrom(lord: DashaLord): DashaLord[] {
    const index = LORD_ORDER.indexOf(lord);
    return [...LORD_ORDER.slice(index), ...LORD_ORDER.slice(0, index)];
}

/** Adds calendar years and months (clamping the day to the month length), then whole days. */
export function addYearsMonthsDays(date: Date, years: number, months: number, days: number): Date {
    let targetYear = date.getUTCFullYear() + years;
    let targetMonth = date.getUTCMonth() + months;
    targetYear += Math.floor(targetMonth / 12);
    targetMonth = ((targetMonth % 12) + 12) % 12;

    const monthLength = new Date(Date.UTC(targetYear, targetMonth + 1, 0)).getUTCDate();
    const result = new Date(date.getTime());
    result.setUTCFullYear(targetYear, targetMonth, Math.min(date.getUTCDate(), monthLength));

    return new Date(result.getTime() + days * MS_PER_DAY);
}

/**
 * Splits an integer total across weights: floors first, then hands the
 * leftover units to the largest fractional parts.
 */
export function distributeByLargestRemainder(rawValues: number[], total: number): number[] {
    const floors = rawValues.map((value) => Math.floor(value));
    const remainder = total - floors.reduce((sum, value) => sum + value, 0);

    const byFraction = rawValues
        .map((value, index) => ({ index, fraction: value - floors[index] }))
        .sort((a, b) => b.fraction - a.fraction);

    const allocation = [...floors];
    if (remainder > 0) {
        byFraction.slice(0, Math.min(remainder, byFraction.length)).forEach(({ index }) => {
            allocation[index] += 1;
        });
    }
    return allocation;
}

export function calculateStartingDasha(moonLongitude: number): StartingDasha {
    const normalized = ((moonLongitude % 360) + 360) % 360;
    const nakshatraIndex = Math.min(Math.floor(normalized / NAKSHATRA_SPAN), 26);
    const lord = LORD_ORDER[nakshatraIndex % LORD_ORDER.length];

    const fractionElapsed = (normalized - NAKSHATRA_SPAN * nakshatraIndex) / NAKSHATRA_SPAN;
    return {
        lord,
        balanceYears: lordYears(lord) * (1 - fractionElapsed),
    };
}

export function generateMahadashaTimeline(
    birthDate: Date,
    startingLord: DashaLord,
    balanceYears: number,
    periodCount = 20,
): MahadashaPeriod[] {
    const timeline: MahadashaPeriod[] = [];
    let index = LORD_ORDER.indexOf(startingLord);
    let current = birthDate;

    for (let period = 0; period < periodCount; period++) {
        const lord = LORD_ORDER[index % LORD_ORDER.length];
        const durationYears = period === 0 ? balanceYears : lordYears(lord);

        const wholeYears = Math.trunc(durationYears);
        const fraction = durationYears - wholeYears;
        const months = Math.trunc(fraction * 12);
        const days = Math.trunc((fraction * 12 - months) * DAYS_PER_MONTH);

        const end = addYearsMonthsDays(current, wholeYears, months, days);
        timeline.push({ lord, start: current, end, durationYears });

        current = end;
        index += 1;
    }

    return timeline;
}

export function calculateAntardasha(
    mahadashaLord: DashaLord,
    start: Date,
    end: Date,
): AntardashaPeriod[] {
    const totalSeconds = Math.max(Math.floor((end.getTime() - start.getTime()) / 1000), 1);
    const sequence = rotateFrom(mahadashaLord);
    const allocation = distributeByLargestRemainder(
        sequence.map((lord) => (lordYears(lord) / TOTAL_CYCLE_YEARS) * totalSeconds),
        totalSeconds,
    );

    const toMonths = (seconds: number) =>
        Math.round((seconds / 86400 / DAYS_PER_MONTH) * 10000) / 10000;

    let current = start;
    const periods = sequence.map((lord, index) => {
        const next = new Date(current.getTime() + allocation[index] * 1000);
        const period: AntardashaPeriod = {
            lord,
            start: current,
            end: next,
            durationMonths: toMonths(allocation[index]),
        };
        current = next;
        return period;
    });

    const last = periods[periods.length - 1];
    last.end = end;
    last.durationMonths = toMonths(
        Math.max(Math.floor((end.getTime() - last.start.getTime()) / 1000), 0),
    );

    return periods;
}

export function calculatePratyantardasha(
    antardashaLord: DashaLord,
    start: Date,
    end: Date,
): PratyantardashaPeriod[] {
    const totalDays = Math.max(Math.floor((end.getTime() - start.getTime()) / MS_PER_DAY), 1);
    const sequence = rotateFrom(antardashaLord);
    const allocation = distributeByLargestRemainder(
        sequence.map((lord) => (lordYears(lord) / TOTAL_CYCLE_YEARS) * totalDays),
        totalDays,
    );

    let current = start;
    const periods = sequence.map((lord, index) => {
        const next = new Date(current.getTime() + allocation[index] * MS_PER_DAY);
        const period: PratyantardashaPeriod = {
            lord,
            start: current,
            end: next,
            durationDays: allocation[index],
        };
        current = next;
        return period;
    });

    periods[periods.length - 1].end = end;
    return periods;
}

export function findActivePeriod<T extends DashaPeriod>(periods: T[], target: Date): T | null {
    const time = target.getTime();
    const active = periods.find(
        (period) => period.start.getTime() <= time && time < period.end.getTime(),
    );
    if (active) {
        return active;
    }

    const last = periods[periods.length - 1];
    if (last && last.end.getTime() === time) {
        return last;
    }
    return null;
}
