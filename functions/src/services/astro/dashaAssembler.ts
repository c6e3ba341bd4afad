import * as functions from 'firebase-functions';
import {
    AntardashaPeriod,
    DashaLord,
    MahadashaPeriod,
    NAKSHATRA_SPAN,
    PratyantardashaPeriod,
    calculateAntardasha,
    calculatePratyantardasha,
    calculateStartingDasha,
    findActivePeriod,
    generateMahadashaTimeline,
} from './dashaTimeline';
import { lordAnnotation, roundTo } from './zodiac';

const MS_PER_DAY = 86_400_000;

export type MahadashaPayload = {
    lord: DashaLord;
    start: string;
    end: string;
    duration_years: number;
};

export type AntardashaPayload = {
    lord: DashaLord;
    start: string;
    end: string;
    duration_months: number;
};

export type PratyantardashaPayload = {
    lord: DashaLord;
    start: string;
    end: string;
    duration_days: number;
};

export type CompleteDashaResponse = {
    birth_date: string;
    target_date: string;
    starting_dasha: { lord: DashaLord; balance_years: number };
    mahadasha: MahadashaPayload;
    antardasha: AntardashaPayload | null;
    pratyantardasha: PratyantardashaPayload | null;
    all_antardashas: AntardashaPayload[];
    all_pratyantardashas: PratyantardashaPayload[];
    upcoming_mahadashas?: MahadashaPayload[];
};

export type DashaErrorResponse = {
    error: 'no_active_mahadasha';
    message: string;
    birth_date: string;
    target_date: string;
};

export type DashaTransitionLevel = {
    current_lord: DashaLord;
    days_remaining: number;
    ends_on: string;
    next_lord: DashaLord | null;
    years_remaining?: number;
    months_remaining?: number;
};

export type DashaTransitions = {
    mahadasha?: DashaTransitionLevel;
    antardasha?: DashaTransitionLevel;
    pratyantardasha?: DashaTransitionLevel;
};

export function isDashaError(
    value: CompleteDashaResponse | DashaErrorResponse,
): value is DashaErrorResponse {
    return 'error' in value;
}

export const toIsoDate = (date: Date): string => date.toISOString().slice(0, 10);

const mahadashaPayload = (period: MahadashaPeriod): MahadashaPayload => ({
    lord: period.lord,
    start: toIsoDate(period.start),
    end: toIsoDate(period.end),
    duration_years: roundTo(period.durationYears, 2),
});

const antardashaPayload = (period: AntardashaPeriod): AntardashaPayload => ({
    lord: period.lord,
    start: toIsoDate(period.start),
    end: toIsoDate(period.end),
    duration_months: period.durationMonths,
});

const pratyantardashaPayload = (period: PratyantardashaPeriod): PratyantardashaPayload => ({
    lord: period.lord,
    start: toIsoDate(period.start),
    end: toIsoDate(period.end),
    duration_days: period.durationDays,
});

/** Whole days between two dates, ignoring time of day. */
function daysBetween(from: Date, isoEnd: string): number {
    const startDay = Date.UTC(from.getUTCFullYear(), from.getUTCMonth(), from.getUTCDate());
    const endDay = Date.parse(`${isoEnd}T00:00:00Z`);
    return Math.round((endDay - startDay) / MS_PER_DAY);
}

function nextLord<T extends { lord: DashaLord; start: string }>(
    periods: T[],
    current: T,
): DashaLord | null {
    const index = periods.findIndex(
        (period) => period.lord === current.lord && period.start === current.start,
    );
    if (index < 0 || index >= periods.length - 1) {
        return null;
    }
    return periods[index + 1].lord;
}

export function buildCompleteResponse(
    birthDate: Date,
    moonLongitude: number,
    targetDate: Date,
    includeFuture = true,
    futureCount = 3,
): CompleteDashaResponse | DashaErrorResponse {
    const starting = calculateStartingDasha(moonLongitude);
    const timeline = generateMahadashaTimeline(birthDate, starting.lord, starting.balanceYears, 20);

    const activeMaha = findActivePeriod(timeline, targetDate);
    if (!activeMaha) {
        functions.logger.warn(`[dasha] No active mahadasha for ${toIsoDate(targetDate)}`);
        return {
            error: 'no_active_mahadasha',
            message:
                `No active Mahadasha found for target date ${toIsoDate(targetDate)}. ` +
                `Timeline starts from birth date ${toIsoDate(birthDate)}.`,
            birth_date: toIsoDate(birthDate),
            target_date: toIsoDate(targetDate),
        };
    }

    const antardashas = calculateAntardasha(activeMaha.lord, activeMaha.start, activeMaha.end);
    let activeAntar: AntardashaPeriod | null = findActivePeriod(antardashas, targetDate);
    if (!activeAntar && antardashas.length > 0) {
        functions.logger.warn(`[dasha] No active antardasha for ${toIsoDate(targetDate)}`);
        activeAntar = antardashas[0];
    }

    let pratyantardashas: PratyantardashaPeriod[] = [];
    let activePratyantar: PratyantardashaPeriod | null = null;
    if (activeAntar) {
        pratyantardashas = calculatePratyantardasha(activeAntar.lord, activeAntar.start, activeAntar.end);
        activePratyantar = findActivePeriod(pratyantardashas, targetDate);
    }

    const response: CompleteDashaResponse = {
        birth_date: toIsoDate(birthDate),
        target_date: toIsoDate(targetDate),
        starting_dasha: {
            lord: starting.lord,
            balance_years: roundTo(starting.balanceYears, 4),
        },
        mahadasha: mahadashaPayload(activeMaha),
        antardasha: activeAntar ? antardashaPayload(activeAntar) : null,
        pratyantardasha: activePratyantar ? pratyantardashaPayload(activePratyantar) : null,
        all_antardashas: antardashas.map(antardashaPayload),
        all_pratyantardashas: pratyantardashas.map(pratyantardashaPayload),
    };

    if (includeFuture) {
        const index = timeline.indexOf(activeMaha);
        response.upcoming_mahadashas = timeline
            .slice(index + 1, index + 1 + futureCount)
            .map(mahadashaPayload);
    }

    return response;
}

export function buildTransitionResponse(
    birthDate: Date,
    moonLongitude: number,
    targetDate: Date,
): DashaTransitions {
    const base = buildCompleteResponse(birthDate, moonLongitude, targetDate, true, 3);
    if (isDashaError(base)) {
        return {};
    }

    const transitions: DashaTransitions = {};

    const maha = base.mahadasha;
    const mahaDays = daysBetween(targetDate, maha.end);
    transitions.mahadasha = {
        current_lord: maha.lord,
        days_remaining: mahaDays,
        years_remaining: roundTo(mahaDays / 365.25, 2),
        months_remaining: roundTo(mahaDays / 30.4375, 1),
        ends_on: maha.end,
        next_lord: base.upcoming_mahadashas?.[0]?.lord ?? null,
    };

    if (base.antardasha) {
        const antar = base.antardasha;
        const antarDays = daysBetween(targetDate, antar.end);
        transitions.antardasha = {
            current_lord: antar.lord,
            days_remaining: antarDays,
            months_remaining: roundTo(antarDays / 30.4375, 1),
            ends_on: antar.end,
            next_lord: nextLord(base.all_antardashas, antar),
        };
    }

    if (base.pratyantardasha) {
        const pratyantar = base.pratyantardasha;
        transitions.pratyantardasha = {
            current_lord: pratyantar.lord,
            days_remaining: daysBetween(targetDate, pratyantar.end),
            ends_on: pratyantar.end,
            next_lord: nextLord(base.all_pratyantardashas, pratyantar),
        };
    }

    return transitions;
}

// =============================================================================
// Narrative and education
// =============================================================================

export function buildPeriodNarrative(
    mahaLord: DashaLord,
    antarLord: DashaLord,
    pratyantarLord: DashaLord | null,
): string {
    const parts = [
        `You are in the ${mahaLord} Mahadasha: ${lordAnnotation(mahaLord)}`,
        antarLord === mahaLord
            ? `The ${antarLord} sub-period doubles down on these themes.`
            : `The ${antarLord} Antardasha colours it: ${lordAnnotation(antarLord)}`,
    ];
    if (pratyantarLord) {
        parts.push(`Day to day, ${pratyantarLord} sets the short-term tone.`);
    }
    return parts.join(' ');
}

export function explainDashaCalculation(
    moonLongitude: number,
    startingLord: DashaLord,
    balanceYears: number,
): string {
    const nakshatraNumber = Math.min(Math.floor((((moonLongitude % 360) + 360) % 360) / NAKSHATRA_SPAN), 26) + 1;
    return (
        `Your Moon sat at ${roundTo(moonLongitude, 2)}° sidereal, in nakshatra ${nakshatraNumber} of 27. ` +
        `Its ruler ${startingLord} opened your dasha sequence with ${roundTo(balanceYears, 2)} years remaining.`
    );
}

export function describeDashaLevel(lord: DashaLord, level: 'mahadasha' | 'antardasha'): string {
    const span = level === 'mahadasha' ? 'major period spanning years' : 'sub-period lasting months';
    return `${lord} ${level} (${span}): ${lordAnnotation(lord)}`;
}
