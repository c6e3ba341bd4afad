/**
 * Birth data parsing
 *
 * Accepts the birth payloads the clients send, either nested under a key
 * (`{ birthData: {...} }`) or flat (`{ birth_date, birth_time, ... }`),
 * and resolves the local wall-clock time to a UTC instant.
 */

export class BirthDataError extends Error {
    readonly code = 'invalid_birth_data' as const;

    constructor(message: string) {
        super(message);
        this.name = 'BirthDataError';
    }
}

export interface ParsedBirthData {
    /** The birth instant in UTC. */
    instant: Date;
    date: string;
    time: string;
    timezone: string;
    latitude: number | null;
    longitude: number | null;
}

export interface ParseBirthDataOptions {
    key?: string;
    requireCoords?: boolean;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, ...keys: string[]): string | undefined {
    for (const key of keys) {
        const value = source[key];
        if (typeof value === 'string' && value.trim().length > 0) {
            return value.trim();
        }
    }
    return undefined;
}

function readNumber(source: Record<string, unknown>, ...keys: string[]): number | null {
    for (const key of keys) {
        const value = source[key];
        if (typeof value === 'number' && Number.isFinite(value)) {
            return value;
        }
        if (typeof value === 'string' && value.trim().length > 0) {
            const parsed = Number(value);
            if (Number.isFinite(parsed)) {
                return parsed;
            }
        }
    }
    return null;
}

/** Parses a `YYYY-MM-DD` string as UTC midnight; null when malformed or not a real date. */
export function parseDateOnly(value: unknown): Date | null {
    if (typeof value !== 'string') {
        return null;
    }
    const match = DATE_PATTERN.exec(value.trim());
    if (!match) {
        return null;
    }
    const date = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
    if (date.getUTCDate() !== Number(match[3]) || date.getUTCMonth() !== Number(match[2]) - 1) {
        return null;
    }
    return date;
}

export function isValidTimezone(timezone: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone: timezone });
        return true;
    } catch {
        return false;
    }
}

/** Offset of `timezone` from UTC at `instant`, in milliseconds. */
export function timezoneOffsetMs(instant: Date, timezone: string): number {
    const formatter = new Intl.DateTimeFormat('en-US', {
        timeZone: timezone,
        hourCycle: 'h23',
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
    });

    const parts: Record<string, number> = {};
    for (const part of formatter.formatToParts(instant)) {
        if (part.type !== 'literal') {
            parts[part.type] = Number(part.value);
        }
    }

    const asUtc = Date.UTC(
        parts.year,
        parts.month - 1,
        parts.day,
        parts.hour,
        parts.minute,
        parts.second,
    );
    return asUtc - (instant.getTime() - instant.getUTCMilliseconds());
}

/**
 * Converts a wall-clock time in `timezone` to a UTC instant. Two passes so that
 * times near a DST change pick up the offset in force at the result.
 */
export function zonedTimeToUtc(date: string, time: string, timezone: string): Date {
    const dateMatch = DATE_PATTERN.exec(date);
    if (!dateMatch) {
        throw new BirthDataError(`Invalid date "${date}", expected YYYY-MM-DD`);
    }
    const timeMatch = TIME_PATTERN.exec(time);
    if (!timeMatch) {
        throw new BirthDataError(`Invalid time "${time}", expected HH:MM`);
    }
    if (!isValidTimezone(timezone)) {
        throw new BirthDataError(`Unknown timezone "${timezone}"`);
    }

    const [year, month, day] = [Number(dateMatch[1]), Number(dateMatch[2]), Number(dateMatch[3])];
    const [hour, minute, second] = [Number(timeMatch[1]), Number(timeMatch[2]), Number(timeMatch[3] ?? 0)];

    if (month < 1 || month > 12 || day < 1 || day > 31) {
        throw new BirthDataError(`Invalid date "${date}"`);
    }
    if (hour > 23 || minute > 59 || second > 59) {
        throw new BirthDataError(`Invalid time "${time}"`);
    }

    const wallClock = Date.UTC(year, month - 1, day, hour, minute, second);
    const probe = new Date(wallClock);
    if (probe.getUTCDate() !== day || probe.getUTCMonth() !== month - 1) {
        throw new BirthDataError(`Invalid date "${date}"`);
    }

    const firstPass = wallClock - timezoneOffsetMs(probe, timezone);
    return new Date(wallClock - timezoneOffsetMs(new Date(firstPass), timezone));
}

export function parseBirthData(
    payload: unknown,
    options: ParseBirthDataOptions = {},
): ParsedBirthData {
    const key = options.key ?? 'birthData';
    const requireCoords = options.requireCoords ?? true;

    if (!isRecord(payload)) {
        throw new BirthDataError('Birth data is required');
    }
    const source = isRecord(payload[key]) ? payload[key] : payload;
    if (!isRecord(source)) {
        throw new BirthDataError('Birth data is required');
    }

    const date = readString(source, 'date', 'birth_date', 'birthDate');
    if (!date) {
        throw new BirthDataError('Birth date is required');
    }

    const time = readString(source, 'time', 'birth_time', 'birthTime') ?? '12:00';
    const timezone = readString(source, 'timezone', 'tz') ?? 'UTC';
    const latitude = readNumber(source, 'latitude', 'lat');
    const longitude = readNumber(source, 'longitude', 'lon', 'lng');

    if (requireCoords && (latitude === null || longitude === null)) {
        throw new BirthDataError('Birth latitude and longitude are required');
    }
    if (latitude !== null && (latitude < -90 || latitude > 90)) {
        throw new BirthDataError('Latitude must be between -90 and 90');
    }
    if (longitude !== null && (longitude < -180 || longitude > 180)) {
        throw new BirthDataError('Longitude must be between -180 and 180');
    }

    return {
        instant: zonedTimeToUtc(date, time, timezone),
        date,
        time,
        timezone,
        latitude,
        longitude,
    };
}
