const MS_PER_DAY = 24 * 60 * 60 * 1000;
const DAYS_PER_YEAR = 365;

const ISO_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?)?Z?$/;
const DAY_FIRST_PATTERN = /^(\d{1,2})[\/.-](\d{1,2})[\/.-](\d{4}|\d{2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

interface DateParts {
    year: number;
    month: number;
    day: number;
    hour: number;
    minute: number;
    second: number;
    millisecond: number;
}

// Two-digit years follow the POSIX %y pivot: 69-99 -> 19xx, 00-68 -> 20xx.
const expandYear = (raw: string): number => {
    const year = Number(raw);
    if (raw.length > 2) {
        return year;
    }
    return year >= 69 ? 1900 + year : 2000 + year;
};

const toUtcDate = (parts: DateParts): Date | null => {
    const { year, month, day, hour, minute, second, millisecond } = parts;

    if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) {
        return null;
    }

    const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millisecond));
    // Date.UTC maps years 0-99 onto 1900-1999
    date.setUTCFullYear(year);

    if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }

    return date;
};

const timeParts = (hour?: string, minute?: string, second?: string, fraction?: string) => ({
    hour: hour ? Number(hour) : 0,
    minute: minute ? Number(minute) : 0,
    second: second ? Number(second) : 0,
    millisecond: fraction ? Number(fraction.padEnd(3, '0')) : 0
});

/**
 * Parses a naive wall-clock date or timestamp into a Date whose UTC fields
 * carry the written values. Accepts `YYYY-MM-DD[ HH:MM[:SS]]` and day-first
 * `DD/MM/YYYY[ HH:MM[:SS]]`; a day-first value that cannot be a real date is
 * retried month-first. Returns null instead of throwing.
 */
export const parseDayFirstDate = (value: string | null | undefined): Date | null => {
    if (value === null || value === undefined) {
        return null;
    }

    const text = value.trim();
    if (text === '') {
        return null;
    }

    const iso = ISO_PATTERN.exec(text);
    if (iso) {
        const [, year, month, day, hour, minute, second, fraction] = iso;
        return toUtcDate({
            year: Number(year),
            month: Number(month),
            day: Number(day),
            ...timeParts(hour, minute, second, fraction)
        });
    }

    const dayFirst = DAY_FIRST_PATTERN.exec(text);
    if (dayFirst) {
        const [, first, second, year, hour, minute, seconds] = dayFirst;
        const time = timeParts(hour, minute, seconds);
        const fullYear = expandYear(year);

        return toUtcDate({ year: fullYear, month: Number(second), day: Number(first), ...time })
            ?? toUtcDate({ year: fullYear, month: Number(first), day: Number(second), ...time });
    }

    return null;
};

/**
 * Whole years between a date of birth and the evaluation instant, counted as
 * elapsed days divided by 365 with no calendar correction.
 */
export const computeAge = (dateOfBirth: Date | null, evaluationInstant: Date): number | null => {
    if (dateOfBirth === null || Number.isNaN(dateOfBirth.getTime())) {
        return null;
    }

    const elapsedDays = Math.floor((evaluationInstant.getTime() - dateOfBirth.getTime()) / MS_PER_DAY);
    return Math.floor(elapsedDays / DAYS_PER_YEAR);
};

export const toIsoString = (date: Date | null): string | null =>
    date === null || Number.isNaN(date.getTime()) ? null : date.toISOString();

export const hourOfDay = (timestamp: Date | null): number | null =>
    timestamp === null || Number.isNaN(timestamp.getTime()) ? null : timestamp.getUTCHours();
