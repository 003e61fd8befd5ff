import { describe, it, expect } from '@jest/globals';
import { parseDayFirstDate, computeAge, hourOfDay } from '../../src/utils/dates';

describe('parseDayFirstDate', () => {
    it('reads day-first timestamps', () => {
        expect(parseDayFirstDate('21/06/2020 12:14')?.toISOString()).toBe('2020-06-21T12:14:00.000Z');
    });

    it('reads day-first timestamps with seconds and dashes', () => {
        expect(parseDayFirstDate('03-02-2019 07:08:09')?.toISOString()).toBe('2019-02-03T07:08:09.000Z');
    });

    it('reads ISO dates and timestamps year-first', () => {
        expect(parseDayFirstDate('1975-07-04')?.toISOString()).toBe('1975-07-04T00:00:00.000Z');
        expect(parseDayFirstDate('2019-01-01 00:00:18')?.toISOString()).toBe('2019-01-01T00:00:18.000Z');
    });

    it('falls back to month-first when the day-first reading is impossible', () => {
        expect(parseDayFirstDate('12/25/2020')?.toISOString()).toBe('2020-12-25T00:00:00.000Z');
    });

    it('expands two-digit years around the 69 pivot', () => {
        expect(parseDayFirstDate('01/02/68')?.getUTCFullYear()).toBe(2068);
        expect(parseDayFirstDate('01/02/69')?.getUTCFullYear()).toBe(1969);
    });

    it('returns null for unparsable or impossible values', () => {
        expect(parseDayFirstDate('not-a-date')).toBeNull();
        expect(parseDayFirstDate('')).toBeNull();
        expect(parseDayFirstDate(undefined)).toBeNull();
        expect(parseDayFirstDate('31/02/2020')).toBeNull();
        expect(parseDayFirstDate('21/06/2020 25:00')).toBeNull();
    });
});

describe('computeAge', () => {
    const evaluation = new Date(Date.UTC(2024, 0, 1));

    it('divides elapsed days by 365 and floors', () => {
        // 14610 days elapsed, 14610 / 365 = 40.03
        expect(computeAge(new Date(Date.UTC(1984, 0, 1)), evaluation)).toBe(40);
    });

    it('does not correct for leap days', () => {
        // 1994-01-08 is 10950 = 365 * 30 days before the evaluation instant
        expect(computeAge(new Date(Date.UTC(1994, 0, 8)), evaluation)).toBe(30);
        expect(computeAge(new Date(Date.UTC(1994, 0, 9)), evaluation)).toBe(29);
    });

    it('is null without a date of birth', () => {
        expect(computeAge(null, evaluation)).toBeNull();
    });
});

describe('hourOfDay', () => {
    it('takes the wall-clock hour', () => {
        expect(hourOfDay(new Date(Date.UTC(2020, 5, 21, 23, 5)))).toBe(23);
        expect(hourOfDay(null)).toBeNull();
    });
});
