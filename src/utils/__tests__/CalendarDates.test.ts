import { describe, test, expect } from 'vitest';
import {
    calendarDateOf,
    formatTimestamp,
    parseCalendarDate,
    parseTimestamp,
    toCalendarDate,
} from '../CalendarDates.ts';

describe('calendar dates', () => {
    test('parts → ISO date, impossible days → null', () => {
        expect(toCalendarDate(2025, 10, 1)).toBe('2025-10-01');
        expect(toCalendarDate(2024, 2, 29)).toBe('2024-02-29');
        expect(toCalendarDate(2025, 2, 29)).toBeNull();
        expect(toCalendarDate(2025, 0, 1)).toBeNull();
    });

    test('compact and ISO forms both parse', () => {
        expect(parseCalendarDate('20251001')).toBe('2025-10-01');
        expect(parseCalendarDate('2025-10-01')).toBe('2025-10-01');
        expect(parseCalendarDate('2025/10/01')).toBeNull();
    });

    test('date of a timestamp', () => {
        expect(calendarDateOf(new Date('2025-10-01T23:45:00Z'))).toBe('2025-10-01');
    });
});

describe('timestamps', () => {
    test('formatted as YYYY-MM-DD HH:mm:ss', () => {
        expect(formatTimestamp(new Date('2025-10-01T23:45:00Z'))).toBe('2025-10-01 23:45:00');
    });

    test('space, T, seconds and fractions are accepted', () => {
        const expected = new Date('2025-10-01T00:15:00Z');

        expect(parseTimestamp('2025-10-01 00:15:00')).toEqual(expected);
        expect(parseTimestamp('2025-10-01T00:15')).toEqual(expected);
        expect(parseTimestamp('2025-10-01T00:15:00.000Z')).toEqual(expected);
    });

    test('anything else → null', () => {
        expect(parseTimestamp('2025-10-01')).toBeNull();
        expect(parseTimestamp('2025-10-01 24:00:00')).toBeNull();
        expect(parseTimestamp('2025-02-30 00:00:00')).toBeNull();
        expect(parseTimestamp('yesterday')).toBeNull();
    });
});
