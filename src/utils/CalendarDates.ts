import type { CalendarDate } from '../model/Models.ts';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;

/**
 * Builds a CalendarDate from its parts, or null when the parts do not
 * name a real day (e.g. 2025-02-30).
 */
export function toCalendarDate(year: number, month: number, day: number): CalendarDate | null {
    if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
        return null;
    }
    const candidate = new Date(Date.UTC(year, month - 1, day));
    if (
        candidate.getUTCFullYear() !== year ||
        candidate.getUTCMonth() !== month - 1 ||
        candidate.getUTCDate() !== day
    ) {
        return null;
    }
    return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Parses 'YYYYMMDD' (file names) or 'YYYY-MM-DD' (configuration).
 */
export function parseCalendarDate(value: string): CalendarDate | null {
    const match = ISO_DATE.exec(value) ?? COMPACT_DATE.exec(value);
    if (!match) return null;
    return toCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

export function splitCalendarDate(date: CalendarDate): { year: number; month: number; day: number } {
    const [year, month, day] = date.split('-').map(Number);
    return { year, month, day };
}

/**
 * Midnight of the given day as a wall-clock instant (UTC fields carry the local time).
 */
export function startOfDay(year: number, month: number, day: number): Date {
    return new Date(Date.UTC(year, month - 1, day));
}

/**
 * Calendar date a wall-clock timestamp falls on.
 */
export function calendarDateOf(timestamp: Date): CalendarDate {
    return timestamp.toISOString().slice(0, 10);
}

/**
 * Renders a wall-clock timestamp as 'YYYY-MM-DD HH:mm:ss'.
 */
export function formatTimestamp(timestamp: Date): string {
    return timestamp.toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * Reads 'YYYY-MM-DD HH:mm:ss' or ISO-8601 without offset as a wall-clock
 * timestamp. Returns null when the value is not a timestamp.
 */
export function parseTimestamp(value: string): Date | null {
    const match = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?Z?$/.exec(value.trim());
    if (!match) return null;
    const [, y, mo, d, h, mi, s] = match;
    const date = toCalendarDate(Number(y), Number(mo), Number(d));
    if (date === null || Number(h) > 23 || Number(mi) > 59 || Number(s ?? '0') > 59) {
        return null;
    }
    return new Date(Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s ?? '0')));
}
