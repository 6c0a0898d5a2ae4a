import { FormatError } from '../model/Errors.ts';
import { formatTimestamp, parseTimestamp } from '../utils/CalendarDates.ts';
import { PRICE_POINT_FIELDS } from '../model/Models.ts';

import type { PricePoint } from '../model/Models.ts';

export type PersistedRow = [number, number, number, number, number, number, string, string];

const FIELD_COUNT = PRICE_POINT_FIELDS.length;

/**
 * Row representation handed to writers: field order and values unchanged,
 * timestamp rendered as 'YYYY-MM-DD HH:mm:ss'.
 */
export function toPersistedRow(point: PricePoint): PersistedRow {
    return [
        point.year,
        point.month,
        point.day,
        point.period,
        point.priceMain,
        point.priceAlt,
        formatTimestamp(point.timestamp),
        point.zone,
    ];
}

/**
 * Binds the first 8 values of a stored row to the price point fields by
 * position (year, month, day, period, priceMain, priceAlt, timestamp, zone).
 * Stored column names are never consulted; extra columns are ignored.
 *
 * @throws FormatError when the row is too short or a value has the wrong type
 */
export function bindRow(values: readonly unknown[], source: string, row: number): PricePoint {
    if (values.length < FIELD_COUNT) {
        throw new FormatError(
            `Expected at least ${FIELD_COUNT} columns in ${source}, found ${values.length} on row ${row}`,
            { source, row, columns: values.length }
        );
    }

    const int = (index: number): number => {
        const value = toNumber(values[index]);
        if (value === null || !Number.isInteger(value)) {
            throw fieldError(source, row, index, values[index]);
        }
        return value;
    };
    const float = (index: number): number => {
        const value = toNumber(values[index]);
        if (value === null) {
            throw fieldError(source, row, index, values[index]);
        }
        return value;
    };

    const timestamp = toTimestamp(values[6]);
    if (timestamp === null) {
        throw fieldError(source, row, 6, values[6]);
    }

    const zone = values[7];
    if (typeof zone !== 'string' || zone.trim() === '') {
        throw fieldError(source, row, 7, zone);
    }

    return {
        year: int(0),
        month: int(1),
        day: int(2),
        period: int(3),
        priceMain: float(4),
        priceAlt: float(5),
        timestamp,
        zone: zone.trim(),
    };
}

function toNumber(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value === 'bigint') {
        return Number(value);
    }
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

function toTimestamp(value: unknown): Date | null {
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? null : value;
    }
    if (typeof value === 'number' || typeof value === 'bigint') {
        return new Date(Number(value));
    }
    if (typeof value === 'string') {
        return parseTimestamp(value);
    }
    return null;
}

function fieldError(source: string, row: number, index: number, value: unknown): FormatError {
    const field = PRICE_POINT_FIELDS[index];
    return new FormatError(
        `Invalid ${field} on row ${row} of ${source}: '${String(value)}'`,
        { source, row, field }
    );
}
