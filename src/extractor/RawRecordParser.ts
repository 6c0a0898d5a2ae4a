import { parse } from 'csv-parse/sync';

import { FormatError } from '../model/Errors.ts';
import { toCalendarDate } from '../utils/CalendarDates.ts';

import type { RawObservation } from '../model/Models.ts';

export interface RawParseOptions {
    delimiter: string;
    headerLines: number;
    missingMarker: string;
    fileName?: string;
}

/**
 * Raw files carry one trailing field after the six value columns
 * (OMIE lines end with the delimiter).
 */
const MIN_FIELDS = 7;

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parses the text of one raw daily file into observations.
 *
 * Lines are split on the delimiter, header lines are discarded and any line
 * containing the missing-data marker is dropped. Each remaining line must
 * have at least 7 fields; the last one is ignored.
 *
 * @throws FormatError when the content does not have the expected shape
 */
export function parseRawRecords(content: string, options: RawParseOptions): RawObservation[] {
    const file = options.fileName ?? '<inline>';

    let rows: string[][];
    try {
        rows = parse(content, {
            delimiter: options.delimiter,
            from_line: options.headerLines + 1,
            relax_column_count: true,
            relax_quotes: true,
            skip_empty_lines: true,
            trim: true,
        });
    } catch (err) {
        throw new FormatError(`Unreadable raw file ${file}`, { file }, { cause: err });
    }

    const observations: RawObservation[] = [];

    rows.forEach((fields, index) => {
        if (fields.some((field) => field.includes(options.missingMarker))) {
            return;
        }
        const row = index + 1;
        if (fields.length < MIN_FIELDS) {
            throw new FormatError(
                `Unexpected column count in ${file}: ${fields.length} fields on data row ${row}, need at least ${MIN_FIELDS}`,
                { file, row, fields: fields.length }
            );
        }

        const [year, month, day, period] = fields.slice(0, 4).map((value, i) => castInt(value, file, row, i));
        const [priceMain, priceAlt] = fields.slice(4, 6).map((value, i) => castFloat(value, file, row, i + 4));

        observations.push({ year, month, day, period, priceMain, priceAlt });
    });

    validateDay(observations, file);
    return observations;
}

function castInt(value: string, file: string, row: number, column: number): number {
    if (!INTEGER.test(value)) {
        throw new FormatError(
            `Expected an integer in ${file}, data row ${row}, column ${column + 1}: '${value}'`,
            { file, row, column: column + 1, value }
        );
    }
    return Number(value);
}

function castFloat(value: string, file: string, row: number, column: number): number {
    const parsed = Number(value);
    if (!DECIMAL.test(value) || !Number.isFinite(parsed)) {
        throw new FormatError(
            `Expected a number in ${file}, data row ${row}, column ${column + 1}: '${value}'`,
            { file, row, column: column + 1, value }
        );
    }
    return parsed;
}

/**
 * A day file holds one calendar date and periods 1..N without gaps or repeats.
 */
function validateDay(observations: RawObservation[], file: string): void {
    if (observations.length === 0) {
        throw new FormatError(`No price rows in ${file}`, { file });
    }

    const first = observations[0];
    if (toCalendarDate(first.year, first.month, first.day) === null) {
        throw new FormatError(
            `Invalid date ${first.year}-${first.month}-${first.day} in ${file}`,
            { file }
        );
    }

    const seen = new Set<number>();
    for (const obs of observations) {
        if (obs.year !== first.year || obs.month !== first.month || obs.day !== first.day) {
            throw new FormatError(`Mixed dates in ${file}`, { file, period: obs.period });
        }
        if (seen.has(obs.period)) {
            throw new FormatError(`Duplicate period ${obs.period} in ${file}`, { file, period: obs.period });
        }
        seen.add(obs.period);
    }

    for (let period = 1; period <= observations.length; period++) {
        if (!seen.has(period)) {
            throw new FormatError(
                `Periods in ${file} are not contiguous from 1: period ${period} missing`,
                { file, period }
            );
        }
    }
}
