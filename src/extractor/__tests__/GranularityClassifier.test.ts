import { describe, test, expect } from 'vitest';
import { classifyObservations, detectGranularity, parseRawFileName } from '../GranularityClassifier.ts';
import { parseRawRecords } from '../RawRecordParser.ts';
import { FormatError, NamingError } from '../../model/Errors.ts';
import { DEFAULT_ENGINE_CONFIG } from '../../config/Config.ts';
import { rawContent, TEST_CONFIG } from '../../__tests__/fixtures.ts';

import type { RawObservation } from '../../model/Models.ts';

// ── Test helpers ──

function observations(date: string, periods: number): RawObservation[] {
    return parseRawRecords(rawContent(date, periods), {
        delimiter: ';',
        headerLines: 1,
        missingMarker: '*',
    });
}

// ── Tests ──

describe('parseRawFileName', () => {
    test('OMIE name → date, revision and zone', () => {
        expect(parseRawFileName('marginalpdbc_20251001.2', DEFAULT_ENGINE_CONFIG)).toEqual({
            fileName: 'marginalpdbc_20251001.2',
            date: '2025-10-01',
            revision: 2,
            zone: 'Portugal',
        });
    });

    test('leading zeros in the revision map to the same zone', () => {
        expect(parseRawFileName('day_20250930.01', TEST_CONFIG).zone).toBe('Spain');
    });

    test('name without a date → NamingError', () => {
        expect(() => parseRawFileName('day_latest.1', TEST_CONFIG)).toThrow(
            'Cannot parse date from filename: day_latest.1'
        );
    });

    test('other prefix → NamingError', () => {
        expect(() => parseRawFileName('marginalpdbc_20251001.1', TEST_CONFIG)).toThrow(NamingError);
    });

    test('impossible date → NamingError', () => {
        expect(() => parseRawFileName('day_20250231.1', TEST_CONFIG)).toThrow(
            'Filename day_20250231.1 carries an impossible date 20250231'
        );
    });

    test('unmapped revision → NamingError', () => {
        expect(() => parseRawFileName('day_20251001.3', TEST_CONFIG)).toThrow(
            'Unrecognized revision suffix .3 in day_20251001.3'
        );
    });
});

describe('detectGranularity', () => {
    test('24 periods → hourly', () => {
        expect(detectGranularity(observations('2025-09-30', 24))).toBe('hourly');
    });

    test('23 periods (short day) → hourly', () => {
        expect(detectGranularity(observations('2025-03-30', 23))).toBe('hourly');
    });

    test('96 periods → subHourly', () => {
        expect(detectGranularity(observations('2025-10-01', 96))).toBe('subHourly');
    });

    test('25 periods → subHourly', () => {
        expect(detectGranularity(observations('2025-10-26', 25))).toBe('subHourly');
    });
});

describe('classifyObservations', () => {
    test('combines file identity with detected granularity', () => {
        const rows = observations('2025-10-01', 96);
        const day = classifyObservations(rows, 'day_20251001.2', TEST_CONFIG);

        expect(day.date).toBe('2025-10-01');
        expect(day.zone).toBe('Portugal');
        expect(day.revision).toBe(2);
        expect(day.granularity).toBe('subHourly');
        expect(day.observations).toBe(rows);
    });

    test('rows dated differently from the file name → FormatError', () => {
        expect(() => classifyObservations(observations('2025-09-30', 24), 'day_20251001.1', TEST_CONFIG)).toThrow(
            'Rows in day_20251001.1 are dated 2025-09-30, file name says 2025-10-01'
        );
    });

    test('no rows → FormatError', () => {
        expect(() => classifyObservations([], 'day_20251001.1', TEST_CONFIG)).toThrow(FormatError);
    });
});
