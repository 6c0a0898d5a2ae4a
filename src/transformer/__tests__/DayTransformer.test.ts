import { describe, test, expect } from 'vitest';
import {
    dayKeys,
    deliveryDate,
    groupByDay,
    observationsToPoints,
    periodStart,
    toHourlyPoints,
    toSubHourlyPoints,
} from '../DayTransformer.ts';
import { AggregationError } from '../../model/Errors.ts';
import { dayPoints, pricePoint } from '../../__tests__/fixtures.ts';

import type { ClassifiedDay, RawObservation } from '../../model/Models.ts';

// ── Test helpers ──

function classifiedDay(periods: number, granularity: ClassifiedDay['granularity']): ClassifiedDay {
    const observations: RawObservation[] = Array.from({ length: periods }, (_, i) => ({
        year: 2025,
        month: 10,
        day: 1,
        period: i + 1,
        priceMain: i + 1,
        priceAlt: i + 101,
    }));
    return {
        fileName: 'day_20251001.1',
        date: '2025-10-01',
        revision: 1,
        zone: 'Spain',
        granularity,
        observations,
    };
}

// ── Tests ──

describe('periodStart', () => {
    test('hourly period p starts at midnight + (p - 1) hours', () => {
        expect(periodStart(2025, 9, 30, 1, 'hourly')).toEqual(new Date('2025-09-30T00:00:00Z'));
        expect(periodStart(2025, 9, 30, 24, 'hourly')).toEqual(new Date('2025-09-30T23:00:00Z'));
    });

    test('15-minute period p starts at midnight + (p - 1) quarter hours', () => {
        expect(periodStart(2025, 10, 1, 2, 'subHourly')).toEqual(new Date('2025-10-01T00:15:00Z'));
        expect(periodStart(2025, 10, 1, 96, 'subHourly')).toEqual(new Date('2025-10-01T23:45:00Z'));
    });

    test('25th hour of a long day runs into the next date', () => {
        expect(periodStart(2025, 10, 26, 25, 'hourly')).toEqual(new Date('2025-10-27T00:00:00Z'));
    });
});

describe('observationsToPoints', () => {
    test('points come out ordered by period with the zone attached', () => {
        const day = classifiedDay(3, 'hourly');
        const points = observationsToPoints([...day.observations].reverse(), 'Portugal', 'hourly');

        expect(points.map((p) => p.period)).toEqual([1, 2, 3]);
        expect(points[2]).toEqual({
            year: 2025,
            month: 10,
            day: 1,
            period: 3,
            priceMain: 3,
            priceAlt: 103,
            timestamp: new Date('2025-10-01T02:00:00Z'),
            zone: 'Portugal',
        });
    });
});

describe('toHourlyPoints / toSubHourlyPoints', () => {
    test('hourly day maps 1:1', () => {
        const points = toHourlyPoints(classifiedDay(24, 'hourly'), 'reject');

        expect(points).toHaveLength(24);
        expect(points[23].priceMain).toBe(24);
    });

    test('sub-hourly day is resampled for the hourly dataset', () => {
        const points = toHourlyPoints(classifiedDay(96, 'subHourly'), 'reject');

        expect(points).toHaveLength(24);
        expect(points[0].priceMain).toBe(2.5);
        expect(points[0].timestamp).toEqual(new Date('2025-10-01T00:00:00Z'));
    });

    test('incomplete sub-hourly day cannot be resampled under reject', () => {
        expect(() => toHourlyPoints(classifiedDay(92, 'subHourly'), 'reject')).toThrow(AggregationError);
    });

    test('sub-hourly day keeps its native rows', () => {
        const points = toSubHourlyPoints(classifiedDay(96, 'subHourly'));

        expect(points).toHaveLength(96);
        expect(points[95].timestamp).toEqual(new Date('2025-10-01T23:45:00Z'));
    });

    test('an hourly day has no 15-minute rows', () => {
        expect(() => toSubHourlyPoints(classifiedDay(24, 'hourly'))).toThrow(TypeError);
    });
});

describe('day grouping', () => {
    test('delivery date comes from the date fields, not the timestamp', () => {
        const lastHour = pricePoint('2025-10-26', 25, 'hourly', 1);

        expect(deliveryDate(lastHour)).toBe('2025-10-26');
    });

    test('points group by (date, zone) in first-seen order', () => {
        const points = [
            ...dayPoints('2025-10-01', 'hourly', 'Spain'),
            ...dayPoints('2025-10-01', 'hourly', 'Portugal'),
            ...dayPoints('2025-09-30', 'hourly', 'Spain'),
        ];
        const groups = groupByDay(points);

        expect([...groups.keys()]).toEqual(['2025-10-01|Spain', '2025-10-01|Portugal', '2025-09-30|Spain']);
        expect(groups.get('2025-10-01|Portugal')).toHaveLength(24);
        expect(dayKeys(points).size).toBe(3);
    });
});
