import { describe, test, expect } from 'vitest';
import { findDuplicateKeys, mergeDataset, mergeDatasets } from '../ReconciliationMerger.ts';
import { dataset, dayPoints, pricePoint } from '../../__tests__/fixtures.ts';

// ── Tests ──

describe('mergeDataset', () => {
    test('incoming point replaces the existing one with the same (timestamp, zone)', () => {
        const existing = dataset('hourly', [pricePoint('2025-10-01', 1, 'hourly', 50)]);
        const merged = mergeDataset(existing, [pricePoint('2025-10-01', 1, 'hourly', 52)]);

        expect(merged.points).toHaveLength(1);
        expect(merged.points[0].priceMain).toBe(52);
        expect(merged.points[0].timestamp).toEqual(new Date('2025-10-01T00:00:00Z'));
    });

    test('same timestamp in different zones → both kept, ordered by zone', () => {
        const merged = mergeDataset(dataset('hourly'), [
            pricePoint('2025-10-01', 1, 'hourly', 50, 'Spain'),
            pricePoint('2025-10-01', 1, 'hourly', 51, 'Portugal'),
        ]);

        expect(merged.points.map((p) => p.zone)).toEqual(['Portugal', 'Spain']);
    });

    test('result is sorted by timestamp whatever the input order', () => {
        const existing = dataset('hourly', dayPoints('2025-10-02', 'hourly'));
        const merged = mergeDataset(existing, dayPoints('2025-10-01', 'hourly').reverse());

        expect(merged.points).toHaveLength(48);
        const times = merged.points.map((p) => p.timestamp.getTime());
        expect(times).toEqual([...times].sort((a, b) => a - b));
        expect(merged.points[0].timestamp).toEqual(new Date('2025-10-01T00:00:00Z'));
    });

    test('among incoming points the last one wins', () => {
        const merged = mergeDataset(dataset('hourly'), [
            pricePoint('2025-10-01', 1, 'hourly', 1),
            pricePoint('2025-10-01', 1, 'hourly', 2),
        ]);

        expect(merged.points.map((p) => p.priceMain)).toEqual([2]);
    });

    test('merging the same points twice changes nothing', () => {
        const incoming = dayPoints('2025-10-01', 'subHourly');
        const once = mergeDataset(dataset('subHourly', dayPoints('2025-10-02', 'subHourly')), incoming);
        const twice = mergeDataset(once, incoming);

        expect(twice).toEqual(once);
        expect(findDuplicateKeys(twice)).toEqual([]);
    });

    test('inputs are left untouched', () => {
        const existingPoints = [pricePoint('2025-10-01', 2, 'hourly', 5)];
        const incoming = [pricePoint('2025-10-01', 1, 'hourly', 7)];
        mergeDataset(dataset('hourly', existingPoints), incoming);

        expect(existingPoints.map((p) => p.period)).toEqual([2]);
        expect(incoming.map((p) => p.period)).toEqual([1]);
    });
});

describe('mergeDatasets', () => {
    test('resolutions must match', () => {
        expect(() => mergeDatasets(dataset('hourly'), dataset('subHourly'))).toThrow(
            'Cannot merge a subHourly dataset into a hourly dataset'
        );
    });

    test('incoming dataset takes precedence', () => {
        const merged = mergeDatasets(
            dataset('subHourly', [pricePoint('2025-10-01', 5, 'subHourly', 1)]),
            dataset('subHourly', [pricePoint('2025-10-01', 5, 'subHourly', 9)])
        );

        expect(merged.points[0].priceMain).toBe(9);
        expect(merged.resolution).toBe('subHourly');
    });
});

describe('findDuplicateKeys', () => {
    test('reports each repeated key once', () => {
        const point = pricePoint('2025-10-01', 1, 'hourly', 1);
        const keys = findDuplicateKeys(dataset('hourly', [point, point, point]));

        expect(keys).toEqual([`${Date.UTC(2025, 9, 1)}|Spain`]);
    });
});
