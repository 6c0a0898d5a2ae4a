import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { ParquetDatasetStore } from '../ParquetDatasetStore.ts';
import { MissingDatasetError } from '../../model/Errors.ts';
import { dataset, dayPoints } from '../../__tests__/fixtures.ts';

let dir: string;

beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'parquet-store-'));
});

afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
});

describe('ParquetDatasetStore', () => {
    test('save then load returns the same points', async () => {
        const store = new ParquetDatasetStore(join(dir, 'omie_15min.parquet'));
        const points = [...dayPoints('2025-10-01', 'subHourly', 'Portugal', (p) => p / 4)];

        await store.save(dataset('subHourly', points));
        const loaded = await store.load('subHourly');

        expect(loaded.resolution).toBe('subHourly');
        expect(loaded.points).toEqual(points);
    });

    test('missing file → MissingDatasetError', async () => {
        const store = new ParquetDatasetStore(join(dir, 'absent.parquet'));

        await expect(store.load('hourly')).rejects.toThrow(MissingDatasetError);
    });
});
