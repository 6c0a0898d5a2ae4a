import { join } from 'node:path';

import { DualDatasetCoordinator } from '../coordinator/DualDatasetCoordinator.ts';
import { DatabaseClient } from '../db/DatabaseClient.ts';
import { RawFileSource } from '../source/RawFileSource.ts';
import { CsvDatasetStore } from '../store/CsvDatasetStore.ts';
import { ParquetDatasetStore } from '../store/ParquetDatasetStore.ts';
import { PostgresDatasetStore } from '../store/PostgresDatasetStore.ts';
import { PricePipeline } from './PricePipeline.ts';

import type { AppConfig } from '../config/Config.ts';
import type { DatasetStore } from '../store/DatasetStore.ts';

export interface PipelineHandle {
    pipeline: PricePipeline;
    close(): Promise<void>;
}

/**
 * Wires the pipeline from configuration: CSV (primary), Parquet and,
 * when DATABASE_URL is set, PostgreSQL for each dataset.
 */
export function createPipeline(config: AppConfig): PipelineHandle {
    const { engine, storage } = config;
    const db = storage.databaseUrl ? new DatabaseClient(storage.databaseUrl) : null;

    const storesFor = (baseName: string, table: string): DatasetStore[] => {
        const stores: DatasetStore[] = [
            new CsvDatasetStore(join(storage.outputDir, `${baseName}.csv`), storage.csvHasHeader),
            new ParquetDatasetStore(join(storage.outputDir, `${baseName}.parquet`)),
        ];
        if (db) {
            stores.push(new PostgresDatasetStore(db, table));
        }
        return stores;
    };

    const pipeline = new PricePipeline(
        new DualDatasetCoordinator(engine),
        new RawFileSource(storage.rawDataDir, engine, storage.readConcurrency),
        {
            hourly: storesFor(storage.hourlyBaseName, storage.hourlyTable),
            subHourly: storesFor(storage.subHourlyBaseName, storage.subHourlyTable),
        }
    );

    return {
        pipeline,
        close: async () => {
            if (db) await db.close();
        },
    };
}
