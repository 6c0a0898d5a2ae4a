import { access } from 'node:fs/promises';
import { ParquetReader, ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';

import { createLogger } from '../utils/Logger.ts';
import { FormatError, MissingDatasetError } from '../model/Errors.ts';
import { isNotFound } from '../utils/fsErrors.ts';
import { bindRow } from './PriceRowBinding.ts';
import { writeAtomically } from './atomicWrite.ts';

import type { Dataset, PricePoint, Resolution } from '../model/Models.ts';
import type { DatasetStore } from './DatasetStore.ts';
import type { Logger } from 'pino';

/**
 * Column order matches the price point field order; the reader binds by position.
 */
const PRICE_SCHEMA = new ParquetSchema({
    year: { type: 'INT32' },
    month: { type: 'INT32' },
    day: { type: 'INT32' },
    period: { type: 'INT32' },
    price_main: { type: 'DOUBLE' },
    price_alt: { type: 'DOUBLE' },
    timestamp: { type: 'TIMESTAMP_MILLIS' },
    zone: { type: 'UTF8' },
});

function toParquetRow(point: PricePoint): Record<string, unknown> {
    return {
        year: point.year,
        month: point.month,
        day: point.day,
        period: point.period,
        price_main: point.priceMain,
        price_alt: point.priceAlt,
        timestamp: point.timestamp,
        zone: point.zone,
    };
}

/**
 * Columnar artifact: one Parquet file per dataset
 */
export class ParquetDatasetStore implements DatasetStore {
    readonly description: string;
    private path: string;
    private logger: Logger;

    constructor(path: string) {
        this.path = path;
        this.description = `parquet:${path}`;
        this.logger = createLogger('ParquetDatasetStore');
    }

    async load(resolution: Resolution): Promise<Dataset> {
        try {
            await access(this.path);
        } catch (err) {
            if (isNotFound(err)) {
                throw new MissingDatasetError(`${this.path} not found`, { path: this.path });
            }
            throw err;
        }

        const reader = await ParquetReader.openFile(this.path);
        const points: PricePoint[] = [];
        try {
            const cursor = reader.getCursor();
            let record: unknown = await cursor.next();
            while (record) {
                if (typeof record !== 'object') {
                    throw new FormatError(`Unexpected record in ${this.path}`, { path: this.path });
                }
                points.push(bindRow(Object.values(record), this.path, points.length + 1));
                record = await cursor.next();
            }
        } finally {
            await reader.close();
        }

        this.logger.info(`Loaded ${points.length} ${resolution} rows from ${this.path}`);
        return { resolution, points };
    }

    async save(dataset: Dataset): Promise<void> {
        await writeAtomically(this.path, async (tempPath) => {
            const writer = await ParquetWriter.openFile(PRICE_SCHEMA, tempPath);
            try {
                for (const point of dataset.points) {
                    await writer.appendRow(toParquetRow(point));
                }
            } finally {
                await writer.close();
            }
        });
        this.logger.info(`Wrote ${dataset.points.length} ${dataset.resolution} rows to ${this.path}`);
    }
}
