import { readFile, writeFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';

import { createLogger } from '../utils/Logger.ts';
import { FormatError, MissingDatasetError } from '../model/Errors.ts';
import { PERSISTED_COLUMNS } from '../model/Models.ts';
import { isNotFound } from '../utils/fsErrors.ts';
import { bindRow, toPersistedRow } from './PriceRowBinding.ts';
import { writeAtomically } from './atomicWrite.ts';

import type { Dataset, Resolution } from '../model/Models.ts';
import type { DatasetStore } from './DatasetStore.ts';
import type { Logger } from 'pino';

/**
 * Row-oriented artifact: one CSV file per dataset.
 *
 * Whether the file has a header row is declared by the caller, never guessed
 * from the content. Columns are bound by position.
 */
export class CsvDatasetStore implements DatasetStore {
    readonly description: string;
    private path: string;
    private hasHeader: boolean;
    private logger: Logger;

    constructor(path: string, hasHeader = true) {
        this.path = path;
        this.hasHeader = hasHeader;
        this.description = `csv:${path}`;
        this.logger = createLogger('CsvDatasetStore');
    }

    async load(resolution: Resolution): Promise<Dataset> {
        let content: string;
        try {
            content = await readFile(this.path, 'utf-8');
        } catch (err) {
            if (isNotFound(err)) {
                throw new MissingDatasetError(`${this.path} not found`, { path: this.path });
            }
            throw err;
        }

        let rows: string[][];
        try {
            rows = parse(content, {
                from_line: this.hasHeader ? 2 : 1,
                skip_empty_lines: true,
                relax_column_count: true,
            });
        } catch (err) {
            throw new FormatError(`Unreadable CSV ${this.path}`, { path: this.path }, { cause: err });
        }

        const points = rows.map((row, index) => bindRow(row, this.path, index + 1));
        this.logger.info(`Loaded ${points.length} ${resolution} rows from ${this.path}`);
        return { resolution, points };
    }

    async save(dataset: Dataset): Promise<void> {
        const rows: (string | number)[][] = dataset.points.map(toPersistedRow);
        if (this.hasHeader) {
            rows.unshift([...PERSISTED_COLUMNS]);
        }
        const content = stringify(rows);

        await writeAtomically(this.path, (tempPath) => writeFile(tempPath, content, 'utf-8'));
        this.logger.info(`Wrote ${dataset.points.length} ${dataset.resolution} rows to ${this.path}`);
    }
}
