import { MissingDatasetError, PersistenceError } from '../model/Errors.ts';

import type { DatabaseClient } from '../db/DatabaseClient.ts';
import type { Dataset, Resolution } from '../model/Models.ts';
import type { DatasetStore } from './DatasetStore.ts';

/**
 * Queryable artifact: one PostgreSQL table per dataset
 */
export class PostgresDatasetStore implements DatasetStore {
    readonly description: string;
    private client: DatabaseClient;
    private table: string;

    constructor(client: DatabaseClient, table: string) {
        this.client = client;
        this.table = table;
        this.description = `postgres:${table}`;
    }

    async load(resolution: Resolution): Promise<Dataset> {
        if (!(await this.client.hasTable(this.table))) {
            throw new MissingDatasetError(`Table ${this.table} does not exist`, { table: this.table });
        }
        return { resolution, points: await this.client.loadPrices(this.table) };
    }

    async save(dataset: Dataset): Promise<void> {
        try {
            await this.client.replacePrices(this.table, dataset.points);
        } catch (err) {
            throw new PersistenceError(`Failed to replace table ${this.table}`, { table: this.table }, { cause: err });
        }
    }
}
