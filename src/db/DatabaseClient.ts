import postgres from 'postgres';
import { createLogger } from '../utils/Logger.ts';
import { formatTimestamp } from '../utils/CalendarDates.ts';
import { bindRow } from '../store/PriceRowBinding.ts';

import type { PricePoint } from '../model/Models.ts';
import type { Logger } from 'pino';

/**
 * A price row as stored in the database, in persisted column order
 */
interface PriceRow {
    year: number;
    month: number;
    day: number;
    period: number;
    price_main: number;
    price_alt: number;
    timestamp: string;
    zone: string;
}

/**
 * Handles all database operations for the price history.
 * Uses the 'postgres' (porsager/postgres) driver.
 *
 * Timestamps are market wall-clock values and are stored in
 * `timestamp without time zone` columns.
 */
export class DatabaseClient {
    private sql: postgres.Sql;
    private logger: Logger;

    constructor(connectionUrl?: string) {
        this.logger = createLogger('DatabaseClient');
        const url = connectionUrl ?? process.env.DATABASE_URL;
        if (!url) {
            throw new Error(
                'DATABASE_URL not set. Provide it as env var or constructor arg.'
            );
        }
        this.sql = postgres(url);
    }

    /**
     * Creates the price table if it does not exist yet.
     */
    async ensurePriceTable(table: string): Promise<void> {
        await this.sql`
            CREATE TABLE IF NOT EXISTS ${this.sql(table)} (
                year        integer          NOT NULL,
                month       integer          NOT NULL,
                day         integer          NOT NULL,
                period      integer          NOT NULL,
                price_main  double precision NOT NULL,
                price_alt   double precision NOT NULL,
                timestamp   timestamp        NOT NULL,
                zone        text             NOT NULL,
                PRIMARY KEY (timestamp, zone)
            )
        `;
    }

    /**
     * True when the table exists.
     */
    async hasTable(table: string): Promise<boolean> {
        const rows = await this.sql<{ present: boolean }[]>`
            SELECT to_regclass(${table}) IS NOT NULL AS present
        `;
        return rows[0]?.present === true;
    }

    /**
     * Replaces the content of a price table with the given points in one
     * transaction: readers see either the old rows or all the new ones.
     *
     * @returns Number of rows written
     */
    async replacePrices(table: string, points: PricePoint[]): Promise<number> {
        await this.ensurePriceTable(table);

        this.logger.info(`Replacing ${table} with ${points.length} rows...`);

        const rows: PriceRow[] = points.map((p) => ({
            year: p.year,
            month: p.month,
            day: p.day,
            period: p.period,
            price_main: p.priceMain,
            price_alt: p.priceAlt,
            timestamp: formatTimestamp(p.timestamp),
            zone: p.zone,
        }));

        // Batch in chunks to stay under the bind parameter limit
        const BATCH_SIZE = 1000;

        await this.sql.begin(async (tx) => {
            await tx`DELETE FROM ${tx(table)}`;

            for (let i = 0; i < rows.length; i += BATCH_SIZE) {
                const batch = rows.slice(i, i + BATCH_SIZE);
                await tx`INSERT INTO ${tx(table)} ${tx(batch)}`;
                this.logger.debug(
                    `Inserted batch ${Math.floor(i / BATCH_SIZE) + 1}: ${i + batch.length}/${rows.length}`
                );
            }
        });

        this.logger.info(`Replace complete: ${rows.length} rows in ${table}`);
        return rows.length;
    }

    /**
     * Reads a price table back, ordered by (timestamp, zone).
     */
    async loadPrices(table: string): Promise<PricePoint[]> {
        const rows = await this.sql<PriceRow[]>`
            SELECT year, month, day, period, price_main, price_alt,
                   to_char(timestamp, 'YYYY-MM-DD HH24:MI:SS') AS timestamp,
                   zone
            FROM ${this.sql(table)}
            ORDER BY timestamp, zone
        `;

        return rows.map((r, index) =>
            bindRow(
                [r.year, r.month, r.day, r.period, r.price_main, r.price_alt, r.timestamp, r.zone],
                table,
                index + 1
            )
        );
    }

    /**
     * Close the database connection pool.
     */
    async close(): Promise<void> {
        await this.sql.end();
        this.logger.info('Database connection closed');
    }
}
