import { createLogger } from '../utils/Logger.ts';
import { MissingDatasetError } from '../model/Errors.ts';
import { emptyDataset } from '../model/Models.ts';
import { findDuplicateKeys, mergeDataset } from '../merger/ReconciliationMerger.ts';

import type { DualDatasetCoordinator } from '../coordinator/DualDatasetCoordinator.ts';
import type { CoordinatorResult, Dataset, Resolution, RunSummary } from '../model/Models.ts';
import type { RawFileListing } from '../source/RawFileSource.ts';
import type { DatasetStore } from '../store/DatasetStore.ts';
import type { Logger } from 'pino';

/**
 * Anything that can hand over the raw files of a run
 */
export interface RawFileProvider {
    load(): Promise<RawFileListing>;
}

/**
 * Where each dataset lives. The first store of each list is the one
 * datasets are loaded from; every store is written.
 */
export interface DatasetTargets {
    hourly: DatasetStore[];
    subHourly: DatasetStore[];
}

/**
 * Runs coordinator operations against persisted datasets:
 * load, reconcile in memory, then replace every artifact.
 * Nothing is written until both datasets have been computed.
 */
export class PricePipeline {
    private logger: Logger;
    private coordinator: DualDatasetCoordinator;
    private source: RawFileProvider;
    private targets: DatasetTargets;

    constructor(coordinator: DualDatasetCoordinator, source: RawFileProvider, targets: DatasetTargets) {
        if (targets.hourly.length === 0 || targets.subHourly.length === 0) {
            throw new Error('Each dataset needs at least one store');
        }
        this.logger = createLogger('PricePipeline');
        this.coordinator = coordinator;
        this.source = source;
        this.targets = targets;
    }

    /**
     * Incremental run. Missing datasets start out empty.
     */
    async ingest(): Promise<RunSummary> {
        const hourly = await this.loadOrEmpty('hourly');
        const subHourly = await this.loadOrEmpty('subHourly');
        const listing = await this.source.load();

        const result = this.coordinator.ingest({ hourly, subHourly, files: listing.files });
        this.addRejectedNames(result.summary, listing);

        if (result.summary.filesAccepted === 0) {
            this.logger.info('No new days to add');
        } else {
            await this.persist(result);
        }

        this.logSummary('ingest', result.summary);
        return result.summary;
    }

    /**
     * Rebuilds everything on/after the cutover from raw files.
     * Needs an existing hourly dataset to take the earlier history from.
     */
    async rebuildFromRaw(): Promise<RunSummary> {
        const hourly = await this.loadRequired('hourly');
        const listing = await this.source.load();

        const result = this.coordinator.rebuildFromRaw({
            hourly,
            subHourly: emptyDataset('subHourly'),
            files: listing.files,
        });
        this.addRejectedNames(result.summary, listing);

        await this.persist(result);
        this.logSummary('rebuild-raw', result.summary);
        return result.summary;
    }

    /**
     * Recomputes post-cutover hourly days from the stored 15-minute dataset.
     * Both datasets must already exist.
     */
    async rebuildHourlyFromSubHourly(): Promise<RunSummary> {
        const hourly = await this.loadRequired('hourly');
        const subHourly = await this.loadRequired('subHourly');

        const result = this.coordinator.rebuildHourlyFromSubHourly({ hourly, subHourly });

        await this.persistDataset(result.hourly, this.targets.hourly);
        this.logSummary('rebuild-subhourly', result.summary);
        return result.summary;
    }

    /**
     * Splits a legacy mixed dataset into the two datasets and writes both.
     *
     * Stored timestamps of a mixed dataset are not trusted (15-minute rows may
     * carry hour-based ones), so rows are handed over as loaded and only keyed
     * once timestamps have been recomputed from the period.
     */
    async splitMixed(mixedStore: DatasetStore): Promise<RunSummary> {
        const mixed = await mixedStore.load('hourly');
        this.logger.info(`Splitting ${mixed.points.length} rows from ${mixedStore.description}`);

        const result = this.coordinator.splitMixedDataset(mixed);

        await this.persist(result);
        this.logSummary('split', result.summary);
        return result.summary;
    }

    private async loadOrEmpty(resolution: Resolution): Promise<Dataset> {
        try {
            return await this.loadRequired(resolution);
        } catch (err) {
            if (!(err instanceof MissingDatasetError)) throw err;
            this.logger.warn({ reason: err.message }, `No stored ${resolution} dataset, starting empty`);
            return emptyDataset(resolution);
        }
    }

    private async loadRequired(resolution: Resolution): Promise<Dataset> {
        const store = this.storesFor(resolution)[0];
        return this.normalize(await store.load(resolution), store.description);
    }

    /**
     * Stored data is sorted and de-duplicated before use.
     */
    private normalize(dataset: Dataset, description: string): Dataset {
        const duplicates = findDuplicateKeys(dataset);
        if (duplicates.length > 0) {
            this.logger.warn(
                { duplicates: duplicates.length },
                `${description} holds repeated (timestamp, zone) keys; keeping the last occurrence`
            );
        }
        return mergeDataset(emptyDataset(dataset.resolution), dataset.points);
    }

    private async persist(result: CoordinatorResult): Promise<void> {
        await this.persistDataset(result.hourly, this.targets.hourly);
        await this.persistDataset(result.subHourly, this.targets.subHourly);
    }

    private async persistDataset(dataset: Dataset, stores: DatasetStore[]): Promise<void> {
        for (const store of stores) {
            await store.save(dataset);
            this.logger.info(`Updated ${store.description} (${dataset.points.length} rows)`);
        }
    }

    private storesFor(resolution: Resolution): DatasetStore[] {
        return resolution === 'hourly' ? this.targets.hourly : this.targets.subHourly;
    }

    private addRejectedNames(summary: RunSummary, listing: RawFileListing): void {
        summary.filesSeen += listing.rejected.length;
        for (const { fileName, error } of listing.rejected) {
            summary.skipped.push({ source: fileName, reason: error.message, errorName: error.name });
        }
    }

    private logSummary(operation: string, summary: RunSummary): void {
        this.logger.info(
            {
                operation,
                filesSeen: summary.filesSeen,
                filesAccepted: summary.filesAccepted,
                filesAlreadyPresent: summary.filesAlreadyPresent,
                filesSkipped: summary.skipped.length,
                hourlyDaysContributed: summary.hourlyDaysContributed,
                subHourlyDaysContributed: summary.subHourlyDaysContributed,
                hourlyRows: summary.hourlyRows,
                subHourlyRows: summary.subHourlyRows,
            },
            'Run summary'
        );
    }
}
