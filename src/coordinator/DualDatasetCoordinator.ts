import { createLogger } from '../utils/Logger.ts';
import { parseRawRecords } from '../extractor/RawRecordParser.ts';
import {
    HOURLY_MAX_PERIOD,
    classifyObservations,
    detectGranularity,
    parseRawFileName,
} from '../extractor/GranularityClassifier.ts';
import { resampleToHourly } from '../transformer/Resampler.ts';
import {
    dayKey,
    dayKeys,
    deliveryDate,
    groupByDay,
    observationsToPoints,
    pointsToObservations,
    toHourlyPoints,
    toSubHourlyPoints,
} from '../transformer/DayTransformer.ts';
import { mergeDataset } from '../merger/ReconciliationMerger.ts';
import { AggregationError, FormatError, NamingError, PipelineError, isFileLevelError } from '../model/Errors.ts';
import { emptyDataset } from '../model/Models.ts';

import type { EngineConfig } from '../config/Config.ts';
import type {
    ClassifiedDay,
    CoordinatorResult,
    Dataset,
    PricePoint,
    RawFile,
    RunSummary,
} from '../model/Models.ts';
import type { Logger } from 'pino';

export interface CoordinatorInput {
    hourly: Dataset;
    subHourly: Dataset;
    files: RawFile[];
}

/**
 * Price points one raw file contributes. `subHourly` is empty unless the
 * file is natively sub-hourly and dated on/after the cutover.
 */
export interface DerivedDay {
    day: ClassifiedDay;
    hourly: PricePoint[];
    subHourly: PricePoint[];
}

function newSummary(filesSeen: number): RunSummary {
    return {
        filesSeen,
        filesAccepted: 0,
        filesAlreadyPresent: 0,
        skipped: [],
        hourlyDaysContributed: 0,
        subHourlyDaysContributed: 0,
        hourlyRows: 0,
        subHourlyRows: 0,
    };
}

/**
 * Keeps the hourly series and the 15-minute series in step.
 *
 * Every operation is a pure function of its inputs and the configuration:
 * existing datasets and raw files in, both reconciled datasets out.
 * Nothing is persisted here.
 */
export class DualDatasetCoordinator {
    private logger: Logger;
    private config: EngineConfig;

    constructor(config: EngineConfig) {
        this.logger = createLogger('DualDatasetCoordinator');
        this.config = config;
    }

    /**
     * Parses and classifies one raw file.
     *
     * @throws FormatError, NamingError
     */
    classifyFile(file: RawFile): ClassifiedDay {
        const observations = parseRawRecords(file.content, {
            delimiter: this.config.delimiter,
            headerLines: this.config.headerLines,
            missingMarker: this.config.missingMarker,
            fileName: file.fileName,
        });
        return classifyObservations(observations, file.fileName, this.config);
    }

    /**
     * Derives both point sets for a classified day. Either both derivations
     * succeed or the error propagates and the day contributes nothing.
     *
     * @throws FormatError for a sub-hourly file dated before the cutover
     * @throws AggregationError when a sub-hourly day cannot be resampled
     */
    deriveDay(day: ClassifiedDay): DerivedDay {
        const afterCutover = day.date >= this.config.cutoverDate;

        if (day.granularity === 'subHourly' && !afterCutover) {
            const periods = day.observations.length;
            const context = { file: day.fileName, date: day.date, cutoverDate: this.config.cutoverDate, periods };
            if (periods === HOURLY_MAX_PERIOD + 1) {
                throw new FormatError(
                    `${day.fileName} has 25 periods (daylight-saving long day) and is dated ${day.date}, before the cutover ${this.config.cutoverDate}; files before the cutover may have at most ${HOURLY_MAX_PERIOD} periods, so this day is not ingested`,
                    context
                );
            }
            throw new FormatError(
                `${day.fileName} has ${periods} sub-hourly periods but is dated ${day.date}, before the cutover ${this.config.cutoverDate}`,
                context
            );
        }

        const hourly = toHourlyPoints(day, this.config.partialBlockPolicy);
        const subHourly = day.granularity === 'subHourly' && afterCutover ? toSubHourlyPoints(day) : [];

        return { day, hourly, subHourly };
    }

    /**
     * Incremental ingest: folds new raw files into both datasets.
     * Files whose (date, zone) is already in the hourly dataset are skipped
     * when `skipExisting` is on.
     */
    ingest(input: CoordinatorInput): CoordinatorResult {
        const summary = newSummary(input.files.length);
        const knownDays = this.config.skipExisting ? dayKeys(input.hourly.points) : new Set<string>();

        const derived: DerivedDay[] = [];
        for (const file of input.files) {
            const result = this.processFile(file, summary, knownDays);
            if (result) derived.push(result);
        }

        return this.assemble(input.hourly, input.subHourly, derived, summary);
    }

    /**
     * Rebuilds everything on/after the cutover from raw files.
     * Hourly points before the cutover are kept as they are; the 15-minute
     * dataset is rebuilt from the raw files alone.
     */
    rebuildFromRaw(input: CoordinatorInput): CoordinatorResult {
        const cutover = this.config.cutoverDate;
        const files = input.files.filter((file) => this.isOnOrAfterCutover(file.fileName));
        const summary = newSummary(files.length);

        this.logger.info(
            `Rebuilding from ${files.length} raw files dated on/after ${cutover} (${input.files.length - files.length} earlier files ignored)`
        );

        const derived: DerivedDay[] = [];
        for (const file of files) {
            const result = this.processFile(file, summary, new Set<string>());
            if (result) derived.push(result);
        }

        if (derived.length === 0) {
            throw new PipelineError(`No usable raw files dated on/after ${cutover}`, { cutoverDate: cutover });
        }

        const before = input.hourly.points.filter((point) => deliveryDate(point) < cutover);
        this.logger.info(`Keeping ${before.length} hourly rows before ${cutover}`);

        return this.assemble(
            { resolution: 'hourly', points: before },
            emptyDataset('subHourly'),
            derived,
            summary
        );
    }

    /**
     * Recomputes post-cutover hourly days from the stored 15-minute dataset.
     * Hourly days without a 15-minute counterpart are kept; the 15-minute
     * dataset is returned unchanged.
     */
    rebuildHourlyFromSubHourly(input: Omit<CoordinatorInput, 'files'>): CoordinatorResult {
        const cutover = this.config.cutoverDate;
        const summary = newSummary(0);

        const resampled: PricePoint[] = [];
        const rebuiltDays = new Set<string>();

        for (const [key, points] of groupByDay(input.subHourly.points)) {
            const date = deliveryDate(points[0]);
            const zone = points[0].zone;
            if (date < cutover) {
                this.skip(summary, key, new FormatError(`15-minute day ${key} is dated before the cutover ${cutover}`));
                continue;
            }
            try {
                const hourly = resampleToHourly(pointsToObservations(points), this.config.partialBlockPolicy, key);
                resampled.push(...observationsToPoints(hourly, zone, 'hourly'));
                rebuiltDays.add(dayKey(date, zone));
            } catch (err) {
                if (!(err instanceof AggregationError)) throw err;
                this.skip(summary, key, err);
            }
        }

        const kept = input.hourly.points.filter((point) => {
            const date = deliveryDate(point);
            return date < cutover || !rebuiltDays.has(dayKey(date, point.zone));
        });

        const hourly = mergeDataset({ resolution: 'hourly', points: kept }, resampled);
        summary.hourlyDaysContributed = rebuiltDays.size;
        summary.hourlyRows = hourly.points.length;
        summary.subHourlyRows = input.subHourly.points.length;

        this.logger.info(`Resampled ${rebuiltDays.size} days from the 15-minute dataset`);

        return { hourly, subHourly: input.subHourly, summary };
    }

    /**
     * Splits a legacy dataset that mixes hourly rows (before the cutover) and
     * 15-minute rows (from the cutover) into the two datasets. Timestamps are
     * recomputed from the period; 15-minute days are also resampled into the
     * hourly dataset.
     *
     * Rows dated before the cutover are stored history and stay hourly
     * whatever their period count (25-hour daylight-saving days included).
     * From the cutover on, the period count decides.
     */
    splitMixedDataset(mixed: Dataset): CoordinatorResult {
        const cutover = this.config.cutoverDate;
        const summary = newSummary(0);

        const hourly: PricePoint[] = [];
        const subHourly: PricePoint[] = [];

        for (const [key, points] of groupByDay(mixed.points)) {
            const observations = pointsToObservations(points);
            const zone = points[0].zone;
            const date = deliveryDate(points[0]);

            const repeated = points.length - new Set(points.map((point) => point.period)).size;
            if (repeated > 0) {
                this.logger.warn({ day: key, repeated }, `Day ${key} repeats ${repeated} periods`);
            }

            if (date < cutover || detectGranularity(observations) === 'hourly') {
                hourly.push(...observationsToPoints(observations, zone, 'hourly'));
                summary.hourlyDaysContributed++;
                continue;
            }

            try {
                const resampled = resampleToHourly(observations, this.config.partialBlockPolicy, key);
                hourly.push(...observationsToPoints(resampled, zone, 'hourly'));
                subHourly.push(...observationsToPoints(observations, zone, 'subHourly'));
                summary.hourlyDaysContributed++;
                summary.subHourlyDaysContributed++;
            } catch (err) {
                if (!(err instanceof AggregationError)) throw err;
                this.skip(summary, key, err);
            }
        }

        const result = {
            hourly: mergeDataset(emptyDataset('hourly'), hourly),
            subHourly: mergeDataset(emptyDataset('subHourly'), subHourly),
            summary,
        };

        // a 25th hour starts at the next day's 00:00 and shares its key
        const replaced = hourly.length - result.hourly.points.length;
        if (replaced > 0) {
            this.logger.warn(
                { replaced },
                `${replaced} hourly rows share (timestamp, zone) with a later row and were replaced by it`
            );
        }

        summary.hourlyRows = result.hourly.points.length;
        summary.subHourlyRows = result.subHourly.points.length;
        return result;
    }

    private processFile(file: RawFile, summary: RunSummary, knownDays: Set<string>): DerivedDay | null {
        try {
            const day = this.classifyFile(file);

            if (knownDays.has(dayKey(day.date, day.zone))) {
                this.logger.info(`Skipping ${file.fileName} (already in hourly dataset)`);
                summary.filesAlreadyPresent++;
                return null;
            }

            const derived = this.deriveDay(day);
            this.logger.info(
                `Adding ${file.fileName}: ${day.granularity}, ${derived.hourly.length} hourly / ${derived.subHourly.length} 15-minute rows`
            );
            summary.filesAccepted++;
            return derived;
        } catch (err) {
            if (!isFileLevelError(err)) throw err;
            this.skip(summary, file.fileName, err);
            return null;
        }
    }

    private skip(summary: RunSummary, source: string, err: PipelineError): void {
        this.logger.warn({ ...err.context, file: source, reason: err.message }, `Skipping ${source}: ${err.name}`);
        summary.skipped.push({ source, reason: err.message, errorName: err.name });
    }

    private isOnOrAfterCutover(fileName: string): boolean {
        try {
            return parseRawFileName(fileName, this.config).date >= this.config.cutoverDate;
        } catch (err) {
            // kept so that the name gets reported as skipped
            if (err instanceof NamingError) return true;
            throw err;
        }
    }

    private assemble(
        hourlyBase: Dataset,
        subHourlyBase: Dataset,
        derived: DerivedDay[],
        summary: RunSummary
    ): CoordinatorResult {
        const newHourly = derived.flatMap((d) => d.hourly);
        const newSubHourly = derived.flatMap((d) => d.subHourly);

        const hourly = mergeDataset(hourlyBase, newHourly);
        const subHourly = mergeDataset(subHourlyBase, newSubHourly);

        summary.hourlyDaysContributed = derived.length;
        summary.subHourlyDaysContributed = derived.filter((d) => d.subHourly.length > 0).length;
        summary.hourlyRows = hourly.points.length;
        summary.subHourlyRows = subHourly.points.length;

        return { hourly, subHourly, summary };
    }
}
