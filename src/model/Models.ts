/**
 * Calendar date as an ISO string, e.g. '2025-10-01'.
 * Lexicographic order equals chronological order.
 */
export type CalendarDate = string;

/**
 * Native reporting granularity of a raw daily file
 */
export type Granularity = 'hourly' | 'subHourly';

/**
 * Resolution of a persisted dataset
 */
export type Resolution = 'hourly' | 'subHourly';

/**
 * How the resampler treats a sub-hourly day that does not split into
 * 24 complete blocks of 4.
 */
export type PartialBlockPolicy = 'reject' | 'average';

/**
 * One row of a raw daily file after parsing
 */
export interface RawObservation {
    year: number;
    month: number;
    day: number;
    period: number;            // 1..24 hourly, 1..96 sub-hourly
    priceMain: number;
    priceAlt: number;
}

/**
 * Identity of a raw file, decoded from its name
 */
export interface RawFileName {
    fileName: string;
    date: CalendarDate;
    revision: number;
    zone: string;
}

/**
 * A raw file's observations together with what the classifier found out
 */
export interface ClassifiedDay extends RawFileName {
    granularity: Granularity;
    observations: RawObservation[];
}

/**
 * Raw file content handed to the coordinator
 */
export interface RawFile {
    fileName: string;
    content: string;
}

/**
 * Canonical price row. Field order is the persisted column order.
 * `timestamp` holds the market wall-clock start of the interval in its UTC fields.
 */
export interface PricePoint {
    year: number;
    month: number;
    day: number;
    period: number;
    priceMain: number;
    priceAlt: number;
    timestamp: Date;
    zone: string;
}

/**
 * Ordered, de-duplicated collection of price points at one resolution
 */
export interface Dataset {
    resolution: Resolution;
    points: PricePoint[];
}

/**
 * Why a raw file (or a stored day, in rebuilds) did not contribute to the run
 */
export interface SkippedFile {
    source: string;            // file name, or 'YYYY-MM-DD|zone' for a stored day
    reason: string;
    errorName: string;
}

/**
 * Counters reported at the end of every run
 */
export interface RunSummary {
    filesSeen: number;
    filesAccepted: number;
    filesAlreadyPresent: number;
    skipped: SkippedFile[];
    hourlyDaysContributed: number;
    subHourlyDaysContributed: number;
    hourlyRows: number;
    subHourlyRows: number;
}

/**
 * Output of one coordinator operation
 */
export interface CoordinatorResult {
    hourly: Dataset;
    subHourly: Dataset;
    summary: RunSummary;
}

/**
 * Positional field order used when binding stored tables
 */
export const PRICE_POINT_FIELDS = [
    'year',
    'month',
    'day',
    'period',
    'priceMain',
    'priceAlt',
    'timestamp',
    'zone',
] as const;

/**
 * Column names written to persisted artifacts, in field order
 */
export const PERSISTED_COLUMNS = [
    'year',
    'month',
    'day',
    'period',
    'price_main',
    'price_alt',
    'timestamp',
    'zone',
] as const;

export function emptyDataset(resolution: Resolution): Dataset {
    return { resolution, points: [] };
}
