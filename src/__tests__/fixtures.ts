import { DEFAULT_ENGINE_CONFIG } from '../config/Config.ts';
import { splitCalendarDate } from '../utils/CalendarDates.ts';
import { periodStart } from '../transformer/DayTransformer.ts';

import type { EngineConfig } from '../config/Config.ts';
import type { CalendarDate, Dataset, PricePoint, RawFile, Resolution } from '../model/Models.ts';

// Shared builders for the test suites. Not a test file itself.

/**
 * OMIE defaults with a short file prefix: day_YYYYMMDD.1 is Spain, .2 Portugal.
 */
export const TEST_CONFIG: EngineConfig = {
    ...DEFAULT_ENGINE_CONFIG,
    filePrefix: 'day',
};

export type PriceFn = (period: number) => number;

/** priceMain of period p is p */
export const byPeriod: PriceFn = (period) => period;

/**
 * Text of a raw daily file: a header line, one `;`-terminated line per
 * period and a trailing `*` line. priceAlt is always priceMain + 100.
 */
export function rawContent(date: CalendarDate, periods: number, price: PriceFn = byPeriod): string {
    const [year, month, day] = date.split('-');
    const lines = ['MARGINALPDBC;'];
    for (let period = 1; period <= periods; period++) {
        const main = price(period);
        lines.push(`${year};${month};${day};${period};${main.toFixed(2)};${(main + 100).toFixed(2)};`);
    }
    lines.push('*');
    return lines.join('\n') + '\n';
}

/**
 * Raw file named `day_<YYYYMMDD>.<revision>` holding `periods` rows dated `date`.
 */
export function rawFile(date: CalendarDate, periods: number, revision = 1, price: PriceFn = byPeriod): RawFile {
    return {
        fileName: `day_${date.replaceAll('-', '')}.${revision}`,
        content: rawContent(date, periods, price),
    };
}

export function pricePoint(
    date: CalendarDate,
    period: number,
    resolution: Resolution,
    priceMain: number,
    zone = 'Spain'
): PricePoint {
    const { year, month, day } = splitCalendarDate(date);
    return {
        year,
        month,
        day,
        period,
        priceMain,
        priceAlt: priceMain + 100,
        timestamp: periodStart(year, month, day, period, resolution),
        zone,
    };
}

/**
 * A complete day of points, priced by period.
 */
export function dayPoints(
    date: CalendarDate,
    resolution: Resolution,
    zone = 'Spain',
    price: PriceFn = byPeriod
): PricePoint[] {
    const periods = resolution === 'hourly' ? 24 : 96;
    return Array.from({ length: periods }, (_, i) => pricePoint(date, i + 1, resolution, price(i + 1), zone));
}

export function dataset(resolution: Resolution, points: PricePoint[] = []): Dataset {
    return { resolution, points };
}
