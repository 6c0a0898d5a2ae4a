import { FormatError, NamingError } from '../model/Errors.ts';
import { parseCalendarDate, toCalendarDate } from '../utils/CalendarDates.ts';

import type { EngineConfig } from '../config/Config.ts';
import type { ClassifiedDay, Granularity, RawFileName, RawObservation } from '../model/Models.ts';

/**
 * Hourly files never go past period 24; anything above is sub-hourly.
 */
export const HOURLY_MAX_PERIOD = 24;

type NamingConfig = Pick<EngineConfig, 'filePrefix' | 'zoneByRevision'>;

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Decodes `<prefix>_<YYYYMMDD>.<revision>` into date, revision and zone.
 *
 * @throws NamingError when the name does not match or the revision is not mapped to a zone
 */
export function parseRawFileName(fileName: string, config: NamingConfig): RawFileName {
    const pattern = new RegExp(`^${escapeRegExp(config.filePrefix)}_(\\d{8})\\.(\\d+)$`);
    const match = pattern.exec(fileName);
    if (!match) {
        throw new NamingError(`Cannot parse date from filename: ${fileName}`, { file: fileName });
    }

    const [, dateDigits, revisionDigits] = match;
    const date = parseCalendarDate(dateDigits);
    if (date === null) {
        throw new NamingError(`Filename ${fileName} carries an impossible date ${dateDigits}`, { file: fileName });
    }

    const revision = Number(revisionDigits);
    const zone = config.zoneByRevision[String(revision)];
    if (zone === undefined) {
        throw new NamingError(
            `Unrecognized revision suffix .${revisionDigits} in ${fileName}`,
            { file: fileName, revision }
        );
    }

    return { fileName, date, revision, zone };
}

/**
 * Granularity is a property of the data: the largest period decides.
 */
export function detectGranularity(observations: RawObservation[]): Granularity {
    const maxPeriod = observations.reduce((max, obs) => Math.max(max, obs.period), 0);
    return maxPeriod > HOURLY_MAX_PERIOD ? 'subHourly' : 'hourly';
}

/**
 * Attaches date, zone and granularity to a parsed raw table.
 *
 * @throws NamingError for a bad file name
 * @throws FormatError when the rows are dated differently from the file name
 */
export function classifyObservations(
    observations: RawObservation[],
    fileName: string,
    config: NamingConfig
): ClassifiedDay {
    const identity = parseRawFileName(fileName, config);

    if (observations.length === 0) {
        throw new FormatError(`No price rows in ${fileName}`, { file: fileName });
    }

    const first = observations[0];
    const contentDate = toCalendarDate(first.year, first.month, first.day);
    if (contentDate !== identity.date) {
        throw new FormatError(
            `Rows in ${fileName} are dated ${contentDate ?? 'invalid'}, file name says ${identity.date}`,
            { file: fileName, contentDate, fileDate: identity.date }
        );
    }

    return {
        ...identity,
        granularity: detectGranularity(observations),
        observations,
    };
}
