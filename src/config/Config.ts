import { z } from 'zod';

import { ConfigError } from '../model/Errors.ts';
import { parseCalendarDate } from '../utils/CalendarDates.ts';
import { OMIE_FILE_PREFIX, OMIE_ZONE_BY_REVISION } from './OmieZones.ts';

import type { CalendarDate, PartialBlockPolicy } from '../model/Models.ts';

/**
 * Everything the reconciliation engine needs to know about the market.
 * Passed explicitly into the coordinator; nothing is read from globals.
 */
export interface EngineConfig {
    cutoverDate: CalendarDate;
    filePrefix: string;
    zoneByRevision: Record<string, string>;
    delimiter: string;
    headerLines: number;
    missingMarker: string;
    partialBlockPolicy: PartialBlockPolicy;
    skipExisting: boolean;
}

/**
 * Where raw files are read from and derived datasets are written to.
 */
export interface StorageConfig {
    rawDataDir: string;
    outputDir: string;
    hourlyBaseName: string;
    subHourlyBaseName: string;
    csvHasHeader: boolean;
    readConcurrency: number;
    databaseUrl?: string;
    hourlyTable: string;
    subHourlyTable: string;
}

export interface AppConfig {
    engine: EngineConfig;
    storage: StorageConfig;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
    cutoverDate: '2025-10-01',
    filePrefix: OMIE_FILE_PREFIX,
    zoneByRevision: OMIE_ZONE_BY_REVISION,
    delimiter: ';',
    headerLines: 1,
    missingMarker: '*',
    partialBlockPolicy: 'reject',
    skipExisting: true,
};

type Env = Record<string, string | undefined>;

// unset and empty variables both fall back to the default
const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);

const calendarDate = z.string().transform((raw, ctx) => {
    const date = parseCalendarDate(raw);
    if (date === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a date (YYYY-MM-DD)' });
        return z.NEVER;
    }
    return date;
});

const flag = z.string().transform((raw, ctx) => {
    switch (raw.toLowerCase()) {
        case 'true':
        case '1':
        case 'yes':
            return true;
        case 'false':
        case '0':
        case 'no':
            return false;
        default:
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be true or false' });
            return z.NEVER;
    }
});

const integerFrom = (min: number) =>
    z.coerce
        .number()
        .int({ message: `must be an integer >= ${min}` })
        .min(min, { message: `must be an integer >= ${min}` });

const singleChar = z.string().length(1, { message: 'must be a single character' });

const name = z.string().regex(/^[A-Za-z0-9_-]+$/, {
    message: "may only contain letters, digits, '_' and '-'",
});

const policy = z.enum(['reject', 'average'], {
    errorMap: () => ({ message: "must be 'reject' or 'average'" }),
});

const envSchema = z.object({
    CUTOVER_DATE: z.preprocess(blankToUndefined, calendarDate.default(DEFAULT_ENGINE_CONFIG.cutoverDate)),
    RAW_FILE_PREFIX: z.preprocess(blankToUndefined, name.default(DEFAULT_ENGINE_CONFIG.filePrefix)),
    ZONE_BY_REVISION: z.preprocess(blankToUndefined, z.string().optional()),
    RAW_DELIMITER: z.preprocess(blankToUndefined, singleChar.default(DEFAULT_ENGINE_CONFIG.delimiter)),
    RAW_HEADER_LINES: z.preprocess(blankToUndefined, integerFrom(0).default(DEFAULT_ENGINE_CONFIG.headerLines)),
    RAW_MISSING_MARKER: z.preprocess(blankToUndefined, singleChar.default(DEFAULT_ENGINE_CONFIG.missingMarker)),
    PARTIAL_BLOCK_POLICY: z.preprocess(blankToUndefined, policy.default(DEFAULT_ENGINE_CONFIG.partialBlockPolicy)),
    SKIP_EXISTING_DAYS: z.preprocess(blankToUndefined, flag.default('true')),

    RAW_DATA_DIR: z.preprocess(blankToUndefined, z.string().default('data')),
    OUTPUT_DIR: z.preprocess(blankToUndefined, z.string().default('processed')),
    HOURLY_BASENAME: z.preprocess(blankToUndefined, name.default('all_omie_prices')),
    SUBHOURLY_BASENAME: z.preprocess(blankToUndefined, name.default('omie_15min')),
    CSV_HAS_HEADER: z.preprocess(blankToUndefined, flag.default('true')),
    READ_CONCURRENCY: z.preprocess(blankToUndefined, integerFrom(1).default(8)),
    DATABASE_URL: z.preprocess(blankToUndefined, z.string().optional()),
    HOURLY_TABLE: z.preprocess(blankToUndefined, name.default('prices_hourly')),
    SUBHOURLY_TABLE: z.preprocess(blankToUndefined, name.default('prices_15min')),
});

/**
 * Builds the application configuration from environment variables,
 * falling back to the OMIE defaults.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => {
            const key = issue.path.join('.');
            return `${key} ${issue.message}, got '${env[key] ?? ''}'`;
        });
        throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`, { problems });
    }
    const vars = parsed.data;

    const engine: EngineConfig = {
        cutoverDate: vars.CUTOVER_DATE,
        filePrefix: vars.RAW_FILE_PREFIX,
        zoneByRevision: vars.ZONE_BY_REVISION
            ? parseZoneMapping(vars.ZONE_BY_REVISION)
            : { ...DEFAULT_ENGINE_CONFIG.zoneByRevision },
        delimiter: vars.RAW_DELIMITER,
        headerLines: vars.RAW_HEADER_LINES,
        missingMarker: vars.RAW_MISSING_MARKER,
        partialBlockPolicy: vars.PARTIAL_BLOCK_POLICY,
        skipExisting: vars.SKIP_EXISTING_DAYS,
    };

    const storage: StorageConfig = {
        rawDataDir: vars.RAW_DATA_DIR,
        outputDir: vars.OUTPUT_DIR,
        hourlyBaseName: vars.HOURLY_BASENAME,
        subHourlyBaseName: vars.SUBHOURLY_BASENAME,
        csvHasHeader: vars.CSV_HAS_HEADER,
        readConcurrency: vars.READ_CONCURRENCY,
        databaseUrl: vars.DATABASE_URL,
        hourlyTable: vars.HOURLY_TABLE,
        subHourlyTable: vars.SUBHOURLY_TABLE,
    };

    return { engine, storage };
}

/**
 * Parses '1:Spain,2:Portugal' into { '1': 'Spain', '2': 'Portugal' }.
 */
export function parseZoneMapping(value: string): Record<string, string> {
    const mapping: Record<string, string> = {};
    for (const entry of value.split(',')) {
        const trimmed = entry.trim();
        if (trimmed === '') continue;
        const [revision, zone, ...rest] = trimmed.split(':').map((part) => part.trim());
        if (rest.length > 0 || !/^\d+$/.test(revision) || !zone) {
            throw new ConfigError(`Invalid ZONE_BY_REVISION entry '${trimmed}', expected <revision>:<zone>`);
        }
        mapping[String(Number(revision))] = zone;
    }
    if (Object.keys(mapping).length === 0) {
        throw new ConfigError('ZONE_BY_REVISION must map at least one revision');
    }
    return mapping;
}
