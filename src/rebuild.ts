// must run before anything reads process.env (the logger reads it at import)
import 'dotenv/config';
import { join } from 'node:path';

import { loadConfig } from './config/Config.ts';
import { createPipeline } from './pipeline/createPipeline.ts';
import { CsvDatasetStore } from './store/CsvDatasetStore.ts';
import { PipelineError } from './model/Errors.ts';
import { createLogger } from './utils/Logger.ts';

import type { RunSummary } from './model/Models.ts';
import type { PricePipeline } from './pipeline/PricePipeline.ts';

/**
 * Standalone script for full rebuilds of the derived datasets.
 *
 * Usage: npm run rebuild -- <mode> [mixed.csv]
 *   raw        rebuild everything on/after the cutover from raw files
 *   subhourly  recompute post-cutover hourly days from the 15-minute dataset
 *   split      split a legacy mixed CSV (default: the hourly CSV) into both datasets
 */

const logger = createLogger('Rebuild');

const MODES = ['raw', 'subhourly', 'split'] as const;
type Mode = (typeof MODES)[number];

function isMode(value: string | undefined): value is Mode {
    return MODES.some((mode) => mode === value);
}

function runMode(pipeline: PricePipeline, mode: Mode, mixedPath: string, csvHasHeader: boolean): Promise<RunSummary> {
    switch (mode) {
        case 'raw':
            return pipeline.rebuildFromRaw();
        case 'subhourly':
            return pipeline.rebuildHourlyFromSubHourly();
        case 'split':
            return pipeline.splitMixed(new CsvDatasetStore(mixedPath, csvHasHeader));
    }
}

async function main() {
    const [mode, mixedPath] = process.argv.slice(2);
    if (!isMode(mode)) {
        throw new Error(`Unknown rebuild mode '${mode ?? ''}', expected one of: ${MODES.join(', ')}`);
    }

    const config = loadConfig();
    const { pipeline, close } = createPipeline(config);

    try {
        const defaultMixed = join(config.storage.outputDir, `${config.storage.hourlyBaseName}.csv`);
        const summary = await runMode(pipeline, mode, mixedPath ?? defaultMixed, config.storage.csvHasHeader);
        logger.info(`Done: ${summary.hourlyRows} hourly rows, ${summary.subHourlyRows} 15-minute rows`);
    } finally {
        await close();
    }
}

main().catch((err) => {
    if (err instanceof PipelineError) {
        logger.error({ err, ...err.context }, `Rebuild failed: ${err.message}`);
    } else {
        logger.error({ err }, 'Rebuild failed');
    }
    process.exit(1);
});
