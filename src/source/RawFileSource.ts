import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import pLimit from 'p-limit';

import { createLogger } from '../utils/Logger.ts';
import { PipelineError } from '../model/Errors.ts';
import { selectLatestRevisions } from '../selector/VersionSelector.ts';
import { isNotFound } from '../utils/fsErrors.ts';

import type { EngineConfig } from '../config/Config.ts';
import type { RawFile, RawFileName } from '../model/Models.ts';
import type { RejectedFileName } from '../selector/VersionSelector.ts';
import type { Logger } from 'pino';

/**
 * Raw files picked for a run, plus the names that were left out
 */
export interface RawFileListing {
    files: RawFile[];
    rejected: RejectedFileName[];
    superseded: number;
}

/**
 * Reads raw daily files from a directory.
 * File names are version-selected before any content is read.
 */
export class RawFileSource {
    directory: string;
    private logger: Logger;
    private concurrency: number;
    private config: Pick<EngineConfig, 'filePrefix' | 'zoneByRevision'>;

    constructor(
        directory: string,
        config: Pick<EngineConfig, 'filePrefix' | 'zoneByRevision'>,
        concurrency = 8
    ) {
        this.directory = directory;
        this.config = config;
        this.concurrency = concurrency;
        this.logger = createLogger('RawFileSource');
    }

    /**
     * Names of every entry that starts with the raw file prefix
     */
    async listCandidates(): Promise<string[]> {
        let entries: string[];
        try {
            entries = await readdir(this.directory);
        } catch (err) {
            if (isNotFound(err)) {
                throw new PipelineError(`Raw data directory not found: ${this.directory}`, {
                    directory: this.directory,
                });
            }
            throw err;
        }
        return entries.filter((name) => name.startsWith(`${this.config.filePrefix}_`)).sort();
    }

    /**
     * Lists, version-selects and reads the raw files. Contents come back in
     * the selector's order no matter in which order the reads complete.
     */
    async load(): Promise<RawFileListing> {
        const candidates = await this.listCandidates();
        const { selected, rejected } = selectLatestRevisions(candidates, this.config);
        const superseded = candidates.length - selected.length - rejected.length;

        for (const { fileName, error } of rejected) {
            this.logger.warn({ file: fileName, reason: error.message }, `Skipping ${fileName}: ${error.name}`);
        }

        this.logger.info(
            `Found ${candidates.length} raw files in ${this.directory}: ${selected.length} selected, ${superseded} superseded, ${rejected.length} unparseable`
        );

        const files = await this.readAll(selected);
        return { files, rejected, superseded };
    }

    private async readAll(selected: RawFileName[]): Promise<RawFile[]> {
        const limit = pLimit(this.concurrency);
        return Promise.all(
            selected.map(({ fileName }) =>
                limit(async () => ({
                    fileName,
                    content: await readFile(join(this.directory, fileName), 'latin1'),
                }))
            )
        );
    }
}
