import { mkdir, rename, rm } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

import { PersistenceError } from '../model/Errors.ts';
import { createLogger } from '../utils/Logger.ts';

const logger = createLogger('atomicWrite');

/**
 * Lets `write` fill a temporary file next to `target`, then renames it over
 * `target`. On failure the temporary file is removed and `target` keeps its
 * previous content.
 *
 * @throws PersistenceError
 */
export async function writeAtomically(target: string, write: (tempPath: string) => Promise<void>): Promise<void> {
    const directory = dirname(target);
    const tempPath = join(directory, `.${basename(target)}.${process.pid}.${Date.now()}.tmp`);

    try {
        await mkdir(directory, { recursive: true });
        await write(tempPath);
        await rename(tempPath, target);
    } catch (err) {
        await rm(tempPath, { force: true }).catch((cleanupErr: unknown) =>
            logger.warn({ err: cleanupErr, tempPath }, 'Could not remove temporary file')
        );
        throw new PersistenceError(`Failed to write ${target}`, { target }, { cause: err });
    }
}
