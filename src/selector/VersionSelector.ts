import { parseRawFileName } from '../extractor/GranularityClassifier.ts';
import { NamingError } from '../model/Errors.ts';
import { dayKey } from '../transformer/DayTransformer.ts';

import type { EngineConfig } from '../config/Config.ts';
import type { RawFileName } from '../model/Models.ts';

export interface RejectedFileName {
    fileName: string;
    error: NamingError;
}

export interface VersionSelection {
    selected: RawFileName[];
    rejected: RejectedFileName[];
}

/**
 * Picks, for every (date, zone), the raw file with the highest revision.
 *
 * Revisions that map to different zones never compete with each other.
 * Names that do not parse are reported in `rejected` and left out.
 * `selected` is ordered by file name, which is the processing order.
 */
export function selectLatestRevisions(
    fileNames: string[],
    config: Pick<EngineConfig, 'filePrefix' | 'zoneByRevision'>
): VersionSelection {
    const latest = new Map<string, RawFileName>();
    const rejected: RejectedFileName[] = [];

    for (const fileName of fileNames) {
        let parsed: RawFileName;
        try {
            parsed = parseRawFileName(fileName, config);
        } catch (err) {
            if (err instanceof NamingError) {
                rejected.push({ fileName, error: err });
                continue;
            }
            throw err;
        }

        const key = dayKey(parsed.date, parsed.zone);
        const current = latest.get(key);
        if (!current || parsed.revision > current.revision) {
            latest.set(key, parsed);
        }
    }

    const selected = [...latest.values()].sort((a, b) =>
        a.fileName < b.fileName ? -1 : a.fileName > b.fileName ? 1 : 0
    );

    return { selected, rejected };
}
