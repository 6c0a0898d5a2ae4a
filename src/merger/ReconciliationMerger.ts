import type { Dataset, PricePoint } from '../model/Models.ts';

export function pointKey(point: PricePoint): string {
    return `${point.timestamp.getTime()}|${point.zone}`;
}

/**
 * Ascending by timestamp, then zone.
 */
export function comparePoints(a: PricePoint, b: PricePoint): number {
    const byTime = a.timestamp.getTime() - b.timestamp.getTime();
    if (byTime !== 0) return byTime;
    return a.zone < b.zone ? -1 : a.zone > b.zone ? 1 : 0;
}

/**
 * Merges incoming points into an existing dataset.
 *
 * One point survives per (timestamp, zone): incoming beats existing, and among
 * incoming points the last one wins. The result is sorted by (timestamp, zone).
 * Neither input is modified.
 */
export function mergeDataset(existing: Dataset, incoming: PricePoint[]): Dataset {
    const byKey = new Map<string, PricePoint>();
    for (const point of existing.points) {
        byKey.set(pointKey(point), point);
    }
    for (const point of incoming) {
        byKey.set(pointKey(point), point);
    }

    return {
        resolution: existing.resolution,
        points: [...byKey.values()].sort(comparePoints),
    };
}

/**
 * Merges two datasets of the same resolution; `incoming` takes precedence.
 */
export function mergeDatasets(existing: Dataset, incoming: Dataset): Dataset {
    if (existing.resolution !== incoming.resolution) {
        throw new TypeError(
            `Cannot merge a ${incoming.resolution} dataset into a ${existing.resolution} dataset`
        );
    }
    return mergeDataset(existing, incoming.points);
}

/**
 * Keys that occur more than once; empty for any dataset this module produced.
 */
export function findDuplicateKeys(dataset: Dataset): string[] {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const point of dataset.points) {
        const key = pointKey(point);
        if (seen.has(key)) {
            duplicates.add(key);
        }
        seen.add(key);
    }
    return [...duplicates];
}
