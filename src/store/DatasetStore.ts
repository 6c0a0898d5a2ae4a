import type { Dataset, Resolution } from '../model/Models.ts';

/**
 * A place a dataset is persisted to.
 *
 * `load` throws MissingDatasetError when nothing has been stored yet.
 * `save` replaces the stored dataset as a whole or leaves it untouched,
 * throwing PersistenceError on failure.
 */
export interface DatasetStore {
    readonly description: string;
    load(resolution: Resolution): Promise<Dataset>;
    save(dataset: Dataset): Promise<void>;
}
