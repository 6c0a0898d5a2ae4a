export type ErrorContext = Record<string, unknown>;

/**
 * Base class for every error the price pipeline raises on purpose.
 * `context` is attached to the log line when the error is reported.
 */
export class PipelineError extends Error {
    context: ErrorContext;

    constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
        super(message, options);
        this.name = this.constructor.name;
        this.context = context;
    }
}

/**
 * Raw file content does not have the expected row/column shape or types.
 * The file is skipped, the run continues.
 */
export class FormatError extends PipelineError {}

/**
 * File name does not match the raw file pattern or carries an unmapped revision.
 * The file is skipped, the run continues.
 */
export class NamingError extends PipelineError {}

/**
 * A sub-hourly day does not decompose into 24 complete blocks of 4.
 * The day is left out of both datasets.
 */
export class AggregationError extends PipelineError {}

/**
 * A persisted dataset was expected but is not there.
 */
export class MissingDatasetError extends PipelineError {}

/**
 * Writing an output artifact failed. Fatal.
 */
export class PersistenceError extends PipelineError {}

/**
 * Environment configuration is invalid. Fatal at startup.
 */
export class ConfigError extends PipelineError {}

/**
 * Errors that drop a single file without aborting the run
 */
export function isFileLevelError(err: unknown): err is FormatError | NamingError | AggregationError {
    return err instanceof FormatError || err instanceof NamingError || err instanceof AggregationError;
}
