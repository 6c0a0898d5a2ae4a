/**
 * OMIE publishes one marginal price file per market zone and delivery day:
 *   marginalpdbc_YYYYMMDD.1 = Spain
 *   marginalpdbc_YYYYMMDD.2 = Portugal
 *
 * The revision suffix therefore names the zone, not a correction.
 * Other markets provide their own prefix and mapping through configuration.
 */
export const OMIE_FILE_PREFIX = 'marginalpdbc';

export const OMIE_ZONE_BY_REVISION: Record<string, string> = {
    '1': 'Spain',
    '2': 'Portugal',
};
