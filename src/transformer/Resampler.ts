import { AggregationError } from '../model/Errors.ts';

import type { PartialBlockPolicy, RawObservation } from '../model/Models.ts';

export const PERIODS_PER_HOUR = 4;
export const HOURS_PER_DAY = 24;
export const SUB_HOURLY_PERIODS_PER_DAY = PERIODS_PER_HOUR * HOURS_PER_DAY;

/**
 * Rounds half away from zero. The scaled value is cut to 15 significant
 * digits first so that binary noise (234.49999999999997) does not flip a tie.
 */
export function roundHalfAwayFromZero(value: number, digits = 2): number {
    const factor = 10 ** digits;
    const scaled = Number((Math.abs(value) * factor).toPrecision(15));
    const rounded = Math.round(scaled) / factor;
    return rounded === 0 ? 0 : Math.sign(value) * rounded;
}

function mean(values: number[]): number {
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Aggregates one sub-hourly day into hourly rows.
 *
 * Period p belongs to hour floor((p - 1) / 4); each hourly price is the mean of
 * its block rounded to 2 decimals. Every dataset build path goes through here.
 *
 * With policy 'reject' the day must be exactly periods 1..96. With 'average'
 * an incomplete block is averaged over the rows it has.
 *
 * @throws AggregationError when the day does not split into hourly blocks
 */
export function resampleToHourly(
    observations: RawObservation[],
    policy: PartialBlockPolicy = 'reject',
    label = 'sub-hourly day'
): RawObservation[] {
    if (observations.length === 0) {
        throw new AggregationError(`Cannot resample ${label}: no rows`, { label });
    }

    const blocks = new Map<number, RawObservation[]>();
    for (const obs of observations) {
        if (!Number.isInteger(obs.period) || obs.period < 1 || obs.period > SUB_HOURLY_PERIODS_PER_DAY) {
            throw new AggregationError(
                `Cannot resample ${label}: period ${obs.period} is outside 1..${SUB_HOURLY_PERIODS_PER_DAY}`,
                { label, period: obs.period }
            );
        }
        const hourIndex = Math.floor((obs.period - 1) / PERIODS_PER_HOUR);
        const block = blocks.get(hourIndex);
        if (block) {
            block.push(obs);
        } else {
            blocks.set(hourIndex, [obs]);
        }
    }

    if (policy === 'reject') {
        const complete =
            blocks.size === HOURS_PER_DAY &&
            [...blocks.values()].every(
                (block) =>
                    block.length === PERIODS_PER_HOUR &&
                    new Set(block.map((obs) => obs.period)).size === PERIODS_PER_HOUR
            );
        if (!complete) {
            throw new AggregationError(
                `Cannot resample ${label}: ${observations.length} periods do not form ${HOURS_PER_DAY} complete blocks of ${PERIODS_PER_HOUR}`,
                { label, periods: observations.length }
            );
        }
    }

    const { year, month, day } = observations[0];

    return [...blocks.entries()]
        .sort(([a], [b]) => a - b)
        .map(([hourIndex, block]) => ({
            year,
            month,
            day,
            period: hourIndex + 1,
            priceMain: roundHalfAwayFromZero(mean(block.map((obs) => obs.priceMain))),
            priceAlt: roundHalfAwayFromZero(mean(block.map((obs) => obs.priceAlt))),
        }));
}
