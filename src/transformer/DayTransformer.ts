import { resampleToHourly } from './Resampler.ts';
import { calendarDateOf, startOfDay, toCalendarDate } from '../utils/CalendarDates.ts';

import type {
    CalendarDate,
    ClassifiedDay,
    PartialBlockPolicy,
    PricePoint,
    RawObservation,
    Resolution,
} from '../model/Models.ts';

const MINUTES_PER_PERIOD: Record<Resolution, number> = {
    hourly: 60,
    subHourly: 15,
};

/**
 * Interval start of a period: midnight plus (period - 1) intervals.
 */
export function periodStart(year: number, month: number, day: number, period: number, resolution: Resolution): Date {
    const midnight = startOfDay(year, month, day);
    return new Date(midnight.getTime() + (period - 1) * MINUTES_PER_PERIOD[resolution] * 60_000);
}

/**
 * Maps observations of one zone to canonical price points, ordered by period.
 */
export function observationsToPoints(
    observations: RawObservation[],
    zone: string,
    resolution: Resolution
): PricePoint[] {
    return [...observations]
        .sort((a, b) => a.period - b.period)
        .map((obs) => ({
            year: obs.year,
            month: obs.month,
            day: obs.day,
            period: obs.period,
            priceMain: obs.priceMain,
            priceAlt: obs.priceAlt,
            timestamp: periodStart(obs.year, obs.month, obs.day, obs.period, resolution),
            zone,
        }));
}

/**
 * Strips the canonical fields back to raw observations, e.g. to resample a stored day.
 */
export function pointsToObservations(points: PricePoint[]): RawObservation[] {
    return points.map(({ year, month, day, period, priceMain, priceAlt }) => ({
        year,
        month,
        day,
        period,
        priceMain,
        priceAlt,
    }));
}

/**
 * Hourly points for a classified day; sub-hourly days are resampled first.
 */
export function toHourlyPoints(day: ClassifiedDay, policy: PartialBlockPolicy): PricePoint[] {
    const hourly =
        day.granularity === 'subHourly'
            ? resampleToHourly(day.observations, policy, day.fileName)
            : day.observations;
    return observationsToPoints(hourly, day.zone, 'hourly');
}

/**
 * 15-minute points for a natively sub-hourly day.
 */
export function toSubHourlyPoints(day: ClassifiedDay): PricePoint[] {
    if (day.granularity !== 'subHourly') {
        throw new TypeError(`${day.fileName} is not a sub-hourly file`);
    }
    return observationsToPoints(day.observations, day.zone, 'subHourly');
}

/**
 * Calendar date a point belongs to, taken from its year/month/day fields.
 */
export function deliveryDate(point: PricePoint): CalendarDate {
    return toCalendarDate(point.year, point.month, point.day) ?? calendarDateOf(point.timestamp);
}

export function dayKey(date: CalendarDate, zone: string): string {
    return `${date}|${zone}`;
}

/**
 * Groups points by (delivery date, zone), keeping first-seen order of days.
 */
export function groupByDay(points: PricePoint[]): Map<string, PricePoint[]> {
    const days = new Map<string, PricePoint[]>();
    for (const point of points) {
        const key = dayKey(deliveryDate(point), point.zone);
        const bucket = days.get(key);
        if (bucket) {
            bucket.push(point);
        } else {
            days.set(key, [point]);
        }
    }
    return days;
}

/**
 * Distinct (delivery date, zone) keys present in a set of points.
 */
export function dayKeys(points: PricePoint[]): Set<string> {
    return new Set(points.map((point) => dayKey(deliveryDate(point), point.zone)));
}
