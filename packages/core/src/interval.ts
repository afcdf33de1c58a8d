/**
 * Interval helpers.
 */

import { areIntervalsOverlapping, differenceInMilliseconds, isEqual } from 'date-fns';
import { invalidInterval, type InvalidIntervalError } from './errors.js';
import { err, ok, type Result } from './result.js';
import type { Interval } from './types.js';

/**
 * Build an interval, rejecting zero-length and inverted ones.
 */
export function createInterval(start: Date, end: Date): Result<Interval, InvalidIntervalError> {
	if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
		return err(invalidInterval('Interval bounds must be valid dates'));
	}
	if (start >= end) {
		return err(
			invalidInterval(
				`Interval start ${start.toISOString()} must be before end ${end.toISOString()}`,
			),
		);
	}
	return ok({ start: new Date(start.getTime()), end: new Date(end.getTime()) });
}

/**
 * Check if two intervals strictly overlap. Intervals sharing only an endpoint do not.
 */
export function intervalsOverlap(a: Interval, b: Interval): boolean {
	return areIntervalsOverlapping(a, b);
}

/**
 * Check if an interval contains a point in time.
 */
export function intervalContains(interval: Interval, time: Date): boolean {
	return time >= interval.start && time < interval.end;
}

export function intervalsEqual(a: Interval, b: Interval): boolean {
	return isEqual(a.start, b.start) && isEqual(a.end, b.end);
}

/**
 * Get the duration of an interval in milliseconds.
 */
export function intervalDuration(interval: Interval): number {
	return differenceInMilliseconds(interval.end, interval.start);
}

/**
 * Order by start, then by end.
 */
export function compareIntervals(a: Interval, b: Interval): number {
	return a.start.getTime() - b.start.getTime() || a.end.getTime() - b.end.getTime();
}
