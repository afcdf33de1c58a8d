/**
 * Set algebra over half-open intervals [start, end).
 *
 * Every function returns fresh, sorted, non-overlapping intervals and leaves
 * its inputs untouched. Empty or inverted inputs are ignored.
 */

import { compareIntervals, type DateRange, type Interval } from '@cadence/core';
import { max, min } from 'date-fns';

const copy = (interval: Interval): Interval => ({
	start: new Date(interval.start.getTime()),
	end: new Date(interval.end.getTime()),
});

const isNonEmpty = (interval: Interval) => interval.start.getTime() < interval.end.getTime();

/**
 * Union of intervals. Overlapping and abutting intervals are coalesced.
 *
 * @example
 * mergeIntervals([
 *   { start: new Date('2026-02-02T10:00:00Z'), end: new Date('2026-02-02T12:00:00Z') },
 *   { start: new Date('2026-02-02T12:00:00Z'), end: new Date('2026-02-02T13:00:00Z') },
 * ]);
 * // => [{ start: 10:00Z, end: 13:00Z }]
 */
export function mergeIntervals(intervals: Interval[]): Interval[] {
	const sorted = intervals.filter(isNonEmpty).map(copy).sort(compareIntervals);
	const merged: Interval[] = [];

	for (const interval of sorted) {
		const last = merged[merged.length - 1];
		if (last && interval.start.getTime() <= last.end.getTime()) {
			last.end = max([last.end, interval.end]);
		} else {
			merged.push(interval);
		}
	}

	return merged;
}

/**
 * Time covered by `from` but not by `subtract`. Holes split intervals.
 */
export function subtractIntervals(from: Interval[], subtract: Interval[]): Interval[] {
	const holes = mergeIntervals(subtract);
	const result: Interval[] = [];

	for (const interval of mergeIntervals(from)) {
		let cursor = interval.start;

		for (const hole of holes) {
			if (hole.end.getTime() <= cursor.getTime()) continue;
			if (hole.start.getTime() >= interval.end.getTime()) break;

			if (hole.start.getTime() > cursor.getTime()) {
				result.push({ start: cursor, end: new Date(hole.start.getTime()) });
			}
			cursor = new Date(hole.end.getTime());
		}

		if (cursor.getTime() < interval.end.getTime()) {
			result.push({ start: cursor, end: interval.end });
		}
	}

	return result;
}

/**
 * Time covered by both `a` and `b`.
 */
export function intersectIntervals(a: Interval[], b: Interval[]): Interval[] {
	const left = mergeIntervals(a);
	const right = mergeIntervals(b);
	const result: Interval[] = [];

	let i = 0;
	let j = 0;
	while (i < left.length && j < right.length) {
		const start = max([left[i].start, right[j].start]);
		const end = min([left[i].end, right[j].end]);
		if (start.getTime() < end.getTime()) {
			result.push({ start, end });
		}

		if (left[i].end.getTime() <= right[j].end.getTime()) {
			i++;
		} else {
			j++;
		}
	}

	return result;
}

/**
 * Union of intervals restricted to `range`.
 */
export function clipIntervals(intervals: Interval[], range: DateRange): Interval[] {
	return intersectIntervals(intervals, [range]);
}
