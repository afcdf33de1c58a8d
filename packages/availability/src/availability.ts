/**
 * Free/busy computation and slot search.
 */

import {
	compareIntervals,
	err,
	invalidInterval,
	ok,
	type DateRange,
	type DurationMs,
	type Interval,
	type Result,
	type SchedulingOptions,
} from '@cadence/core';
import { clipIntervals, mergeIntervals, subtractIntervals } from './intervals.js';
import type {
	AvailabilityError,
	AvailabilityStatus,
	AvailabilityWindow,
	FreeSlotOptions,
	WorkingHoursRule,
} from './types.js';
import { expandWorkingHours } from './working-hours.js';

/**
 * Explicit statuses, strongest first. A stronger window claims its span from
 * every weaker one.
 */
const EXPLICIT_PRECEDENCE: readonly AvailabilityStatus[] = ['out-of-office', 'busy', 'tentative', 'free'];

function tag(intervals: Interval[], status: AvailabilityStatus): AvailabilityWindow[] {
	return intervals.map((interval) => ({ interval, status }));
}

/**
 * Sort windows and coalesce abutting neighbours that share a status.
 */
function coalesce(windows: AvailabilityWindow[]): AvailabilityWindow[] {
	const sorted = [...windows].sort((a, b) => compareIntervals(a.interval, b.interval));
	const result: AvailabilityWindow[] = [];

	for (const window of sorted) {
		const last = result[result.length - 1];
		if (last && last.status === window.status && last.interval.end.getTime() === window.interval.start.getTime()) {
			last.interval = { start: last.interval.start, end: window.interval.end };
		} else {
			result.push(window);
		}
	}

	return result;
}

/**
 * Free/busy windows within `range`, ordered and non-overlapping.
 *
 * - Explicit `availabilityWindows` win for their own span, in the order
 *   out-of-office, busy, tentative, free.
 * - Remaining busy time is reported as busy.
 * - Working hours minus busy time is reported as free. With no working-hours
 *   rules the whole range is a candidate.
 * - Time outside working hours that is neither busy nor tagged is omitted.
 */
export function getAvailability(
	busy: Interval[],
	availabilityWindows: AvailabilityWindow[],
	workingHours: WorkingHoursRule[],
	range: DateRange,
	options: SchedulingOptions = {},
): Result<AvailabilityWindow[], AvailabilityError> {
	if (range.end.getTime() <= range.start.getTime()) {
		return err(invalidInterval('Availability range end must be after its start'));
	}

	const windows: AvailabilityWindow[] = [];
	let claimed: Interval[] = [];

	for (const status of EXPLICIT_PRECEDENCE) {
		const spans = clipIntervals(
			availabilityWindows.filter((window) => window.status === status).map((window) => window.interval),
			range,
		);
		windows.push(...tag(subtractIntervals(spans, claimed), status));
		claimed = mergeIntervals([...claimed, ...spans]);
	}

	const busyInRange = clipIntervals(busy, range);
	windows.push(...tag(subtractIntervals(busyInRange, claimed), 'busy'));

	let candidates: Interval[] = [{ start: new Date(range.start.getTime()), end: new Date(range.end.getTime()) }];
	if (workingHours.length > 0) {
		const expanded = expandWorkingHours(workingHours, range, options);
		if (!expanded.ok) return expanded;
		candidates = expanded.value;
	}
	windows.push(...tag(subtractIntervals(candidates, [...claimed, ...busyInRange]), 'free'));

	return ok(coalesce(windows));
}

/**
 * Slots of exactly `duration`, one at the start of each free window long
 * enough to hold it, earliest first. An empty list means nothing fits.
 *
 * @example
 * const slots = findFreeSlots(busy, officeHours, week, 30 * 60 * 1000, {
 *   bufferAfter: 10 * 60 * 1000,
 *   limit: 3,
 * });
 */
export function findFreeSlots(
	busy: Interval[],
	workingHours: WorkingHoursRule[],
	range: DateRange,
	duration: DurationMs,
	options: FreeSlotOptions & SchedulingOptions = {},
): Result<Interval[], AvailabilityError> {
	const { availabilityWindows = [], bufferBefore = 0, bufferAfter = 0, limit } = options;
	if (duration <= 0 || limit === 0) return ok([]);

	const padded = busy.map((interval) => ({
		start: new Date(interval.start.getTime() - bufferBefore),
		end: new Date(interval.end.getTime() + bufferAfter),
	}));

	const availability = getAvailability(padded, availabilityWindows, workingHours, range, options);
	if (!availability.ok) return availability;

	const slots: Interval[] = [];
	for (const window of availability.value) {
		if (window.status !== 'free') continue;

		const start = window.interval.start.getTime();
		if (window.interval.end.getTime() - start < duration) continue;

		slots.push({ start: new Date(start), end: new Date(start + duration) });
		if (limit !== undefined && slots.length >= limit) break;
	}

	return ok(slots);
}
