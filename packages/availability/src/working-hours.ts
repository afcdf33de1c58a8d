/**
 * Working-hours expansion: weekday rules in local time to UTC intervals.
 */

import {
	addLocalDays,
	addLocalMilliseconds,
	compareLocalDate,
	err,
	instantToZoned,
	localDateTime,
	ok,
	parseLocalTime,
	resolveSchedulingOptions,
	toLocalDate,
	weekdayOf,
	zonedToInstant,
	type DateRange,
	type InvalidTimezoneError,
	type Interval,
	type LocalDate,
	type Result,
	type SchedulingOptions,
	type TimezoneDatabase,
} from '@cadence/core';
import { clipIntervals, mergeIntervals } from './intervals.js';
import type { InvalidWorkingHoursError, WorkingHoursRule } from './types.js';

const MS_PER_MINUTE = 60 * 1000;

function invalidWorkingHours(message: string): InvalidWorkingHoursError {
	return { kind: 'InvalidWorkingHours', message };
}

/**
 * Local dates a rule must be evaluated on to cover `range`. Starts a day early
 * so overnight windows begun the previous evening are included.
 */
function* localDays(range: DateRange, rule: WorkingHoursRule, database: TimezoneDatabase): Generator<LocalDate> {
	const first = addLocalDays(toLocalDate(instantToZoned(database, range.start, rule.timezone)), -1);
	const last = toLocalDate(instantToZoned(database, range.end, rule.timezone));

	for (let day: LocalDate = first; compareLocalDate(day, last) <= 0; day = addLocalDays(day, 1)) {
		yield day;
	}
}

/**
 * Expand working-hours rules into merged UTC intervals within `range`.
 *
 * Each rule is evaluated per local day in its own zone, so "09:00-17:00" stays
 * 09:00-17:00 local across DST transitions.
 *
 * @example
 * const result = expandWorkingHours(
 *   [{ dailyStart: '09:00', dailyEnd: '17:00', daysOfWeek: ['monday'], timezone: 'Europe/Berlin' }],
 *   { start: new Date('2026-02-02T00:00:00Z'), end: new Date('2026-02-03T00:00:00Z') },
 * );
 * // => ok([{ start: 2026-02-02T08:00Z, end: 2026-02-02T16:00Z }])
 */
export function expandWorkingHours(
	rules: WorkingHoursRule[],
	range: DateRange,
	options: SchedulingOptions = {},
): Result<Interval[], InvalidWorkingHoursError | InvalidTimezoneError> {
	const { resolver } = resolveSchedulingOptions(options);
	const intervals: Interval[] = [];

	for (const rule of rules) {
		const zone = resolver.checkZone(rule.timezone);
		if (!zone.ok) return zone;

		const startMinutes = parseLocalTime(rule.dailyStart);
		const endMinutes = parseLocalTime(rule.dailyEnd);
		if (startMinutes === null || endMinutes === null || startMinutes === 24 * 60) {
			return err(
				invalidWorkingHours(`Working hours must be HH:MM times, got "${rule.dailyStart}"-"${rule.dailyEnd}"`),
			);
		}
		if (startMinutes === endMinutes) {
			return err(invalidWorkingHours(`Working hours "${rule.dailyStart}"-"${rule.dailyEnd}" are empty`));
		}

		const overnight = endMinutes < startMinutes;

		for (const day of localDays(range, rule, resolver.database)) {
			if (!rule.daysOfWeek.includes(weekdayOf(day))) continue;

			const midnight = localDateTime(day.year, day.month, day.day);
			const startLocal = addLocalMilliseconds(midnight, startMinutes * MS_PER_MINUTE);
			const endLocal = addLocalMilliseconds(
				overnight ? addLocalMilliseconds(midnight, 24 * 60 * MS_PER_MINUTE) : midnight,
				endMinutes * MS_PER_MINUTE,
			);

			const start = zonedToInstant(resolver.database, startLocal, rule.timezone, resolver.disambiguation);
			const end = zonedToInstant(resolver.database, endLocal, rule.timezone, resolver.disambiguation);
			if (start.getTime() < end.getTime()) {
				intervals.push({ start, end });
			}
		}
	}

	return ok(clipIntervals(mergeIntervals(intervals), range));
}
