/**
 * Candidate dates for one recurrence period, computed in local calendar space.
 *
 * A period is the unit a rule steps by: one day, one week (starting on the
 * rule's week start), one month or one year. Candidates are returned sorted
 * and de-duplicated; dates a period cannot hold (the 31st of April, a fifth
 * Monday that does not exist) are simply absent.
 */

import {
	addLocalDays,
	addMonths,
	DAY_TO_NUMBER,
	daysInMonth,
	daysInYear,
	localDate,
	startOfLocalWeek,
	weekdayOf,
	type DayOfWeek,
	type LocalDate,
} from '@cadence/core';
import type { RecurrenceRule, WeekdaySpec } from './types.js';

// ============================================================================
// Weekday Arithmetic
// ============================================================================

/**
 * Day of month of the nth `weekday` in a month, or null when the month has
 * no such day. Negative `n` counts from the end.
 */
export function nthWeekdayOfMonth(year: number, month: number, weekday: DayOfWeek, n: number): number | null {
	const length = daysInMonth(year, month);
	const target = DAY_TO_NUMBER[weekday];

	if (n > 0) {
		const first = DAY_TO_NUMBER[weekdayOf(localDate(year, month, 1))];
		const day = 1 + ((target - first + 7) % 7) + (n - 1) * 7;
		return day <= length ? day : null;
	}

	const last = DAY_TO_NUMBER[weekdayOf(localDate(year, month, length))];
	const day = length - ((last - target + 7) % 7) - (-n - 1) * 7;
	return day >= 1 ? day : null;
}

/**
 * Date of the nth `weekday` in a year, or null when the year has no such day.
 */
export function nthWeekdayOfYear(year: number, weekday: DayOfWeek, n: number): LocalDate | null {
	const length = daysInYear(year);
	const target = DAY_TO_NUMBER[weekday];
	const jan1 = localDate(year, 1, 1);

	let dayOfYear: number;
	if (n > 0) {
		const first = DAY_TO_NUMBER[weekdayOf(jan1)];
		dayOfYear = 1 + ((target - first + 7) % 7) + (n - 1) * 7;
	} else {
		const last = DAY_TO_NUMBER[weekdayOf(localDate(year, 12, 31))];
		dayOfYear = length - ((last - target + 7) % 7) - (-n - 1) * 7;
	}

	if (dayOfYear < 1 || dayOfYear > length) return null;
	return addLocalDays(jan1, dayOfYear - 1);
}

function matchesWeekday(date: LocalDate, spec: WeekdaySpec): boolean {
	if (weekdayOf(date) !== spec.day) return false;
	if (spec.ordinal === undefined) return true;
	return nthWeekdayOfMonth(date.year, date.month, spec.day, spec.ordinal) === date.day;
}

// ============================================================================
// Filters
// ============================================================================

/**
 * Resolve BYMONTHDAY values against a month's real length.
 * Positive days past the end and negative days before the start are dropped.
 */
function resolveMonthDays(year: number, month: number, byMonthDay: number[]): number[] {
	const length = daysInMonth(year, month);
	return byMonthDay
		.map((day) => (day > 0 ? day : length + day + 1))
		.filter((day) => day >= 1 && day <= length);
}

function passesFilters(date: LocalDate, rule: RecurrenceRule): boolean {
	if (rule.byMonth && !rule.byMonth.includes(date.month)) return false;
	if (rule.byMonthDay && !resolveMonthDays(date.year, date.month, rule.byMonthDay).includes(date.day)) {
		return false;
	}
	if (rule.byWeekday && !rule.byWeekday.some((spec) => matchesWeekday(date, spec))) return false;
	return true;
}

function sortUnique(dates: LocalDate[]): LocalDate[] {
	const byKey = new Map<number, LocalDate>();
	for (const date of dates) {
		byKey.set(date.year * 10000 + date.month * 100 + date.day, date);
	}
	return [...byKey.entries()].sort(([a], [b]) => a - b).map(([, date]) => date);
}

// ============================================================================
// Period Expansion
// ============================================================================

/**
 * Candidate days within one month for monthly and yearly rules.
 * Without BYMONTHDAY or BYDAY the anchor day (the series start's day of month)
 * is used, and a month too short to hold it yields nothing.
 */
function monthCandidates(year: number, month: number, rule: RecurrenceRule, anchorDay: number): LocalDate[] {
	if (rule.byMonthDay) {
		return resolveMonthDays(year, month, rule.byMonthDay)
			.map((day) => localDate(year, month, day))
			.filter((date) => !rule.byWeekday || rule.byWeekday.some((spec) => matchesWeekday(date, spec)));
	}

	if (rule.byWeekday) {
		const dates: LocalDate[] = [];
		const length = daysInMonth(year, month);
		for (const spec of rule.byWeekday) {
			if (spec.ordinal !== undefined) {
				const day = nthWeekdayOfMonth(year, month, spec.day, spec.ordinal);
				if (day !== null) dates.push(localDate(year, month, day));
				continue;
			}
			const first = nthWeekdayOfMonth(year, month, spec.day, 1);
			for (let day = first ?? length + 1; day <= length; day += 7) {
				dates.push(localDate(year, month, day));
			}
		}
		return dates;
	}

	return anchorDay <= daysInMonth(year, month) ? [localDate(year, month, anchorDay)] : [];
}

/**
 * Candidate days across a whole year, for yearly rules with BYDAY but
 * neither BYMONTH nor BYMONTHDAY.
 */
function yearWeekdayCandidates(year: number, byWeekday: WeekdaySpec[]): LocalDate[] {
	const dates: LocalDate[] = [];
	for (const spec of byWeekday) {
		if (spec.ordinal !== undefined) {
			const date = nthWeekdayOfYear(year, spec.day, spec.ordinal);
			if (date) dates.push(date);
			continue;
		}
		for (let date = nthWeekdayOfYear(year, spec.day, 1); date && date.year === year; date = addLocalDays(date, 7)) {
			dates.push(date);
		}
	}
	return dates;
}

/**
 * First local date of period `index` of a series starting on `seriesStart`.
 */
export function periodStart(rule: RecurrenceRule, seriesStart: LocalDate, index: number): LocalDate {
	const step = index * rule.interval;
	switch (rule.frequency) {
		case 'daily':
			return addLocalDays(seriesStart, step);
		case 'weekly':
			return addLocalDays(startOfLocalWeek(seriesStart, rule.weekStart), step * 7);
		case 'monthly': {
			const { year, month } = addMonths(seriesStart.year, seriesStart.month, step);
			return localDate(year, month, 1);
		}
		case 'yearly':
			return localDate(seriesStart.year + step, 1, 1);
	}
}

/**
 * All candidate dates in period `index`, sorted. Candidates before the series
 * start are included; the caller skips them.
 */
export function periodCandidates(rule: RecurrenceRule, seriesStart: LocalDate, index: number): LocalDate[] {
	const first = periodStart(rule, seriesStart, index);

	switch (rule.frequency) {
		case 'daily':
			return passesFilters(first, rule) ? [first] : [];

		case 'weekly': {
			const days = rule.byWeekday?.map((spec) => spec.day) ?? [weekdayOf(seriesStart)];
			const dates: LocalDate[] = [];
			for (let offset = 0; offset < 7; offset++) {
				const date = addLocalDays(first, offset);
				if (!days.includes(weekdayOf(date))) continue;
				if (rule.byMonth && !rule.byMonth.includes(date.month)) continue;
				if (rule.byMonthDay && !resolveMonthDays(date.year, date.month, rule.byMonthDay).includes(date.day)) {
					continue;
				}
				dates.push(date);
			}
			return dates;
		}

		case 'monthly': {
			if (rule.byMonth && !rule.byMonth.includes(first.month)) return [];
			return sortUnique(monthCandidates(first.year, first.month, rule, seriesStart.day));
		}

		case 'yearly': {
			if (!rule.byMonth && !rule.byMonthDay && rule.byWeekday) {
				return sortUnique(yearWeekdayCandidates(first.year, rule.byWeekday));
			}
			const months =
				rule.byMonth ?? (rule.byMonthDay ? [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12] : [seriesStart.month]);
			return sortUnique(months.flatMap((month) => monthCandidates(first.year, month, rule, seriesStart.day)));
		}
	}
}
