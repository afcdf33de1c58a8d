/**
 * Wall-clock calendar arithmetic.
 *
 * Local values are mapped onto a "wall epoch": the millisecond count the same
 * fields would have in UTC. Arithmetic on the wall epoch never touches the
 * process timezone and never observes DST.
 */

import type { DayOfWeek, LocalDate, LocalDateTime, LocalTime } from './types.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Maps DayOfWeek to getUTCDay() values (0 = Sunday, 6 = Saturday)
 */
export const DAY_TO_NUMBER: Record<DayOfWeek, number> = {
	sunday: 0,
	monday: 1,
	tuesday: 2,
	wednesday: 3,
	thursday: 4,
	friday: 5,
	saturday: 6,
};

/**
 * Maps getUTCDay() values to DayOfWeek
 */
export const NUMBER_TO_DAY: readonly DayOfWeek[] = [
	'sunday',
	'monday',
	'tuesday',
	'wednesday',
	'thursday',
	'friday',
	'saturday',
];

// ============================================================================
// Construction
// ============================================================================

export function localDate(year: number, month: number, day: number): LocalDate {
	return { year, month, day };
}

export function localDateTime(
	year: number,
	month: number,
	day: number,
	hour = 0,
	minute = 0,
	second = 0,
): LocalDateTime {
	return { year, month, day, hour, minute, second };
}

export function toLocalDate(value: LocalDate): LocalDate {
	return { year: value.year, month: value.month, day: value.day };
}

/**
 * Place the time of day of `time` on `date`.
 */
export function atDate(date: LocalDate, time: LocalDateTime): LocalDateTime {
	return {
		year: date.year,
		month: date.month,
		day: date.day,
		hour: time.hour,
		minute: time.minute,
		second: time.second,
	};
}

// ============================================================================
// Wall Epoch
// ============================================================================

function utcFromFields(
	year: number,
	month: number,
	day: number,
	hour = 0,
	minute = 0,
	second = 0,
): number {
	const date = new Date(0);
	// setUTCFullYear keeps years 0-99 literal, unlike Date.UTC
	date.setUTCFullYear(year, month - 1, day);
	date.setUTCHours(hour, minute, second, 0);
	return date.getTime();
}

export function localToEpoch(value: LocalDateTime): number {
	return utcFromFields(value.year, value.month, value.day, value.hour, value.minute, value.second);
}

export function epochToLocal(epochMs: number): LocalDateTime {
	const date = new Date(epochMs);
	return {
		year: date.getUTCFullYear(),
		month: date.getUTCMonth() + 1,
		day: date.getUTCDate(),
		hour: date.getUTCHours(),
		minute: date.getUTCMinutes(),
		second: date.getUTCSeconds(),
	};
}

function dateToEpoch(value: LocalDate): number {
	return utcFromFields(value.year, value.month, value.day);
}

function epochToDate(epochMs: number): LocalDate {
	return toLocalDate(epochToLocal(epochMs));
}

// ============================================================================
// Calendar Arithmetic
// ============================================================================

export function daysInMonth(year: number, month: number): number {
	return new Date(utcFromFields(year, month + 1, 0)).getUTCDate();
}

export function isLeapYear(year: number): boolean {
	return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInYear(year: number): number {
	return isLeapYear(year) ? 366 : 365;
}

export function weekdayOf(value: LocalDate): DayOfWeek {
	return NUMBER_TO_DAY[new Date(dateToEpoch(value)).getUTCDay()];
}

export function addLocalDays(value: LocalDate, days: number): LocalDate {
	return epochToDate(dateToEpoch(value) + days * MS_PER_DAY);
}

/**
 * Add calendar months to a (year, month) pair.
 */
export function addMonths(year: number, month: number, months: number): { year: number; month: number } {
	const index = year * 12 + (month - 1) + months;
	return { year: Math.floor(index / 12), month: (index % 12) + 1 };
}

export function addLocalMilliseconds(value: LocalDateTime, ms: number): LocalDateTime {
	return epochToLocal(localToEpoch(value) + ms);
}

/**
 * Milliseconds of wall-clock time from `from` to `to`.
 */
export function localDifference(to: LocalDateTime, from: LocalDateTime): number {
	return localToEpoch(to) - localToEpoch(from);
}

/**
 * Calendar days from `from` to `to`.
 */
export function daysBetween(from: LocalDate, to: LocalDate): number {
	return Math.round((dateToEpoch(to) - dateToEpoch(from)) / MS_PER_DAY);
}

/**
 * The first day of the week containing `value`, for weeks starting on `weekStart`.
 */
export function startOfLocalWeek(value: LocalDate, weekStart: DayOfWeek = 'monday'): LocalDate {
	const offset = (DAY_TO_NUMBER[weekdayOf(value)] - DAY_TO_NUMBER[weekStart] + 7) % 7;
	return addLocalDays(value, -offset);
}

// ============================================================================
// Comparison
// ============================================================================

export function compareLocalDate(a: LocalDate, b: LocalDate): number {
	return a.year - b.year || a.month - b.month || a.day - b.day;
}

export function compareLocalDateTime(a: LocalDateTime, b: LocalDateTime): number {
	return localToEpoch(a) - localToEpoch(b);
}

export function isValidLocalDate(value: LocalDate): boolean {
	return (
		Number.isInteger(value.year) &&
		Number.isInteger(value.month) &&
		Number.isInteger(value.day) &&
		value.year >= 1 &&
		value.year <= 9999 &&
		value.month >= 1 &&
		value.month <= 12 &&
		value.day >= 1 &&
		value.day <= daysInMonth(value.year, value.month)
	);
}

export function isValidLocalDateTime(value: LocalDateTime): boolean {
	return (
		isValidLocalDate(value) &&
		Number.isInteger(value.hour) &&
		Number.isInteger(value.minute) &&
		Number.isInteger(value.second) &&
		value.hour >= 0 &&
		value.hour <= 23 &&
		value.minute >= 0 &&
		value.minute <= 59 &&
		value.second >= 0 &&
		value.second <= 59
	);
}

// ============================================================================
// Parsing & Formatting
// ============================================================================

const EXTENDED_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?)?$/;
const COMPACT_PATTERN = /^(\d{4})(\d{2})(\d{2})(?:T(\d{2})(\d{2})(\d{2}))?$/;

/**
 * Parse `YYYY-MM-DD[THH:mm[:ss]]` or RFC 5545 `YYYYMMDD[THHmmss]`.
 * Returns null for anything else, including impossible dates.
 */
export function parseLocalDateTime(text: string): LocalDateTime | null {
	const match = EXTENDED_PATTERN.exec(text) ?? COMPACT_PATTERN.exec(text);
	if (!match) return null;

	const [, year, month, day, hour = '0', minute = '0', second = '0'] = match;
	const value = localDateTime(
		Number(year),
		Number(month),
		Number(day),
		Number(hour),
		Number(minute),
		Number(second),
	);
	return isValidLocalDateTime(value) ? value : null;
}

export function parseLocalDate(text: string): LocalDate | null {
	if (text.includes('T')) return null;
	const parsed = parseLocalDateTime(text);
	return parsed ? toLocalDate(parsed) : null;
}

/**
 * Parse an HH:MM local time into minutes after midnight. "24:00" is allowed.
 */
export function parseLocalTime(time: LocalTime): number | null {
	const match = /^(\d{2}):(\d{2})$/.exec(time);
	if (!match) return null;
	const hours = Number(match[1]);
	const minutes = Number(match[2]);
	if (minutes > 59) return null;
	if (hours > 24 || (hours === 24 && minutes !== 0)) return null;
	return hours * 60 + minutes;
}

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

export function formatLocalDate(value: LocalDate): string {
	return `${pad(value.year, 4)}-${pad(value.month)}-${pad(value.day)}`;
}

export function formatLocalDateTime(value: LocalDateTime): string {
	return `${formatLocalDate(value)}T${pad(value.hour)}:${pad(value.minute)}:${pad(value.second)}`;
}

/**
 * RFC 5545 basic form: `YYYYMMDD`.
 */
export function formatCompactDate(value: LocalDate): string {
	return `${pad(value.year, 4)}${pad(value.month)}${pad(value.day)}`;
}

/**
 * RFC 5545 basic form: `YYYYMMDDTHHmmss`.
 */
export function formatCompactDateTime(value: LocalDateTime): string {
	return `${formatCompactDate(value)}T${pad(value.hour)}${pad(value.minute)}${pad(value.second)}`;
}
