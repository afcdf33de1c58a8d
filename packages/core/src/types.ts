/**
 * Shared time primitives for Cadence packages.
 * All intervals are half-open: [start, end)
 * All instants are UTC `Date` values; wall-clock values carry no zone.
 */

/**
 * A half-open interval [start, end) between two instants.
 *
 * @example
 * const interval: Interval = {
 *   start: new Date('2026-02-02T14:00:00Z'),
 *   end: new Date('2026-02-02T14:30:00Z')
 * };
 */
export interface Interval {
	/** The start of the interval (inclusive) */
	start: Date;
	/** The end of the interval (exclusive) */
	end: Date;
}

/** Alias used where the interval is an event's occupied time. */
export type TimeInterval = Interval;

/**
 * A date range for querying time-bounded data.
 * Semantically identical to Interval.
 */
export interface DateRange {
	start: Date;
	end: Date;
}

/**
 * Duration in milliseconds.
 */
export type DurationMs = number;

/**
 * Days of the week, lowercase for consistent parsing.
 */
export type DayOfWeek =
	| 'monday'
	| 'tuesday'
	| 'wednesday'
	| 'thursday'
	| 'friday'
	| 'saturday'
	| 'sunday';

/**
 * A local time string in HH:MM format (24-hour).
 *
 * @example "09:00", "17:30", "24:00"
 */
export type LocalTime = string;

/**
 * A calendar date without a zone.
 * `month` is 1-based.
 */
export interface LocalDate {
	year: number;
	month: number;
	day: number;
}

/**
 * A wall-clock date and time without a zone.
 * It has no absolute meaning until resolved against a timezone.
 */
export interface LocalDateTime extends LocalDate {
	hour: number;
	minute: number;
	second: number;
}
