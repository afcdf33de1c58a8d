/**
 * Recurrence type definitions.
 */

import type { DayOfWeek, Interval, LocalDate, LocalDateTime } from '@cadence/core';

/**
 * Base unit a rule repeats in.
 */
export type Frequency = 'daily' | 'weekly' | 'monthly' | 'yearly';

/**
 * A weekday constraint, optionally restricted to its nth occurrence in the
 * month (or year, for yearly rules without BYMONTH). Negative ordinals count
 * from the end: -1 is the last.
 *
 * @example { day: 'tuesday', ordinal: 2 } // "2nd Tuesday"
 */
export interface WeekdaySpec {
	day: DayOfWeek;
	ordinal?: number;
}

/**
 * The last allowed occurrence start, in one of the three RFC 5545 value forms:
 * - `date`: a local date, inclusive (`UNTIL=20260301`)
 * - `instant`: a UTC date-time (`UNTIL=20260301T000000Z`)
 * - `floating`: a local date-time in the event's zone (`UNTIL=20260301T000000`)
 */
export type RecurrenceUntil =
	| { type: 'date'; date: LocalDate }
	| { type: 'instant'; at: Date }
	| { type: 'floating'; at: LocalDateTime };

/**
 * RRULE parts this library understands.
 */
export type RRulePart =
	| 'FREQ'
	| 'INTERVAL'
	| 'UNTIL'
	| 'COUNT'
	| 'BYMONTH'
	| 'BYDAY'
	| 'BYMONTHDAY'
	| 'WKST';

/**
 * How a rule was written, recorded by the parser so serialization reproduces
 * the original text wherever the rule is unchanged.
 */
export interface RRuleLayout {
	/** Text before the first part, e.g. "RRULE:" */
	prefix: string;
	parts: Array<{ part: RRulePart; name: string; value: string }>;
}

/**
 * A parsed recurrence rule.
 *
 * @example
 * const everyOtherMonday: RecurrenceRule = {
 *   frequency: 'weekly',
 *   interval: 2,
 *   byWeekday: [{ day: 'monday' }],
 *   count: 10,
 * };
 */
export interface RecurrenceRule {
	frequency: Frequency;
	/** Number of frequency units per step, at least 1 */
	interval: number;
	byWeekday?: WeekdaySpec[];
	/** Days of the month; negative values count from the month's end */
	byMonthDay?: number[];
	/** Months of the year, 1-12 */
	byMonth?: number[];
	/** First day of the week for weekly periods; defaults to Monday */
	weekStart?: DayOfWeek;
	until?: RecurrenceUntil;
	count?: number;
	/** Local dates removed from the series; they do not count toward `count` */
	exceptions?: LocalDate[];
	layout?: RRuleLayout;
}

/**
 * A moved instance of a series. Replaces the occurrence generated for
 * `recurrenceDate` and keeps that occurrence's place in the `count` sequence.
 */
export interface OccurrenceOverride {
	recurrenceDate: LocalDate;
	startLocal: LocalDateTime;
	endLocal: LocalDateTime;
}

/**
 * A single or recurring event as supplied by the caller.
 * Its duration is `endLocal - startLocal` in wall-clock time.
 */
export interface EventTemplate {
	id: string;
	startLocal: LocalDateTime;
	endLocal: LocalDateTime;
	/** IANA timezone identifier */
	timezone: string;
	recurrence?: RecurrenceRule;
	overrides?: OccurrenceOverride[];
}

/**
 * A materialized, timezone-resolved instance of an EventTemplate.
 */
export interface Occurrence {
	/** `<sourceEventId>#<recurrence id in YYYYMMDDTHHmmss>` */
	id: string;
	sourceEventId: string;
	/** The wall-clock start the rule generated, before any override */
	recurrenceId: LocalDateTime;
	interval: Interval;
	/** True when an override moved this instance */
	isException: boolean;
}

/**
 * Query window for expansion. Without `end`, the rule must bound itself.
 */
export interface ExpansionRange {
	start: Date;
	end?: Date;
}
