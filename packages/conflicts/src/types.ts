/**
 * Conflict detection type definitions.
 */

import type { DateRange, Interval, SchedulingOptions } from '@cadence/core';
import type { FreeSlotOptions, WorkingHoursRule } from '@cadence/availability';

/**
 * `hard`: identical intervals. `soft`: any other overlap.
 */
export type ConflictKind = 'hard' | 'soft';

/**
 * Two overlapping occurrences, identified by occurrence id.
 */
export interface ConflictPair {
	first: string;
	second: string;
	kind: ConflictKind;
	/** The time both occupy */
	overlap: Interval;
}

/**
 * A connected set of overlapping occurrences.
 * A group is hard only when every member has the same interval.
 */
export interface ConflictGroup {
	/** Occurrence ids, ordered by start then input order */
	members: string[];
	kind: ConflictKind;
	pairs: ConflictPair[];
	/** From the earliest start to the latest end in the group */
	span: Interval;
	/** Highest-priority member, when priorities were supplied. Advisory only. */
	dominant?: string;
}

export interface EventPriority {
	/** Higher wins */
	priority: number;
	/** Earlier wins among equal priorities */
	createdAt?: Date;
}

export interface FindConflictsOptions {
	/** Only occurrences overlapping this range are considered */
	range?: DateRange;
	/** Keyed by source event id */
	priorities?: Record<string, EventPriority>;
}

export interface SuggestAlternativesOptions extends FreeSlotOptions, SchedulingOptions {
	range: DateRange;
	workingHours?: WorkingHoursRule[];
}

export interface UnknownEventError {
	kind: 'UnknownEvent';
	eventId: string;
	message: string;
}
