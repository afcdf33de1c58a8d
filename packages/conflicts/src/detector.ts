/**
 * Conflict detection over materialized occurrences.
 *
 * The detector only reports. It never drops, moves or edits an occurrence;
 * `dominant` and alternative slots are suggestions for the caller.
 */

import {
	compareIntervals,
	err,
	intervalDuration,
	intervalsEqual,
	intervalsOverlap,
	noopLogger,
	ok,
	type Interval,
	type Result,
} from '@cadence/core';
import { findFreeSlots, type AvailabilityError } from '@cadence/availability';
import type { Occurrence } from '@cadence/recurrence';
import { max, min } from 'date-fns';
import type {
	ConflictGroup,
	ConflictPair,
	EventPriority,
	FindConflictsOptions,
	SuggestAlternativesOptions,
	UnknownEventError,
} from './types.js';

// ============================================================================
// Pairwise
// ============================================================================

/**
 * True when two intervals share any time. Symmetric; abutting intervals
 * ([a, b) and [b, c)) do not conflict.
 */
export function hasConflict(a: Interval, b: Interval): boolean {
	return intervalsOverlap(a, b);
}

function pairOf(a: Occurrence, b: Occurrence): ConflictPair {
	return {
		first: a.id,
		second: b.id,
		kind: intervalsEqual(a.interval, b.interval) ? 'hard' : 'soft',
		overlap: {
			start: max([a.interval.start, b.interval.start]),
			end: min([a.interval.end, b.interval.end]),
		},
	};
}

// ============================================================================
// Grouping
// ============================================================================

/**
 * Order two members for dominance: higher priority, then earlier createdAt
 * (missing last), then the earlier member. Negative when `a` dominates.
 */
function compareDominance(a: EventPriority | undefined, b: EventPriority | undefined): number {
	if (!a || !b) return a ? -1 : b ? 1 : 0;
	if (a.priority !== b.priority) return b.priority - a.priority;

	const aCreated = a.createdAt?.getTime() ?? Number.POSITIVE_INFINITY;
	const bCreated = b.createdAt?.getTime() ?? Number.POSITIVE_INFINITY;
	return aCreated === bCreated ? 0 : aCreated < bCreated ? -1 : 1;
}

function dominantOf(members: Occurrence[], priorities: Record<string, EventPriority>): string | undefined {
	let best: Occurrence | undefined;
	for (const member of members) {
		if (!(member.sourceEventId in priorities)) continue;
		if (!best || compareDominance(priorities[member.sourceEventId], priorities[best.sourceEventId]) < 0) {
			best = member;
		}
	}
	return best?.id;
}

function buildGroup(members: Occurrence[], end: Date, options: FindConflictsOptions): ConflictGroup {
	const pairs: ConflictPair[] = [];
	for (let i = 0; i < members.length; i++) {
		for (let j = i + 1; j < members.length; j++) {
			if (hasConflict(members[i].interval, members[j].interval)) {
				pairs.push(pairOf(members[i], members[j]));
			}
		}
	}

	const group: ConflictGroup = {
		members: members.map((member) => member.id),
		kind: members.every((member) => intervalsEqual(member.interval, members[0].interval)) ? 'hard' : 'soft',
		pairs,
		span: { start: new Date(members[0].interval.start.getTime()), end: new Date(end.getTime()) },
	};

	if (options.priorities) {
		const dominant = dominantOf(members, options.priorities);
		if (dominant !== undefined) group.dominant = dominant;
	}

	return group;
}

/**
 * Group occurrences into connected components of the overlap relation.
 * Occurrences that conflict with nothing are left out.
 *
 * Sweeps the occurrences in start order, so A=[0,10) B=[5,15) C=[12,20)
 * form one group even though A and C do not overlap directly.
 *
 * @example
 * const groups = findConflicts(occurrences, {
 *   priorities: { 'board-meeting': { priority: 10 }, standup: { priority: 1 } },
 * });
 */
export function findConflicts(occurrences: Occurrence[], options: FindConflictsOptions = {}): ConflictGroup[] {
	const { range } = options;
	const candidates = occurrences
		.filter((occurrence) => !range || hasConflict(occurrence.interval, range))
		// Array.prototype.sort is stable, so equal starts keep input order
		.sort((a, b) => a.interval.start.getTime() - b.interval.start.getTime());

	const groups: ConflictGroup[] = [];
	let current: Occurrence[] = [];
	let currentEnd = new Date(0);

	const close = () => {
		if (current.length > 1) {
			groups.push(buildGroup(current, currentEnd, options));
		}
	};

	for (const occurrence of candidates) {
		if (current.length > 0 && occurrence.interval.start.getTime() < currentEnd.getTime()) {
			current.push(occurrence);
			currentEnd = max([currentEnd, occurrence.interval.end]);
			continue;
		}

		close();
		current = [occurrence];
		currentEnd = occurrence.interval.end;
	}
	close();

	return groups;
}

// ============================================================================
// Alternatives
// ============================================================================

function findTarget(eventId: string, occurrences: Occurrence[]): Occurrence | undefined {
	const exact = occurrences.find((occurrence) => occurrence.id === eventId);
	if (exact) return exact;

	const series = occurrences
		.filter((occurrence) => occurrence.sourceEventId === eventId)
		.sort((a, b) => compareIntervals(a.interval, b.interval));

	const conflicting = series.find((candidate) =>
		occurrences.some((other) => other.id !== candidate.id && hasConflict(candidate.interval, other.interval)),
	);
	return conflicting ?? series[0];
}

/**
 * Free slots with the event's duration, closest to its original start first
 * (ties to the earlier slot).
 *
 * `eventId` is an occurrence id, or a source event id, in which case the
 * earliest of its occurrences that conflicts with something is moved. The
 * event's current window is treated as busy so it is never suggested back.
 */
export function suggestAlternatives(
	eventId: string,
	occurrences: Occurrence[],
	options: SuggestAlternativesOptions,
): Result<Interval[], AvailabilityError | UnknownEventError> {
	const logger = options.logger ?? noopLogger;
	const target = findTarget(eventId, occurrences);
	if (!target) {
		return err({
			kind: 'UnknownEvent',
			eventId,
			message: `No occurrence matches event "${eventId}"`,
		});
	}

	const busy = occurrences.filter((occurrence) => occurrence.id !== target.id).map((occurrence) => occurrence.interval);
	busy.push(target.interval);

	const { limit, workingHours = [], range, ...slotOptions } = options;
	const slots = findFreeSlots(busy, workingHours, range, intervalDuration(target.interval), slotOptions);
	if (!slots.ok) return slots;

	const origin = target.interval.start.getTime();
	const ordered = slots.value.sort(
		(a, b) =>
			Math.abs(a.start.getTime() - origin) - Math.abs(b.start.getTime() - origin) ||
			a.start.getTime() - b.start.getTime(),
	);

	logger.debug('Suggested alternatives', { eventId, occurrenceId: target.id, candidates: ordered.length });

	return ok(limit === undefined ? ordered : ordered.slice(0, limit));
}
