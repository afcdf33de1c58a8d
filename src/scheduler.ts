/**
 * Scheduler with adapter-based data loading.
 *
 * The adapter is the caller's object store: it hands over plain event
 * records, working hours and tagged availability windows for an owner. The
 * scheduler validates and expands them on every call and keeps nothing.
 */

import {
	compareIntervals,
	createInterval,
	err,
	resolveSchedulingOptions,
	type DateRange,
	type DurationMs,
	type InvalidIntervalError,
	type Interval,
	type Result,
	type SchedulingOptions,
} from '@cadence/core';
import {
	bookSlot,
	findFreeSlots,
	getAvailability,
	type AvailabilityError,
	type AvailabilityWindow,
	type Booking,
	type BookingError,
	type FreeSlotOptions,
	type WorkingHoursRule,
} from '@cadence/availability';
import {
	findConflicts,
	suggestAlternatives,
	type ConflictGroup,
	type EventPriority,
	type UnknownEventError,
} from '@cadence/conflicts';
import { expand, fromEventRecord, type ExpansionError, type Occurrence } from '@cadence/recurrence';

// ============================================================================
// Adapter & Queries
// ============================================================================

export interface OwnerQuery {
	ownerId: string;
	range: DateRange;
}

/**
 * Data source for a scheduler. Only `getEvents` is required.
 */
export interface SchedulerAdapter {
	/** Event records overlapping the range; validated by the scheduler */
	getEvents(query: OwnerQuery): Promise<unknown[]>;
	getWorkingHours?(query: { ownerId: string }): Promise<WorkingHoursRule[]>;
	getAvailabilityWindows?(query: OwnerQuery): Promise<AvailabilityWindow[]>;
}

export interface CreateSchedulerOptions extends SchedulingOptions {
	adapter: SchedulerAdapter;
}

/**
 * A record that could not be turned into occurrences.
 */
export interface RejectedRecord {
	recordId?: string;
	error: ExpansionError;
}

export interface OccurrenceSet {
	occurrences: Occurrence[];
	rejected: RejectedRecord[];
}

export interface ConflictQuery extends OwnerQuery {
	priorities?: Record<string, EventPriority>;
}

export interface FreeSlotQuery extends OwnerQuery, Omit<FreeSlotOptions, 'availabilityWindows'> {
	duration: DurationMs;
}

export interface AlternativesQuery extends OwnerQuery, Omit<FreeSlotOptions, 'availabilityWindows'> {
	/** Occurrence id or source event id */
	eventId: string;
}

export interface BookingRequest {
	ownerId: string;
	slot: Interval;
}

export interface Scheduler {
	getOccurrences(query: OwnerQuery): Promise<OccurrenceSet>;
	findConflicts(query: ConflictQuery): Promise<ConflictGroup[]>;
	getAvailability(query: OwnerQuery): Promise<Result<AvailabilityWindow[], AvailabilityError>>;
	findFreeSlots(query: FreeSlotQuery): Promise<Result<Interval[], AvailabilityError>>;
	suggestAlternatives(query: AlternativesQuery): Promise<Result<Interval[], AvailabilityError | UnknownEventError>>;
	book(request: BookingRequest): Promise<Result<Booking, BookingError | InvalidIntervalError>>;
}

// ============================================================================
// Helpers
// ============================================================================

/** Explicit windows that block a booking. */
const BLOCKING_STATUSES = new Set<AvailabilityWindow['status']>(['busy', 'out-of-office']);

function recordIdOf(record: unknown): string | undefined {
	if (typeof record !== 'object' || record === null || !('id' in record)) return undefined;
	return typeof record.id === 'string' ? record.id : undefined;
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a scheduler over the given adapter.
 *
 * @example
 * const scheduler = createScheduler({
 *   adapter: {
 *     getEvents: async ({ ownerId }) => db.events.findMany({ where: { ownerId } }),
 *     getWorkingHours: async ({ ownerId }) => db.workingHours.findMany({ where: { ownerId } }),
 *   },
 *   logger: createConsoleLogger('info'),
 * });
 *
 * const slots = await scheduler.findFreeSlots({ ownerId: 'owner-1', range: week, duration: 30 * 60 * 1000 });
 */
export function createScheduler(options: CreateSchedulerOptions): Scheduler {
	const { adapter, ...schedulingOptions } = options;
	const { logger } = resolveSchedulingOptions(schedulingOptions);

	async function getOccurrences(query: OwnerQuery): Promise<OccurrenceSet> {
		const records = await adapter.getEvents(query);
		const occurrences: Occurrence[] = [];
		const rejected: RejectedRecord[] = [];

		for (const record of records) {
			const template = fromEventRecord(record, schedulingOptions);
			const expanded = template.ok ? expand(template.value, query.range, schedulingOptions) : template;

			if (!expanded.ok) {
				const recordId = recordIdOf(record);
				logger.warn('Rejected event record', {
					ownerId: query.ownerId,
					recordId,
					kind: expanded.error.kind,
					message: expanded.error.message,
				});
				rejected.push(recordId === undefined ? { error: expanded.error } : { recordId, error: expanded.error });
				continue;
			}

			occurrences.push(...expanded.value);
		}

		occurrences.sort((a, b) => compareIntervals(a.interval, b.interval));
		return { occurrences, rejected };
	}

	async function loadContext(query: OwnerQuery) {
		const [{ occurrences }, workingHours, availabilityWindows] = await Promise.all([
			getOccurrences(query),
			adapter.getWorkingHours ? adapter.getWorkingHours({ ownerId: query.ownerId }) : Promise.resolve([]),
			adapter.getAvailabilityWindows ? adapter.getAvailabilityWindows(query) : Promise.resolve([]),
		]);
		return { occurrences, workingHours, availabilityWindows };
	}

	return {
		getOccurrences,

		async findConflicts({ priorities, ...query }) {
			const { occurrences } = await getOccurrences(query);
			return findConflicts(occurrences, { range: query.range, priorities });
		},

		async getAvailability(query) {
			const { occurrences, workingHours, availabilityWindows } = await loadContext(query);
			return getAvailability(
				occurrences.map((occurrence) => occurrence.interval),
				availabilityWindows,
				workingHours,
				query.range,
				schedulingOptions,
			);
		},

		async findFreeSlots({ duration, bufferBefore, bufferAfter, limit, ...query }) {
			const { occurrences, workingHours, availabilityWindows } = await loadContext(query);
			return findFreeSlots(
				occurrences.map((occurrence) => occurrence.interval),
				workingHours,
				query.range,
				duration,
				{ ...schedulingOptions, availabilityWindows, bufferBefore, bufferAfter, limit },
			);
		},

		async suggestAlternatives({ eventId, bufferBefore, bufferAfter, limit, ...query }) {
			const { occurrences, workingHours, availabilityWindows } = await loadContext(query);
			return suggestAlternatives(eventId, occurrences, {
				...schedulingOptions,
				range: query.range,
				workingHours,
				availabilityWindows,
				bufferBefore,
				bufferAfter,
				limit,
			});
		},

		async book({ ownerId, slot }) {
			const checked = createInterval(slot.start, slot.end);
			if (!checked.ok) return checked;

			// Busy set is read immediately before booking
			const range = checked.value;
			const [{ occurrences, rejected }, windows] = await Promise.all([
				getOccurrences({ ownerId, range }),
				adapter.getAvailabilityWindows ? adapter.getAvailabilityWindows({ ownerId, range }) : Promise.resolve([]),
			]);

			// An unreadable record may hide an event in the slot
			if (rejected.length > 0) {
				const recordIds = rejected.flatMap((entry) => (entry.recordId === undefined ? [] : [entry.recordId]));
				logger.warn('Booking blocked by unreadable event records', { ownerId, recordIds, records: rejected.length });
				const error: BookingError = {
					kind: 'BookingError',
					reason: 'UnreadableEvents',
					message: `Slot starting ${range.start.toISOString()} cannot be checked: ${rejected.length} event record(s) could not be read`,
				};
				return err(error);
			}

			const busy = [
				...occurrences.map((occurrence) => occurrence.interval),
				...windows.filter((window) => BLOCKING_STATUSES.has(window.status)).map((window) => window.interval),
			];
			return bookSlot(slot, busy, { ownerId, logger });
		},
	};
}
