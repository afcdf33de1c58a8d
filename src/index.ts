/**
 * Cadence
 *
 * Recurring events, availability and conflict detection over an
 * adapter-backed event store.
 *
 * @packageDocumentation
 */

export * from '@cadence/core';
export * from '@cadence/recurrence';
export * from '@cadence/availability';
export * from '@cadence/conflicts';

export {
	createScheduler,
	type AlternativesQuery,
	type BookingRequest,
	type ConflictQuery,
	type CreateSchedulerOptions,
	type FreeSlotQuery,
	type OccurrenceSet,
	type OwnerQuery,
	type RejectedRecord,
	type Scheduler,
	type SchedulerAdapter,
} from './scheduler.js';
