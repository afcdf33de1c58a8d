/**
 * Slot booking and the booking state machine.
 *
 * `bookSlot` re-checks the slot against the busy set it is given and nothing
 * else. Two callers that read availability and then book are racing; the
 * caller must fetch the busy set immediately before booking and serialize
 * bookings for an owner if double-booking must be impossible.
 */

import {
	createInterval,
	err,
	intervalsOverlap,
	noopLogger,
	ok,
	type InvalidIntervalError,
	type Interval,
	type Logger,
	type Result,
} from '@cadence/core';
import type { Booking, BookingError, BookingStatus } from './types.js';

export interface BookSlotOptions {
	ownerId: string;
	logger?: Logger;
}

const TRANSITIONS: Record<BookingStatus, readonly BookingStatus[]> = {
	pending: ['confirmed', 'cancelled'],
	confirmed: ['cancelled'],
	cancelled: [],
};

/**
 * Create a pending booking for `slot` if no busy interval overlaps it.
 *
 * @example
 * const result = bookSlot(slot, await store.getBusy(ownerId), { ownerId });
 * if (!result.ok && result.error.kind === 'BookingError') {
 *   // refetch availability and offer another slot
 * }
 */
export function bookSlot(
	slot: Interval,
	busy: Interval[],
	options: BookSlotOptions,
): Result<Booking, BookingError | InvalidIntervalError> {
	const logger = options.logger ?? noopLogger;

	const interval = createInterval(slot.start, slot.end);
	if (!interval.ok) return interval;

	const conflicts = busy
		.filter((other) => intervalsOverlap(interval.value, other))
		.map((other) => ({ start: new Date(other.start.getTime()), end: new Date(other.end.getTime()) }));

	if (conflicts.length > 0) {
		logger.warn('Slot is no longer free', {
			ownerId: options.ownerId,
			start: interval.value.start.toISOString(),
			conflicts: conflicts.length,
		});
		return err({
			kind: 'BookingError',
			reason: 'SlotNoLongerFree',
			message: `Slot starting ${interval.value.start.toISOString()} overlaps ${conflicts.length} busy interval(s)`,
			conflicts,
		});
	}

	logger.info('Slot booked', {
		ownerId: options.ownerId,
		start: interval.value.start.toISOString(),
		end: interval.value.end.toISOString(),
	});

	return ok({ interval: interval.value, ownerId: options.ownerId, status: 'pending' });
}

/**
 * Move a booking to `status`, returning a new booking.
 * Allowed: pending to confirmed or cancelled, confirmed to cancelled.
 */
export function transitionBooking(booking: Booking, status: BookingStatus): Result<Booking, BookingError> {
	if (!TRANSITIONS[booking.status].includes(status)) {
		return err({
			kind: 'BookingError',
			reason: 'InvalidTransition',
			message: `Cannot move a ${booking.status} booking to ${status}`,
		});
	}
	return ok({ ...booking, status });
}

export function confirmBooking(booking: Booking): Result<Booking, BookingError> {
	return transitionBooking(booking, 'confirmed');
}

export function cancelBooking(booking: Booking): Result<Booking, BookingError> {
	return transitionBooking(booking, 'cancelled');
}
