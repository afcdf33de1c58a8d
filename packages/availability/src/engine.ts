/**
 * Availability engine bound to one set of scheduling options.
 */

import {
	resolveSchedulingOptions,
	type DateRange,
	type DurationMs,
	type InvalidIntervalError,
	type InvalidTimezoneError,
	type Interval,
	type Result,
	type SchedulingOptions,
} from '@cadence/core';
import { findFreeSlots, getAvailability } from './availability.js';
import { bookSlot, cancelBooking, confirmBooking } from './booking.js';
import type {
	AvailabilityError,
	AvailabilityWindow,
	Booking,
	BookingError,
	FreeSlotOptions,
	InvalidWorkingHoursError,
	WorkingHoursRule,
} from './types.js';
import { expandWorkingHours } from './working-hours.js';

export interface AvailabilityEngine {
	expandWorkingHours(
		rules: WorkingHoursRule[],
		range: DateRange,
	): Result<Interval[], InvalidWorkingHoursError | InvalidTimezoneError>;
	getAvailability(
		busy: Interval[],
		availabilityWindows: AvailabilityWindow[],
		workingHours: WorkingHoursRule[],
		range: DateRange,
	): Result<AvailabilityWindow[], AvailabilityError>;
	findFreeSlots(
		busy: Interval[],
		workingHours: WorkingHoursRule[],
		range: DateRange,
		duration: DurationMs,
		options?: FreeSlotOptions,
	): Result<Interval[], AvailabilityError>;
	bookSlot(slot: Interval, busy: Interval[], ownerId: string): Result<Booking, BookingError | InvalidIntervalError>;
	confirmBooking(booking: Booking): Result<Booking, BookingError>;
	cancelBooking(booking: Booking): Result<Booking, BookingError>;
}

/**
 * Create an availability engine. Working hours resolve through the configured
 * timezone database and bookings are logged through the configured logger.
 */
export function createAvailabilityEngine(options: SchedulingOptions = {}): AvailabilityEngine {
	const { logger } = resolveSchedulingOptions(options);

	return {
		expandWorkingHours: (rules, range) => expandWorkingHours(rules, range, options),
		getAvailability: (busy, windows, workingHours, range) =>
			getAvailability(busy, windows, workingHours, range, options),
		findFreeSlots: (busy, workingHours, range, duration, slotOptions = {}) =>
			findFreeSlots(busy, workingHours, range, duration, { ...options, ...slotOptions }),
		bookSlot: (slot, busy, ownerId) => bookSlot(slot, busy, { ownerId, logger }),
		confirmBooking,
		cancelBooking,
	};
}
