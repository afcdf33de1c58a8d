/**
 * Cadence Availability
 *
 * Interval algebra, working-hours expansion, free/busy windows, slot search
 * and booking. All intervals are half-open: [start, end)
 *
 * @packageDocumentation
 */

// Interval arithmetic
export { clipIntervals, intersectIntervals, mergeIntervals, subtractIntervals } from './intervals.js';
// Working hours
export { expandWorkingHours } from './working-hours.js';
// Free/busy and slots
export { findFreeSlots, getAvailability } from './availability.js';
// Bookings
export { bookSlot, cancelBooking, confirmBooking, transitionBooking, type BookSlotOptions } from './booking.js';
// Bound engine
export { createAvailabilityEngine, type AvailabilityEngine } from './engine.js';

export type {
	AvailabilityError,
	AvailabilityStatus,
	AvailabilityWindow,
	Booking,
	BookingError,
	BookingErrorReason,
	BookingStatus,
	FreeSlotOptions,
	InvalidWorkingHoursError,
	WorkingHoursRule,
} from './types.js';
