/**
 * Availability type definitions.
 */

import type {
	DayOfWeek,
	DurationMs,
	InvalidIntervalError,
	InvalidTimezoneError,
	Interval,
	LocalTime,
} from '@cadence/core';

// ============================================================================
// Working Hours
// ============================================================================

/**
 * Daily working window in a zone, repeated on the listed weekdays.
 *
 * `dailyEnd` may be "24:00". A `dailyEnd` earlier than `dailyStart` describes
 * an overnight window that ends on the following day.
 *
 * @example
 * const officeHours: WorkingHoursRule = {
 *   dailyStart: '09:00',
 *   dailyEnd: '17:00',
 *   daysOfWeek: ['monday', 'tuesday', 'wednesday', 'thursday', 'friday'],
 *   timezone: 'America/New_York',
 * };
 */
export interface WorkingHoursRule {
	dailyStart: LocalTime;
	dailyEnd: LocalTime;
	daysOfWeek: DayOfWeek[];
	/** IANA timezone identifier */
	timezone: string;
}

export interface InvalidWorkingHoursError {
	kind: 'InvalidWorkingHours';
	message: string;
}

// ============================================================================
// Availability
// ============================================================================

export type AvailabilityStatus = 'free' | 'busy' | 'tentative' | 'out-of-office';

export interface AvailabilityWindow {
	interval: Interval;
	status: AvailabilityStatus;
}

export type AvailabilityError = InvalidIntervalError | InvalidTimezoneError | InvalidWorkingHoursError;

export interface FreeSlotOptions {
	/** Explicitly tagged spans that override free/busy inference */
	availabilityWindows?: AvailabilityWindow[];
	/** Time kept clear before each busy interval */
	bufferBefore?: DurationMs;
	/** Time kept clear after each busy interval */
	bufferAfter?: DurationMs;
	/** Maximum number of slots to return */
	limit?: number;
}

// ============================================================================
// Bookings
// ============================================================================

export type BookingStatus = 'pending' | 'confirmed' | 'cancelled';

export interface Booking {
	interval: Interval;
	ownerId: string;
	status: BookingStatus;
}

/**
 * `UnreadableEvents`: the busy set could not be fully read, so the slot
 * cannot be shown to be free.
 */
export type BookingErrorReason = 'SlotNoLongerFree' | 'InvalidTransition' | 'UnreadableEvents';

/**
 * A booking that could not be made or moved.
 * `conflicts` lists the busy intervals that now overlap the requested slot.
 */
export interface BookingError {
	kind: 'BookingError';
	reason: BookingErrorReason;
	message: string;
	conflicts?: Interval[];
}
