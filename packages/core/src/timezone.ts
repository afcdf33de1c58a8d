/**
 * Timezone resolution between wall-clock values and absolute instants.
 *
 * The IANA rule database is treated as process-wide, read-only data behind the
 * `TimezoneDatabase` interface. The default database reads the rules bundled
 * with the runtime's Intl implementation.
 *
 * DST policy:
 * - A nonexistent local time (spring-forward gap) is read with the offset in
 *   force before the transition, i.e. shifted forward by the gap.
 * - An ambiguous local time (fall-back overlap) resolves to the earlier of the
 *   two instants unless `disambiguation: 'later'` is configured.
 */

import { formatInTimeZone } from 'date-fns-tz';
import { invalidTimezone, type InvalidTimezoneError } from './errors.js';
import { epochToLocal, localToEpoch } from './local.js';
import { err, ok, type Result } from './result.js';
import type { LocalDateTime } from './types.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// ============================================================================
// Database
// ============================================================================

/**
 * Read-only view of the IANA timezone rules.
 */
export interface TimezoneDatabase {
	/** Version of the rule set; part of any cache key built on resolver output */
	readonly version: string;
	/** Whether `zoneId` names a zone in this rule set */
	isKnownZone: (zoneId: string) => boolean;
	/** Offset from UTC in milliseconds (positive east of Greenwich) at the given instant */
	offsetAt: (zoneId: string, epochMs: number) => number;
}

// Bare offsets and "Z" are accepted by some Intl builds but are not IANA identifiers
const OFFSET_PATTERN = /^(?:[+-]\d|Z$)/i;

// Every segment of an IANA identifier starts with a capital letter
const IDENTIFIER_CASE_PATTERN = /^[A-Z][^/]*(?:\/[A-Z][^/]*)*$/;

function createIntlTimezoneDatabase(): TimezoneDatabase {
	const formatters = new Map<string, Intl.DateTimeFormat>();
	const known = new Map<string, boolean>();

	function formatterFor(zoneId: string): Intl.DateTimeFormat {
		let formatter = formatters.get(zoneId);
		if (!formatter) {
			formatter = new Intl.DateTimeFormat('en-US', {
				timeZone: zoneId,
				year: 'numeric',
				month: '2-digit',
				day: '2-digit',
				hour: '2-digit',
				minute: '2-digit',
				second: '2-digit',
				hourCycle: 'h23',
			});
			formatters.set(zoneId, formatter);
		}
		return formatter;
	}

	let canonicalNames: Map<string, string> | undefined;

	/**
	 * Intl matches zone names case-insensitively; identifiers are not. A name
	 * is accepted only in the exact case of the identifier it resolves to, or,
	 * for link names Intl does not list, in identifier case.
	 */
	function hasIdentifierCase(zoneId: string, resolved: string): boolean {
		if (resolved === zoneId) return true;

		canonicalNames ??= new Map(Intl.supportedValuesOf('timeZone').map((name) => [name.toLowerCase(), name]));
		const lower = zoneId.toLowerCase();
		const canonical = canonicalNames.get(lower) ?? (resolved.toLowerCase() === lower ? resolved : undefined);
		return canonical === undefined ? IDENTIFIER_CASE_PATTERN.test(zoneId) : canonical === zoneId;
	}

	function isKnownZone(zoneId: string): boolean {
		const cached = known.get(zoneId);
		if (cached !== undefined) return cached;

		let valid = false;
		if (zoneId.trim() === zoneId && zoneId.length > 0 && !OFFSET_PATTERN.test(zoneId)) {
			try {
				valid = hasIdentifierCase(zoneId, formatterFor(zoneId).resolvedOptions().timeZone);
			} catch (error) {
				if (!(error instanceof RangeError)) throw error;
			}
		}
		known.set(zoneId, valid);
		return valid;
	}

	function offsetAt(zoneId: string, epochMs: number): number {
		const parts = formatterFor(zoneId).formatToParts(new Date(epochMs));
		const getPart = (type: Intl.DateTimeFormatPartTypes): number => {
			const part = parts.find((p) => p.type === type);
			return part ? parseInt(part.value, 10) : 0;
		};

		const asUtc = localToEpoch({
			year: getPart('year'),
			month: getPart('month'),
			day: getPart('day'),
			hour: getPart('hour') % 24,
			minute: getPart('minute'),
			second: getPart('second'),
		});
		// The formatter drops milliseconds, so compare against the whole second
		const wholeSecond = epochMs - (((epochMs % 1000) + 1000) % 1000);
		return asUtc - wholeSecond;
	}

	return {
		version: process.versions.tz ?? 'unknown',
		isKnownZone,
		offsetAt,
	};
}

/**
 * The runtime's timezone database, loaded once per process.
 */
export const systemTimezones: TimezoneDatabase = createIntlTimezoneDatabase();

// ============================================================================
// Unchecked Conversions
// ============================================================================

export type Disambiguation = 'earlier' | 'later';

/**
 * Convert a wall-clock value in a zone already known to be valid to an instant.
 */
export function zonedToInstant(
	database: TimezoneDatabase,
	local: LocalDateTime,
	zoneId: string,
	disambiguation: Disambiguation = 'earlier',
): Date {
	const wall = localToEpoch(local);
	// Offsets a day either side bracket any single transition near this wall time
	const offsetBefore = database.offsetAt(zoneId, wall - MS_PER_DAY);
	const offsetAfter = database.offsetAt(zoneId, wall + MS_PER_DAY);

	const candidates = [offsetBefore, offsetAfter]
		.filter((offset, index, all) => all.indexOf(offset) === index)
		.map((offset) => wall - offset)
		.filter((instant) => database.offsetAt(zoneId, instant) === wall - instant)
		.sort((a, b) => a - b);

	if (candidates.length === 0) {
		// Gap: read the wall time with the pre-transition offset
		return new Date(wall - offsetBefore);
	}

	return new Date(disambiguation === 'later' ? candidates[candidates.length - 1] : candidates[0]);
}

/**
 * Convert an instant to wall-clock time in a zone already known to be valid.
 */
export function instantToZoned(
	database: TimezoneDatabase,
	instant: Date,
	zoneId: string,
): LocalDateTime {
	const epochMs = instant.getTime();
	return epochToLocal(epochMs + database.offsetAt(zoneId, epochMs));
}

// ============================================================================
// Resolver
// ============================================================================

export interface TimezoneResolverOptions {
	database?: TimezoneDatabase;
	disambiguation?: Disambiguation;
}

export interface TimezoneResolver {
	readonly database: TimezoneDatabase;
	readonly disambiguation: Disambiguation;
	validateZone: (zoneId: string) => boolean;
	checkZone: (zoneId: string) => Result<string, InvalidTimezoneError>;
	toInstant: (local: LocalDateTime, zoneId: string) => Result<Date, InvalidTimezoneError>;
	toLocal: (instant: Date, zoneId: string) => Result<LocalDateTime, InvalidTimezoneError>;
	offsetAt: (instant: Date, zoneId: string) => Result<number, InvalidTimezoneError>;
	/** ISO-8601 rendering of an instant in a zone, e.g. `2026-02-02T09:00:00-05:00` */
	formatInstant: (instant: Date, zoneId: string) => Result<string, InvalidTimezoneError>;
}

/**
 * Create a resolver over a timezone database (the system database by default).
 */
export function createTimezoneResolver(options: TimezoneResolverOptions = {}): TimezoneResolver {
	const database = options.database ?? systemTimezones;
	const disambiguation = options.disambiguation ?? 'earlier';

	function checkZone(zoneId: string): Result<string, InvalidTimezoneError> {
		return database.isKnownZone(zoneId) ? ok(zoneId) : err(invalidTimezone(zoneId));
	}

	return {
		database,
		disambiguation,
		validateZone: (zoneId) => database.isKnownZone(zoneId),
		checkZone,
		toInstant(local, zoneId) {
			const zone = checkZone(zoneId);
			if (!zone.ok) return zone;
			return ok(zonedToInstant(database, local, zoneId, disambiguation));
		},
		toLocal(instant, zoneId) {
			const zone = checkZone(zoneId);
			if (!zone.ok) return zone;
			return ok(instantToZoned(database, instant, zoneId));
		},
		offsetAt(instant, zoneId) {
			const zone = checkZone(zoneId);
			if (!zone.ok) return zone;
			return ok(database.offsetAt(zoneId, instant.getTime()));
		},
		formatInstant(instant, zoneId) {
			const zone = checkZone(zoneId);
			if (!zone.ok) return zone;
			return ok(formatInTimeZone(instant, zoneId, "yyyy-MM-dd'T'HH:mm:ssXXX"));
		},
	};
}
