/**
 * Boundary between stored event records and EventTemplate values.
 *
 * Records arrive as plain data from whatever store the caller uses and are
 * validated here before anything is expanded.
 */

import {
	err,
	formatLocalDate,
	formatLocalDateTime,
	invalidTemplate,
	ok,
	parseLocalDate,
	parseLocalDateTime,
	resolveSchedulingOptions,
	toLocalDate,
	type LocalDate,
	type LocalDateTime,
	type ResolvedSchedulingOptions,
	type Result,
	type SchedulingOptions,
} from '@cadence/core';
import { z } from 'zod';
import { checkTemplate, type TemplateError } from './expand.js';
import { parseRRule, serializeRRule } from './rrule.js';
import type { EventTemplate, OccurrenceOverride } from './types.js';

// ============================================================================
// Schemas
// ============================================================================

/**
 * A wall-clock string (`2026-02-02T09:00`), or an absolute time as an ISO
 * string with offset (`2026-02-02T14:00:00Z`) or a Date.
 */
const TimeValueSchema = z.union([z.string().min(1), z.date()]);

export const EventOverrideRecordSchema = z.object({
	recurrenceDate: z.string().min(1),
	startTime: TimeValueSchema,
	endTime: TimeValueSchema,
});

export const EventRecordSchema = z.object({
	id: z.string().min(1),
	startTime: TimeValueSchema,
	endTime: TimeValueSchema,
	timezone: z.string().min(1),
	rrule: z.string().min(1).optional(),
	exdates: z.array(z.string().min(1)).optional(),
	overrides: z.array(EventOverrideRecordSchema).optional(),
});

export type EventRecord = z.infer<typeof EventRecordSchema>;
export type EventOverrideRecord = z.infer<typeof EventOverrideRecordSchema>;

const ABSOLUTE_TIME_PATTERN = /(?:Z|[+-]\d{2}:?\d{2})$/i;

// ============================================================================
// Conversion Helpers
// ============================================================================

function toWallClock(
	value: string | Date,
	timezone: string,
	options: ResolvedSchedulingOptions,
): LocalDateTime | null {
	if (value instanceof Date) {
		if (Number.isNaN(value.getTime())) return null;
		const local = options.resolver.toLocal(value, timezone);
		return local.ok ? local.value : null;
	}

	if (ABSOLUTE_TIME_PATTERN.test(value)) {
		const instant = new Date(value);
		return Number.isNaN(instant.getTime()) ? null : toWallClock(instant, timezone, options);
	}

	return parseLocalDateTime(value);
}

function toDate(text: string): LocalDate | null {
	const date = parseLocalDate(text);
	if (date) return date;
	const dateTime = parseLocalDateTime(text);
	return dateTime ? toLocalDate(dateTime) : null;
}

// ============================================================================
// Record -> Template
// ============================================================================

/**
 * Validate an untrusted record and convert it to an EventTemplate.
 *
 * @example
 * const template = fromEventRecord({
 *   id: 'standup',
 *   startTime: '2026-02-02T09:00',
 *   endTime: '2026-02-02T09:30',
 *   timezone: 'America/New_York',
 *   rrule: 'FREQ=WEEKLY;BYDAY=MO;COUNT=3',
 * });
 */
export function fromEventRecord(
	input: unknown,
	options: SchedulingOptions = {},
): Result<EventTemplate, TemplateError> {
	const parsed = EventRecordSchema.safeParse(input);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
		return err(invalidTemplate(`Event record is invalid: ${where}${issue.message}`, recordId(input)));
	}

	const record = parsed.data;
	const resolved = resolveSchedulingOptions(options);

	const zone = resolved.resolver.checkZone(record.timezone);
	if (!zone.ok) return zone;

	const startLocal = toWallClock(record.startTime, record.timezone, resolved);
	const endLocal = toWallClock(record.endTime, record.timezone, resolved);
	if (!startLocal || !endLocal) {
		return err(invalidTemplate(`Event record "${record.id}" has an unreadable start or end time`, record.id));
	}

	const template: EventTemplate = {
		id: record.id,
		startLocal,
		endLocal,
		timezone: record.timezone,
	};

	if (!record.rrule) {
		if ((record.exdates?.length ?? 0) > 0 || (record.overrides?.length ?? 0) > 0) {
			return err(
				invalidTemplate(`Event record "${record.id}" has exdates or overrides but no rrule`, record.id),
			);
		}
		return checked(template, resolved);
	}

	const rule = parseRRule(record.rrule);
	if (!rule.ok) {
		return err(
			invalidTemplate(
				`Event record "${record.id}" has an invalid rrule: ${rule.error.message}`,
				record.id,
				rule.error,
			),
		);
	}

	const exceptions: LocalDate[] = [];
	for (const text of record.exdates ?? []) {
		const date = toDate(text);
		if (!date) {
			return err(invalidTemplate(`Event record "${record.id}" has an unreadable exdate "${text}"`, record.id));
		}
		exceptions.push(date);
	}
	template.recurrence = { ...rule.value, exceptions };

	if (record.overrides) {
		const overrides: OccurrenceOverride[] = [];
		for (const override of record.overrides) {
			const recurrenceDate = toDate(override.recurrenceDate);
			const start = toWallClock(override.startTime, record.timezone, resolved);
			const end = toWallClock(override.endTime, record.timezone, resolved);
			if (!recurrenceDate || !start || !end) {
				return err(
					invalidTemplate(
						`Event record "${record.id}" has an unreadable override for "${override.recurrenceDate}"`,
						record.id,
					),
				);
			}
			overrides.push({ recurrenceDate, startLocal: start, endLocal: end });
		}
		template.overrides = overrides;
	}

	return checked(template, resolved);
}

function checked(
	template: EventTemplate,
	options: ResolvedSchedulingOptions,
): Result<EventTemplate, TemplateError> {
	const check = checkTemplate(template, options);
	return check.ok ? ok(template) : check;
}

function recordId(input: unknown): string | undefined {
	if (typeof input !== 'object' || input === null || !('id' in input)) return undefined;
	return typeof input.id === 'string' ? input.id : undefined;
}

// ============================================================================
// Template -> Record
// ============================================================================

/**
 * Convert a template to a storable record with wall-clock times.
 * Parsed rules keep their original RRULE text.
 */
export function toEventRecord(template: EventTemplate): EventRecord {
	const record: EventRecord = {
		id: template.id,
		startTime: formatLocalDateTime(template.startLocal),
		endTime: formatLocalDateTime(template.endLocal),
		timezone: template.timezone,
	};

	if (template.recurrence) {
		record.rrule = serializeRRule(template.recurrence);
		const exceptions = template.recurrence.exceptions ?? [];
		if (exceptions.length > 0) {
			record.exdates = exceptions.map(formatLocalDate);
		}
	}

	if (template.overrides && template.overrides.length > 0) {
		record.overrides = template.overrides.map((override) => ({
			recurrenceDate: formatLocalDate(override.recurrenceDate),
			startTime: formatLocalDateTime(override.startLocal),
			endTime: formatLocalDateTime(override.endLocal),
		}));
	}

	return record;
}
