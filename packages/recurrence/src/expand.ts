/**
 * Expansion of event templates into timezone-resolved occurrences.
 *
 * Generation runs in local wall-clock space: each period of the rule yields
 * candidate dates, the template's time of day is placed on each, and only then
 * is the wall-clock value resolved to an instant in the template's zone. A
 * 09:00 meeting therefore stays at 09:00 local across DST transitions.
 */

import {
	addLocalDays,
	addLocalMilliseconds,
	atDate,
	compareIntervals,
	compareLocalDate,
	compareLocalDateTime,
	err,
	formatCompactDate,
	formatCompactDateTime,
	instantToZoned,
	invalidInterval,
	invalidTemplate,
	isValidLocalDate,
	isValidLocalDateTime,
	localDifference,
	ok,
	resolveSchedulingOptions,
	toLocalDate,
	unboundedExpansion,
	zonedToInstant,
	type InvalidIntervalError,
	type InvalidTemplateError,
	type InvalidTimezoneError,
	type LocalDate,
	type LocalDateTime,
	type ResolvedSchedulingOptions,
	type Result,
	type SchedulingOptions,
	type UnboundedExpansionError,
} from '@cadence/core';
import { periodCandidates, periodStart } from './calendar.js';
import type { EventTemplate, ExpansionRange, Occurrence, OccurrenceOverride, RecurrenceRule } from './types.js';
import { validateRule } from './validate.js';

export type TemplateError = InvalidTemplateError | InvalidTimezoneError;

export type ExpansionError = TemplateError | UnboundedExpansionError | InvalidIntervalError;

// ============================================================================
// Identity
// ============================================================================

/**
 * Stable occurrence id: `<sourceEventId>#<YYYYMMDDTHHmmss>`.
 *
 * @example occurrenceId('standup', { year: 2026, month: 2, day: 2, hour: 9, minute: 0, second: 0 })
 * // => "standup#20260202T090000"
 */
export function occurrenceId(sourceEventId: string, recurrenceId: LocalDateTime): string {
	return `${sourceEventId}#${formatCompactDateTime(recurrenceId)}`;
}

// ============================================================================
// Template Validation
// ============================================================================

function checkWindow(
	templateId: string,
	label: string,
	start: LocalDateTime,
	end: LocalDateTime,
): InvalidTemplateError | undefined {
	if (!isValidLocalDateTime(start) || !isValidLocalDateTime(end)) {
		return invalidTemplate(`${label} has a malformed wall-clock start or end`, templateId);
	}
	if (compareLocalDateTime(end, start) <= 0) {
		return invalidTemplate(`${label} must end after it starts`, templateId);
	}
	return undefined;
}

/**
 * Check a template before any expansion: its zone, its wall-clock window,
 * its rule and everything attached to the rule.
 */
export function checkTemplate(
	template: EventTemplate,
	options: ResolvedSchedulingOptions,
): Result<void, TemplateError> {
	const zone = options.resolver.checkZone(template.timezone);
	if (!zone.ok) return zone;

	const window = checkWindow(template.id, `Template "${template.id}"`, template.startLocal, template.endLocal);
	if (window) return err(window);

	const rule = template.recurrence;
	if (!rule) {
		if (template.overrides && template.overrides.length > 0) {
			return err(invalidTemplate(`Template "${template.id}" has overrides but no recurrence`, template.id));
		}
		return ok(undefined);
	}

	const validation = validateRule(rule);
	if (!validation.ok) {
		return err(
			invalidTemplate(
				`Template "${template.id}" has an invalid recurrence: ${validation.error.message}`,
				template.id,
				validation.error,
			),
		);
	}

	const badException = rule.exceptions?.find((date) => !isValidLocalDate(date));
	if (badException) {
		return err(invalidTemplate(`Template "${template.id}" has a malformed exception date`, template.id));
	}

	for (const override of template.overrides ?? []) {
		if (!isValidLocalDate(override.recurrenceDate)) {
			return err(invalidTemplate(`Template "${template.id}" has an override with a malformed date`, template.id));
		}
		const problem = checkWindow(
			template.id,
			`Override for ${formatCompactDate(override.recurrenceDate)}`,
			override.startLocal,
			override.endLocal,
		);
		if (problem) return err(problem);
	}

	return ok(undefined);
}

// ============================================================================
// Generation
// ============================================================================

function toInterval(
	template: EventTemplate,
	startLocal: LocalDateTime,
	endLocal: LocalDateTime,
	options: ResolvedSchedulingOptions,
): { start: Date; end: Date } {
	const { database, disambiguation } = options.resolver;
	const start = zonedToInstant(database, startLocal, template.timezone, disambiguation);
	let end = zonedToInstant(database, endLocal, template.timezone, disambiguation);

	// A window squeezed by a transition keeps its elapsed duration
	if (end.getTime() <= start.getTime()) {
		end = new Date(start.getTime() + localDifference(endLocal, startLocal));
	}
	return { start, end };
}

function exceedsUntil(
	rule: RecurrenceRule,
	recurrenceId: LocalDateTime,
	template: EventTemplate,
	options: ResolvedSchedulingOptions,
): boolean {
	const until = rule.until;
	if (!until) return false;

	switch (until.type) {
		case 'date':
			return compareLocalDate(recurrenceId, until.date) > 0;
		case 'floating':
			return compareLocalDateTime(recurrenceId, until.at) > 0;
		case 'instant': {
			const { database, disambiguation } = options.resolver;
			const start = zonedToInstant(database, recurrenceId, template.timezone, disambiguation);
			return start.getTime() > until.at.getTime();
		}
	}
}

/**
 * Generate occurrences in recurrence order (by recurrence id).
 * Stops at `horizon` (a local date) when given, otherwise only at the rule's
 * own terminators or the empty-stretch bound.
 */
function* generate(
	template: EventTemplate,
	options: ResolvedSchedulingOptions,
	horizon?: LocalDate,
): Generator<Occurrence> {
	const rule = template.recurrence;

	if (!rule) {
		yield {
			id: occurrenceId(template.id, template.startLocal),
			sourceEventId: template.id,
			recurrenceId: { ...template.startLocal },
			interval: toInterval(template, template.startLocal, template.endLocal, options),
			isException: false,
		};
		return;
	}

	const seriesStart = toLocalDate(template.startLocal);
	const duration = localDifference(template.endLocal, template.startLocal);
	const exceptions = new Set((rule.exceptions ?? []).map(formatCompactDate));
	const overrides = new Map<string, OccurrenceOverride>(
		(template.overrides ?? []).map((override) => [formatCompactDate(override.recurrenceDate), override]),
	);

	let emitted = 0;
	let lastMatchYear = seriesStart.year;
	const emptyYearLimit = options.maxEmptyYears * rule.interval;

	for (let index = 0; ; index++) {
		const start = periodStart(rule, seriesStart, index);
		if (horizon && compareLocalDate(start, horizon) > 0) {
			return;
		}

		let matched = false;
		for (const date of periodCandidates(rule, seriesStart, index)) {
			if (compareLocalDate(date, seriesStart) < 0) continue;

			const recurrenceId = atDate(date, template.startLocal);
			if (exceedsUntil(rule, recurrenceId, template, options)) return;

			matched = true;
			const key = formatCompactDate(date);
			if (exceptions.has(key)) continue;

			const override = overrides.get(key);
			const startLocal = override ? override.startLocal : recurrenceId;
			const endLocal = override ? override.endLocal : addLocalMilliseconds(recurrenceId, duration);

			yield {
				id: occurrenceId(template.id, recurrenceId),
				sourceEventId: template.id,
				recurrenceId,
				interval: toInterval(template, startLocal, endLocal, options),
				isException: override !== undefined,
			};

			emitted++;
			if (rule.count !== undefined && emitted >= rule.count) return;
		}

		if (matched) {
			lastMatchYear = start.year;
		} else if (start.year - lastMatchYear > emptyYearLimit) {
			options.logger.warn('Recurrence stopped after an empty stretch', {
				templateId: template.id,
				emptyYears: start.year - lastMatchYear,
			});
			return;
		}
	}
}

/**
 * Last local date generation must reach to cover `end`, including overrides
 * whose original date lies beyond it.
 */
function horizonFor(template: EventTemplate, end: Date, options: ResolvedSchedulingOptions): LocalDate {
	const endLocal = instantToZoned(options.resolver.database, end, template.timezone);

	let horizon = addLocalDays(toLocalDate(endLocal), 1);
	for (const override of template.overrides ?? []) {
		if (compareLocalDate(override.recurrenceDate, horizon) > 0) {
			horizon = toLocalDate(override.recurrenceDate);
		}
	}
	return horizon;
}

// ============================================================================
// Public Operations
// ============================================================================

/**
 * Lazily generate every occurrence of a template in recurrence order.
 * The returned iterable restarts from the first occurrence each time it is
 * iterated. Unbounded rules produce an unbounded sequence.
 */
export function iterate(
	template: EventTemplate,
	options: SchedulingOptions = {},
): Result<Iterable<Occurrence>, TemplateError> {
	const resolved = resolveSchedulingOptions(options);
	const check = checkTemplate(template, resolved);
	if (!check.ok) return check;

	return ok({
		[Symbol.iterator]: () => generate(template, resolved),
	});
}

/**
 * Expand a template into the occurrences overlapping `range`, ordered by start.
 *
 * Expansion is bounded by the earliest of the range end, the rule's UNTIL and
 * an exhausted COUNT. A non-recurring template yields its single interval.
 *
 * @example
 * const result = expand(standup, {
 *   start: new Date('2026-02-01T00:00:00Z'),
 *   end: new Date('2026-03-01T00:00:00Z'),
 * });
 */
export function expand(
	template: EventTemplate,
	range: ExpansionRange,
	options: SchedulingOptions = {},
): Result<Occurrence[], ExpansionError> {
	const resolved = resolveSchedulingOptions(options);
	const check = checkTemplate(template, resolved);
	if (!check.ok) return check;

	const { start, end } = range;
	if (end && end.getTime() <= start.getTime()) {
		return err(invalidInterval('Expansion range end must be after its start'));
	}

	const rule = template.recurrence;
	if (!end && rule && rule.until === undefined && rule.count === undefined) {
		return err(unboundedExpansion(template.id));
	}

	const horizon = end ? horizonFor(template, end, resolved) : undefined;
	const occurrences: Occurrence[] = [];

	for (const occurrence of generate(template, resolved, horizon)) {
		const { interval } = occurrence;
		if (interval.end.getTime() <= start.getTime()) continue;
		if (end && interval.start.getTime() >= end.getTime()) continue;
		occurrences.push(occurrence);
	}

	occurrences.sort((a, b) => compareIntervals(a.interval, b.interval));

	resolved.logger.debug('Expanded template', {
		templateId: template.id,
		occurrences: occurrences.length,
	});

	return ok(occurrences);
}

/**
 * First occurrence starting strictly after `after`, or null when the series
 * has none. Moved instances are considered at their moved time.
 */
export function nextOccurrence(
	template: EventTemplate,
	after: Date,
	options: SchedulingOptions = {},
): Result<Occurrence | null, TemplateError> {
	const resolved = resolveSchedulingOptions(options);
	const check = checkTemplate(template, resolved);
	if (!check.ok) return check;

	let lastOverride: LocalDate | undefined;
	for (const override of template.overrides ?? []) {
		if (!lastOverride || compareLocalDate(override.recurrenceDate, lastOverride) > 0) {
			lastOverride = override.recurrenceDate;
		}
	}

	let best: Occurrence | null = null;
	for (const occurrence of generate(template, resolved)) {
		const startsAfter = occurrence.interval.start.getTime() > after.getTime();
		if (startsAfter && (!best || occurrence.interval.start.getTime() < best.interval.start.getTime())) {
			best = occurrence;
		}

		// Regular starts only increase, so once one qualifies only later overrides can beat it
		const pastOverrides = !lastOverride || compareLocalDate(occurrence.recurrenceId, lastOverride) >= 0;
		if (best && startsAfter && pastOverrides && !occurrence.isException) break;
	}

	return ok(best);
}

/**
 * Occurrences of a recurring template overlapping [start, end).
 * COUNT is cumulative from the rule's first occurrence, not from `start`.
 */
export function occurrencesBetween(
	template: EventTemplate,
	start: Date,
	end: Date,
	options: SchedulingOptions = {},
): Result<Occurrence[], ExpansionError> {
	if (!template.recurrence) {
		return err(invalidTemplate(`Template "${template.id}" has no recurrence rule`, template.id));
	}
	return expand(template, { start, end }, options);
}
