/**
 * Cadence Recurrence
 *
 * RRULE parsing and serialization, rule validation and DST-aware expansion of
 * event templates into occurrences.
 *
 * @packageDocumentation
 */

export type {
	EventTemplate,
	ExpansionRange,
	Frequency,
	Occurrence,
	OccurrenceOverride,
	RecurrenceRule,
	RecurrenceUntil,
	RRuleLayout,
	RRulePart,
	WeekdaySpec,
} from './types.js';

export { validateRule } from './validate.js';

export { parseRRule, serializeRRule } from './rrule.js';

export { nthWeekdayOfMonth, nthWeekdayOfYear, periodCandidates, periodStart } from './calendar.js';

export {
	checkTemplate,
	expand,
	iterate,
	nextOccurrence,
	occurrenceId,
	occurrencesBetween,
	type ExpansionError,
	type TemplateError,
} from './expand.js';

export {
	EventOverrideRecordSchema,
	EventRecordSchema,
	fromEventRecord,
	toEventRecord,
	type EventOverrideRecord,
	type EventRecord,
} from './records.js';

export { createRecurrenceEngine, type RecurrenceEngine } from './engine.js';
