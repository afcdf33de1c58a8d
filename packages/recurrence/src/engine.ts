/**
 * Recurrence engine bound to one set of scheduling options.
 */

import type { Result, RuleError, SchedulingOptions } from '@cadence/core';
import {
	expand,
	iterate,
	nextOccurrence,
	occurrencesBetween,
	type ExpansionError,
	type TemplateError,
} from './expand.js';
import { fromEventRecord } from './records.js';
import { parseRRule, serializeRRule } from './rrule.js';
import type { EventTemplate, ExpansionRange, Occurrence, RecurrenceRule } from './types.js';
import { validateRule } from './validate.js';

export interface RecurrenceEngine {
	validate(rule: RecurrenceRule): Result<void, RuleError>;
	parse(rruleText: string): Result<RecurrenceRule, RuleError>;
	serialize(rule: RecurrenceRule): string;
	fromRecord(record: unknown): Result<EventTemplate, TemplateError>;
	iterate(template: EventTemplate): Result<Iterable<Occurrence>, TemplateError>;
	expand(template: EventTemplate, range: ExpansionRange): Result<Occurrence[], ExpansionError>;
	nextOccurrence(template: EventTemplate, after: Date): Result<Occurrence | null, TemplateError>;
	occurrencesBetween(template: EventTemplate, start: Date, end: Date): Result<Occurrence[], ExpansionError>;
}

/**
 * Create a recurrence engine. Every operation uses the same timezone
 * database, disambiguation policy and logger.
 *
 * @example
 * const recurrence = createRecurrenceEngine({ logger: createConsoleLogger('debug') });
 * const rule = recurrence.parse('FREQ=MONTHLY;BYDAY=-1FR');
 */
export function createRecurrenceEngine(options: SchedulingOptions = {}): RecurrenceEngine {
	return {
		validate: validateRule,
		parse: parseRRule,
		serialize: serializeRRule,
		fromRecord: (record) => fromEventRecord(record, options),
		iterate: (template) => iterate(template, options),
		expand: (template, range) => expand(template, range, options),
		nextOccurrence: (template, after) => nextOccurrence(template, after, options),
		occurrencesBetween: (template, start, end) => occurrencesBetween(template, start, end, options),
	};
}
