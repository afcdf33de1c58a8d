/**
 * RFC 5545 RRULE text <-> RecurrenceRule.
 *
 * The parser records how each part was written (`layout`). The serializer
 * replays that layout, re-emitting every unchanged part byte-for-byte, so a
 * parsed rule serializes back to the exact text it came from. Parts that were
 * edited, or rules built by hand, use the canonical form.
 */

import {
	epochToLocal,
	err,
	formatCompactDate,
	formatCompactDateTime,
	localToEpoch,
	ok,
	parseLocalDateTime,
	ruleError,
	toLocalDate,
	type DayOfWeek,
	type Result,
	type RuleError,
} from '@cadence/core';
import type { Frequency, RecurrenceRule, RecurrenceUntil, RRuleLayout, RRulePart } from './types.js';
import { validateRule } from './validate.js';

// ============================================================================
// Vocabulary
// ============================================================================

const DAY_CODES: Record<DayOfWeek, string> = {
	monday: 'MO',
	tuesday: 'TU',
	wednesday: 'WE',
	thursday: 'TH',
	friday: 'FR',
	saturday: 'SA',
	sunday: 'SU',
};

const CODE_TO_DAY: Record<string, DayOfWeek> = {
	MO: 'monday',
	TU: 'tuesday',
	WE: 'wednesday',
	TH: 'thursday',
	FR: 'friday',
	SA: 'saturday',
	SU: 'sunday',
};

const FREQUENCIES: Record<string, Frequency> = {
	DAILY: 'daily',
	WEEKLY: 'weekly',
	MONTHLY: 'monthly',
	YEARLY: 'yearly',
};

const SUB_DAILY_FREQUENCIES = new Set(['HOURLY', 'MINUTELY', 'SECONDLY']);

/**
 * Order used for parts the layout does not place.
 */
const CANONICAL_ORDER: readonly RRulePart[] = [
	'FREQ',
	'INTERVAL',
	'UNTIL',
	'COUNT',
	'BYMONTH',
	'BYDAY',
	'BYMONTHDAY',
	'WKST',
];

const KNOWN_PARTS = new Set<string>(CANONICAL_ORDER);

const isKnownPart = (name: string): name is RRulePart => KNOWN_PARTS.has(name);

const PREFIX_PATTERN = /^RRULE:/i;
const UNTIL_PATTERN = /^(\d{8})(?:(T\d{6})(Z)?)?$/i;
const WEEKDAY_PATTERN = /^([+-]?\d{1,2})?([A-Z]{2})$/i;
const SIGNED_INTEGER_PATTERN = /^[+-]?\d{1,2}$/;
const INTEGER_PATTERN = /^\d+$/;

// ============================================================================
// Part Parsing
// ============================================================================

function malformed(message: string): RuleError {
	return ruleError('MalformedRule', message);
}

function parseIntegerList(name: string, value: string): number[] | RuleError {
	if (value === '') return [];
	const items = value.split(',');
	const invalid = items.find((item) => !SIGNED_INTEGER_PATTERN.test(item));
	if (invalid !== undefined) {
		return malformed(`${name} contains a non-integer value "${invalid}"`);
	}
	return items.map(Number);
}

function parseDayCode(name: string, code: string): DayOfWeek | RuleError {
	const day = CODE_TO_DAY[code.toUpperCase()];
	return day ?? malformed(`${name} contains an unknown weekday "${code}"`);
}

function parseUntil(value: string): RecurrenceUntil | RuleError {
	const match = UNTIL_PATTERN.exec(value);
	const local = match ? parseLocalDateTime(`${match[1]}${match[2]?.toUpperCase() ?? ''}`) : null;
	if (!match || !local) {
		return malformed(`UNTIL must be YYYYMMDD or YYYYMMDDTHHMMSS[Z], got "${value}"`);
	}

	if (match[2] === undefined) {
		return { type: 'date', date: toLocalDate(local) };
	}
	if (match[3] !== undefined) {
		return { type: 'instant', at: new Date(localToEpoch(local)) };
	}
	return { type: 'floating', at: local };
}

/**
 * Apply one NAME=VALUE part to a draft rule. Returns an error or undefined.
 */
function applyPart(rule: RecurrenceRule, part: RRulePart, value: string): RuleError | undefined {
	switch (part) {
		case 'FREQ': {
			const upper = value.toUpperCase();
			const frequency = FREQUENCIES[upper];
			if (frequency) {
				rule.frequency = frequency;
				return undefined;
			}
			return SUB_DAILY_FREQUENCIES.has(upper)
				? ruleError('UnsupportedPart', `FREQ=${value} is not supported; the finest frequency is DAILY`)
				: malformed(`Unknown FREQ "${value}"`);
		}

		case 'INTERVAL':
		case 'COUNT': {
			if (!INTEGER_PATTERN.test(value)) {
				return malformed(`${part} must be an integer, got "${value}"`);
			}
			if (part === 'INTERVAL') {
				rule.interval = Number(value);
			} else {
				rule.count = Number(value);
			}
			return undefined;
		}

		case 'UNTIL': {
			const until = parseUntil(value);
			if ('kind' in until) return until;
			rule.until = until;
			return undefined;
		}

		case 'BYDAY': {
			const specs: NonNullable<RecurrenceRule['byWeekday']> = [];
			for (const item of value === '' ? [] : value.split(',')) {
				const match = WEEKDAY_PATTERN.exec(item);
				if (!match) return malformed(`BYDAY contains an invalid entry "${item}"`);

				const day = parseDayCode('BYDAY', match[2]);
				if (typeof day !== 'string') return day;
				specs.push(match[1] === undefined ? { day } : { day, ordinal: Number(match[1]) });
			}
			rule.byWeekday = specs;
			return undefined;
		}

		case 'BYMONTHDAY':
		case 'BYMONTH': {
			const values = parseIntegerList(part, value);
			if (!Array.isArray(values)) return values;
			if (part === 'BYMONTHDAY') {
				rule.byMonthDay = values;
			} else {
				rule.byMonth = values;
			}
			return undefined;
		}

		case 'WKST': {
			const day = parseDayCode('WKST', value);
			if (typeof day !== 'string') return day;
			rule.weekStart = day;
			return undefined;
		}
	}
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse RRULE text such as `FREQ=WEEKLY;BYDAY=MO;COUNT=3` into a validated rule.
 * An optional `RRULE:` prefix is accepted and preserved in the layout.
 */
export function parseRRule(text: string): Result<RecurrenceRule, RuleError> {
	const prefixMatch = PREFIX_PATTERN.exec(text);
	const prefix = prefixMatch ? prefixMatch[0] : '';
	const body = text.slice(prefix.length);

	if (body === '') {
		return err(malformed('RRULE is empty'));
	}

	const rule: RecurrenceRule = { frequency: 'daily', interval: 1, exceptions: [] };
	const layout: RRuleLayout = { prefix, parts: [] };
	const seen = new Set<RRulePart>();

	for (const segment of body.split(';')) {
		const separator = segment.indexOf('=');
		if (separator <= 0) {
			return err(malformed(`Expected NAME=VALUE, got "${segment}"`));
		}

		const name = segment.slice(0, separator);
		const value = segment.slice(separator + 1);
		const part = name.toUpperCase();

		if (!isKnownPart(part)) {
			return err(
				/^[A-Z-]+$/.test(part)
					? ruleError('UnsupportedPart', `RRULE part ${part} is not supported`)
					: malformed(`Invalid RRULE part name "${name}"`),
			);
		}
		if (seen.has(part)) {
			return err(malformed(`RRULE part ${part} appears more than once`));
		}
		seen.add(part);

		const failure = applyPart(rule, part, value);
		if (failure) return err(failure);

		layout.parts.push({ part, name, value });
	}

	if (!seen.has('FREQ')) {
		return err(malformed('RRULE must contain FREQ'));
	}

	const validation = validateRule(rule);
	if (!validation.ok) return validation;

	rule.layout = layout;
	return ok(rule);
}

// ============================================================================
// Serialization
// ============================================================================

function formatUntil(until: RecurrenceUntil): string {
	switch (until.type) {
		case 'date':
			return formatCompactDate(until.date);
		case 'instant':
			return `${formatCompactDateTime(epochToLocal(until.at.getTime()))}Z`;
		case 'floating':
			return formatCompactDateTime(until.at);
	}
}

/**
 * Canonical text of one part, or undefined when the rule does not set it.
 */
function canonicalValue(part: RRulePart, rule: RecurrenceRule): string | undefined {
	switch (part) {
		case 'FREQ':
			return rule.frequency.toUpperCase();
		case 'INTERVAL':
			return String(rule.interval);
		case 'UNTIL':
			return rule.until ? formatUntil(rule.until) : undefined;
		case 'COUNT':
			return rule.count === undefined ? undefined : String(rule.count);
		case 'BYMONTH':
			return rule.byMonth?.join(',');
		case 'BYDAY':
			return rule.byWeekday
				?.map((spec) => `${spec.ordinal ?? ''}${DAY_CODES[spec.day]}`)
				.join(',');
		case 'BYMONTHDAY':
			return rule.byMonthDay?.join(',');
		case 'WKST':
			return rule.weekStart ? DAY_CODES[rule.weekStart] : undefined;
	}
}

/**
 * Whether raw text, as originally written, still means `current`.
 */
function stillMeans(part: RRulePart, raw: string, current: string): boolean {
	const draft: RecurrenceRule = { frequency: 'daily', interval: 1 };
	if (applyPart(draft, part, raw)) return false;
	return canonicalValue(part, draft) === current;
}

/**
 * Serialize a rule to RRULE text. Exceptions are not part of RRULE text.
 */
export function serializeRRule(rule: RecurrenceRule): string {
	const segments: string[] = [];
	const emitted = new Set<RRulePart>();

	for (const { part, name, value } of rule.layout?.parts ?? []) {
		const current = canonicalValue(part, rule);
		emitted.add(part);
		if (current === undefined) continue;

		segments.push(`${name}=${stillMeans(part, value, current) ? value : current}`);
	}

	for (const part of CANONICAL_ORDER) {
		if (emitted.has(part)) continue;
		if (part === 'INTERVAL' && rule.interval === 1) continue;

		const current = canonicalValue(part, rule);
		if (current !== undefined) {
			segments.push(`${part}=${current}`);
		}
	}

	return `${rule.layout?.prefix ?? ''}${segments.join(';')}`;
}
