import { localDate, localDateTime } from '@cadence/core';
import { describe, expect, test } from 'vitest';
import { parseRRule, serializeRRule } from '../src/rrule.js';
import type { RecurrenceRule } from '../src/types.js';

function parsed(text: string): RecurrenceRule {
	const result = parseRRule(text);
	if (!result.ok) throw new Error(result.error.message);
	return result.value;
}

function failureReason(text: string): string | undefined {
	const result = parseRRule(text);
	return result.ok ? undefined : result.error.reason;
}

describe('parseRRule', () => {
	test('parses a weekly rule', () => {
		const rule = parsed('FREQ=WEEKLY;BYDAY=MO;COUNT=3');
		expect(rule.frequency).toBe('weekly');
		expect(rule.interval).toBe(1);
		expect(rule.byWeekday).toEqual([{ day: 'monday' }]);
		expect(rule.count).toBe(3);
		expect(rule.until).toBeUndefined();
		expect(rule.exceptions).toEqual([]);
	});

	test('parses ordinals, month days and months', () => {
		const rule = parsed('FREQ=YEARLY;BYMONTH=3,9;BYDAY=-1SU,+2MO');
		expect(rule.byMonth).toEqual([3, 9]);
		expect(rule.byWeekday).toEqual([
			{ day: 'sunday', ordinal: -1 },
			{ day: 'monday', ordinal: 2 },
		]);

		expect(parsed('FREQ=MONTHLY;BYMONTHDAY=1,-1').byMonthDay).toEqual([1, -1]);
	});

	test('parses the three UNTIL forms', () => {
		expect(parsed('FREQ=DAILY;UNTIL=20260301').until).toEqual({
			type: 'date',
			date: localDate(2026, 3, 1),
		});
		expect(parsed('FREQ=DAILY;UNTIL=20260301T120000Z').until).toEqual({
			type: 'instant',
			at: new Date('2026-03-01T12:00:00Z'),
		});
		expect(parsed('FREQ=DAILY;UNTIL=20260301T120000').until).toEqual({
			type: 'floating',
			at: localDateTime(2026, 3, 1, 12, 0, 0),
		});
	});

	test('accepts an RRULE: prefix and lowercase text', () => {
		const rule = parsed('RRULE:freq=monthly;interval=2;wkst=su');
		expect(rule.frequency).toBe('monthly');
		expect(rule.interval).toBe(2);
		expect(rule.weekStart).toBe('sunday');
	});

	test('rejects malformed text', () => {
		expect(failureReason('')).toBe('MalformedRule');
		expect(failureReason('RRULE:')).toBe('MalformedRule');
		expect(failureReason('BYDAY=MO')).toBe('MalformedRule');
		expect(failureReason('FREQ=WEEKLY;;BYDAY=MO')).toBe('MalformedRule');
		expect(failureReason('FREQ=WEEKLY;BYDAY=XX')).toBe('MalformedRule');
		expect(failureReason('FREQ=WEEKLY;COUNT=2;COUNT=3')).toBe('MalformedRule');
		expect(failureReason('FREQ=DAILY;UNTIL=2026-03-01')).toBe('MalformedRule');
		expect(failureReason('FREQ=DAILY;COUNT=three')).toBe('MalformedRule');
		expect(failureReason('FREQ=FORTNIGHTLY')).toBe('MalformedRule');
	});

	test('rejects parts outside the supported subset', () => {
		expect(failureReason('FREQ=HOURLY')).toBe('UnsupportedPart');
		expect(failureReason('FREQ=MONTHLY;BYDAY=MO;BYSETPOS=1')).toBe('UnsupportedPart');
		expect(failureReason('FREQ=DAILY;BYHOUR=9')).toBe('UnsupportedPart');
	});

	test('reports rule validation failures', () => {
		expect(failureReason('FREQ=DAILY;COUNT=3;UNTIL=20260301')).toBe('ConflictingTerminators');
		expect(failureReason('FREQ=DAILY;INTERVAL=0')).toBe('InvalidInterval');
		expect(failureReason('FREQ=DAILY;COUNT=0')).toBe('InvalidCount');
		expect(failureReason('FREQ=WEEKLY;BYDAY=')).toBe('EmptyByWeekday');
		expect(failureReason('FREQ=MONTHLY;BYMONTHDAY=32')).toBe('InvalidMonthDay');
		expect(failureReason('FREQ=MONTHLY;BYMONTHDAY=0')).toBe('InvalidMonthDay');
		expect(failureReason('FREQ=YEARLY;BYMONTH=13')).toBe('InvalidMonth');
		expect(failureReason('FREQ=WEEKLY;BYDAY=1MO')).toBe('InvalidOrdinal');
	});
});

describe('serializeRRule', () => {
	test('reproduces parsed text exactly', () => {
		const sources = [
			'FREQ=WEEKLY;BYDAY=MO;COUNT=3',
			'RRULE:freq=monthly;interval=02;byday=+2tu;until=20261231T235959Z',
			'COUNT=10;FREQ=YEARLY;BYMONTH=2;BYMONTHDAY=-1',
			'FREQ=DAILY;INTERVAL=1;UNTIL=20260301',
		];

		for (const source of sources) {
			expect(serializeRRule(parsed(source))).toBe(source);
		}
	});

	test('re-emits edited parts in canonical form', () => {
		const rule = parsed('FREQ=WEEKLY;BYDAY=MO;COUNT=3');
		expect(serializeRRule({ ...rule, count: 5 })).toBe('FREQ=WEEKLY;BYDAY=MO;COUNT=5');
	});

	test('drops removed parts and appends new ones', () => {
		const rule = parsed('FREQ=WEEKLY;BYDAY=MO;COUNT=3');
		const edited: RecurrenceRule = {
			...rule,
			count: undefined,
			until: { type: 'date', date: localDate(2026, 3, 1) },
		};
		expect(serializeRRule(edited)).toBe('FREQ=WEEKLY;BYDAY=MO;UNTIL=20260301');
	});

	test('serializes hand-built rules in canonical order', () => {
		const rule: RecurrenceRule = {
			frequency: 'weekly',
			interval: 2,
			byWeekday: [{ day: 'monday' }, { day: 'wednesday' }],
			count: 10,
		};
		expect(serializeRRule(rule)).toBe('FREQ=WEEKLY;INTERVAL=2;COUNT=10;BYDAY=MO,WE');
	});

	test('omits an interval of one and formats every UNTIL form', () => {
		expect(
			serializeRRule({
				frequency: 'daily',
				interval: 1,
				until: { type: 'instant', at: new Date('2026-03-01T12:00:00Z') },
			}),
		).toBe('FREQ=DAILY;UNTIL=20260301T120000Z');

		expect(
			serializeRRule({
				frequency: 'monthly',
				interval: 1,
				byWeekday: [{ day: 'friday', ordinal: -1 }],
				until: { type: 'floating', at: localDateTime(2026, 6, 30, 17, 0, 0) },
			}),
		).toBe('FREQ=MONTHLY;UNTIL=20260630T170000;BYDAY=-1FR');
	});
});
