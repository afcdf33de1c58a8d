import { localDate } from '@cadence/core';
import { describe, expect, test } from 'vitest';
import type { RecurrenceRule } from '../src/types.js';
import { validateRule } from '../src/validate.js';

const weekly: RecurrenceRule = { frequency: 'weekly', interval: 1, byWeekday: [{ day: 'monday' }] };

function reason(rule: RecurrenceRule): string | undefined {
	const result = validateRule(rule);
	return result.ok ? undefined : result.error.reason;
}

describe('validateRule', () => {
	test('accepts well-formed rules', () => {
		expect(validateRule(weekly)).toEqual({ ok: true, value: undefined });
		expect(reason({ frequency: 'monthly', interval: 3, byWeekday: [{ day: 'friday', ordinal: -1 }] })).toBe(
			undefined,
		);
		expect(reason({ frequency: 'yearly', interval: 1, byWeekday: [{ day: 'monday', ordinal: 53 }] })).toBe(
			undefined,
		);
	});

	test('rejects UNTIL together with COUNT', () => {
		expect(reason({ ...weekly, count: 3, until: { type: 'date', date: localDate(2026, 3, 1) } })).toBe(
			'ConflictingTerminators',
		);
	});

	test('rejects non-positive and fractional intervals', () => {
		expect(reason({ ...weekly, interval: 0 })).toBe('InvalidInterval');
		expect(reason({ ...weekly, interval: -2 })).toBe('InvalidInterval');
		expect(reason({ ...weekly, interval: 1.5 })).toBe('InvalidInterval');
	});

	test('rejects non-positive counts', () => {
		expect(reason({ ...weekly, count: 0 })).toBe('InvalidCount');
	});

	test('rejects an empty weekday list', () => {
		expect(reason({ ...weekly, byWeekday: [] })).toBe('EmptyByWeekday');
	});

	test('rejects ordinals out of range or on daily and weekly rules', () => {
		const monthly: RecurrenceRule = { frequency: 'monthly', interval: 1 };
		expect(reason({ ...monthly, byWeekday: [{ day: 'monday', ordinal: 0 }] })).toBe('InvalidOrdinal');
		expect(reason({ ...monthly, byWeekday: [{ day: 'monday', ordinal: 54 }] })).toBe('InvalidOrdinal');
		expect(reason({ ...weekly, byWeekday: [{ day: 'monday', ordinal: 1 }] })).toBe('InvalidOrdinal');
	});

	test('rejects month days outside [-31,-1] and [1,31]', () => {
		const monthly: RecurrenceRule = { frequency: 'monthly', interval: 1 };
		expect(reason({ ...monthly, byMonthDay: [15, -31] })).toBe(undefined);
		expect(reason({ ...monthly, byMonthDay: [0] })).toBe('InvalidMonthDay');
		expect(reason({ ...monthly, byMonthDay: [-32] })).toBe('InvalidMonthDay');
		expect(reason({ ...monthly, byMonthDay: [] })).toBe('InvalidMonthDay');
	});

	test('rejects month days that no listed month has', () => {
		const yearly: RecurrenceRule = { frequency: 'yearly', interval: 1 };
		expect(validateRule({ ...yearly, byMonth: [2], byMonthDay: [30] })).toEqual({
			ok: false,
			error: { kind: 'RuleError', reason: 'InvalidMonthDay', message: 'BYMONTHDAY 30 never falls in BYMONTH 2' },
		});
		expect(reason({ ...yearly, byMonth: [4, 6], byMonthDay: [-31] })).toBe('InvalidMonthDay');
		expect(reason({ ...yearly, byMonth: [2], byMonthDay: [29] })).toBe(undefined);
		expect(reason({ ...yearly, byMonth: [2, 4], byMonthDay: [30] })).toBe(undefined);
		expect(reason({ ...yearly, byMonth: [2], byMonthDay: [31, 1] })).toBe(undefined);
	});

	test('rejects months outside 1-12', () => {
		const yearly: RecurrenceRule = { frequency: 'yearly', interval: 1 };
		expect(reason({ ...yearly, byMonth: [0] })).toBe('InvalidMonth');
		expect(reason({ ...yearly, byMonth: [] })).toBe('InvalidMonth');
	});

	test('reports the first problem found', () => {
		const result = validateRule({ ...weekly, interval: 0, count: 0 });
		expect(result).toEqual({
			ok: false,
			error: {
				kind: 'RuleError',
				reason: 'InvalidInterval',
				message: 'INTERVAL must be a positive integer, got 0',
			},
		});
	});
});
