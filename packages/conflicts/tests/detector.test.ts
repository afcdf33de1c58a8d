import { localDateTime, type Interval } from '@cadence/core';
import type { Occurrence } from '@cadence/recurrence';
import { describe, expect, test } from 'vitest';
import { findConflicts, hasConflict, suggestAlternatives } from '../src/detector.js';

const d = (iso: string) => new Date(iso);

// Hours after 2026-02-02T00:00Z
const h = (hours: number) => new Date(Date.UTC(2026, 1, 2) + hours * 60 * 60 * 1000);
const span = (start: number, end: number): Interval => ({ start: h(start), end: h(end) });

function occurrence(id: string, start: number, end: number, sourceEventId = id): Occurrence {
	return {
		id,
		sourceEventId,
		recurrenceId: localDateTime(2026, 2, 2),
		interval: span(start, end),
		isException: false,
	};
}

describe('hasConflict', () => {
	test('detects overlap symmetrically', () => {
		expect(hasConflict(span(0, 10), span(5, 15))).toBe(true);
		expect(hasConflict(span(5, 15), span(0, 10))).toBe(true);
		expect(hasConflict(span(0, 10), span(2, 3))).toBe(true);
	});

	test('does not treat abutting intervals as conflicting', () => {
		expect(hasConflict(span(0, 10), span(10, 20))).toBe(false);
		expect(hasConflict(span(10, 20), span(0, 10))).toBe(false);
	});
});

describe('findConflicts', () => {
	test('groups overlapping occurrences and leaves isolated ones out', () => {
		const groups = findConflicts([occurrence('A', 0, 10), occurrence('B', 5, 15), occurrence('C', 20, 30)]);

		expect(groups).toEqual([
			{
				members: ['A', 'B'],
				kind: 'soft',
				pairs: [{ first: 'A', second: 'B', kind: 'soft', overlap: span(5, 10) }],
				span: span(0, 15),
			},
		]);
	});

	test('connects chains of overlaps into one group', () => {
		const groups = findConflicts([occurrence('C', 12, 20), occurrence('A', 0, 10), occurrence('B', 5, 15)]);

		expect(groups).toHaveLength(1);
		expect(groups[0].members).toEqual(['A', 'B', 'C']);
		expect(groups[0].pairs.map((pair) => [pair.first, pair.second])).toEqual([
			['A', 'B'],
			['B', 'C'],
		]);
		expect(groups[0].span).toEqual(span(0, 20));
	});

	test('classifies identical intervals as hard', () => {
		const [group] = findConflicts([occurrence('A', 9, 10), occurrence('B', 9, 10)]);
		expect(group.kind).toBe('hard');
		expect(group.pairs[0].kind).toBe('hard');
	});

	test('is soft when any member differs', () => {
		const [group] = findConflicts([occurrence('A', 9, 10), occurrence('B', 9, 10), occurrence('C', 9, 11)]);
		expect(group.kind).toBe('soft');
		expect(group.pairs.map((pair) => pair.kind)).toEqual(['hard', 'soft', 'soft']);
	});

	test('keeps input order for equal starts', () => {
		const [group] = findConflicts([occurrence('Y', 0, 10), occurrence('X', 0, 5)]);
		expect(group.members).toEqual(['Y', 'X']);
	});

	test('orders groups by start', () => {
		const groups = findConflicts([
			occurrence('late-1', 20, 22),
			occurrence('early-1', 1, 3),
			occurrence('late-2', 21, 23),
			occurrence('early-2', 2, 4),
		]);
		expect(groups.map((group) => group.members)).toEqual([
			['early-1', 'early-2'],
			['late-1', 'late-2'],
		]);
	});

	test('considers only occurrences overlapping the range', () => {
		const occurrences = [occurrence('A', 0, 10), occurrence('B', 5, 15), occurrence('C', 20, 30)];
		expect(findConflicts(occurrences, { range: span(20, 30) })).toEqual([]);
		expect(findConflicts(occurrences, { range: span(0, 6) }).map((group) => group.members)).toEqual([['A', 'B']]);
	});

	test('returns nothing for no occurrences or one occurrence', () => {
		expect(findConflicts([])).toEqual([]);
		expect(findConflicts([occurrence('A', 0, 1)])).toEqual([]);
	});

	describe('dominance', () => {
		const occurrences = [occurrence('a#1', 0, 10, 'a'), occurrence('b#1', 5, 15, 'b')];

		test('picks the highest priority', () => {
			const [group] = findConflicts(occurrences, { priorities: { a: { priority: 1 }, b: { priority: 5 } } });
			expect(group.dominant).toBe('b#1');
		});

		test('breaks priority ties by earlier creation', () => {
			const [group] = findConflicts(occurrences, {
				priorities: {
					a: { priority: 5, createdAt: d('2026-01-05T00:00:00Z') },
					b: { priority: 5, createdAt: d('2026-01-01T00:00:00Z') },
				},
			});
			expect(group.dominant).toBe('b#1');
		});

		test('sorts a missing creation time last', () => {
			const [group] = findConflicts(occurrences, {
				priorities: { a: { priority: 5 }, b: { priority: 5, createdAt: d('2026-01-01T00:00:00Z') } },
			});
			expect(group.dominant).toBe('b#1');
		});

		test('falls back to member order', () => {
			const [group] = findConflicts(occurrences, { priorities: { a: { priority: 5 }, b: { priority: 5 } } });
			expect(group.dominant).toBe('a#1');
		});

		test('ranks members without a priority below those with one', () => {
			const [group] = findConflicts(occurrences, { priorities: { b: { priority: -3 } } });
			expect(group.dominant).toBe('b#1');
		});

		test('leaves dominant unset without matching priorities', () => {
			const [group] = findConflicts(occurrences, { priorities: { other: { priority: 1 } } });
			expect('dominant' in group).toBe(false);
		});

		test('never removes or edits occurrences', () => {
			const before = structuredClone(occurrences);
			findConflicts(occurrences, { priorities: { a: { priority: 1 } } });
			expect(occurrences).toEqual(before);
		});
	});
});

describe('suggestAlternatives', () => {
	const occurrences = [occurrence('review#1', 10, 11, 'review'), occurrence('standup#1', 10.5, 11, 'standup')];
	const range = span(9, 13);

	test('orders slots by distance to the original start', () => {
		expect(suggestAlternatives('standup', occurrences, { range })).toEqual({
			ok: true,
			value: [span(11, 11.5), span(9, 9.5)],
		});
	});

	test('accepts occurrence ids and a limit', () => {
		expect(suggestAlternatives('standup#1', occurrences, { range, limit: 1 })).toEqual({
			ok: true,
			value: [span(11, 11.5)],
		});
	});

	test('breaks distance ties by earlier start', () => {
		const solo = [occurrence('solo#1', 10, 11, 'solo')];
		expect(suggestAlternatives('solo', solo, { range: span(9, 12) })).toEqual({
			ok: true,
			value: [span(9, 10), span(11, 12)],
		});
	});

	test('respects working hours', () => {
		const result = suggestAlternatives('standup', occurrences, {
			range: span(0, 24),
			workingHours: [{ dailyStart: '09:00', dailyEnd: '12:00', daysOfWeek: ['monday'], timezone: 'UTC' }],
		});
		expect(result).toEqual({ ok: true, value: [span(11, 11.5), span(9, 9.5)] });
	});

	test('reports unknown events', () => {
		expect(suggestAlternatives('missing', occurrences, { range })).toEqual({
			ok: false,
			error: { kind: 'UnknownEvent', eventId: 'missing', message: 'No occurrence matches event "missing"' },
		});
	});
});
