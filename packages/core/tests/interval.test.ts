import { describe, expect, test } from 'vitest';
import {
	compareIntervals,
	createInterval,
	intervalContains,
	intervalDuration,
	intervalsEqual,
	intervalsOverlap,
} from '../src/interval.js';

const d = (iso: string) => new Date(iso);

describe('createInterval', () => {
	test('builds a half-open interval', () => {
		const result = createInterval(d('2026-02-02T09:00:00Z'), d('2026-02-02T10:00:00Z'));
		expect(result).toEqual({
			ok: true,
			value: { start: d('2026-02-02T09:00:00Z'), end: d('2026-02-02T10:00:00Z') },
		});
	});

	test('rejects zero-length intervals', () => {
		const result = createInterval(d('2026-02-02T09:00:00Z'), d('2026-02-02T09:00:00Z'));
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.kind).toBe('InvalidInterval');
		}
	});

	test('rejects inverted and invalid bounds', () => {
		expect(createInterval(d('2026-02-02T10:00:00Z'), d('2026-02-02T09:00:00Z')).ok).toBe(false);
		expect(createInterval(new Date(Number.NaN), d('2026-02-02T09:00:00Z')).ok).toBe(false);
	});
});

describe('interval helpers', () => {
	const morning = { start: d('2026-02-02T09:00:00Z'), end: d('2026-02-02T12:00:00Z') };
	const noon = { start: d('2026-02-02T12:00:00Z'), end: d('2026-02-02T13:00:00Z') };
	const late = { start: d('2026-02-02T11:00:00Z'), end: d('2026-02-02T14:00:00Z') };

	test('abutting intervals do not overlap', () => {
		expect(intervalsOverlap(morning, noon)).toBe(false);
		expect(intervalsOverlap(noon, morning)).toBe(false);
	});

	test('overlap is symmetric', () => {
		expect(intervalsOverlap(morning, late)).toBe(true);
		expect(intervalsOverlap(late, morning)).toBe(true);
	});

	test('containment is half-open', () => {
		expect(intervalContains(morning, d('2026-02-02T09:00:00Z'))).toBe(true);
		expect(intervalContains(morning, d('2026-02-02T12:00:00Z'))).toBe(false);
	});

	test('equality, duration and ordering', () => {
		expect(intervalsEqual(morning, { ...morning })).toBe(true);
		expect(intervalsEqual(morning, late)).toBe(false);
		expect(intervalDuration(morning)).toBe(3 * 60 * 60 * 1000);
		expect([noon, late, morning].sort(compareIntervals)).toEqual([morning, late, noon]);
	});
});
