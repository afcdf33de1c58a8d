import { describe, expect, test } from 'vitest';
import {
	bookSlot,
	expand,
	findConflicts,
	findFreeSlots,
	fromEventRecord,
	hasConflict,
	instantToZoned,
	occurrencesBetween,
	systemTimezones,
	type EventTemplate,
	type Occurrence,
} from '../src/index.js';

const d = (iso: string) => new Date(iso);
const minutes = (n: number) => n * 60 * 1000;

function template(record: Record<string, unknown>): EventTemplate {
	const result = fromEventRecord(record);
	if (!result.ok) throw new Error(result.error.message);
	return result.value;
}

function values(result: { ok: true; value: Occurrence[] } | { ok: false; error: { message: string } }) {
	if (!result.ok) throw new Error(result.error.message);
	return result.value;
}

describe('weekly standup in New York', () => {
	const standup = template({
		id: 'standup',
		startTime: '2026-02-02T09:00',
		endTime: '2026-02-02T09:30',
		timezone: 'America/New_York',
		rrule: 'FREQ=WEEKLY;BYDAY=MO;COUNT=3',
	});

	test('yields three Mondays of thirty minutes at 09:00 local', () => {
		const list = values(expand(standup, { start: d('2026-02-01T00:00:00Z'), end: d('2026-03-01T00:00:00Z') }));

		expect(list.map((occurrence) => occurrence.interval.start.toISOString())).toEqual([
			'2026-02-02T14:00:00.000Z',
			'2026-02-09T14:00:00.000Z',
			'2026-02-16T14:00:00.000Z',
		]);
		for (const occurrence of list) {
			expect(occurrence.interval.end.getTime() - occurrence.interval.start.getTime()).toBe(minutes(30));
			const local = instantToZoned(systemTimezones, occurrence.interval.start, 'America/New_York');
			expect([local.hour, local.minute]).toEqual([9, 0]);
		}
	});
});

describe('count is independent of the query window', () => {
	const daily = template({
		id: 'checkin',
		startTime: '2026-02-02T09:00',
		endTime: '2026-02-02T09:15',
		timezone: 'UTC',
		rrule: 'FREQ=DAILY;COUNT=5',
	});

	test('sub-windows together return the whole series once', () => {
		const windows = [
			['2026-02-01T00:00:00Z', '2026-02-03T00:00:00Z'],
			['2026-02-03T00:00:00Z', '2026-02-05T00:00:00Z'],
			['2026-02-05T00:00:00Z', '2026-02-10T00:00:00Z'],
			['2026-03-01T00:00:00Z', '2026-04-01T00:00:00Z'],
		];
		const counts = windows.map(([start, end]) => values(occurrencesBetween(daily, d(start), d(end))).length);

		expect(counts).toEqual([1, 2, 2, 0]);
	});

	test('an open-ended range returns exactly the count', () => {
		expect(values(expand(daily, { start: d('2026-01-01T00:00:00Z') }))).toHaveLength(5);
	});

	test('a single event expands to its own interval once', () => {
		const lunch = template({ id: 'lunch', startTime: '2026-02-03T12:00', endTime: '2026-02-03T13:00', timezone: 'UTC' });
		const list = values(expand(lunch, { start: d('2026-02-01T00:00:00Z'), end: d('2026-02-08T00:00:00Z') }));

		expect(list.map((occurrence) => occurrence.interval)).toEqual([
			{ start: d('2026-02-03T12:00:00Z'), end: d('2026-02-03T13:00:00Z') },
		]);
	});
});

describe('daily event across the autumn transition', () => {
	test('keeps 09:00 local while the instant shifts by the offset change', () => {
		const daily = template({
			id: 'review',
			startTime: '2026-10-31T09:00',
			endTime: '2026-10-31T09:30',
			timezone: 'America/New_York',
			rrule: 'FREQ=DAILY;COUNT=3',
		});
		const starts = values(expand(daily, { start: d('2026-10-30T00:00:00Z') })).map(
			(occurrence) => occurrence.interval.start,
		);

		expect(starts.map((start) => start.toISOString())).toEqual([
			'2026-10-31T13:00:00.000Z',
			'2026-11-01T14:00:00.000Z',
			'2026-11-02T14:00:00.000Z',
		]);
		expect(starts[1].getTime() - starts[0].getTime()).toBe(minutes(25 * 60));
	});
});

describe('conflict grouping', () => {
	const hour = (n: number) => new Date(Date.UTC(2026, 1, 2) + n * 60 * 60 * 1000);
	const occurrence = (id: string, start: number, end: number): Occurrence => ({
		id,
		sourceEventId: id,
		recurrenceId: { year: 2026, month: 2, day: 2, hour: 0, minute: 0, second: 0 },
		interval: { start: hour(start), end: hour(end) },
		isException: false,
	});

	test('groups A with B and leaves C alone', () => {
		const a = occurrence('A', 0, 10);
		const b = occurrence('B', 5, 15);
		const c = occurrence('C', 20, 30);

		expect(hasConflict(a.interval, b.interval)).toBe(hasConflict(b.interval, a.interval));
		expect(findConflicts([a, b, c]).map((group) => group.members)).toEqual([['A', 'B']]);
	});
});

describe('booking race', () => {
	test('a slot taken between search and commit is no longer free', () => {
		const range = { start: d('2026-02-02T09:00:00Z'), end: d('2026-02-02T10:00:00Z') };
		const busy = [{ start: d('2026-02-02T09:30:00Z'), end: d('2026-02-02T10:00:00Z') }];

		const slots = findFreeSlots(busy, [], range, minutes(30));
		expect(slots).toEqual({ ok: true, value: [{ start: d('2026-02-02T09:00:00Z'), end: d('2026-02-02T09:30:00Z') }] });
		if (!slots.ok) return;

		busy.push({ start: d('2026-02-02T09:15:00Z'), end: d('2026-02-02T09:45:00Z') });
		const result = bookSlot(slots.value[0], busy, { ownerId: 'owner-1' });

		expect(result.ok).toBe(false);
		if (!result.ok && result.error.kind === 'BookingError') {
			expect(result.error.reason).toBe('SlotNoLongerFree');
		}
	});
});

describe('free slots', () => {
	test('are never shorter than requested and never overlap', () => {
		const busy = [
			{ start: d('2026-02-02T09:20:00Z'), end: d('2026-02-02T10:00:00Z') },
			{ start: d('2026-02-02T11:00:00Z'), end: d('2026-02-02T11:10:00Z') },
			{ start: d('2026-02-02T13:00:00Z'), end: d('2026-02-02T15:30:00Z') },
		];
		const workingHours = [
			{ dailyStart: '09:00', dailyEnd: '17:00', daysOfWeek: ['monday' as const], timezone: 'UTC' },
		];
		const result = findFreeSlots(
			busy,
			workingHours,
			{ start: d('2026-02-02T00:00:00Z'), end: d('2026-02-03T00:00:00Z') },
			minutes(45),
		);
		if (!result.ok) throw new Error(result.error.message);

		expect(result.value.map((slot) => slot.start.toISOString())).toEqual([
			'2026-02-02T10:00:00.000Z',
			'2026-02-02T11:10:00.000Z',
			'2026-02-02T15:30:00.000Z',
		]);
		for (const [index, slot] of result.value.entries()) {
			expect(slot.end.getTime() - slot.start.getTime()).toBe(minutes(45));
			const next = result.value[index + 1];
			if (next) expect(slot.end.getTime()).toBeLessThanOrEqual(next.start.getTime());
		}
	});
});
