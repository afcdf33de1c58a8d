/**
 * Structural validation of recurrence rules.
 */

import { err, ok, ruleError, type Result, type RuleError } from '@cadence/core';
import type { RecurrenceRule } from './types.js';

const isPositiveInteger = (value: number) => Number.isInteger(value) && value >= 1;

/** Longest length of each month across leap and common years. */
const MAX_MONTH_LENGTH = [31, 29, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

/**
 * Validate a rule, reporting the first problem found.
 * Rules are never corrected silently.
 */
export function validateRule(rule: RecurrenceRule): Result<void, RuleError> {
	if (rule.until !== undefined && rule.count !== undefined) {
		return err(ruleError('ConflictingTerminators', 'UNTIL and COUNT cannot both be set'));
	}

	if (!isPositiveInteger(rule.interval)) {
		return err(ruleError('InvalidInterval', `INTERVAL must be a positive integer, got ${rule.interval}`));
	}

	if (rule.count !== undefined && !isPositiveInteger(rule.count)) {
		return err(ruleError('InvalidCount', `COUNT must be a positive integer, got ${rule.count}`));
	}

	if (rule.byWeekday !== undefined) {
		if (rule.byWeekday.length === 0) {
			return err(ruleError('EmptyByWeekday', 'BYDAY was specified without any weekdays'));
		}

		for (const spec of rule.byWeekday) {
			if (spec.ordinal === undefined) continue;

			if (!Number.isInteger(spec.ordinal) || spec.ordinal === 0 || Math.abs(spec.ordinal) > 53) {
				return err(
					ruleError('InvalidOrdinal', `BYDAY ordinal must be in [-53,-1] or [1,53], got ${spec.ordinal}`),
				);
			}
			if (rule.frequency === 'daily' || rule.frequency === 'weekly') {
				return err(
					ruleError('InvalidOrdinal', `BYDAY ordinals are only valid for monthly and yearly rules`),
				);
			}
		}
	}

	if (rule.byMonthDay !== undefined) {
		if (rule.byMonthDay.length === 0) {
			return err(ruleError('InvalidMonthDay', 'BYMONTHDAY was specified without any days'));
		}
		const invalid = rule.byMonthDay.find(
			(day) => !Number.isInteger(day) || day === 0 || day < -31 || day > 31,
		);
		if (invalid !== undefined) {
			return err(ruleError('InvalidMonthDay', `BYMONTHDAY must be in [-31,-1] or [1,31], got ${invalid}`));
		}
	}

	if (rule.byMonth !== undefined) {
		if (rule.byMonth.length === 0) {
			return err(ruleError('InvalidMonth', 'BYMONTH was specified without any months'));
		}
		const invalid = rule.byMonth.find((month) => !Number.isInteger(month) || month < 1 || month > 12);
		if (invalid !== undefined) {
			return err(ruleError('InvalidMonth', `BYMONTH must be in [1,12], got ${invalid}`));
		}
	}

	if (rule.byMonth !== undefined && rule.byMonthDay !== undefined) {
		const longest = Math.max(...rule.byMonth.map((month) => MAX_MONTH_LENGTH[month - 1]));
		if (rule.byMonthDay.every((day) => Math.abs(day) > longest)) {
			return err(
				ruleError(
					'InvalidMonthDay',
					`BYMONTHDAY ${rule.byMonthDay.join(',')} never falls in BYMONTH ${rule.byMonth.join(',')}`,
				),
			);
		}
	}

	return ok(undefined);
}
