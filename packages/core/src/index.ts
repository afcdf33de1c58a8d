/**
 * Cadence Core
 *
 * Shared time primitives, timezone resolution, results and errors for
 * Cadence packages. All intervals are half-open: [start, end)
 *
 * @packageDocumentation
 */

export type {
	DateRange,
	DayOfWeek,
	DurationMs,
	Interval,
	LocalDate,
	LocalDateTime,
	LocalTime,
	TimeInterval,
} from './types.js';

export { err, mapResult, ok, type Result } from './result.js';

export {
	invalidInterval,
	invalidTemplate,
	invalidTimezone,
	ruleError,
	SchedulingFailure,
	unboundedExpansion,
	unwrap,
	type InvalidIntervalError,
	type InvalidTemplateError,
	type InvalidTimezoneError,
	type RuleError,
	type RuleErrorReason,
	type SchedulingError,
	type UnboundedExpansionError,
} from './errors.js';

export { createConsoleLogger, noopLogger, type Logger, type LogLevel } from './logger.js';

export {
	addLocalDays,
	addLocalMilliseconds,
	addMonths,
	atDate,
	compareLocalDate,
	compareLocalDateTime,
	DAY_TO_NUMBER,
	daysBetween,
	daysInMonth,
	daysInYear,
	epochToLocal,
	formatCompactDate,
	formatCompactDateTime,
	formatLocalDate,
	formatLocalDateTime,
	isLeapYear,
	isValidLocalDate,
	isValidLocalDateTime,
	localDate,
	localDateTime,
	localDifference,
	localToEpoch,
	NUMBER_TO_DAY,
	parseLocalDate,
	parseLocalDateTime,
	parseLocalTime,
	startOfLocalWeek,
	toLocalDate,
	weekdayOf,
} from './local.js';

export {
	createTimezoneResolver,
	instantToZoned,
	systemTimezones,
	zonedToInstant,
	type Disambiguation,
	type TimezoneDatabase,
	type TimezoneResolver,
	type TimezoneResolverOptions,
} from './timezone.js';

export {
	compareIntervals,
	createInterval,
	intervalContains,
	intervalDuration,
	intervalsEqual,
	intervalsOverlap,
} from './interval.js';

export {
	resolveSchedulingOptions,
	SCHEDULING_DEFAULTS,
	type ResolvedSchedulingOptions,
	type SchedulingOptions,
} from './config.js';
