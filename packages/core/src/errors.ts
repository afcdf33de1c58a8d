/**
 * Error taxonomy shared by every Cadence component.
 *
 * Errors are plain discriminated values carried inside a `Result`.
 * Each one describes exactly one malformed input.
 */

import type { Result } from './result.js';

// ============================================================================
// Error Values
// ============================================================================

export type RuleErrorReason =
	| 'ConflictingTerminators'
	| 'InvalidInterval'
	| 'EmptyByWeekday'
	| 'InvalidMonthDay'
	| 'InvalidMonth'
	| 'InvalidCount'
	| 'InvalidOrdinal'
	| 'MalformedRule'
	| 'UnsupportedPart';

/**
 * A malformed recurrence rule. Always fixable by the caller.
 */
export interface RuleError {
	kind: 'RuleError';
	reason: RuleErrorReason;
	message: string;
}

export interface InvalidTimezoneError {
	kind: 'InvalidTimezone';
	zoneId: string;
	message: string;
}

/**
 * A structurally inconsistent event template.
 * When the template's rule is at fault the rule error is attached as `cause`.
 */
export interface InvalidTemplateError {
	kind: 'InvalidTemplate';
	templateId?: string;
	message: string;
	cause?: RuleError;
}

export interface UnboundedExpansionError {
	kind: 'UnboundedExpansion';
	templateId: string;
	message: string;
}

export interface InvalidIntervalError {
	kind: 'InvalidInterval';
	message: string;
}

export type SchedulingError =
	| RuleError
	| InvalidTimezoneError
	| InvalidTemplateError
	| UnboundedExpansionError
	| InvalidIntervalError;

// ============================================================================
// Constructors
// ============================================================================

export function ruleError(reason: RuleErrorReason, message: string): RuleError {
	return { kind: 'RuleError', reason, message };
}

export function invalidTimezone(zoneId: string): InvalidTimezoneError {
	return {
		kind: 'InvalidTimezone',
		zoneId,
		message: `Unknown IANA timezone identifier: "${zoneId}"`,
	};
}

export function invalidTemplate(
	message: string,
	templateId?: string,
	cause?: RuleError,
): InvalidTemplateError {
	const error: InvalidTemplateError = { kind: 'InvalidTemplate', message };
	if (templateId !== undefined) error.templateId = templateId;
	if (cause) error.cause = cause;
	return error;
}

export function unboundedExpansion(templateId: string): UnboundedExpansionError {
	return {
		kind: 'UnboundedExpansion',
		templateId,
		message: `Template "${templateId}" has no range end, UNTIL or COUNT to bound expansion`,
	};
}

export function invalidInterval(message: string): InvalidIntervalError {
	return { kind: 'InvalidInterval', message };
}

// ============================================================================
// Throwing Boundary
// ============================================================================

/**
 * Thrown by `unwrap` for callers that prefer exceptions over results.
 */
export class SchedulingFailure<E extends { kind: string; message: string }> extends Error {
	readonly error: E;

	constructor(error: E) {
		super(error.message);
		this.name = 'SchedulingFailure';
		this.error = error;
	}
}

/**
 * Return the value of a successful result or throw its error as a `SchedulingFailure`.
 */
export function unwrap<T, E extends { kind: string; message: string }>(result: Result<T, E>): T {
	if (!result.ok) {
		throw new SchedulingFailure(result.error);
	}
	return result.value;
}
