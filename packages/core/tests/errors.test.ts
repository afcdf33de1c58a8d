import { describe, expect, test } from 'vitest';
import { resolveSchedulingOptions, SCHEDULING_DEFAULTS } from '../src/config.js';
import { invalidTemplate, ruleError, SchedulingFailure, unwrap } from '../src/errors.js';
import { createConsoleLogger, noopLogger } from '../src/logger.js';
import { err, mapResult, ok } from '../src/result.js';

describe('results', () => {
	test('mapResult transforms only successes', () => {
		expect(mapResult(ok(2), (n) => n * 3)).toEqual({ ok: true, value: 6 });
		const failure = err(ruleError('InvalidInterval', 'bad'));
		expect(mapResult(failure, (n: number) => n * 3)).toBe(failure);
	});

	test('unwrap returns values and throws failures', () => {
		expect(unwrap(ok('fine'))).toBe('fine');

		const cause = ruleError('ConflictingTerminators', 'UNTIL and COUNT are both set');
		const error = invalidTemplate('Invalid recurrence rule', 'standup', cause);
		try {
			unwrap(err(error));
			expect.unreachable();
		} catch (thrown) {
			expect(thrown).toBeInstanceOf(SchedulingFailure);
			if (thrown instanceof SchedulingFailure) {
				expect(thrown.message).toBe('Invalid recurrence rule');
				expect(thrown.error).toEqual({
					kind: 'InvalidTemplate',
					message: 'Invalid recurrence rule',
					templateId: 'standup',
					cause,
				});
			}
		}
	});
});

describe('configuration', () => {
	test('fills defaults', () => {
		const resolved = resolveSchedulingOptions();
		expect(resolved.logger).toBe(noopLogger);
		expect(resolved.maxEmptyYears).toBe(SCHEDULING_DEFAULTS.maxEmptyYears);
		expect(resolved.resolver.disambiguation).toBe('earlier');
	});

	test('keeps caller overrides', () => {
		const logger = createConsoleLogger('error');
		const resolved = resolveSchedulingOptions({ logger, maxEmptyYears: 5, disambiguation: 'later' });
		expect(resolved.logger).toBe(logger);
		expect(resolved.maxEmptyYears).toBe(5);
		expect(resolved.resolver.disambiguation).toBe('later');
	});
});
