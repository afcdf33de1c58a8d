/**
 * Logging seam. Cadence never writes output on its own; callers inject a logger.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
	debug: (message: string, data?: Record<string, unknown>) => void;
	info: (message: string, data?: Record<string, unknown>) => void;
	warn: (message: string, data?: Record<string, unknown>) => void;
	error: (message: string, data?: Record<string, unknown>) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

const noop = (): void => {};

/**
 * A logger that discards everything. Used when no logger is configured.
 */
export const noopLogger: Logger = {
	debug: noop,
	info: noop,
	warn: noop,
	error: noop,
};

/**
 * Create a console-backed logger that drops messages below `minLevel`.
 */
export function createConsoleLogger(minLevel: LogLevel = 'info', prefix = '[cadence]'): Logger {
	const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

	const write = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
		if (!enabled(level)) return;
		if (data) {
			console[level](`${prefix} ${level}: ${message}`, data);
		} else {
			console[level](`${prefix} ${level}: ${message}`);
		}
	};

	return {
		debug: write('debug'),
		info: write('info'),
		warn: write('warn'),
		error: write('error'),
	};
}
