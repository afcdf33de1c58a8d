/**
 * Options shared by every Cadence entry point.
 */

import { noopLogger, type Logger } from './logger.js';
import {
	createTimezoneResolver,
	type Disambiguation,
	type TimezoneDatabase,
	type TimezoneResolver,
} from './timezone.js';

export interface SchedulingOptions {
	/** Timezone rules; defaults to the runtime's IANA database */
	timezones?: TimezoneDatabase;
	/** Which instant an ambiguous local time resolves to; defaults to "earlier" */
	disambiguation?: Disambiguation;
	logger?: Logger;
	/**
	 * Calendar years without an occurrence, per unit of INTERVAL, after which
	 * generation stops. The Gregorian calendar repeats every 400 years, so a
	 * rule that matches nothing for that long never matches again.
	 */
	maxEmptyYears?: number;
}

export interface ResolvedSchedulingOptions {
	resolver: TimezoneResolver;
	logger: Logger;
	maxEmptyYears: number;
}

export const SCHEDULING_DEFAULTS = {
	disambiguation: 'earlier',
	maxEmptyYears: 400,
} as const satisfies { disambiguation: Disambiguation; maxEmptyYears: number };

/**
 * Fill in defaults for any option the caller left out.
 */
export function resolveSchedulingOptions(options: SchedulingOptions = {}): ResolvedSchedulingOptions {
	return {
		resolver: createTimezoneResolver({
			database: options.timezones,
			disambiguation: options.disambiguation ?? SCHEDULING_DEFAULTS.disambiguation,
		}),
		logger: options.logger ?? noopLogger,
		maxEmptyYears: options.maxEmptyYears ?? SCHEDULING_DEFAULTS.maxEmptyYears,
	};
}
