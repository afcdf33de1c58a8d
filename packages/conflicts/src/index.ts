/**
 * Cadence Conflicts
 *
 * Overlap detection, conflict grouping, priority annotation and alternative
 * slot suggestions for materialized occurrences.
 *
 * @packageDocumentation
 */

export { findConflicts, hasConflict, suggestAlternatives } from './detector.js';

export type {
	ConflictGroup,
	ConflictKind,
	ConflictPair,
	EventPriority,
	FindConflictsOptions,
	SuggestAlternativesOptions,
	UnknownEventError,
} from './types.js';
