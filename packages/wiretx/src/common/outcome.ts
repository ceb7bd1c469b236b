import type { ServerError } from './errors.js';
import type { QueryResult } from './types.js';

/**
 * What every query returns. Server errors arrive here as values; only
 * termination is delivered as a rejection.
 */
export type QueryOutcome =
	| { ok: true; result: QueryResult }
	| { ok: false; error: ServerError };

/**
 * What transaction() returns. Ordinary server errors never escape a transaction
 * as rejections; they end in one of these two outcomes.
 */
export type TransactionOutcome<T> =
	| { kind: 'success'; value: T }
	| { kind: 'rolled_back'; reason: unknown };

export function succeeded(result: QueryResult): QueryOutcome {
	return { ok: true, result };
}

export function failedWith(error: ServerError): QueryOutcome {
	return { ok: false, error };
}

/** Returns the result or throws the server error. */
export function unwrapOutcome(outcome: QueryOutcome): QueryResult {
	if (!outcome.ok) {
		throw outcome.error;
	}
	return outcome.result;
}
