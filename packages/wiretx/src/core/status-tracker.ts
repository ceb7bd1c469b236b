/**
 * Believed transaction status for one connection, verified after every round trip.
 */

import { createLogger } from '../common/logger.js';
import type { TransactionStatus } from '../common/types.js';
import { ProtocolViolationError } from '../common/errors.js';
import type { CommandCategory } from './command.js';

const log = createLogger('tracker');
const errorLog = log.extend('error');

export type ResponseKind = 'ok' | 'error';

export type StatusVerdict =
	| { ok: true; status: TransactionStatus }
	| { ok: false; violation: ProtocolViolationError };

/**
 * Status the server must report after a command of the given category,
 * starting from `believed`.
 */
export function expectedStatus(believed: TransactionStatus, category: CommandCategory, response: ResponseKind): TransactionStatus {
	if (category === 'commit' || category === 'rollback') {
		return 'idle';
	}
	if (response === 'error') {
		// An error outside a block leaves the session idle; inside, it fails the block
		return believed === 'idle' ? 'idle' : 'failed';
	}
	switch (category) {
		case 'begin':
		case 'rollback_to':
			return 'in_transaction';
		default:
			return believed;
	}
}

export class StatusTracker {
	private believed: TransactionStatus;

	constructor(initial: TransactionStatus = 'idle') {
		this.believed = initial;
	}

	get status(): TransactionStatus {
		return this.believed;
	}

	/**
	 * Checks the status reported with a command's response against the status
	 * derived from the command. On success the belief moves to the observed
	 * status; on mismatch the belief is left untouched and a violation returned.
	 */
	update(category: CommandCategory, response: ResponseKind, observed: TransactionStatus): StatusVerdict {
		const expected = expectedStatus(this.believed, category, response);
		if (expected !== observed) {
			errorLog('%s (%s) expected %s, server reported %s', category, response, expected, observed);
			return { ok: false, violation: new ProtocolViolationError(expected, observed) };
		}
		if (observed !== this.believed) {
			log('%s: %s -> %s', category, this.believed, observed);
		}
		this.believed = observed;
		return { ok: true, status: observed };
	}

	/**
	 * Checks a status-only round trip (no command was issued).
	 */
	verify(observed: TransactionStatus): StatusVerdict {
		if (observed !== this.believed) {
			errorLog('sync: believed %s, server reported %s', this.believed, observed);
			return { ok: false, violation: new ProtocolViolationError(this.believed, observed) };
		}
		return { ok: true, status: observed };
	}
}
