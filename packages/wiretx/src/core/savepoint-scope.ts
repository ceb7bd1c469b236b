/**
 * Runs one unit of work as an independently rollback-able segment of an open
 * transaction, using SAVEPOINT / ROLLBACK TO SAVEPOINT / RELEASE SAVEPOINT.
 *
 * The scope returns exactly one of: the unit's success, the unit's failure, or
 * the failure of the closing RELEASE. Results are never combined.
 */

import { createLogger } from '../common/logger.js';
import { SavepointReleaseError, type ServerError } from '../common/errors.js';
import { releaseSql, rollbackToSql, savepointSql } from './command.js';
import type { CommandRunner } from './command-runner.js';
import { SavepointFrame, type TransactionContext } from './transaction-context.js';

const log = createLogger('savepoint');
const debugLog = log.extend('debug');
const errorLog = log.extend('error');

/** Savepoint name used for per-query savepoints; one can be live at a time. */
export const QUERY_SAVEPOINT = 'wiretx_query';

/** Name of the anchor savepoint at the given nesting depth (1-based). */
export function anchorSavepointName(depth: number): string {
	return depth <= 1 ? 'wiretx_savepoint' : `wiretx_savepoint_${depth}`;
}

export type ScopeResult<T, E> =
	/** `rollBack` undoes the unit's work but still reports its value */
	| { ok: true; value: T; rollBack?: boolean }
	| { ok: false; reason: E };

export class SavepointScope {
	constructor(private readonly runner: CommandRunner) {}

	/**
	 * @param parent Context the savepoint is opened in; receives the failure if
	 *   the savepoint cannot be opened or released. Undefined when the enclosing
	 *   transaction was opened outside wiretx.
	 * @param unit The work to run. A `{ ok: false }` or `rollBack` result rolls back to the savepoint.
	 */
	async run<T, E>(
		parent: TransactionContext | undefined,
		name: string,
		unit: () => Promise<ScopeResult<T, E>>,
	): Promise<ScopeResult<T, E | ServerError>> {
		if (parent?.failed) {
			// SAVEPOINT would fail server-side; the unit fails fast on its own
			debugLog('Context %d already failed; running %s without a savepoint', parent.id, name);
			return unit();
		}

		const opened = await this.runner.run(savepointSql(name), [], 'savepoint');
		if (!opened.ok) {
			parent?.markFailed(opened.error);
			return { ok: false, reason: opened.error };
		}
		const frame = new SavepointFrame(name, parent);

		let result: ScopeResult<T, E>;
		try {
			result = await unit();
		} catch (error) {
			if (!this.runner.isTerminated) {
				debugLog('Unit threw inside %s; unwinding before rethrow', name);
				const releaseFailure = await this.unwind(frame, true);
				if (releaseFailure) {
					errorLog('Could not release %s after unit threw: %s', name, releaseFailure.message);
				}
			}
			throw error;
		}

		if (this.runner.isTerminated) {
			// The connection is going away; nothing left to roll back
			return result;
		}

		const releaseFailure = await this.unwind(frame, !result.ok || result.rollBack === true);
		return releaseFailure ? { ok: false, reason: releaseFailure } : result;
	}

	/**
	 * Closes the frame: ROLLBACK TO (when the unit failed) then RELEASE, which
	 * runs even if the rollback failed.
	 */
	private async unwind(frame: SavepointFrame, rollBack: boolean): Promise<SavepointReleaseError | undefined> {
		if (rollBack) {
			const rolledBack = await this.runner.run(rollbackToSql(frame.name), [], 'rollback_to');
			if (!rolledBack.ok) {
				errorLog('ROLLBACK TO %s failed: %s', frame.name, rolledBack.error.message);
			}
		}

		const released = await this.runner.run(releaseSql(frame.name), [], 'release');
		if (released.ok) {
			frame.markReleased();
			return undefined;
		}

		const failure = new SavepointReleaseError(frame.name, released.error);
		// The rollback boundary is gone; the enclosing transaction can no longer be trusted
		if (frame.parent && !frame.parent.failed) {
			frame.parent.markFailed(failure);
		}
		log('RELEASE %s failed: %s', frame.name, failure.message);
		return failure;
	}
}
