/**
 * Transaction management for a Connection.
 *
 * This module handles the transaction() lifecycle:
 * - Strict transactions (BEGIN/COMMIT/ROLLBACK issued by the manager)
 * - Naive transactions anchored on a savepoint inside an outer transaction
 * - Per-query savepoints
 * - Failed-context short-circuiting
 */

import { createLogger } from '../common/logger.js';
import type { MaybePromise, QueryResult, SqlValue, TransactionStrategy } from '../common/types.js';
import { InFailedTransactionError, MisuseError, type ServerError } from '../common/errors.js';
import { failedWith, unwrapOutcome, type QueryOutcome, type TransactionOutcome } from '../common/outcome.js';
import { categorizeCallerCommand, categorizeCommand, type CommandCategory } from './command.js';
import type { CommandRunner } from './command-runner.js';
import { QUERY_SAVEPOINT, SavepointScope, anchorSavepointName, type ScopeResult } from './savepoint-scope.js';
import { TransactionContext } from './transaction-context.js';

const log = createLogger('transaction');
const debugLog = log.extend('debug');
const errorLog = log.extend('error');

export interface QueryOptions {
	/** Run the statement inside its own savepoint so its failure does not fail the transaction */
	savepoint?: boolean;
}

export interface TransactionOptions {
	/** Overrides the connection's configured strategy for this call */
	strategy?: TransactionStrategy;
}

/**
 * The handle a transaction body receives.
 */
export interface TransactionHandle {
	readonly strategy: TransactionStrategy;
	/** Whether an error has failed this transaction */
	readonly failed: boolean;
	query(sql: string, params?: readonly SqlValue[], options?: QueryOptions): Promise<QueryOutcome>;
	/** Like query(), but throws the ServerError instead of returning it. */
	queryOrThrow(sql: string, params?: readonly SqlValue[], options?: QueryOptions): Promise<QueryResult>;
	/** Nested transaction() inside this one. Only the naive strategy nests. */
	transaction<T>(body: TransactionBody<T>, options?: TransactionOptions): Promise<TransactionOutcome<T>>;
	/**
	 * Unwinds to this transaction() call, which returns `rolled_back` with the given reason.
	 */
	rollback(reason?: unknown): never;
}

export type TransactionBody<T> = (handle: TransactionHandle) => MaybePromise<T>;

/** Default reason for rollback() called without one. */
export const ROLLBACK = 'rollback';

/**
 * Thrown by rollback() to unwind the body; caught by the transaction() call
 * that owns the context.
 */
class RollbackSignal extends Error {
	constructor(readonly context: TransactionContext, readonly reason: unknown) {
		super('rollback');
		this.name = 'RollbackSignal';
	}
}

const isRollbackOf = (error: unknown, context: TransactionContext): error is RollbackSignal =>
	error instanceof RollbackSignal && error.context === context;

/**
 * Owns the transaction contexts of one connection. Callers are serialized by
 * the Connection, so at most one chain of nested contexts is live.
 */
export class TransactionManager {
	private current: TransactionContext | undefined;
	private anchorDepth = 0;
	private readonly scope: SavepointScope;

	constructor(
		private readonly runner: CommandRunner,
		/** Connection strategy; decides who owns transaction boundaries */
		private readonly strategy: TransactionStrategy,
	) {
		this.scope = new SavepointScope(runner);
	}

	/** The innermost open context, if any. */
	get activeContext(): TransactionContext | undefined {
		return this.current;
	}

	async transaction<T>(body: TransactionBody<T>, options: TransactionOptions = {}): Promise<TransactionOutcome<T>> {
		const strategy = options.strategy ?? this.strategy;
		return strategy === 'strict'
			? this.strictTransaction(body)
			: this.naiveTransaction(body);
	}

	/**
	 * Runs a statement outside any transaction() call.
	 */
	async queryOutside(sql: string, params: readonly SqlValue[], options: QueryOptions = {}): Promise<QueryOutcome> {
		if (options.savepoint) {
			throw new MisuseError('A per-query savepoint requires an open transaction');
		}
		return this.runner.run(sql, params, categorizeCallerCommand(sql, this.strategy));
	}

	// ============================================================================
	// Strategies
	// ============================================================================

	private async strictTransaction<T>(body: TransactionBody<T>): Promise<TransactionOutcome<T>> {
		if (this.current) {
			throw new MisuseError('Cannot begin a strict transaction: a transaction is already open on this connection');
		}

		debugLog('Beginning strict transaction.');
		const begin = await this.runner.run('BEGIN', [], 'begin');
		if (!begin.ok) {
			errorLog('BEGIN failed: %s', begin.error.message);
			return { kind: 'rolled_back', reason: begin.error };
		}

		const context = new TransactionContext('strict', undefined, this.anchorDepth);
		this.current = context;
		let outcome: TransactionOutcome<T> | undefined;
		try {
			let value: T;
			try {
				value = await body(this.createHandle(context));
			} catch (error) {
				if (isRollbackOf(error, context)) {
					await this.rollbackStrict(context);
					outcome = { kind: 'rolled_back', reason: error.reason };
					return outcome;
				}
				await this.abortStrict(context, error);
				throw error;
			}
			outcome = await this.commitStrict(context, value);
			return outcome;
		} finally {
			context.close(outcome);
			this.current = undefined;
		}
	}

	private async naiveTransaction<T>(body: TransactionBody<T>): Promise<TransactionOutcome<T>> {
		const parent = this.current;
		const depth = ++this.anchorDepth;
		const context = new TransactionContext('naive', parent, depth);
		const name = anchorSavepointName(depth);
		debugLog('Beginning naive transaction anchored on %s.', name);

		this.current = context;
		let outcome: TransactionOutcome<T> | undefined;
		try {
			const result = await this.scope.run(parent, name, () => this.runNaiveBody(context, body));
			outcome = result.ok
				? { kind: 'success', value: result.value }
				: { kind: 'rolled_back', reason: result.reason };
			return outcome;
		} finally {
			context.close(outcome);
			this.current = parent;
			this.anchorDepth--;
		}
	}

	private async runNaiveBody<T>(context: TransactionContext, body: TransactionBody<T>): Promise<ScopeResult<T, unknown>> {
		let value: T;
		try {
			value = await body(this.createHandle(context));
		} catch (error) {
			if (isRollbackOf(error, context)) {
				return { ok: false, reason: error.reason };
			}
			throw error;
		}
		if (context.parent?.failed) {
			// Entered an already-failed transaction; there is no anchor to roll back to
			return { ok: false, reason: new InFailedTransactionError(context.failureReason) };
		}
		if (context.failed) {
			// Releasing the anchor would fail; the failed work is rolled back, the body's value stands
			debugLog('Naive transaction %d ended failed; rolling back to its anchor.', context.id);
			return { ok: true, value, rollBack: true };
		}
		return { ok: true, value };
	}

	// ============================================================================
	// Strict boundaries
	// ============================================================================

	/**
	 * COMMIT, or an implicit rollback when the commit is refused: locally for a
	 * failed context, by an error response, or by the server answering ROLLBACK.
	 */
	private async commitStrict<T>(context: TransactionContext, value: T): Promise<TransactionOutcome<T>> {
		const commit = context.failed
			? failedWith(new InFailedTransactionError(context.failureReason))
			: await this.runner.run('COMMIT', [], 'commit');

		if (commit.ok && commit.result.command !== 'ROLLBACK') {
			debugLog('Committed transaction %d.', context.id);
			return { kind: 'success', value };
		}

		const reason: ServerError = commit.ok
			? new InFailedTransactionError(context.failureReason)
			: commit.error;
		context.markFailed(reason);
		log('Commit of transaction %d refused (%s); rolling back.', context.id, reason.message);
		if (this.runner.status !== 'idle') {
			await this.rollbackStrict(context);
		}
		return { kind: 'rolled_back', reason };
	}

	private async rollbackStrict(context: TransactionContext): Promise<void> {
		debugLog('Rolling back transaction %d.', context.id);
		const rollback = await this.runner.run('ROLLBACK', [], 'rollback');
		if (!rollback.ok) {
			errorLog('ROLLBACK of transaction %d failed: %s', context.id, rollback.error.message);
		}
	}

	/** The body threw: roll back unless the connection is already gone. */
	private async abortStrict(context: TransactionContext, error: unknown): Promise<void> {
		if (this.runner.isTerminated) {
			debugLog('Connection terminated during transaction %d; skipping rollback.', context.id);
			return;
		}
		log('Transaction %d body threw; rolling back: %O', context.id, error);
		await this.rollbackStrict(context);
	}

	// ============================================================================
	// Queries inside a transaction
	// ============================================================================

	private createHandle(context: TransactionContext): TransactionHandle {
		return {
			strategy: context.strategy,
			get failed() {
				return context.failed;
			},
			query: (sql, params = [], options = {}) => this.query(context, sql, params, options),
			queryOrThrow: async (sql, params = [], options = {}) => unwrapOutcome(await this.query(context, sql, params, options)),
			transaction: <T>(body: TransactionBody<T>, options: TransactionOptions = {}) => {
				context.assertOpen();
				return this.transaction(body, options);
			},
			rollback: (reason: unknown = ROLLBACK): never => {
				context.assertOpen();
				throw new RollbackSignal(context, reason);
			},
		};
	}

	private async query(context: TransactionContext, sql: string, params: readonly SqlValue[], options: QueryOptions): Promise<QueryOutcome> {
		context.assertOpen();
		const category = categorizeCallerCommand(sql, context.boundaryStrategy);

		if (!options.savepoint) {
			return this.guarded(context, sql, params, category);
		}

		const result = await this.scope.run(context, QUERY_SAVEPOINT, async (): Promise<ScopeResult<QueryOutcome, ServerError>> => {
			const outcome = await this.guarded(context, sql, params, category, false);
			return outcome.ok ? { ok: true, value: outcome } : { ok: false, reason: outcome.error };
		});
		return result.ok ? result.value : failedWith(result.reason);
	}

	/**
	 * Executes against a context, short-circuiting if it has failed.
	 * @param track Whether an error fails the context (not inside a query savepoint)
	 */
	private async guarded(
		context: TransactionContext,
		sql: string,
		params: readonly SqlValue[],
		category: CommandCategory,
		track = true,
	): Promise<QueryOutcome> {
		// Rollback statements are the way out of a failed context; they always reach the server
		const keyword = categorizeCommand(sql);
		if (context.failed && keyword !== 'rollback' && keyword !== 'rollback_to') {
			return failedWith(new InFailedTransactionError(context.failureReason));
		}

		const outcome = await this.runner.run(sql, params, category);
		if (!outcome.ok) {
			if (track) context.markFailed(outcome.error);
		} else if (category === 'rollback_to' && context.failed && this.runner.status === 'in_transaction') {
			debugLog('Transaction %d recovered by ROLLBACK TO.', context.id);
			context.clearFailure();
		}
		return outcome;
	}
}
