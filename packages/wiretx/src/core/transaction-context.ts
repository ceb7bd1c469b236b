import type { TransactionStrategy } from '../common/types.js';
import { MisuseError } from '../common/errors.js';
import type { TransactionOutcome } from '../common/outcome.js';

let contextIdCounter = 0;

/**
 * State of one transaction() call. Lives exactly as long as the call.
 */
export class TransactionContext {
	readonly id: number;
	private failure: Error | undefined;
	private outcome: TransactionOutcome<unknown> | undefined;
	private closed = false;

	constructor(
		readonly strategy: TransactionStrategy,
		/** Enclosing context when transaction() calls nest */
		readonly parent: TransactionContext | undefined,
		/** Anchor savepoints open on the connection when this context was entered, including its own */
		readonly savepointDepth: number,
	) {
		this.id = ++contextIdCounter;
		// Nothing issued inside an already-failed transaction can succeed
		this.failure = parent?.failureReason;
	}

	/**
	 * Strategy that decides who owns BEGIN/COMMIT/ROLLBACK for statements issued
	 * in this context: strict if this or any enclosing context is strict.
	 */
	get boundaryStrategy(): TransactionStrategy {
		return this.strategy === 'strict' ? 'strict' : this.parent?.boundaryStrategy ?? 'naive';
	}

	get failed(): boolean {
		return this.failure !== undefined;
	}

	/** The first error that failed this context. */
	get failureReason(): Error | undefined {
		return this.failure;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	get result(): TransactionOutcome<unknown> | undefined {
		return this.outcome;
	}

	/** Marks the context failed. An already-failed context keeps its original reason. */
	markFailed(error: Error): void {
		this.failure ??= error;
	}

	/** A rollback re-established the boundary. */
	clearFailure(): void {
		this.failure = undefined;
	}

	assertOpen(): void {
		if (this.closed) {
			throw new MisuseError(`Transaction ${this.id} has already finished`);
		}
	}

	close(outcome: TransactionOutcome<unknown> | undefined): void {
		this.closed = true;
		this.outcome = outcome;
	}
}

/**
 * One nested rollback point. Destroyed on release or rollback-to.
 */
export class SavepointFrame {
	private released = false;

	constructor(
		readonly name: string,
		readonly parent: TransactionContext | undefined,
	) {}

	get isReleased(): boolean {
		return this.released;
	}

	markReleased(): void {
		this.released = true;
	}
}
