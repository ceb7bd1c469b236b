import { StatusCode, type ServerErrorFields, type TransactionStatus } from './types.js';
import { SQLSTATE, conditionName } from './sqlstate.js';

/**
 * Base class for wiretx specific errors
 * Provides status code and cause support
 */
export class WiretxError extends Error {
	public code: number;
	public cause?: Error;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error) {
		super(message);
		this.code = code;
		this.name = 'WiretxError';
		this.cause = cause;

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, WiretxError);
		}
	}
}

/**
 * Error thrown when the API is used incorrectly
 */
export class MisuseError extends WiretxError {
	constructor(message: string = "API misuse") {
		super(message, StatusCode.MISUSE);
		this.name = 'MisuseError';
		Object.setPrototypeOf(this, MisuseError.prototype);
	}
}

function formatServerMessage(fields: ServerErrorFields): string {
	const condition = conditionName(fields.code);
	return condition
		? `${fields.severity} ${fields.code} (${condition}) ${fields.message}`
		: `${fields.severity} ${fields.code} ${fields.message}`;
}

/**
 * Error reported by the server for one command.
 * Always handed to the caller as a value, never thrown by query().
 */
export class ServerError extends WiretxError {
	readonly severity: string;
	readonly sqlState: string;
	/** Condition name for the SQLSTATE, when known (e.g. 'unique_violation') */
	readonly condition: string | undefined;
	/** Message text as the server sent it, without severity and code */
	readonly serverMessage: string;
	readonly detail: string | undefined;

	constructor(fields: ServerErrorFields, cause?: Error) {
		super(formatServerMessage(fields), StatusCode.ERROR, cause);
		this.name = 'ServerError';
		this.severity = fields.severity;
		this.sqlState = fields.code;
		this.condition = conditionName(fields.code);
		this.serverMessage = fields.message;
		this.detail = fields.detail;
		Object.setPrototypeOf(this, ServerError.prototype);
	}

	toFields(): ServerErrorFields {
		const fields: ServerErrorFields = { severity: this.severity, code: this.sqlState, message: this.serverMessage };
		if (this.detail !== undefined) fields.detail = this.detail;
		return fields;
	}
}

/**
 * Synthesized locally for any command against a context that already failed.
 * The server is not contacted; `cause` is the error that failed the context.
 */
export class InFailedTransactionError extends ServerError {
	constructor(cause?: Error) {
		super({
			severity: 'ERROR',
			code: SQLSTATE.in_failed_sql_transaction,
			message: 'current transaction is aborted, commands ignored until end of transaction block',
		}, cause);
		this.name = 'InFailedTransactionError';
		Object.setPrototypeOf(this, InFailedTransactionError.prototype);
	}
}

/**
 * The server rejected RELEASE SAVEPOINT. Carries the server's own code, and
 * forces the owning context into the failed state.
 */
export class SavepointReleaseError extends ServerError {
	readonly savepoint: string;

	constructor(savepoint: string, failure: ServerError) {
		super(failure.toFields(), failure);
		this.name = 'SavepointReleaseError';
		this.savepoint = savepoint;
		Object.setPrototypeOf(this, SavepointReleaseError.prototype);
	}
}

/**
 * The believed transaction status disagrees with the server's.
 * Only ever observed as the reason of a connection termination.
 */
export class ProtocolViolationError extends WiretxError {
	readonly expected: TransactionStatus;
	readonly observed: TransactionStatus;

	constructor(expected: TransactionStatus, observed: TransactionStatus) {
		super(`unexpected status: ${observed}`, StatusCode.PROTOCOL);
		this.name = 'ProtocolViolationError';
		this.expected = expected;
		this.observed = observed;
		Object.setPrototypeOf(this, ProtocolViolationError.prototype);
	}
}

/**
 * Termination reason for a server error matched by the disconnect policy.
 */
export class DisconnectError extends WiretxError {
	constructor(public readonly serverError: ServerError) {
		super(`disconnected: ${serverError.message}`, StatusCode.ABORT, serverError);
		this.name = 'DisconnectError';
		Object.setPrototypeOf(this, DisconnectError.prototype);
	}
}

/**
 * Termination reason for a caller-requested close().
 */
export class ConnectionClosedError extends WiretxError {
	constructor(message: string = 'connection closed') {
		super(message, StatusCode.ABORT);
		this.name = 'ConnectionClosedError';
		Object.setPrototypeOf(this, ConnectionClosedError.prototype);
	}
}

/**
 * The termination event. Every call awaiting a terminated connection rejects
 * with one of these, and all of them carry the same `reason`.
 */
export class ConnectionTerminatedError extends WiretxError {
	constructor(public readonly reason: Error) {
		super(`connection terminated: ${reason.message}`, StatusCode.ABORT, reason);
		this.name = 'ConnectionTerminatedError';
		Object.setPrototypeOf(this, ConnectionTerminatedError.prototype);
	}
}

/**
 * Normalizes anything thrown by a collaborator into an Error.
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new WiretxError(String(value), StatusCode.IOERR);
}
