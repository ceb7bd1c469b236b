/**
 * One round trip at a time: executes a command, verifies the reported status,
 * and applies the disconnect policy to any server error.
 */

import { createLogger } from '../common/logger.js';
import type { SqlValue, TransactionStatus, WireResponse, WireTransport } from '../common/types.js';
import { DisconnectError, ServerError, toError } from '../common/errors.js';
import { failedWith, succeeded, type QueryOutcome } from '../common/outcome.js';
import type { CommandCategory } from './command.js';
import type { ErrorClassifier } from './error-classifier.js';
import type { StatusTracker } from './status-tracker.js';
import type { ConnectionSupervisor } from './supervisor.js';

const log = createLogger('connection');
const debugLog = log.extend('debug');

export class CommandRunner {
	constructor(
		private readonly transport: WireTransport,
		private readonly tracker: StatusTracker,
		private readonly classifier: ErrorClassifier,
		private readonly supervisor: ConnectionSupervisor,
	) {}

	get status(): TransactionStatus {
		return this.tracker.status;
	}

	get isTerminated(): boolean {
		return this.supervisor.isTerminated;
	}

	/**
	 * Executes one command.
	 *
	 * Resolves with the server's result or error. Rejects with the connection's
	 * ConnectionTerminatedError if the connection is (or becomes) terminated,
	 * including when the reported status contradicts the tracker.
	 */
	async run(sql: string, params: readonly SqlValue[], category: CommandCategory): Promise<QueryOutcome> {
		this.supervisor.assertOpen();
		debugLog('[%s] %s', category, sql);

		let response: WireResponse;
		try {
			response = await this.transport.execute(sql, params);
		} catch (error) {
			throw this.supervisor.requestTermination(toError(error));
		}
		// Terminated while the command was in flight
		this.supervisor.assertOpen();

		const verdict = this.tracker.update(category, response.type, response.status);
		if (!verdict.ok) {
			throw this.supervisor.requestTermination(verdict.violation);
		}

		if (response.type === 'ok') {
			return succeeded(response.result);
		}

		const error = new ServerError(response.error);
		if (this.classifier.classify(error) === 'disconnect') {
			// The caller still receives the error; termination follows asynchronously
			this.supervisor.requestTermination(new DisconnectError(error));
		}
		return failedWith(error);
	}

	/**
	 * Round trip without a statement; verifies the reported status.
	 */
	async sync(): Promise<TransactionStatus> {
		this.supervisor.assertOpen();
		let observed: TransactionStatus;
		try {
			observed = await this.transport.sync();
		} catch (error) {
			throw this.supervisor.requestTermination(toError(error));
		}
		this.supervisor.assertOpen();

		const verdict = this.tracker.verify(observed);
		if (!verdict.ok) {
			throw this.supervisor.requestTermination(verdict.violation);
		}
		return observed;
	}
}
