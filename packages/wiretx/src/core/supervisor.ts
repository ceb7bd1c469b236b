/**
 * Termination handling for one connection.
 *
 * A termination request is recorded synchronously, so no further command is
 * processed once it is made, and delivered asynchronously: the transport is
 * closed and every listener and awaiting caller observes the same event.
 */

import { createLogger } from '../common/logger.js';
import { ConnectionTerminatedError } from '../common/errors.js';
import type { WireTransport } from '../common/types.js';
import { deferred } from './deferred.js';

const log = createLogger('supervisor');
const errorLog = log.extend('error');

export type TerminationListener = (event: ConnectionTerminatedError) => void;

export class ConnectionSupervisor {
	private event: ConnectionTerminatedError | undefined;
	private readonly listeners = new Set<TerminationListener>();
	private readonly requested = deferred<ConnectionTerminatedError>();
	private readonly delivered = deferred<ConnectionTerminatedError>();

	constructor(private readonly transport: WireTransport) {}

	get isTerminated(): boolean {
		return this.event !== undefined;
	}

	/** The termination event, once one has been requested. */
	get termination(): ConnectionTerminatedError | undefined {
		return this.event;
	}

	/** Resolves as soon as termination is requested. */
	get terminationRequested(): Promise<ConnectionTerminatedError> {
		return this.requested.promise;
	}

	/**
	 * Fire-and-forget. The first request wins; later reasons are only logged.
	 * @returns The connection's termination event.
	 */
	requestTermination(reason: Error): ConnectionTerminatedError {
		if (this.event) {
			log('Termination already requested (%s); ignoring: %s', this.event.reason.message, reason.message);
			return this.event;
		}
		const event = new ConnectionTerminatedError(reason);
		this.event = event;
		this.requested.resolve(event);
		setImmediate(() => {
			void this.deliver(event);
		});
		return event;
	}

	/** Throws the termination event if the connection has been terminated. */
	assertOpen(): void {
		if (this.event) {
			throw this.event;
		}
	}

	/**
	 * Subscribe to the termination event.
	 * @returns Unsubscribe function.
	 */
	onTerminated(listener: TerminationListener): () => void {
		this.listeners.add(listener);
		return () => this.listeners.delete(listener);
	}

	/** Resolves once the termination has been delivered and the transport closed. */
	whenTerminated(): Promise<ConnectionTerminatedError> {
		return this.delivered.promise;
	}

	private async deliver(event: ConnectionTerminatedError): Promise<void> {
		errorLog('disconnected: %s', event.reason.message);
		try {
			await this.transport.close(event.reason);
		} catch (error) {
			errorLog('Error closing transport: %O', error);
		}
		for (const listener of this.listeners) {
			try {
				listener(event);
			} catch (error) {
				errorLog('Termination listener error: %O', error);
			}
		}
		this.delivered.resolve(event);
	}
}
