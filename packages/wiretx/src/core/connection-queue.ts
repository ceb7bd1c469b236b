import type { ConnectionTerminatedError } from '../common/errors.js';
import { deferred } from './deferred.js';

type Rejecter = (event: ConnectionTerminatedError) => void;

/**
 * Mutex queue admitting one caller at a time onto a connection.
 *
 * Callers still waiting when the connection terminates reject with the
 * termination event instead of ever being admitted.
 */
export class ConnectionQueue {
	// Promise representing the completion of the last queued caller
	private tail: Promise<void> = Promise.resolve();
	private readonly waiters = new Set<Rejecter>();
	private termination: ConnectionTerminatedError | undefined;

	constructor(terminated: Promise<ConnectionTerminatedError>) {
		void terminated.then(event => this.terminate(event));
	}

	/** Callers queued and not yet admitted. */
	get waiting(): number {
		return this.waiters.size;
	}

	/**
	 * Waits for this caller's turn.
	 * Returns a release function that must be called to admit the next caller.
	 */
	acquire(): Promise<() => void> {
		if (this.termination) {
			return Promise.reject(this.termination);
		}

		const previous = this.tail;
		const turn = deferred<void>();
		this.tail = turn.promise;
		const release = (): void => {
			turn.resolve();
		};

		const admission = deferred<() => void>();
		const reject: Rejecter = event => {
			// Let whoever queued behind us observe the termination too
			release();
			admission.reject(event);
		};
		this.waiters.add(reject);
		void previous.then(() => {
			if (this.waiters.delete(reject)) {
				admission.resolve(release);
			}
		});
		return admission.promise;
	}

	private terminate(event: ConnectionTerminatedError): void {
		this.termination = event;
		const waiting = [...this.waiters];
		this.waiters.clear();
		for (const reject of waiting) {
			reject(event);
		}
	}
}
