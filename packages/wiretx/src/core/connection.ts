import { createLogger, enableLogging } from '../common/logger.js';
import type { QueryResult, SqlValue, TransactionStatus, WireTransport } from '../common/types.js';
import { ConnectionClosedError, type ConnectionTerminatedError } from '../common/errors.js';
import { unwrapOutcome, type QueryOutcome, type TransactionOutcome } from '../common/outcome.js';
import { DEFAULT_CONFIG, type ConnectionConfig, type PartialConnectionConfig } from '../config/types.js';
import { mergeConfig, resolveDisconnectPolicy, validateConfig } from '../config/loader.js';
import { CommandRunner } from './command-runner.js';
import { ConnectionQueue } from './connection-queue.js';
import { ErrorClassifier } from './error-classifier.js';
import { StatusTracker } from './status-tracker.js';
import { ConnectionSupervisor, type TerminationListener } from './supervisor.js';
import {
	TransactionManager,
	type QueryOptions,
	type TransactionBody,
	type TransactionOptions,
} from './transaction-manager.js';

const log = createLogger('connection');
const debugLog = log.extend('debug');

export type ConnectionOptions = PartialConnectionConfig;

/**
 * A single logical connection over a WireTransport.
 *
 * Callers are admitted one at a time; a transaction() holds the connection for
 * its whole body. Server errors come back as values. The returned promises
 * reject only for API misuse, for errors thrown by a transaction body, and with
 * the ConnectionTerminatedError once the connection is terminated.
 */
export class Connection {
	readonly config: ConnectionConfig;
	private readonly tracker = new StatusTracker();
	private readonly supervisor: ConnectionSupervisor;
	private readonly queue: ConnectionQueue;
	private readonly runner: CommandRunner;
	private readonly manager: TransactionManager;

	constructor(transport: WireTransport, options: ConnectionOptions = {}) {
		this.config = validateConfig(mergeConfig(DEFAULT_CONFIG, options));
		if (this.config.logging.namespaces) {
			enableLogging(this.config.logging.namespaces);
		}

		this.supervisor = new ConnectionSupervisor(transport);
		this.queue = new ConnectionQueue(this.supervisor.terminationRequested);
		const classifier = new ErrorClassifier(resolveDisconnectPolicy(this.config));
		this.runner = new CommandRunner(transport, this.tracker, classifier, this.supervisor);
		this.manager = new TransactionManager(this.runner, this.config.transactions);
	}

	/**
	 * Creates a connection and confirms the session starts idle.
	 */
	static async open(transport: WireTransport, options: ConnectionOptions = {}): Promise<Connection> {
		const connection = new Connection(transport, options);
		await connection.ping();
		debugLog('Connection opened (%s transactions).', connection.config.transactions);
		return connection;
	}

	/** Believed transaction status, as last verified against the server. */
	get status(): TransactionStatus {
		return this.tracker.status;
	}

	get isTerminated(): boolean {
		return this.supervisor.isTerminated;
	}

	/**
	 * Runs one statement outside any transaction() call.
	 */
	async query(sql: string, params: readonly SqlValue[] = [], options: QueryOptions = {}): Promise<QueryOutcome> {
		return this.exclusive(() => this.manager.queryOutside(sql, params, options));
	}

	async queryOrThrow(sql: string, params: readonly SqlValue[] = []): Promise<QueryResult> {
		return unwrapOutcome(await this.query(sql, params));
	}

	async transaction<T>(body: TransactionBody<T>, options: TransactionOptions = {}): Promise<TransactionOutcome<T>> {
		return this.exclusive(() => this.manager.transaction(body, options));
	}

	/**
	 * Status-only round trip. A status other than the believed one terminates
	 * the connection.
	 */
	async ping(): Promise<TransactionStatus> {
		return this.exclusive(() => this.runner.sync());
	}

	/**
	 * Terminates the connection and waits until the transport is closed.
	 */
	async close(): Promise<void> {
		this.supervisor.requestTermination(new ConnectionClosedError());
		await this.supervisor.whenTerminated();
	}

	onTerminated(listener: TerminationListener): () => void {
		return this.supervisor.onTerminated(listener);
	}

	whenTerminated(): Promise<ConnectionTerminatedError> {
		return this.supervisor.whenTerminated();
	}

	private async exclusive<T>(fn: () => Promise<T>): Promise<T> {
		this.supervisor.assertOpen();
		const release = await this.queue.acquire();
		try {
			return await fn();
		} finally {
			release();
		}
	}
}
