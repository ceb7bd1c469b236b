/**
 * wiretx - transaction and savepoint execution core for wire-protocol SQL clients
 *
 * Tracks the server-reported transaction status across every round trip,
 * emulates nested transactions with savepoints, and terminates the connection
 * on a status desync or on errors named by the disconnect policy.
 */

// Connection and transactions
export { Connection } from './core/connection.js';
export type { ConnectionOptions } from './core/connection.js';
export { TransactionManager, ROLLBACK } from './core/transaction-manager.js';
export type { TransactionHandle, TransactionBody, TransactionOptions, QueryOptions } from './core/transaction-manager.js';
export { TransactionContext, SavepointFrame } from './core/transaction-context.js';
export { SavepointScope, QUERY_SAVEPOINT, anchorSavepointName } from './core/savepoint-scope.js';
export type { ScopeResult } from './core/savepoint-scope.js';

// Status tracking, classification and termination
export { StatusTracker, expectedStatus } from './core/status-tracker.js';
export type { StatusVerdict, ResponseKind } from './core/status-tracker.js';
export { ErrorClassifier, DisconnectPolicy } from './core/error-classifier.js';
export type { ErrorDisposition } from './core/error-classifier.js';
export { ConnectionSupervisor } from './core/supervisor.js';
export type { TerminationListener } from './core/supervisor.js';
export { CommandRunner } from './core/command-runner.js';
export { ConnectionQueue } from './core/connection-queue.js';
export { categorizeCommand, categorizeCallerCommand } from './core/command.js';
export type { CommandCategory } from './core/command.js';

// Common data types and constants
export { StatusCode } from './common/types.js';
export type {
	SqlValue,
	Row,
	MaybePromise,
	TransactionStatus,
	TransactionStrategy,
	QueryResult,
	ServerErrorFields,
	WireResponse,
	WireTransport,
} from './common/types.js';
export type { QueryOutcome, TransactionOutcome } from './common/outcome.js';
export { unwrapOutcome } from './common/outcome.js';
export { SQLSTATE, conditionName, toSqlState } from './common/sqlstate.js';
export type { ConditionName } from './common/sqlstate.js';
export {
	WiretxError,
	MisuseError,
	ServerError,
	InFailedTransactionError,
	SavepointReleaseError,
	ProtocolViolationError,
	DisconnectError,
	ConnectionClosedError,
	ConnectionTerminatedError,
} from './common/errors.js';

// Configuration
export {
	DEFAULT_CONFIG,
	DEFAULT_CONFIG_FILE,
	loadConfig,
	loadConfigFile,
	loadEnvConfig,
	mergeConfig,
	parseConfig,
	validateConfig,
	resolveDisconnectPolicy,
} from './config/index.js';
export type { ConnectionConfig, PartialConnectionConfig, LoggingConfig } from './config/index.js';

// Logging
export { createLogger, enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';
