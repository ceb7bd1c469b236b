/**
 * Configuration types for wiretx connections.
 */

import type { TransactionStrategy } from '../common/types.js';

/**
 * Logging configuration.
 */
export interface LoggingConfig {
	/** Debug namespace filter enabled when the connection is created (e.g., 'wiretx:*:error') */
	namespaces?: string;
}

/**
 * Full connection configuration.
 */
export interface ConnectionConfig {
	/** Transaction strategy, fixed for the connection */
	transactions: TransactionStrategy;
	/** Condition names or SQLSTATEs that terminate the connection when a command fails with them */
	disconnectOnErrorCodes: string[];
	logging: LoggingConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ConnectionConfig = {
	transactions: 'strict',
	disconnectOnErrorCodes: [],
	logging: {},
};

/**
 * Partial configuration for merging.
 */
export type PartialConnectionConfig = {
	transactions?: TransactionStrategy;
	disconnectOnErrorCodes?: string[];
	logging?: Partial<LoggingConfig>;
};
