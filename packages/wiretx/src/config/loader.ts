/**
 * Configuration loading from multiple sources.
 *
 * Priority (highest to lowest):
 * 1. Programmatic options
 * 2. Environment variables
 * 3. Config file
 * 4. Defaults
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { createLogger } from '../common/logger.js';
import { MisuseError, WiretxError } from '../common/errors.js';
import { StatusCode, type TransactionStrategy } from '../common/types.js';
import { DisconnectPolicy } from '../core/error-classifier.js';
import {
	type ConnectionConfig,
	type PartialConnectionConfig,
	DEFAULT_CONFIG,
} from './types.js';

const configLog = createLogger('config');

export const DEFAULT_CONFIG_FILE = 'wiretx.json';

function isStrategy(value: unknown): value is TransactionStrategy {
	return value === 'strict' || value === 'naive';
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function splitList(value: string): string[] {
	return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Narrows parsed JSON to a partial configuration, rejecting misshapen fields.
 */
export function parseConfig(raw: unknown, source: string): PartialConnectionConfig {
	if (!isRecord(raw)) {
		throw new WiretxError(`Configuration in ${source} must be an object`, StatusCode.FORMAT);
	}
	const config: PartialConnectionConfig = {};

	if (raw.transactions !== undefined) {
		if (!isStrategy(raw.transactions)) {
			throw new MisuseError(`Invalid transactions strategy in ${source}: ${String(raw.transactions)}`);
		}
		config.transactions = raw.transactions;
	}

	const codes = raw.disconnectOnErrorCodes;
	if (codes !== undefined) {
		if (!Array.isArray(codes) || !codes.every((code): code is string => typeof code === 'string')) {
			throw new WiretxError(`disconnectOnErrorCodes in ${source} must be an array of strings`, StatusCode.FORMAT);
		}
		config.disconnectOnErrorCodes = codes;
	}

	if (isRecord(raw.logging) && typeof raw.logging.namespaces === 'string') {
		config.logging = { namespaces: raw.logging.namespaces };
	}

	return config;
}

/**
 * Load configuration from a JSON file.
 */
export function loadConfigFile(configPath: string): PartialConnectionConfig {
	const resolved = resolve(configPath);
	if (!existsSync(resolved)) {
		configLog('Config file not found: %s', resolved);
		return {};
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(readFileSync(resolved, 'utf-8'));
	} catch (err) {
		configLog('Failed to parse config file %s: %O', resolved, err);
		throw new WiretxError(`Failed to parse config file: ${resolved}`, StatusCode.FORMAT, err instanceof Error ? err : undefined);
	}
	configLog('Loaded config from %s', resolved);
	return parseConfig(parsed, resolved);
}

/**
 * Load configuration from environment variables.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialConnectionConfig {
	const config: PartialConnectionConfig = {};

	if (env.WIRETX_TRANSACTIONS) {
		const strategy = env.WIRETX_TRANSACTIONS.trim().toLowerCase();
		if (!isStrategy(strategy)) {
			throw new MisuseError(`Invalid WIRETX_TRANSACTIONS: ${env.WIRETX_TRANSACTIONS}`);
		}
		config.transactions = strategy;
	}
	if (env.WIRETX_DISCONNECT_ON_ERROR_CODES !== undefined) {
		config.disconnectOnErrorCodes = splitList(env.WIRETX_DISCONNECT_ON_ERROR_CODES);
	}
	if (env.WIRETX_LOG) {
		config.logging = { namespaces: env.WIRETX_LOG };
	}

	return config;
}

/**
 * Merge configuration objects.
 */
export function mergeConfig(
	base: ConnectionConfig,
	...overrides: PartialConnectionConfig[]
): ConnectionConfig {
	const result: ConnectionConfig = {
		...base,
		disconnectOnErrorCodes: [...base.disconnectOnErrorCodes],
		logging: { ...base.logging },
	};

	for (const override of overrides) {
		if (override.transactions !== undefined) result.transactions = override.transactions;
		if (override.disconnectOnErrorCodes !== undefined) {
			result.disconnectOnErrorCodes = [...override.disconnectOnErrorCodes];
		}
		if (override.logging) {
			result.logging = { ...result.logging, ...override.logging };
		}
	}

	return result;
}

/**
 * Checks a merged configuration; throws MisuseError on the first problem.
 */
export function validateConfig(config: ConnectionConfig): ConnectionConfig {
	if (!isStrategy(config.transactions)) {
		throw new MisuseError(`Invalid transactions strategy: ${String(config.transactions)}`);
	}
	// Resolving the policy rejects unknown condition names
	DisconnectPolicy.from(config.disconnectOnErrorCodes);
	return config;
}

/**
 * Builds the immutable disconnect policy for a configuration.
 */
export function resolveDisconnectPolicy(config: ConnectionConfig): DisconnectPolicy {
	return DisconnectPolicy.from(config.disconnectOnErrorCodes);
}

/**
 * Load full configuration from all sources.
 */
export function loadConfig(options: {
	configPath?: string;
	overrides?: PartialConnectionConfig;
	env?: NodeJS.ProcessEnv;
} = {}): ConnectionConfig {
	const sources: PartialConnectionConfig[] = [];

	// Load from file if specified or default exists
	const configPath = options.configPath ?? DEFAULT_CONFIG_FILE;
	if (options.configPath || existsSync(configPath)) {
		sources.push(loadConfigFile(configPath));
	}

	sources.push(loadEnvConfig(options.env));

	if (options.overrides) {
		sources.push(options.overrides);
	}

	const config = validateConfig(mergeConfig(DEFAULT_CONFIG, ...sources));
	configLog('Final config: %O', config);

	return config;
}
