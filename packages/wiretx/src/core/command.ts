import type { TransactionStrategy } from '../common/types.js';
import { MisuseError } from '../common/errors.js';

/**
 * What a command does to the transaction block, which determines the status
 * the server should report after it.
 */
export type CommandCategory =
	| 'begin'
	| 'commit'
	| 'rollback'
	| 'rollback_to'
	| 'savepoint'
	| 'release'
	| 'statement';

const NOISE_WORDS = new Set(['WORK', 'TRANSACTION']);
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Strips leading whitespace and comments. */
function stripLeading(sql: string): string {
	let rest = sql;
	for (;;) {
		rest = rest.trimStart();
		if (rest.startsWith('--')) {
			const eol = rest.indexOf('\n');
			rest = eol === -1 ? '' : rest.slice(eol + 1);
		} else if (rest.startsWith('/*')) {
			const end = rest.indexOf('*/');
			rest = end === -1 ? '' : rest.slice(end + 2);
		} else {
			return rest;
		}
	}
}

function leadingWords(sql: string, count: number): string[] {
	return stripLeading(sql)
		.split(/[\s;(]+/, count + 1)
		.filter(word => word.length > 0)
		.slice(0, count)
		.map(word => word.toUpperCase());
}

/**
 * Categorizes SQL text by its leading keywords.
 */
export function categorizeCommand(sql: string): CommandCategory {
	const words = leadingWords(sql, 4);
	switch (words[0]) {
		case 'BEGIN':
			return 'begin';
		case 'START':
			return words[1] === 'TRANSACTION' ? 'begin' : 'statement';
		case 'COMMIT':
		case 'END':
			return words[1] === 'PREPARED' ? 'statement' : 'commit';
		case 'ROLLBACK':
		case 'ABORT': {
			const next = words.slice(1).find(word => !NOISE_WORDS.has(word));
			if (next === 'TO') return 'rollback_to';
			if (next === 'PREPARED') return 'statement';
			return 'rollback';
		}
		case 'SAVEPOINT':
			return 'savepoint';
		case 'RELEASE':
			return 'release';
		default:
			return 'statement';
	}
}

/**
 * Categorizes a statement the caller issued.
 *
 * Under the strict strategy the manager owns the transaction boundaries, so a
 * caller-issued BEGIN, COMMIT or ROLLBACK is expected to leave the status alone;
 * if the server says otherwise the tracker reports a desync.
 */
export function categorizeCallerCommand(sql: string, strategy: TransactionStrategy): CommandCategory {
	const category = categorizeCommand(sql);
	if (strategy === 'strict' && (category === 'begin' || category === 'commit' || category === 'rollback')) {
		return 'statement';
	}
	return category;
}

function checkSavepointName(name: string): string {
	if (!IDENTIFIER_PATTERN.test(name)) {
		throw new MisuseError(`Invalid savepoint name: ${name}`);
	}
	return name;
}

export const savepointSql = (name: string): string => `SAVEPOINT ${checkSavepointName(name)}`;
export const releaseSql = (name: string): string => `RELEASE SAVEPOINT ${checkSavepointName(name)}`;
export const rollbackToSql = (name: string): string => `ROLLBACK TO SAVEPOINT ${checkSavepointName(name)}`;
