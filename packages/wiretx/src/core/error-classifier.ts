import { createLogger } from '../common/logger.js';
import { MisuseError, type ServerError } from '../common/errors.js';
import { toSqlState } from '../common/sqlstate.js';

const log = createLogger('classifier');

export type ErrorDisposition = 'local' | 'disconnect';

/**
 * Immutable set of SQLSTATEs whose occurrence terminates the connection.
 */
export class DisconnectPolicy {
	private readonly codes: ReadonlySet<string>;

	private constructor(codes: ReadonlySet<string>) {
		this.codes = codes;
	}

	static readonly none = new DisconnectPolicy(new Set());

	/**
	 * Builds a policy from condition names ('read_only_sql_transaction') or
	 * SQLSTATEs ('25006').
	 */
	static from(entries: Iterable<string>): DisconnectPolicy {
		const codes = new Set<string>();
		for (const entry of entries) {
			const code = toSqlState(entry);
			if (code === undefined) {
				throw new MisuseError(`Unknown error code in disconnect policy: ${entry}`);
			}
			codes.add(code);
		}
		return new DisconnectPolicy(codes);
	}

	has(sqlState: string): boolean {
		return this.codes.has(sqlState);
	}

	get size(): number {
		return this.codes.size;
	}

	toArray(): string[] {
		return [...this.codes];
	}
}

export class ErrorClassifier {
	constructor(private readonly policy: DisconnectPolicy = DisconnectPolicy.none) {}

	classify(error: ServerError): ErrorDisposition {
		if (this.policy.has(error.sqlState)) {
			log('%s is in the disconnect policy', error.sqlState);
			return 'disconnect';
		}
		return 'local';
	}
}
