export type MaybePromise<T> = T | Promise<T>;

/**
 * Scalar values wiretx passes as statement parameters and receives in result rows.
 * Encoding them for the wire is the transport's concern.
 */
export type SqlValue = string | number | bigint | boolean | Uint8Array | null;

/**
 * Represents a row of data, which is an array of SqlValue.
 */
export type Row = SqlValue[];

/**
 * Transaction status as reported by the server on every response.
 * The status carried on the most recent response is the single source of truth.
 */
export type TransactionStatus = 'idle' | 'in_transaction' | 'failed';

/**
 * How transaction() establishes its rollback boundary.
 * - strict: the manager issues BEGIN/COMMIT/ROLLBACK itself
 * - naive: the caller opened the transaction; the manager anchors on a savepoint
 */
export type TransactionStrategy = 'strict' | 'naive';

/**
 * Status/error codes carried by every WiretxError.
 */
export enum StatusCode {
	OK = 0,
	ERROR = 1,
	INTERNAL = 2,
	ABORT = 4,
	IOERR = 10,
	PROTOCOL = 15,
	MISUSE = 21,
	FORMAT = 24,
}

/** Successful result of one command. */
export interface QueryResult {
	/** Command tag reported by the server (SELECT, INSERT, BEGIN, ROLLBACK, ...) */
	command: string;
	columns: string[];
	rows: Row[];
	/** Rows returned or affected */
	rowCount: number;
}

/** Error fields as decoded from the server's error response. */
export interface ServerErrorFields {
	severity: string;
	/** Five-character SQLSTATE */
	code: string;
	message: string;
	detail?: string;
}

/**
 * One structured outcome per executed command, always paired with the status
 * the server reported at the end of the round trip.
 */
export type WireResponse =
	| { type: 'ok'; result: QueryResult; status: TransactionStatus }
	| { type: 'error'; error: ServerErrorFields; status: TransactionStatus };

/**
 * The "execute one command" primitive consumed from the wire layer.
 *
 * A rejected promise from execute() or sync() means the connection was lost;
 * it is handled as an abrupt termination, never as an ordinary error.
 */
export interface WireTransport {
	execute(sql: string, params: readonly SqlValue[]): Promise<WireResponse>;
	/** Round trip without a statement; resolves to the reported status. */
	sync(): Promise<TransactionStatus>;
	close(reason: Error): Promise<void>;
}
