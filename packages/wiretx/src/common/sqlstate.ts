/**
 * SQLSTATE codes wiretx refers to by condition name.
 *
 * Codes outside this table are still carried through untouched; they simply have
 * no symbolic name and can only be configured by their five-character code.
 */
export const SQLSTATE = {
	successful_completion: '00000',
	warning: '01000',
	connection_exception: '08000',
	connection_failure: '08006',
	protocol_violation: '08P01',
	feature_not_supported: '0A000',
	invalid_transaction_initiation: '0B000',
	data_exception: '22000',
	division_by_zero: '22012',
	invalid_text_representation: '22P02',
	integrity_constraint_violation: '23000',
	not_null_violation: '23502',
	foreign_key_violation: '23503',
	unique_violation: '23505',
	check_violation: '23514',
	invalid_transaction_state: '25000',
	active_sql_transaction: '25001',
	read_only_sql_transaction: '25006',
	no_active_sql_transaction: '25P01',
	in_failed_sql_transaction: '25P02',
	idle_in_transaction_session_timeout: '25P03',
	invalid_sql_statement_name: '26000',
	invalid_savepoint_specification: '3B001',
	transaction_rollback: '40000',
	serialization_failure: '40001',
	deadlock_detected: '40P01',
	syntax_error: '42601',
	undefined_table: '42P01',
	undefined_parameter: '42P02',
	insufficient_privilege: '42501',
	query_canceled: '57014',
	admin_shutdown: '57P01',
	crash_shutdown: '57P02',
	cannot_connect_now: '57P03',
	internal_error: 'XX000',
} as const;

export type ConditionName = keyof typeof SQLSTATE;

const namesByCode = new Map<string, ConditionName>();
for (const [name, code] of Object.entries(SQLSTATE)) {
	if (isConditionName(name)) namesByCode.set(code, name);
}

const SQLSTATE_PATTERN = /^[0-9A-Z]{5}$/;

function isConditionName(value: string): value is ConditionName {
	return Object.prototype.hasOwnProperty.call(SQLSTATE, value);
}

/** Symbolic condition name for a SQLSTATE, if known. */
export function conditionName(code: string): ConditionName | undefined {
	return namesByCode.get(code);
}

/**
 * Normalizes a condition name or SQLSTATE to the SQLSTATE.
 * Returns undefined for values that are neither.
 */
export function toSqlState(nameOrCode: string): string | undefined {
	const trimmed = nameOrCode.trim();
	const lowered = trimmed.toLowerCase();
	if (isConditionName(lowered)) {
		return SQLSTATE[lowered];
	}
	const upper = trimmed.toUpperCase();
	return SQLSTATE_PATTERN.test(upper) ? upper : undefined;
}
