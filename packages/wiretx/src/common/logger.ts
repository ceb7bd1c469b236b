import debug from 'debug';

// Base namespace for the project
const BASE_NAMESPACE = 'wiretx';

/**
 * Namespaced logger under `wiretx:`. Subsystems split off `:error` and `:debug`
 * children, so `DEBUG=wiretx:*:error` shows only disconnects and failed BEGIN,
 * ROLLBACK and savepoint commands.
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Enables logging by `debug` pattern, e.g. `wiretx:supervisor:error` for the
 * reason of every terminated connection or `wiretx:tracker` for each status
 * check. `logFn` receives debug's unformatted arguments.
 */
export function enableLogging(
	pattern: string = `${BASE_NAMESPACE}:*`,
	logFn?: (...args: unknown[]) => void
): void {
	if (logFn) {
		debug.log = logFn;
	}
	debug.enable(pattern);
}

/**
 * Disable all wiretx debug logging.
 */
export function disableLogging(): void {
	debug.disable();
}

/** @param namespace Without the `wiretx:` prefix */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
