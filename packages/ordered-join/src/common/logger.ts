import debug from 'debug';

// Base namespace for the project
const BASE_NAMESPACE = 'ordered-join';

/**
 * Creates a namespaced debug logger instance.
 *
 * Example: createLogger('merge') -> returns a debugger for 'ordered-join:merge'
 *
 * Usage:
 * const log = createLogger('group');
 * log('Group join started');
 * const errorLog = log.extend('error'); // Creates 'ordered-join:group:error'
 *
 * @param subNamespace The specific subsystem namespace (e.g., 'merge', 'cursor')
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Enable debug logging programmatically, as an alternative to the DEBUG
 * environment variable.
 *
 * @param pattern - Debug pattern to enable (default: 'ordered-join:*')
 *   Examples:
 *   - 'ordered-join:*' - all logs
 *   - 'ordered-join:merge' - row joins only
 *   - 'ordered-join:*,-ordered-join:cursor' - all except cursor disposal
 * @param logFn - Optional custom log function. Defaults to debug's stderr writer.
 *
 * @example
 * ```typescript
 * import { enableLogging } from 'ordered-join';
 *
 * enableLogging('ordered-join:group', console.log.bind(console));
 * ```
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
 * Disable all debug logging.
 */
export function disableLogging(): void {
	debug.disable();
}

/**
 * Check if logging is enabled for a specific namespace.
 *
 * @param namespace - The namespace to check (without the 'ordered-join:' prefix)
 */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
