import type { Logger } from "../lib/logger/index.js";
import { type FederationError, UnhandledTransportError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";

/**
 * Unwraps the result of an interactive call for a command-line front end.
 *
 * An UnhandledTransportError is logged and ends the process with status 1;
 * any other failure is thrown.
 */
export function exitOnTerminalFailure<T>(
	result: Result<T, FederationError>,
	logger: Logger,
	exit: (code: number) => never = (code) => process.exit(code),
): T {
	if (result.ok) return result.value;
	if (result.error instanceof UnhandledTransportError) {
		logger.error(result.error.toJSON(), result.error.message);
		return exit(1);
	}
	throw result.error;
}
