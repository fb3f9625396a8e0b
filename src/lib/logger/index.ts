/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Binary values (certificates, keys, tensor bytes) never reach the log
 * stream: they are replaced by a `[N bytes]` marker. Path-based redaction
 * covers named sensitive fields on top of that.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe; `silent` disables output. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
	"trace",
	"debug",
	"info",
	"warn",
	"error",
	"fatal",
	"silent",
];

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface injected into every client component. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

/** Fields censored by default wherever they appear at the top level of a log object. */
export const DEFAULT_REDACT_PATHS: readonly string[] = ["privateKey", "certificate", "rootCertificate"];

// ── Binary serializer ───────────────────────────────────────────────

function redactBinary(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = value instanceof Uint8Array ? `[${value.byteLength} bytes]` : value;
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

function wrapPino(pinoLogger: pino.Logger): Logger {
	const write =
		(level: "info" | "warn" | "error" | "debug") =>
		(msgOrObj: unknown, msg?: string): void => {
			if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
				pinoLogger[level](String(msgOrObj ?? ""));
			} else if (typeof msgOrObj === "object") {
				pinoLogger[level](redactBinary({ ...msgOrObj }), msg ?? "");
			} else {
				pinoLogger[level](String(msgOrObj));
			}
		};

	return {
		info: write("info"),
		warn: write("warn"),
		error: write("error"),
		debug: write("debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with binary redaction and optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ target: "agg.example:50051" }, "Connecting to aggregator");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const redactPaths = config.redactPaths ?? DEFAULT_REDACT_PATHS;
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...redactPaths],
			censor: "[REDACTED]",
		};
	}

	const destination = config.destination;
	const pinoLogger = destination
		? pino(pinoOptions, {
				write(chunk: string): void {
					destination.write(chunk);
				},
			})
		: pino(pinoOptions);

	return wrapPino(pinoLogger);
}

/** Logger that discards everything; the default for library callers that inject none. */
export function createSilentLogger(): Logger {
	return createLogger({ level: "silent" });
}
