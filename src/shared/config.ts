/**
 * Environment configuration.
 *
 * Every variable is optional here; the client layer decides which ones a
 * complete configuration needs. Values that are present but malformed throw
 * ConfigError.
 */

import { status } from "@grpc/grpc-js";
import { LOG_LEVELS, type LogLevel, isLogLevel } from "../lib/logger/index.js";
import { ConfigError } from "./errors.js";

type Env = Readonly<Record<string, string | undefined>>;

/** Values read from `FEDLINK_*` environment variables. */
export interface EnvConfig {
	readonly host?: string;
	readonly port?: number;
	readonly tls?: boolean;
	readonly disableClientAuth?: boolean;
	readonly rootCertificatePath?: string;
	readonly certificatePath?: string;
	readonly privateKeyPath?: string;
	readonly aggregatorUuid?: string;
	readonly federationUuid?: string;
	readonly singleColCertCommonName?: string;
	readonly reconnectIntervalMs?: number;
	readonly maxFrameBytes?: number;
	readonly retryStatuses?: readonly number[];
	readonly retryMaxAttempts?: number;
	readonly retryDeadlineMs?: number;
	readonly resendStatuses?: readonly number[];
	readonly resendMaxAttempts?: number;
	readonly logLevel?: LogLevel;
}

/**
 * Reads client settings from the environment.
 * Supported: FEDLINK_AGGREGATOR_HOST, FEDLINK_AGGREGATOR_PORT, FEDLINK_TLS,
 * FEDLINK_DISABLE_CLIENT_AUTH, FEDLINK_ROOT_CERT, FEDLINK_CERT, FEDLINK_PRIVATE_KEY,
 * FEDLINK_AGGREGATOR_UUID, FEDLINK_FEDERATION_UUID, FEDLINK_SINGLE_COL_CERT_CN,
 * FEDLINK_RECONNECT_INTERVAL_MS, FEDLINK_MAX_FRAME_BYTES, FEDLINK_RETRY_STATUSES,
 * FEDLINK_RETRY_MAX_ATTEMPTS, FEDLINK_RETRY_DEADLINE_MS, FEDLINK_RESEND_STATUSES,
 * FEDLINK_RESEND_MAX_ATTEMPTS, FEDLINK_LOG_LEVEL.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(env: Env = process.env): EnvConfig {
	const host = readString(env, "FEDLINK_AGGREGATOR_HOST");
	const port = readInt(env, "FEDLINK_AGGREGATOR_PORT", 1, 65_535);
	const tls = readBool(env, "FEDLINK_TLS");
	const disableClientAuth = readBool(env, "FEDLINK_DISABLE_CLIENT_AUTH");
	const rootCertificatePath = readString(env, "FEDLINK_ROOT_CERT");
	const certificatePath = readString(env, "FEDLINK_CERT");
	const privateKeyPath = readString(env, "FEDLINK_PRIVATE_KEY");
	const aggregatorUuid = readString(env, "FEDLINK_AGGREGATOR_UUID");
	const federationUuid = readString(env, "FEDLINK_FEDERATION_UUID");
	const singleColCertCommonName = readString(env, "FEDLINK_SINGLE_COL_CERT_CN");
	const reconnectIntervalMs = readInt(env, "FEDLINK_RECONNECT_INTERVAL_MS", 0);
	const maxFrameBytes = readInt(env, "FEDLINK_MAX_FRAME_BYTES", 1);
	const retryStatuses = readStatuses(env, "FEDLINK_RETRY_STATUSES");
	const retryMaxAttempts = readInt(env, "FEDLINK_RETRY_MAX_ATTEMPTS", 1);
	const retryDeadlineMs = readInt(env, "FEDLINK_RETRY_DEADLINE_MS", 1);
	const resendStatuses = readStatuses(env, "FEDLINK_RESEND_STATUSES");
	const resendMaxAttempts = readInt(env, "FEDLINK_RESEND_MAX_ATTEMPTS", 1);

	const logLevel = readLogLevel(env, "FEDLINK_LOG_LEVEL");

	return {
		...(host !== undefined && { host }),
		...(port !== undefined && { port }),
		...(tls !== undefined && { tls }),
		...(disableClientAuth !== undefined && { disableClientAuth }),
		...(rootCertificatePath !== undefined && { rootCertificatePath }),
		...(certificatePath !== undefined && { certificatePath }),
		...(privateKeyPath !== undefined && { privateKeyPath }),
		...(aggregatorUuid !== undefined && { aggregatorUuid }),
		...(federationUuid !== undefined && { federationUuid }),
		...(singleColCertCommonName !== undefined && { singleColCertCommonName }),
		...(reconnectIntervalMs !== undefined && { reconnectIntervalMs }),
		...(maxFrameBytes !== undefined && { maxFrameBytes }),
		...(retryStatuses !== undefined && { retryStatuses }),
		...(retryMaxAttempts !== undefined && { retryMaxAttempts }),
		...(retryDeadlineMs !== undefined && { retryDeadlineMs }),
		...(resendStatuses !== undefined && { resendStatuses }),
		...(resendMaxAttempts !== undefined && { resendMaxAttempts }),
		...(logLevel !== undefined && { logLevel }),
	};
}

function readString(env: Env, key: string): string | undefined {
	const raw = env[key];
	return raw === undefined || raw === "" ? undefined : raw;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function readInt(
	env: Env,
	key: string,
	min: number,
	max = Number.MAX_SAFE_INTEGER,
): number | undefined {
	const raw = readString(env, key);
	if (raw === undefined) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed < min || parsed > max) {
		const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `within [${min}, ${max}]`;
		throw new ConfigError(`Invalid ${key}: "${raw}" must be an integer ${range}`);
	}
	return parsed;
}

function readLogLevel(env: Env, key: string): LogLevel | undefined {
	const raw = readString(env, key);
	if (raw === undefined) return undefined;
	if (!isLogLevel(raw)) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be one of ${LOG_LEVELS.join(", ")}`);
	}
	return raw;
}

function readBool(env: Env, key: string): boolean | undefined {
	const raw = readString(env, key);
	if (raw === undefined) return undefined;
	if (raw === "true" || raw === "1") return true;
	if (raw === "false" || raw === "0") return false;
	throw new ConfigError(`Invalid ${key}: "${raw}" must be true or false`);
}

const STATUS_BY_NAME: ReadonlyMap<string, number> = new Map(
	Object.entries(status).filter((entry): entry is [string, number] => typeof entry[1] === "number"),
);

/** Comma-separated gRPC status names, e.g. `UNAVAILABLE,DEADLINE_EXCEEDED`; empty list allowed. */
function readStatuses(env: Env, key: string): number[] | undefined {
	const raw = env[key];
	if (raw === undefined) return undefined;
	const names = raw
		.split(",")
		.map((name) => name.trim())
		.filter((name) => name.length > 0);
	return names.map((name) => {
		const code = STATUS_BY_NAME.get(name.toUpperCase());
		if (code === undefined) {
			throw new ConfigError(`Invalid ${key}: "${name}" is not a gRPC status name`);
		}
		return code;
	});
}
