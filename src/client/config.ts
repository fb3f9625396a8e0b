/**
 * Client configuration: shape, defaults, and assembly from the environment.
 */

import { DEFAULT_MAX_FRAME_BYTES } from "../codec/datastream.js";
import { LOG_LEVELS, type LogLevel } from "../lib/logger/index.js";
import { type ValidationError, validate, z } from "../lib/validation/index.js";
import { configFromEnv } from "../shared/config.js";
import { ConfigError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { Duration } from "../shared/time.js";
import { DEFAULT_RESEND_POLICY, type ResendPolicy } from "../transport/resend.js";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "../transport/retry-interceptor.js";
import type {
	CredentialSource,
	Endpoint,
	Identity,
	SecurityConfig,
} from "../transport/types.js";

/** Optional tuning; every unset field falls back to {@link DEFAULT_CLIENT_SETTINGS}. */
export interface ClientSettingsInput {
	readonly reconnectIntervalMs?: number | undefined;
	readonly maxFrameBytes?: number | undefined;
	readonly retryStatuses?: readonly number[] | undefined;
	readonly retryMaxAttempts?: number | undefined;
	readonly retryDeadlineMs?: number | undefined;
	readonly resendStatuses?: readonly number[] | undefined;
	readonly resendMaxAttempts?: number | undefined;
}

export interface ClientSettings {
	/** Pause between retry attempts of the default constant backoff */
	readonly reconnectIntervalMs: number;
	readonly maxFrameBytes: number;
	readonly retry: RetryPolicy;
	readonly resend: ResendPolicy;
}

export const DEFAULT_CLIENT_SETTINGS: ClientSettings = {
	reconnectIntervalMs: Duration.seconds(1),
	maxFrameBytes: DEFAULT_MAX_FRAME_BYTES,
	retry: DEFAULT_RETRY_POLICY,
	resend: DEFAULT_RESEND_POLICY,
};

export interface AggregatorClientConfig {
	readonly endpoint: Endpoint;
	readonly security: SecurityConfig;
	readonly identity: Identity;
	readonly settings?: ClientSettingsInput | undefined;
	/** Level of the logger built when none is injected; defaults to `info` */
	readonly logLevel?: LogLevel | undefined;
}

// ── Schema ───────────────────────────────────────────────────────────

const CredentialSourceSchema: z.ZodType<CredentialSource, z.ZodTypeDef, unknown> = z.union([
	z.object({ path: z.string().min(1) }).strict(),
	z.object({ bytes: z.instanceof(Uint8Array) }).strict(),
]);

const StatusListSchema = z.array(z.number().int().min(0).max(16));

export const AggregatorClientConfigSchema: z.ZodType<
	AggregatorClientConfig,
	z.ZodTypeDef,
	unknown
> = z.object({
	endpoint: z.object({
		host: z.string().min(1),
		port: z.number().int().min(1).max(65_535),
	}),
	security: z.object({
		tls: z.boolean(),
		disableClientAuth: z.boolean().default(false),
		rootCertificate: CredentialSourceSchema.optional(),
		certificate: CredentialSourceSchema.optional(),
		privateKey: CredentialSourceSchema.optional(),
	}),
	identity: z.object({
		aggregatorUuid: z.string().min(1),
		federationUuid: z.string().min(1),
		singleColCertCommonName: z.string().optional(),
	}),
	settings: z
		.object({
			reconnectIntervalMs: z.number().int().min(0).optional(),
			maxFrameBytes: z.number().int().positive().optional(),
			retryStatuses: StatusListSchema.optional(),
			retryMaxAttempts: z.number().int().positive().optional(),
			retryDeadlineMs: z.number().int().positive().optional(),
			resendStatuses: StatusListSchema.optional(),
			resendMaxAttempts: z.number().int().positive().optional(),
		})
		.optional(),
	logLevel: z
		.string()
		.refine((level): level is LogLevel => LOG_LEVELS.some((known) => known === level), {
			message: `Expected one of ${LOG_LEVELS.join(", ")}`,
		})
		.optional(),
});

/** Checks a caller-supplied configuration object. */
export function parseClientConfig(
	input: unknown,
): Result<AggregatorClientConfig, ValidationError> {
	return validate(AggregatorClientConfigSchema, input, "Client configuration");
}

/** Fills unset tuning fields from the defaults. */
export function resolveSettings(input: ClientSettingsInput = {}): ClientSettings {
	const defaults = DEFAULT_CLIENT_SETTINGS;
	return {
		reconnectIntervalMs: input.reconnectIntervalMs ?? defaults.reconnectIntervalMs,
		maxFrameBytes: input.maxFrameBytes ?? defaults.maxFrameBytes,
		retry: {
			statuses: input.retryStatuses ?? defaults.retry.statuses,
			maxAttempts: input.retryMaxAttempts ?? defaults.retry.maxAttempts,
			deadlineMs: input.retryDeadlineMs ?? defaults.retry.deadlineMs,
		},
		resend: {
			statuses: input.resendStatuses ?? defaults.resend.statuses,
			maxAttempts: input.resendMaxAttempts ?? defaults.resend.maxAttempts,
		},
	};
}

// ── Environment ──────────────────────────────────────────────────────

function required<T>(value: T | undefined, variable: string): T {
	if (value === undefined) {
		throw new ConfigError(`${variable} is required`, { variable });
	}
	return value;
}

function fromPath(path: string | undefined): CredentialSource | undefined {
	return path === undefined ? undefined : { path };
}

/**
 * Builds a complete client configuration from `FEDLINK_*` variables.
 * TLS is on unless `FEDLINK_TLS=false`.
 */
export function clientConfigFromEnv(
	env: Readonly<Record<string, string | undefined>> = process.env,
): Result<AggregatorClientConfig, ConfigError> {
	try {
		const values = configFromEnv(env);
		return ok({
			endpoint: {
				host: required(values.host, "FEDLINK_AGGREGATOR_HOST"),
				port: required(values.port, "FEDLINK_AGGREGATOR_PORT"),
			},
			security: {
				tls: values.tls ?? true,
				disableClientAuth: values.disableClientAuth ?? false,
				rootCertificate: fromPath(values.rootCertificatePath),
				certificate: fromPath(values.certificatePath),
				privateKey: fromPath(values.privateKeyPath),
			},
			identity: {
				aggregatorUuid: required(values.aggregatorUuid, "FEDLINK_AGGREGATOR_UUID"),
				federationUuid: required(values.federationUuid, "FEDLINK_FEDERATION_UUID"),
				singleColCertCommonName: values.singleColCertCommonName,
			},
			settings: {
				reconnectIntervalMs: values.reconnectIntervalMs,
				maxFrameBytes: values.maxFrameBytes,
				retryStatuses: values.retryStatuses,
				retryMaxAttempts: values.retryMaxAttempts,
				retryDeadlineMs: values.retryDeadlineMs,
				resendStatuses: values.resendStatuses,
				resendMaxAttempts: values.resendMaxAttempts,
			},
			logLevel: values.logLevel,
		});
	} catch (error) {
		if (error instanceof ConfigError) return err(error);
		throw error;
	}
}
