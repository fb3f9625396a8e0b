import { status } from "@grpc/grpc-js";
import { describe, expect, it } from "vitest";
import { configFromEnv } from "./config.js";
import { ConfigError } from "./errors.js";

describe("configFromEnv", () => {
	it("returns an empty config when nothing is set", () => {
		expect(configFromEnv({})).toEqual({});
	});

	it("treats empty strings as unset", () => {
		expect(configFromEnv({ FEDLINK_AGGREGATOR_HOST: "", FEDLINK_AGGREGATOR_PORT: "" })).toEqual({});
	});

	it("reads every supported variable", () => {
		const config = configFromEnv({
			FEDLINK_AGGREGATOR_HOST: "agg.test",
			FEDLINK_AGGREGATOR_PORT: "50051",
			FEDLINK_TLS: "1",
			FEDLINK_DISABLE_CLIENT_AUTH: "false",
			FEDLINK_ROOT_CERT: "/certs/ca.pem",
			FEDLINK_CERT: "/certs/col.pem",
			FEDLINK_PRIVATE_KEY: "/certs/col.key",
			FEDLINK_AGGREGATOR_UUID: "aggregator-uuid",
			FEDLINK_FEDERATION_UUID: "federation-uuid",
			FEDLINK_SINGLE_COL_CERT_CN: "shared-cn",
			FEDLINK_RECONNECT_INTERVAL_MS: "0",
			FEDLINK_MAX_FRAME_BYTES: "1024",
			FEDLINK_RETRY_STATUSES: "UNAVAILABLE,resource_exhausted",
			FEDLINK_RETRY_MAX_ATTEMPTS: "5",
			FEDLINK_RETRY_DEADLINE_MS: "60000",
			FEDLINK_RESEND_STATUSES: "UNKNOWN, internal",
			FEDLINK_RESEND_MAX_ATTEMPTS: "2",
			FEDLINK_LOG_LEVEL: "warn",
		});

		expect(config).toEqual({
			host: "agg.test",
			port: 50051,
			tls: true,
			disableClientAuth: false,
			rootCertificatePath: "/certs/ca.pem",
			certificatePath: "/certs/col.pem",
			privateKeyPath: "/certs/col.key",
			aggregatorUuid: "aggregator-uuid",
			federationUuid: "federation-uuid",
			singleColCertCommonName: "shared-cn",
			reconnectIntervalMs: 0,
			maxFrameBytes: 1_024,
			retryStatuses: [status.UNAVAILABLE, status.RESOURCE_EXHAUSTED],
			retryMaxAttempts: 5,
			retryDeadlineMs: 60_000,
			resendStatuses: [status.UNKNOWN, status.INTERNAL],
			resendMaxAttempts: 2,
			logLevel: "warn",
		});
	});

	it("reads an empty retry status list as retry-everything", () => {
		expect(configFromEnv({ FEDLINK_RETRY_STATUSES: "" })).toEqual({ retryStatuses: [] });
	});

	it("rejects a port outside the valid range", () => {
		expect(() => configFromEnv({ FEDLINK_AGGREGATOR_PORT: "0" })).toThrow(
			new ConfigError('Invalid FEDLINK_AGGREGATOR_PORT: "0" must be an integer within [1, 65535]'),
		);
	});

	it("rejects non-integer numbers", () => {
		expect(() => configFromEnv({ FEDLINK_MAX_FRAME_BYTES: "1.5" })).toThrow(
			'Invalid FEDLINK_MAX_FRAME_BYTES: "1.5" must be an integer >= 1',
		);
		expect(() => configFromEnv({ FEDLINK_RECONNECT_INTERVAL_MS: "soon" })).toThrow(
			'Invalid FEDLINK_RECONNECT_INTERVAL_MS: "soon" must be an integer >= 0',
		);
	});

	it("rejects booleans it cannot read", () => {
		expect(() => configFromEnv({ FEDLINK_TLS: "yes" })).toThrow(
			'Invalid FEDLINK_TLS: "yes" must be true or false',
		);
	});

	it("rejects unknown status names", () => {
		expect(() => configFromEnv({ FEDLINK_RETRY_STATUSES: "UNAVAILABLE,FLAKY" })).toThrow(
			'Invalid FEDLINK_RETRY_STATUSES: "FLAKY" is not a gRPC status name',
		);
		expect(() => configFromEnv({ FEDLINK_RESEND_STATUSES: "LOST" })).toThrow(
			'Invalid FEDLINK_RESEND_STATUSES: "LOST" is not a gRPC status name',
		);
	});

	it("rejects a retry deadline below one millisecond", () => {
		expect(() => configFromEnv({ FEDLINK_RETRY_DEADLINE_MS: "0" })).toThrow(
			'Invalid FEDLINK_RETRY_DEADLINE_MS: "0" must be an integer >= 1',
		);
	});

	it("rejects unknown log levels", () => {
		expect(() => configFromEnv({ FEDLINK_LOG_LEVEL: "verbose" })).toThrow(
			'Invalid FEDLINK_LOG_LEVEL: "verbose" must be one of trace, debug, info, warn, error, fatal, silent',
		);
	});

	it("throws ConfigError instances", () => {
		expect(() => configFromEnv({ FEDLINK_RETRY_MAX_ATTEMPTS: "0" })).toThrow(ConfigError);
	});
});
