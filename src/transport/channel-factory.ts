/**
 * ChannelFactory — opens plaintext or TLS channels from an endpoint and a
 * security posture. Stateless beyond the options it is built with.
 */

import { readFileSync } from "node:fs";
import { type ChannelCredentials, type ChannelOptions, credentials } from "@grpc/grpc-js";
import { TransportConfigError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { GrpcChannel } from "./grpc-channel.js";
import {
	type Channel,
	type CredentialSource,
	type Endpoint,
	type SecurityConfig,
	type Telemetry,
	endpointTarget,
} from "./types.js";

export interface ChannelFactory {
	open(endpoint: Endpoint, security: SecurityConfig): Result<Channel, TransportConfigError>;
}

/** Message size ceilings sized for model payloads. */
export const DEFAULT_CHANNEL_OPTIONS: ChannelOptions = {
	"grpc.max_metadata_size": 32 * 1024 * 1024,
	"grpc.max_send_message_length": 128 * 1024 * 1024,
	"grpc.max_receive_message_length": 128 * 1024 * 1024,
};

export interface CredentialMaterial {
	readonly rootCertificate: Buffer;
	readonly certificate: Buffer | null;
	readonly privateKey: Buffer | null;
}

type CredentialName = "rootCertificate" | "certificate" | "privateKey";

function readCredential(
	name: CredentialName,
	source: CredentialSource | undefined,
): Result<Buffer, TransportConfigError> {
	if (source === undefined) {
		return err(new TransportConfigError(`${name} is required when TLS is enabled`, name));
	}
	if ("bytes" in source) {
		if (source.bytes.byteLength === 0) {
			return err(new TransportConfigError(`${name} is empty`, name));
		}
		return ok(Buffer.from(source.bytes));
	}
	try {
		return ok(readFileSync(source.path));
	} catch (error) {
		return err(
			new TransportConfigError(`Unable to read ${name} from ${source.path}`, name, {
				path: source.path,
				cause: error,
			}),
		);
	}
}

/**
 * Loads the TLS material a secure channel needs. With client auth disabled
 * only the root certificate is read.
 */
export function loadCredentialMaterial(
	security: SecurityConfig,
): Result<CredentialMaterial, TransportConfigError> {
	const root = readCredential("rootCertificate", security.rootCertificate);
	if (!root.ok) return root;
	if (security.disableClientAuth) {
		return ok({ rootCertificate: root.value, certificate: null, privateKey: null });
	}
	const privateKey = readCredential("privateKey", security.privateKey);
	if (!privateKey.ok) return privateKey;
	const certificate = readCredential("certificate", security.certificate);
	if (!certificate.ok) return certificate;
	return ok({
		rootCertificate: root.value,
		certificate: certificate.value,
		privateKey: privateKey.value,
	});
}

export class GrpcChannelFactory implements ChannelFactory {
	private readonly telemetry: Telemetry;
	private readonly options: ChannelOptions;

	constructor(telemetry: Telemetry, options: ChannelOptions = DEFAULT_CHANNEL_OPTIONS) {
		this.telemetry = telemetry;
		this.options = options;
	}

	open(endpoint: Endpoint, security: SecurityConfig): Result<Channel, TransportConfigError> {
		const target = endpointTarget(endpoint);
		const channelCredentials = this.credentialsFor(target, security);
		if (!channelCredentials.ok) return channelCredentials;
		return ok(new GrpcChannel(target, channelCredentials.value, this.options));
	}

	private credentialsFor(
		target: string,
		security: SecurityConfig,
	): Result<ChannelCredentials, TransportConfigError> {
		if (!security.tls) {
			this.telemetry.logger.warn(
				{ target },
				"gRPC is running on insecure channel with TLS disabled.",
			);
			this.telemetry.events.emit("insecure-channel", { target });
			return ok(credentials.createInsecure());
		}

		if (security.disableClientAuth) {
			this.telemetry.logger.warn({ target }, "Client-side authentication is disabled.");
			this.telemetry.events.emit("client-auth-disabled", { target });
		}
		const material = loadCredentialMaterial(security);
		if (!material.ok) return material;

		try {
			return ok(
				credentials.createSsl(
					material.value.rootCertificate,
					material.value.privateKey,
					material.value.certificate,
				),
			);
		} catch (error) {
			return err(
				new TransportConfigError("TLS credential material was rejected", "certificate", {
					cause: error,
				}),
			);
		}
	}
}
