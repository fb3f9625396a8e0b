/**
 * Transport-layer types: where the aggregator lives, how to secure the
 * channel, who the parties are, and the shape of an open channel.
 */

import type { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import type {
	AddCollaboratorRequest,
	AdminAck,
	ConnectivityCheckResponse,
	DataStreamFrame,
	GetAggregatedTensorRequest,
	GetAggregatedTensorResponse,
	GetExperimentStatusResponse,
	GetTasksResponse,
	GetTrainedModelRequest,
	GetTrainedModelResponse,
	HeadedRequest,
	RemoveCollaboratorRequest,
	SendLocalTaskResultsResponse,
	SetStragglerCutoffTimeRequest,
} from "../codec/messages.js";

// ── Addressing & security ────────────────────────────────────────────

export interface Endpoint {
	readonly host: string;
	readonly port: number;
}

/** Renders an endpoint as the `host:port` target gRPC dials; IPv6 literals get brackets. */
export function endpointTarget(endpoint: Endpoint): string {
	const { host, port } = endpoint;
	if (host.includes(":") && !host.startsWith("[")) return `[${host}]:${port}`;
	return `${host}:${port}`;
}

/** Credential material, either a file read at channel-open time or inline bytes. */
export type CredentialSource = { readonly path: string } | { readonly bytes: Uint8Array };

export interface SecurityConfig {
	/** TLS on (mutual unless `disableClientAuth`) or plaintext */
	readonly tls: boolean;
	/** Server-auth-only TLS: the client presents no certificate */
	readonly disableClientAuth: boolean;
	readonly rootCertificate?: CredentialSource | undefined;
	readonly certificate?: CredentialSource | undefined;
	readonly privateKey?: CredentialSource | undefined;
}

/** Identities every headed message is stamped with and checked against. */
export interface Identity {
	readonly aggregatorUuid: string;
	readonly federationUuid: string;
	/** Common name shared by every collaborator certificate, when the federation uses one */
	readonly singleColCertCommonName?: string | undefined;
}

// ── Observability ────────────────────────────────────────────────────

/** Events a client emits; payloads are plain data. */
export interface TransportEvents {
	"insecure-channel": { readonly target: string };
	"client-auth-disabled": { readonly target: string };
	"reconnect-attempt": { readonly target: string; readonly delayMs: number };
	retry: { readonly method: string; readonly code: number; readonly attempt: number };
	resend: { readonly operation: string; readonly code: number; readonly attempt: number };
	connect: { readonly target: string };
	disconnect: { readonly target: string };
	"header-mismatch": { readonly field: string; readonly expected: string; readonly actual: string };
	fatal: { readonly operation: string; readonly code: number; readonly details: string };
}

/** Logger plus event sink, scoped to one client instance. */
export interface Telemetry {
	readonly logger: Logger;
	readonly events: TypedEmitter<TransportEvents>;
}

// ── Channel ──────────────────────────────────────────────────────────

/**
 * An open transport handle bound to one endpoint and security posture.
 *
 * Method names mirror the RPCs of the `Aggregator` and `AggregatorAdmin`
 * services. Every call rejects with the transport's raw failure; retry and
 * classification happen above the channel.
 */
export interface Channel {
	readonly target: string;
	readonly closed: boolean;
	getTasks(request: HeadedRequest): Promise<GetTasksResponse>;
	getAggregatedTensor(request: GetAggregatedTensorRequest): Promise<GetAggregatedTensorResponse>;
	sendLocalTaskResults(frames: readonly DataStreamFrame[]): Promise<SendLocalTaskResultsResponse>;
	connectivityCheck(request: HeadedRequest): Promise<ConnectivityCheckResponse>;
	addCollaborator(request: AddCollaboratorRequest): Promise<AdminAck>;
	removeCollaborator(request: RemoveCollaboratorRequest): Promise<AdminAck>;
	getExperimentStatus(request: HeadedRequest): Promise<GetExperimentStatusResponse>;
	setStragglerCutoffTime(request: SetStragglerCutoffTimeRequest): Promise<AdminAck>;
	getTrainedModel(request: GetTrainedModelRequest): Promise<GetTrainedModelResponse>;
	/** Idempotent: the underlying transport is released on the first call only. */
	close(): void;
}
