/**
 * Wire message shapes of `proto/aggregator.proto`, in the camelCase form
 * proto-loader produces, with Zod schemas for every message decoded off
 * the wire.
 */

import { z } from "../lib/validation/index.js";

// ── Shared pieces ────────────────────────────────────────────────────

export interface MessageHeader {
	readonly sender: string;
	readonly receiver: string;
	readonly federationUuid: string;
	readonly singleColCertCommonName: string;
}

export const EMPTY_HEADER: MessageHeader = {
	sender: "",
	receiver: "",
	federationUuid: "",
	singleColCertCommonName: "",
};

export interface HeadedRequest {
	readonly header: MessageHeader;
}

export interface MetadataProto {
	readonly intToFloat: Readonly<Record<string, number>>;
	readonly intList: readonly number[];
	readonly boolList: readonly boolean[];
}

export interface NamedTensor {
	readonly name: string;
	readonly roundNumber: number;
	readonly lossless: boolean;
	readonly report: boolean;
	readonly tags: readonly string[];
	readonly transformerMetadata: readonly MetadataProto[];
	readonly dataBytes: Uint8Array;
}

/** One frame of a client-streamed payload. */
export interface DataStreamFrame {
	readonly npbytes: Uint8Array;
	readonly size: number;
}

// ── Requests ─────────────────────────────────────────────────────────

export interface GetAggregatedTensorRequest extends HeadedRequest {
	readonly tensorName: string;
	readonly roundNumber: number;
	readonly report: boolean;
	readonly tags: readonly string[];
	readonly requireLossless: boolean;
}

/** Logical request carried by the `SendLocalTaskResults` frame stream. */
export interface TaskResults extends HeadedRequest {
	readonly roundNumber: number;
	readonly taskName: string;
	readonly dataSize: number;
	readonly tensors: readonly NamedTensor[];
}

export interface AddCollaboratorRequest extends HeadedRequest {
	readonly collaboratorLabel: string;
	readonly collaboratorCn: string;
}

export type RemoveCollaboratorRequest = AddCollaboratorRequest;

export interface SetStragglerCutoffTimeRequest extends HeadedRequest {
	readonly timeoutInSeconds: number;
}

export type ModelTypeName = "BEST_MODEL" | "LAST_MODEL";

export interface GetTrainedModelRequest {
	readonly experimentName: string;
	readonly modelType: ModelTypeName;
}

// ── Responses ────────────────────────────────────────────────────────

export interface GetTasksResponse extends HeadedRequest {
	readonly roundNumber: number;
	readonly tasks: readonly string[];
	readonly sleepTime: number;
	readonly quit: boolean;
}

export interface GetAggregatedTensorResponse extends HeadedRequest {
	readonly roundNumber: number;
	readonly tensor: NamedTensor;
}

export type SendLocalTaskResultsResponse = HeadedRequest;
export type ConnectivityCheckResponse = HeadedRequest;
/** Header-only acknowledgement of an administrative call. */
export type AdminAck = HeadedRequest;

export interface CollaboratorStatusProto {
	readonly label: string;
	readonly commonName: string;
	readonly state: string;
}

export interface GetExperimentStatusResponse extends HeadedRequest {
	readonly experimentName: string;
	readonly status: string;
	readonly roundNumber: number;
	readonly totalRounds: number;
	readonly collaborators: readonly CollaboratorStatusProto[];
	readonly stragglerCutoffSeconds: number;
}

export interface ModelProto {
	readonly tensors: readonly NamedTensor[];
}

export interface GetTrainedModelResponse {
	readonly modelProto: ModelProto;
}

// ── Schemas ──────────────────────────────────────────────────────────

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/** An unset message field decodes as `null`; it is read as an all-empty header. */
export const MessageHeaderSchema: Schema<MessageHeader> = z
	.object({
		sender: z.string(),
		receiver: z.string(),
		federationUuid: z.string(),
		singleColCertCommonName: z.string(),
	})
	.nullish()
	.transform((header) => header ?? EMPTY_HEADER);

const headed = { header: MessageHeaderSchema };

const BytesSchema = z.instanceof(Uint8Array);

const MetadataProtoSchema: Schema<MetadataProto> = z.object({
	intToFloat: z.record(z.number()),
	intList: z.array(z.number().int()),
	boolList: z.array(z.boolean()),
});

export const NamedTensorSchema: Schema<NamedTensor> = z.object({
	name: z.string(),
	roundNumber: z.number().int(),
	lossless: z.boolean(),
	report: z.boolean(),
	tags: z.array(z.string()),
	transformerMetadata: z.array(MetadataProtoSchema),
	dataBytes: BytesSchema,
});

export const HeadedResponseSchema: Schema<HeadedRequest> = z.object(headed);

export const GetTasksResponseSchema: Schema<GetTasksResponse> = z.object({
	...headed,
	roundNumber: z.number().int(),
	tasks: z.array(z.string()),
	sleepTime: z.number().int(),
	quit: z.boolean(),
});

export const GetAggregatedTensorResponseSchema: Schema<GetAggregatedTensorResponse> = z.object({
	...headed,
	roundNumber: z.number().int(),
	tensor: NamedTensorSchema,
});

export const GetExperimentStatusResponseSchema: Schema<GetExperimentStatusResponse> = z.object({
	...headed,
	experimentName: z.string(),
	status: z.string(),
	roundNumber: z.number().int(),
	totalRounds: z.number().int(),
	collaborators: z.array(
		z.object({ label: z.string(), commonName: z.string(), state: z.string() }),
	),
	stragglerCutoffSeconds: z.number().int(),
});

export const GetTrainedModelResponseSchema: Schema<GetTrainedModelResponse> = z.object({
	modelProto: z
		.object({ tensors: z.array(NamedTensorSchema) })
		.nullish()
		.transform((model) => model ?? { tensors: [] }),
});
