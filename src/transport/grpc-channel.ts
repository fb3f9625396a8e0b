/**
 * Channel implementation over a grpc-js `Client`.
 *
 * Service definitions come from proto-loader; responses are plain objects
 * and are validated into typed messages before they leave the channel. Both
 * the `Aggregator` and the `AggregatorAdmin` services are reached through
 * the same underlying connection.
 */

import {
	type ChannelCredentials,
	type ChannelOptions,
	Client,
	Metadata,
	type ServiceError,
} from "@grpc/grpc-js";
import type { MethodDefinition, ServiceDefinition } from "@grpc/proto-loader";
import {
	type AddCollaboratorRequest,
	type AdminAck,
	type ConnectivityCheckResponse,
	type DataStreamFrame,
	type GetAggregatedTensorRequest,
	type GetAggregatedTensorResponse,
	GetAggregatedTensorResponseSchema,
	type GetExperimentStatusResponse,
	GetExperimentStatusResponseSchema,
	type GetTasksResponse,
	GetTasksResponseSchema,
	type GetTrainedModelRequest,
	type GetTrainedModelResponse,
	GetTrainedModelResponseSchema,
	type HeadedRequest,
	HeadedResponseSchema,
	type RemoveCollaboratorRequest,
	type SendLocalTaskResultsResponse,
	type SetStragglerCutoffTimeRequest,
} from "../codec/messages.js";
import { serviceDefinition } from "../codec/schema.js";
import { validate, type z } from "../lib/validation/index.js";
import { SystemError } from "../shared/errors.js";
import type { Channel } from "./types.js";

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;
type WireMethod = MethodDefinition<object, object>;

function methodOf(service: ServiceDefinition, name: string): WireMethod {
	const method = service[name];
	if (method === undefined) {
		throw new SystemError(`RPC ${name} is missing from the aggregator schema`);
	}
	return method;
}

export class GrpcChannel implements Channel {
	readonly target: string;
	private readonly client: Client;
	private readonly aggregator: ServiceDefinition;
	private readonly admin: ServiceDefinition;
	private isClosed = false;

	constructor(target: string, credentials: ChannelCredentials, options: ChannelOptions = {}) {
		this.target = target;
		this.aggregator = serviceDefinition("Aggregator");
		this.admin = serviceDefinition("AggregatorAdmin");
		this.client = new Client(target, credentials, options);
	}

	get closed(): boolean {
		return this.isClosed;
	}

	getTasks(request: HeadedRequest): Promise<GetTasksResponse> {
		return this.unary(this.aggregator, "GetTasks", request, GetTasksResponseSchema);
	}

	getAggregatedTensor(request: GetAggregatedTensorRequest): Promise<GetAggregatedTensorResponse> {
		return this.unary(
			this.aggregator,
			"GetAggregatedTensor",
			request,
			GetAggregatedTensorResponseSchema,
		);
	}

	sendLocalTaskResults(frames: readonly DataStreamFrame[]): Promise<SendLocalTaskResultsResponse> {
		return this.clientStream(this.aggregator, "SendLocalTaskResults", frames, HeadedResponseSchema);
	}

	connectivityCheck(request: HeadedRequest): Promise<ConnectivityCheckResponse> {
		return this.unary(this.aggregator, "ConnectivityCheck", request, HeadedResponseSchema);
	}

	addCollaborator(request: AddCollaboratorRequest): Promise<AdminAck> {
		return this.unary(this.aggregator, "AddCollaborator", request, HeadedResponseSchema);
	}

	removeCollaborator(request: RemoveCollaboratorRequest): Promise<AdminAck> {
		return this.unary(this.aggregator, "RemoveCollaborator", request, HeadedResponseSchema);
	}

	getExperimentStatus(request: HeadedRequest): Promise<GetExperimentStatusResponse> {
		return this.unary(
			this.aggregator,
			"GetExperimentStatus",
			request,
			GetExperimentStatusResponseSchema,
		);
	}

	setStragglerCutoffTime(request: SetStragglerCutoffTimeRequest): Promise<AdminAck> {
		return this.unary(this.aggregator, "SetStragglerCutoffTime", request, HeadedResponseSchema);
	}

	getTrainedModel(request: GetTrainedModelRequest): Promise<GetTrainedModelResponse> {
		return this.unary(this.admin, "GetTrainedModel", request, GetTrainedModelResponseSchema);
	}

	close(): void {
		if (this.isClosed) return;
		this.isClosed = true;
		this.client.close();
	}

	private unary<Res>(
		service: ServiceDefinition,
		name: string,
		request: object,
		schema: Schema<Res>,
	): Promise<Res> {
		const method = methodOf(service, name);
		return new Promise<Res>((resolve, reject) => {
			this.client.makeUnaryRequest(
				method.path,
				method.requestSerialize,
				method.responseDeserialize,
				request,
				new Metadata(),
				(error: ServiceError | null, response?: object) => {
					settle(name, schema, error, response, resolve, reject);
				},
			);
		});
	}

	private clientStream<Res>(
		service: ServiceDefinition,
		name: string,
		frames: readonly object[],
		schema: Schema<Res>,
	): Promise<Res> {
		const method = methodOf(service, name);
		return new Promise<Res>((resolve, reject) => {
			const call = this.client.makeClientStreamRequest(
				method.path,
				method.requestSerialize,
				method.responseDeserialize,
				new Metadata(),
				(error: ServiceError | null, response?: object) => {
					settle(name, schema, error, response, resolve, reject);
				},
			);
			for (const frame of frames) {
				call.write(frame);
			}
			call.end();
		});
	}
}

function settle<Res>(
	name: string,
	schema: Schema<Res>,
	error: ServiceError | null,
	response: object | undefined,
	resolve: (value: Res) => void,
	reject: (reason: unknown) => void,
): void {
	if (error) {
		reject(error);
		return;
	}
	const decoded = validate(schema, response, `${name} response`);
	if (decoded.ok) {
		resolve(decoded.value);
	} else {
		reject(decoded.error);
	}
}
