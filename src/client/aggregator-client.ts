/**
 * AggregatorClient — the collaborator's and the administrator's view of the
 * aggregator, behind Result error handling.
 *
 * Worker operations (tasks, tensors, results) ride out transient failures:
 * the retry interceptor resends the call, and the resend layer re-runs the
 * whole operation when the aggregator lost the request across a reconnect.
 * Interactive operations (connectivity check and administration) never
 * retry; a transport failure comes back as UnhandledTransportError and the
 * embedding application decides whether to stop.
 */

import { taskResultsToDataStream } from "../codec/datastream.js";
import { type ExperimentStatus, experimentStatusFromProto } from "../codec/experiment-status.js";
import type { MessageHeader, ModelTypeName, NamedTensor } from "../codec/messages.js";
import { type ModelCodec, NoCompressionCodec, deconstructModel } from "../codec/model-codec.js";
import type { TypedEmitter } from "../lib/events/index.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import {
	type FederationError,
	type TransportConfigError,
	UnhandledTransportError,
	classifyRpcError,
	rpcDetailsOf,
	rpcStatusOf,
	statusName,
} from "../shared/errors.js";
import { type Result, map, ok, unwrap } from "../shared/result.js";
import { type Clock, type Sleep, SystemClock } from "../shared/time.js";
import { type BackoffDeps, type BackoffPolicy, ConstantBackoff } from "../transport/backoff.js";
import { type ChannelFactory, GrpcChannelFactory } from "../transport/channel-factory.js";
import { ConnectionLifecycle } from "../transport/connection-lifecycle.js";
import { HeaderValidator } from "../transport/header-validator.js";
import { type ResendContext, resendOnReconnection } from "../transport/resend.js";
import {
	type CallInterceptor,
	PassthroughInterceptor,
	RetryInterceptor,
} from "../transport/retry-interceptor.js";
import { createTelemetry } from "../transport/telemetry.js";
import {
	type Channel,
	type Telemetry,
	type TransportEvents,
	endpointTarget,
} from "../transport/types.js";
import {
	type AggregatorClientConfig,
	type ClientSettings,
	parseClientConfig,
	resolveSettings,
} from "./config.js";

/** Work the aggregator assigns a collaborator for the current round. */
export interface TasksAssignment {
	readonly tasks: readonly string[];
	readonly roundNumber: number;
	/** Seconds to wait before asking again when no tasks are ready */
	readonly sleepTime: number;
	readonly quit: boolean;
}

export type TrainedModelKind = "best" | "last";

const MODEL_TYPES: Record<TrainedModelKind, ModelTypeName> = {
	best: "BEST_MODEL",
	last: "LAST_MODEL",
};

/** Collaborators the client is built from; every one has a production default. */
export interface AggregatorClientDeps {
	readonly logger?: Logger;
	readonly channelFactory?: ChannelFactory;
	/** Builds the policy paced between retries; constant backoff when unset */
	readonly backoff?: (deps: BackoffDeps) => BackoffPolicy;
	readonly codec?: ModelCodec;
	readonly clock?: Clock;
	readonly sleep?: Sleep;
}

export class AggregatorClient {
	readonly target: string;
	private readonly telemetry: Telemetry;
	private readonly lifecycle: ConnectionLifecycle;
	private readonly headers: HeaderValidator;
	private readonly retrying: CallInterceptor;
	private readonly direct: CallInterceptor;
	private readonly resend: ResendContext;
	private readonly settings: ClientSettings;
	private readonly codec: ModelCodec;

	private constructor(
		target: string,
		telemetry: Telemetry,
		lifecycle: ConnectionLifecycle,
		headers: HeaderValidator,
		retrying: CallInterceptor,
		direct: CallInterceptor,
		settings: ClientSettings,
		codec: ModelCodec,
	) {
		this.target = target;
		this.telemetry = telemetry;
		this.lifecycle = lifecycle;
		this.headers = headers;
		this.retrying = retrying;
		this.direct = direct;
		this.settings = settings;
		this.codec = codec;
		this.resend = { policy: settings.resend, target, telemetry };
	}

	/**
	 * Validates the configuration and opens the initial channel.
	 * @returns Result containing the client, or a ValidationError / TransportConfigError
	 */
	static create(
		config: AggregatorClientConfig,
		deps: AggregatorClientDeps = {},
	): Result<AggregatorClient, FederationError> {
		const parsed = parseClientConfig(config);
		if (!parsed.ok) return parsed;
		const { endpoint, security, identity } = parsed.value;
		const settings = resolveSettings(parsed.value.settings);
		const target = endpointTarget(endpoint);

		const logger = deps.logger ?? createLogger({ level: parsed.value.logLevel ?? "info" });
		const telemetry = createTelemetry(logger.child({ component: "aggregator-client", target }));

		const factory = deps.channelFactory ?? new GrpcChannelFactory(telemetry);
		const lifecycle = ConnectionLifecycle.open(endpoint, security, factory, telemetry);
		if (!lifecycle.ok) return lifecycle;

		const backoffDeps: BackoffDeps = {
			target,
			telemetry,
			...(deps.sleep !== undefined && { sleep: deps.sleep }),
		};
		const backoff =
			deps.backoff?.(backoffDeps) ?? new ConstantBackoff(settings.reconnectIntervalMs, backoffDeps);
		const retrying = new RetryInterceptor(
			settings.retry,
			backoff,
			telemetry,
			deps.clock ?? SystemClock,
		);

		return ok(
			new AggregatorClient(
				target,
				telemetry,
				lifecycle.value,
				new HeaderValidator(identity, telemetry),
				retrying,
				PassthroughInterceptor,
				settings,
				deps.codec ?? NoCompressionCodec,
			),
		);
	}

	/** Observability events of this client instance. */
	get events(): TypedEmitter<TransportEvents> {
		return this.telemetry.events;
	}

	// ── Worker operations ──────────────────────────────────────────────

	/**
	 * Asks the aggregator which tasks `collaboratorName` should run next.
	 * @param collaboratorName - Caller identity stamped into the request header
	 */
	getTasks(collaboratorName: string): Promise<Result<TasksAssignment, FederationError>> {
		return this.worker("GetTasks", async (channel) => {
			const response = await this.retrying.interceptUnary(
				"GetTasks",
				{ header: this.headers.stamp(collaboratorName) },
				(request) => channel.getTasks(request),
			);
			this.checkHeader(response.header, collaboratorName);
			return {
				tasks: response.tasks,
				roundNumber: response.roundNumber,
				sleepTime: response.sleepTime,
				quit: response.quit,
			};
		});
	}

	/**
	 * Fetches one aggregated tensor.
	 * @param tags - Tags identifying the tensor alongside its name and round
	 * @param requireLossless - Ask for the tensor without lossy compression
	 */
	getAggregatedTensor(
		collaboratorName: string,
		tensorName: string,
		roundNumber: number,
		report: boolean,
		tags: readonly string[],
		requireLossless: boolean,
	): Promise<Result<NamedTensor, FederationError>> {
		return this.worker("GetAggregatedTensor", async (channel) => {
			const response = await this.retrying.interceptUnary(
				"GetAggregatedTensor",
				{
					header: this.headers.stamp(collaboratorName),
					tensorName,
					roundNumber,
					report,
					tags,
					requireLossless,
				},
				(request) => channel.getAggregatedTensor(request),
			);
			this.checkHeader(response.header, collaboratorName);
			return response.tensor;
		});
	}

	/**
	 * Streams the results of a finished task, split into frames of at most
	 * `maxFrameBytes`. Every attempt resends the complete frame list.
	 * @param dataSize - Number of training samples behind the results
	 */
	sendLocalTaskResults(
		collaboratorName: string,
		roundNumber: number,
		taskName: string,
		dataSize: number,
		namedTensors: readonly NamedTensor[],
	): Promise<Result<void, FederationError>> {
		return this.worker("SendLocalTaskResults", async (channel) => {
			const frames = taskResultsToDataStream(
				{
					header: this.headers.stamp(collaboratorName),
					roundNumber,
					taskName,
					dataSize,
					tensors: namedTensors,
				},
				this.settings.maxFrameBytes,
			);
			this.telemetry.logger.debug(
				{ taskName, roundNumber, frames: frames.length },
				"Streaming task results",
			);
			const response = await this.retrying.interceptStream(
				"SendLocalTaskResults",
				frames,
				(stream) => channel.sendLocalTaskResults(stream),
			);
			this.checkHeader(response.header, collaboratorName);
		});
	}

	// ── Interactive operations ─────────────────────────────────────────

	/** Confirms the aggregator is reachable and accepts this collaborator's identity. */
	connectivityCheck(collaboratorName: string): Promise<Result<void, FederationError>> {
		return this.terminal("ConnectivityCheck", async (channel) => {
			const response = await this.direct.interceptUnary(
				"ConnectivityCheck",
				{ header: this.headers.stamp(collaboratorName) },
				(request) => channel.connectivityCheck(request),
			);
			this.checkHeader(response.header, collaboratorName);
		});
	}

	/** Admits a collaborator to the running experiment. */
	addCollaborator(
		adminName: string,
		label: string,
		commonName: string,
	): Promise<Result<void, FederationError>> {
		return this.terminal("AddCollaborator", async (channel) => {
			const response = await this.direct.interceptUnary(
				"AddCollaborator",
				{
					header: this.headers.stamp(adminName),
					collaboratorLabel: label,
					collaboratorCn: commonName,
				},
				(request) => channel.addCollaborator(request),
			);
			this.checkHeader(response.header, adminName);
		});
	}

	/** Evicts a collaborator from the running experiment. */
	removeCollaborator(
		adminName: string,
		label: string,
		commonName: string,
	): Promise<Result<void, FederationError>> {
		return this.terminal("RemoveCollaborator", async (channel) => {
			const response = await this.direct.interceptUnary(
				"RemoveCollaborator",
				{
					header: this.headers.stamp(adminName),
					collaboratorLabel: label,
					collaboratorCn: commonName,
				},
				(request) => channel.removeCollaborator(request),
			);
			this.checkHeader(response.header, adminName);
		});
	}

	getExperimentStatus(adminName: string): Promise<Result<ExperimentStatus, FederationError>> {
		return this.terminal("GetExperimentStatus", async (channel) => {
			const response = await this.direct.interceptUnary(
				"GetExperimentStatus",
				{ header: this.headers.stamp(adminName) },
				(request) => channel.getExperimentStatus(request),
			);
			this.checkHeader(response.header, adminName);
			return experimentStatusFromProto(response);
		});
	}

	/** Sets how long the aggregator waits for slow collaborators before closing a round. */
	setStragglerCutoffTime(
		adminName: string,
		timeoutInSeconds: number,
	): Promise<Result<void, FederationError>> {
		return this.terminal("SetStragglerCutoffTime", async (channel) => {
			const response = await this.direct.interceptUnary(
				"SetStragglerCutoffTime",
				{ header: this.headers.stamp(adminName), timeoutInSeconds },
				(request) => channel.setStragglerCutoffTime(request),
			);
			this.checkHeader(response.header, adminName);
		});
	}

	/**
	 * Downloads a trained model from the admin service and decodes every tensor
	 * with the configured codec. Unheaded and never retried.
	 */
	getTrainedModel(
		experimentName: string,
		modelType: TrainedModelKind,
	): Promise<Result<Record<string, Float32Array>, FederationError>> {
		return this.lifecycle.run(
			async (channel) => {
				const response = await this.direct.interceptUnary(
					"GetTrainedModel",
					{ experimentName, modelType: MODEL_TYPES[modelType] },
					(request) => channel.getTrainedModel(request),
				);
				return unwrap(deconstructModel(response.modelProto, this.codec));
			},
			(error) => classifyRpcError(error, this.settings.retry.statuses),
		);
	}

	// ── Channel control ────────────────────────────────────────────────

	/** Replaces the current channel with a fresh one. */
	reconnect(): Result<void, TransportConfigError> {
		return map(this.lifecycle.reconnect(), () => undefined);
	}

	/** Releases the current channel. The client can still be used afterwards. */
	close(): void {
		this.lifecycle.disconnect();
	}

	// ── Paths ──────────────────────────────────────────────────────────

	private worker<T>(
		operation: string,
		body: (channel: Channel) => Promise<T>,
	): Promise<Result<T, FederationError>> {
		return this.lifecycle.run(
			(channel) => resendOnReconnection(operation, () => body(channel), this.resend),
			(error) => classifyRpcError(error, this.settings.retry.statuses),
		);
	}

	private terminal<T>(
		operation: string,
		body: (channel: Channel) => Promise<T>,
	): Promise<Result<T, FederationError>> {
		return this.lifecycle.run(body, (error) => this.escalate(operation, error));
	}

	private escalate(operation: string, error: unknown): FederationError {
		const code = rpcStatusOf(error);
		if (code === undefined) return classifyRpcError(error);
		const details = rpcDetailsOf(error);
		this.telemetry.logger.error(
			{ operation, status: statusName(code), details },
			`gRPC Error: ${statusName(code)}. Details: ${details}`,
		);
		this.telemetry.events.emit("fatal", { operation, code, details });
		return new UnhandledTransportError(operation, code, details, { cause: error });
	}

	private checkHeader(header: MessageHeader, caller: string): void {
		unwrap(this.headers.validate(header, caller));
	}
}
