// ── Client ───────────────────────────────────────────────────────────
export {
	AggregatorClient,
	type AggregatorClientDeps,
	type TasksAssignment,
	type TrainedModelKind,
	type AggregatorClientConfig,
	AggregatorClientConfigSchema,
	type ClientSettings,
	type ClientSettingsInput,
	DEFAULT_CLIENT_SETTINGS,
	clientConfigFromEnv,
	parseClientConfig,
	resolveSettings,
	exitOnTerminalFailure,
} from "./client/index.js";

// ── Transport ────────────────────────────────────────────────────────
export {
	type Channel,
	type CredentialSource,
	type Endpoint,
	type Identity,
	type SecurityConfig,
	type Telemetry,
	type TransportEvents,
	endpointTarget,
	createTelemetry,
	type ChannelFactory,
	type CredentialMaterial,
	DEFAULT_CHANNEL_OPTIONS,
	GrpcChannelFactory,
	loadCredentialMaterial,
	GrpcChannel,
	type BackoffDeps,
	type BackoffPolicy,
	ConstantBackoff,
	ExponentialBackoff,
	type ExponentialBackoffConfig,
	type CallInterceptor,
	DEFAULT_RETRY_POLICY,
	PassthroughInterceptor,
	RetryInterceptor,
	type RetryPolicy,
	DEFAULT_RESEND_POLICY,
	type ResendPolicy,
	resendOnReconnection,
	ConnectionLifecycle,
	type HeaderField,
	HeaderValidator,
} from "./transport/index.js";

// ── Codec ────────────────────────────────────────────────────────────
export {
	type MessageHeader,
	type NamedTensor,
	type DataStreamFrame,
	type TaskResults,
	type ModelProto,
	EMPTY_HEADER,
	DEFAULT_MAX_FRAME_BYTES,
	toDataStream,
	fromDataStream,
	taskResultsToDataStream,
	taskResultsFromDataStream,
	type ModelCodec,
	NoCompressionCodec,
	deconstructModel,
	float32ToBytes,
	type ExperimentStatus,
	type CollaboratorState,
	PROTO_PATH,
	serviceDefinition,
} from "./codec/index.js";

// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	map,
	unwrap,
	isOk,
	isErr,
	ErrorCategory,
	FederationError,
	ConfigError,
	TransportConfigError,
	HeaderMismatchError,
	SystemError,
	TransientTransportError,
	AuthenticationError,
	RpcError,
	UnhandledTransportError,
	classifyRpcError,
	statusName,
	isAuthenticationError,
	isHeaderMismatch,
	isTransportConfigError,
	isUnhandledTransportError,
	isConfigError,
	type Clock,
	type Sleep,
	SystemClock,
	FakeClock,
	Duration,
	type EnvConfig,
	configFromEnv,
} from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LogLevel, createLogger, createSilentLogger } from "./lib/logger/index.js";
export { ValidationError, type ValidationIssue } from "./lib/validation/index.js";
export { TypedEmitter } from "./lib/events/index.js";
