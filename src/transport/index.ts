export {
	type Channel,
	type CredentialSource,
	type Endpoint,
	type Identity,
	type SecurityConfig,
	type Telemetry,
	type TransportEvents,
	endpointTarget,
} from "./types.js";
export { createTelemetry } from "./telemetry.js";
export {
	type ChannelFactory,
	type CredentialMaterial,
	DEFAULT_CHANNEL_OPTIONS,
	GrpcChannelFactory,
	loadCredentialMaterial,
} from "./channel-factory.js";
export { GrpcChannel } from "./grpc-channel.js";
export {
	type BackoffDeps,
	type BackoffPolicy,
	ConstantBackoff,
	ExponentialBackoff,
	type ExponentialBackoffConfig,
} from "./backoff.js";
export {
	type CallInterceptor,
	DEFAULT_RETRY_POLICY,
	PassthroughInterceptor,
	RetryInterceptor,
	type RetryPolicy,
	type StreamInvoker,
	type UnaryInvoker,
} from "./retry-interceptor.js";
export {
	DEFAULT_RESEND_POLICY,
	type ResendContext,
	type ResendPolicy,
	resendOnReconnection,
} from "./resend.js";
export { ConnectionLifecycle } from "./connection-lifecycle.js";
export { type HeaderField, HeaderValidator } from "./header-validator.js";
