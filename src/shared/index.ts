export { type Result, ok, err, map, unwrap, isOk, isErr } from "./result.js";

export {
	ErrorCategory,
	FederationError,
	ConfigError,
	TransportConfigError,
	HeaderMismatchError,
	SystemError,
	RpcFailure,
	TransientTransportError,
	AuthenticationError,
	RpcError,
	UnhandledTransportError,
	type StatusCarrier,
	statusName,
	isStatusCarrier,
	rpcStatusOf,
	rpcDetailsOf,
	classifyRpcError,
	isAuthenticationError,
	isHeaderMismatch,
	isTransportConfigError,
	isUnhandledTransportError,
	isConfigError,
} from "./errors.js";

export { type Clock, type Sleep, SystemClock, FakeClock, Duration, realSleep } from "./time.js";
export { type EnvConfig, configFromEnv } from "./config.js";
