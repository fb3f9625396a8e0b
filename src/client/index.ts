export {
	AggregatorClient,
	type AggregatorClientDeps,
	type TasksAssignment,
	type TrainedModelKind,
} from "./aggregator-client.js";
export {
	type AggregatorClientConfig,
	AggregatorClientConfigSchema,
	type ClientSettings,
	type ClientSettingsInput,
	DEFAULT_CLIENT_SETTINGS,
	clientConfigFromEnv,
	parseClientConfig,
	resolveSettings,
} from "./config.js";
export { exitOnTerminalFailure } from "./exit.js";
