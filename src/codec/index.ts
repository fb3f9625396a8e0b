export * from "./messages.js";
export {
	DEFAULT_MAX_FRAME_BYTES,
	fromDataStream,
	taskResultsFromDataStream,
	taskResultsToDataStream,
	toDataStream,
} from "./datastream.js";
export {
	type ModelCodec,
	NoCompressionCodec,
	deconstructModel,
	float32ToBytes,
} from "./model-codec.js";
export {
	type CollaboratorState,
	type ExperimentStatus,
	experimentStatusFromProto,
} from "./experiment-status.js";
export {
	type AggregatorServiceName,
	PROTO_PACKAGE,
	PROTO_PATH,
	aggregatorPackageDefinition,
	serviceDefinition,
} from "./schema.js";
