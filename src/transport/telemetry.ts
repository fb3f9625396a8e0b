import { TypedEmitter } from "../lib/events/index.js";
import { type Logger, createSilentLogger } from "../lib/logger/index.js";
import type { Telemetry, TransportEvents } from "./types.js";

/** Builds the per-client logger and event sink; the logger is silent unless one is injected. */
export function createTelemetry(logger: Logger = createSilentLogger()): Telemetry {
	return { logger, events: new TypedEmitter<TransportEvents>() };
}
