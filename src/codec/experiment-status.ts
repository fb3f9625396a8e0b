import type { GetExperimentStatusResponse } from "./messages.js";

export interface CollaboratorState {
	readonly label: string;
	readonly commonName: string;
	readonly state: string;
}

/** Administrative view of a running experiment. */
export interface ExperimentStatus {
	readonly experimentName: string;
	readonly status: string;
	readonly roundNumber: number;
	readonly totalRounds: number;
	readonly collaborators: readonly CollaboratorState[];
	/** Seconds the aggregator waits for stragglers; 0 when no cutoff is set */
	readonly stragglerCutoffSeconds: number;
}

/** Drops the routing header and copies the status payload into a plain record. */
export function experimentStatusFromProto(response: GetExperimentStatusResponse): ExperimentStatus {
	return {
		experimentName: response.experimentName,
		status: response.status,
		roundNumber: response.roundNumber,
		totalRounds: response.totalRounds,
		collaborators: response.collaborators.map((c) => ({
			label: c.label,
			commonName: c.commonName,
			state: c.state,
		})),
		stragglerCutoffSeconds: response.stragglerCutoffSeconds,
	};
}
