/**
 * Operation-level resend.
 *
 * Sits above the retry interceptor and re-runs a whole operation body (stamp,
 * call, validate) when the aggregator answers with a status that signals the
 * request was lost across a reconnection. Authentication failures always
 * propagate.
 */

import { status } from "@grpc/grpc-js";
import { rpcStatusOf, statusName } from "../shared/errors.js";
import type { Telemetry } from "./types.js";

export interface ResendPolicy {
	readonly statuses: readonly number[];
	/** Total runs including the first; unbounded when unset */
	readonly maxAttempts?: number | undefined;
}

export const DEFAULT_RESEND_POLICY: ResendPolicy = {
	statuses: [status.UNKNOWN],
};

export interface ResendContext {
	readonly policy: ResendPolicy;
	readonly target: string;
	readonly telemetry: Telemetry;
}

export async function resendOnReconnection<T>(
	operation: string,
	body: () => Promise<T>,
	context: ResendContext,
): Promise<T> {
	const { policy, target, telemetry } = context;
	for (let attempt = 1; ; attempt++) {
		try {
			return await body();
		} catch (error) {
			const code = rpcStatusOf(error);
			if (
				code === undefined ||
				code === status.UNAUTHENTICATED ||
				!policy.statuses.includes(code) ||
				(policy.maxAttempts !== undefined && attempt >= policy.maxAttempts)
			) {
				throw error;
			}
			telemetry.logger.info(
				{ operation, status: statusName(code), attempt },
				`Attempting to resend data request to aggregator at ${target}`,
			);
			telemetry.events.emit("resend", { operation, code, attempt });
		}
	}
}
