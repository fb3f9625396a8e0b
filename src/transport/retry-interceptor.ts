/**
 * Call interceptors: one interface, two capability variants.
 *
 * `interceptUnary` carries a single request; `interceptStream` carries the
 * complete frame list of a client-streamed call, which is resent in full on
 * every attempt. Both route through the same retry loop.
 */

import { status } from "@grpc/grpc-js";
import { rpcStatusOf, statusName } from "../shared/errors.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { BackoffPolicy } from "./backoff.js";
import type { Telemetry } from "./types.js";

export type UnaryInvoker<Req, Res> = (request: Req) => Promise<Res>;
export type StreamInvoker<Frame, Res> = (frames: readonly Frame[]) => Promise<Res>;

export interface CallInterceptor {
	interceptUnary<Req, Res>(method: string, request: Req, invoke: UnaryInvoker<Req, Res>): Promise<Res>;
	interceptStream<Frame, Res>(
		method: string,
		frames: readonly Frame[],
		invoke: StreamInvoker<Frame, Res>,
	): Promise<Res>;
}

export interface RetryPolicy {
	/** gRPC status codes worth another attempt; empty means every status except UNAUTHENTICATED */
	readonly statuses: readonly number[];
	/** Total attempts including the first; unbounded when unset */
	readonly maxAttempts?: number | undefined;
	/** Stop retrying once this much time has passed since the first attempt; unbounded when unset */
	readonly deadlineMs?: number | undefined;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
	statuses: [status.UNAVAILABLE],
};

/**
 * Forwards every call once, without logging or retrying. The client routes
 * its interactive operations and getTrainedModel through it.
 */
export const PassthroughInterceptor: CallInterceptor = {
	interceptUnary: (_method, request, invoke) => invoke(request),
	interceptStream: (_method, frames, invoke) => invoke(frames),
};

/** Resends calls that fail with a retryable status, pacing attempts with a backoff policy. */
export class RetryInterceptor implements CallInterceptor {
	private readonly policy: RetryPolicy;
	private readonly backoff: BackoffPolicy;
	private readonly telemetry: Telemetry;
	private readonly clock: Clock;

	constructor(
		policy: RetryPolicy,
		backoff: BackoffPolicy,
		telemetry: Telemetry,
		clock: Clock = SystemClock,
	) {
		this.policy = policy;
		this.backoff = backoff;
		this.telemetry = telemetry;
		this.clock = clock;
	}

	interceptUnary<Req, Res>(method: string, request: Req, invoke: UnaryInvoker<Req, Res>): Promise<Res> {
		return this.intercept(method, () => invoke(request));
	}

	interceptStream<Frame, Res>(
		method: string,
		frames: readonly Frame[],
		invoke: StreamInvoker<Frame, Res>,
	): Promise<Res> {
		return this.intercept(method, () => invoke(frames));
	}

	/** Whether a failure with `code` earns another attempt under this policy. */
	isRetryable(code: number): boolean {
		if (code === status.UNAUTHENTICATED) return false;
		return this.policy.statuses.length === 0 || this.policy.statuses.includes(code);
	}

	private async intercept<Res>(method: string, attemptCall: () => Promise<Res>): Promise<Res> {
		const startedAt = this.clock.now();
		for (let attempt = 1; ; attempt++) {
			try {
				const response = await attemptCall();
				this.backoff.reset();
				return response;
			} catch (error) {
				const code = rpcStatusOf(error);
				if (code === undefined) throw error;

				this.telemetry.logger.info(
					{ method, status: statusName(code), attempt },
					`Response code: ${statusName(code)}`,
				);
				if (!this.isRetryable(code) || this.exhausted(attempt, startedAt)) throw error;

				this.telemetry.events.emit("retry", { method, code, attempt });
				await this.backoff.wait();
			}
		}
	}

	private exhausted(attempt: number, startedAt: number): boolean {
		const { maxAttempts, deadlineMs } = this.policy;
		if (maxAttempts !== undefined && attempt >= maxAttempts) return true;
		return deadlineMs !== undefined && this.clock.now() - startedAt >= deadlineMs;
	}
}
