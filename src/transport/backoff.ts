/**
 * Backoff policies paced between retry attempts.
 *
 * Every policy announces the reconnect attempt (log + `reconnect-attempt`
 * event naming the target) before it sleeps.
 */

import { ConfigError } from "../shared/errors.js";
import { type Sleep, realSleep } from "../shared/time.js";
import type { Telemetry } from "./types.js";

export interface BackoffPolicy {
	/** Pauses before the next attempt. */
	wait(): Promise<void>;
	/** Forgets attempt history after a successful call. */
	reset(): void;
}

export interface BackoffDeps {
	readonly target: string;
	readonly telemetry: Telemetry;
	readonly sleep?: Sleep;
}

abstract class AnnouncingBackoff implements BackoffPolicy {
	private readonly target: string;
	private readonly telemetry: Telemetry;
	private readonly sleep: Sleep;

	protected constructor(deps: BackoffDeps) {
		this.target = deps.target;
		this.telemetry = deps.telemetry;
		this.sleep = deps.sleep ?? realSleep;
	}

	protected abstract nextDelay(): number;

	abstract reset(): void;

	async wait(): Promise<void> {
		const delayMs = this.nextDelay();
		this.telemetry.logger.info(
			{ target: this.target, delayMs },
			`Attempting to connect to aggregator at ${this.target}`,
		);
		this.telemetry.events.emit("reconnect-attempt", { target: this.target, delayMs });
		await this.sleep(delayMs);
	}
}

/** Sleeps the same interval before every attempt. */
export class ConstantBackoff extends AnnouncingBackoff {
	private readonly intervalMs: number;

	constructor(intervalMs: number, deps: BackoffDeps) {
		super(deps);
		if (!Number.isFinite(intervalMs) || intervalMs < 0) {
			throw new ConfigError("reconnect interval must be >= 0", { intervalMs });
		}
		this.intervalMs = intervalMs;
	}

	protected nextDelay(): number {
		return this.intervalMs;
	}

	reset(): void {}
}

export interface ExponentialBackoffConfig {
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	/** Fraction of the delay randomly added or removed; 0 disables jitter */
	readonly jitterFactor: number;
}

/** Doubles the delay per attempt up to a cap, with optional symmetric jitter. */
export class ExponentialBackoff extends AnnouncingBackoff {
	private readonly config: ExponentialBackoffConfig;
	private readonly random: () => number;
	private attempts = 0;

	constructor(config: ExponentialBackoffConfig, deps: BackoffDeps & { random?: () => number }) {
		super(deps);
		if (config.baseDelayMs < 0 || config.maxDelayMs < config.baseDelayMs) {
			throw new ConfigError("backoff delays must satisfy 0 <= base <= max", { ...config });
		}
		if (config.jitterFactor < 0 || config.jitterFactor > 1) {
			throw new ConfigError("jitterFactor must be within [0, 1]", { ...config });
		}
		this.config = config;
		this.random = deps.random ?? Math.random;
	}

	protected nextDelay(): number {
		const raw = this.config.baseDelayMs * 2 ** this.attempts;
		const capped = Math.min(raw, this.config.maxDelayMs);
		// Stop counting at the cap, and for a zero base, so 2 ** attempts stays finite.
		if (raw < this.config.maxDelayMs && this.config.baseDelayMs > 0) this.attempts += 1;
		if (this.config.jitterFactor === 0) return capped;
		const jitter = capped * this.config.jitterFactor * (this.random() * 2 - 1);
		return Math.max(0, Math.round(capped + jitter));
	}

	reset(): void {
		this.attempts = 0;
	}
}
