/**
 * ConnectionLifecycle — one fresh channel per logical operation.
 *
 * `run` serializes operations on a client instance, replaces the channel on
 * entry, and closes it on exit whatever the outcome. It is also the boundary
 * where thrown failures become `Result` values.
 */

import type { FederationError, TransportConfigError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { ChannelFactory } from "./channel-factory.js";
import {
	type Channel,
	type Endpoint,
	type SecurityConfig,
	type Telemetry,
	endpointTarget,
} from "./types.js";

export class ConnectionLifecycle {
	readonly target: string;
	private readonly endpoint: Endpoint;
	private readonly security: SecurityConfig;
	private readonly factory: ChannelFactory;
	private readonly telemetry: Telemetry;
	private channel: Channel;
	private tail: Promise<void> = Promise.resolve();

	private constructor(
		endpoint: Endpoint,
		security: SecurityConfig,
		factory: ChannelFactory,
		telemetry: Telemetry,
		initial: Channel,
	) {
		this.target = endpointTarget(endpoint);
		this.endpoint = endpoint;
		this.security = security;
		this.factory = factory;
		this.telemetry = telemetry;
		this.channel = initial;
	}

	/** Opens the initial channel; fails when TLS material cannot be loaded. */
	static open(
		endpoint: Endpoint,
		security: SecurityConfig,
		factory: ChannelFactory,
		telemetry: Telemetry,
	): Result<ConnectionLifecycle, TransportConfigError> {
		const initial = factory.open(endpoint, security);
		if (!initial.ok) return initial;
		return ok(new ConnectionLifecycle(endpoint, security, factory, telemetry, initial.value));
	}

	/** The channel most recently opened; closed between operations. */
	get current(): Channel {
		return this.channel;
	}

	/** Closes the current channel. Safe to call any number of times. */
	disconnect(): void {
		if (this.channel.closed) return;
		this.telemetry.logger.debug(
			{ target: this.target },
			`Disconnecting from gRPC server at ${this.target}`,
		);
		this.channel.close();
		this.telemetry.events.emit("disconnect", { target: this.target });
	}

	/** Discards the current channel and opens a new one. */
	reconnect(): Result<Channel, TransportConfigError> {
		this.disconnect();
		const opened = this.factory.open(this.endpoint, this.security);
		if (!opened.ok) return opened;
		this.channel = opened.value;
		this.telemetry.logger.debug({ target: this.target }, `Connecting to gRPC at ${this.target}`);
		this.telemetry.events.emit("connect", { target: this.target });
		return ok(this.channel);
	}

	/**
	 * Runs `body` against a freshly opened channel and closes it afterwards.
	 * Thrown failures are mapped through `classify`.
	 */
	run<T>(
		body: (channel: Channel) => Promise<T>,
		classify: (error: unknown) => FederationError,
	): Promise<Result<T, FederationError>> {
		return this.exclusive(async () => {
			const connected = this.reconnect();
			if (!connected.ok) return connected;
			try {
				return ok(await body(connected.value));
			} catch (error) {
				return err(classify(error));
			} finally {
				this.disconnect();
			}
		});
	}

	private exclusive<T>(task: () => Promise<T>): Promise<T> {
		const result = this.tail.then(task);
		this.tail = result.then(
			() => undefined,
			() => undefined,
		);
		return result;
	}
}
