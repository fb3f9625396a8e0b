import { status } from "@grpc/grpc-js";
import { describe, expect, it } from "vitest";
import { EMPTY_HEADER } from "../codec/messages.js";
import { RpcError, TransportConfigError, classifyRpcError } from "../shared/errors.js";
import { FakeAggregator, rpcFailure } from "../testing/fake-aggregator.js";
import { recordingTelemetry } from "../testing/telemetry.js";
import { ConnectionLifecycle } from "./connection-lifecycle.js";
import type { Channel } from "./types.js";

const ENDPOINT = { host: "agg.test", port: 50051 };
const PLAINTEXT = { tls: false, disableClientAuth: false };
const IDENTITY = { aggregatorUuid: "aggregator-uuid", federationUuid: "federation-uuid" };

function setup() {
	const aggregator = new FakeAggregator(IDENTITY);
	const recording = recordingTelemetry();
	const opened = ConnectionLifecycle.open(ENDPOINT, PLAINTEXT, aggregator, recording.telemetry);
	if (!opened.ok) throw opened.error;
	return { aggregator, lifecycle: opened.value, ...recording };
}

describe("ConnectionLifecycle", () => {
	it("opens an initial channel to the endpoint", () => {
		const { aggregator, lifecycle } = setup();

		expect(aggregator.opened).toBe(1);
		expect(lifecycle.target).toBe("agg.test:50051");
		expect(lifecycle.current.closed).toBe(false);
	});

	it("fails to open when the factory rejects the security settings", () => {
		const aggregator = new FakeAggregator(IDENTITY).failOpen(
			new TransportConfigError("rootCertificate is required when TLS is enabled", "rootCertificate"),
		);
		const { telemetry } = recordingTelemetry();

		const opened = ConnectionLifecycle.open(ENDPOINT, PLAINTEXT, aggregator, telemetry);

		expect(opened.ok).toBe(false);
		if (!opened.ok) expect(opened.error.credential).toBe("rootCertificate");
	});

	it("reconnecting twice in a row never fails and leaves one open channel", () => {
		const { aggregator, lifecycle } = setup();

		expect(lifecycle.reconnect().ok).toBe(true);
		expect(lifecycle.reconnect().ok).toBe(true);

		expect(aggregator.opened).toBe(3);
		expect(aggregator.channels.map((c) => c.closed)).toEqual([true, true, false]);
		expect(aggregator.channels.map((c) => c.releases)).toEqual([1, 1, 0]);
	});

	it("disconnect is idempotent", () => {
		const { aggregator, lifecycle, events } = setup();

		lifecycle.disconnect();
		lifecycle.disconnect();

		expect(aggregator.channels[0]?.releases).toBe(1);
		expect(events.disconnect).toEqual([{ target: "agg.test:50051" }]);
	});

	it("runs the body on a fresh channel and closes it afterwards", async () => {
		const { aggregator, lifecycle, events } = setup();
		const used: Channel[] = [];

		const result = await lifecycle.run(
			async (channel) => {
				used.push(channel);
				expect(channel.closed).toBe(false);
				return "done";
			},
			(error) => classifyRpcError(error),
		);

		expect(result).toEqual({ ok: true, value: "done" });
		expect(used).toHaveLength(1);
		expect(used[0]).toBe(aggregator.channels[1]);
		expect(used[0]?.closed).toBe(true);
		expect(events.connect).toEqual([{ target: "agg.test:50051" }]);
		expect(events.disconnect).toHaveLength(2);
	});

	it("closes the channel and returns the classified failure when the body throws", async () => {
		const { aggregator, lifecycle } = setup();

		const result = await lifecycle.run(
			(channel) => channel.getTasks({ header: EMPTY_HEADER }),
			(error) => classifyRpcError(error),
		);

		expect(result.ok).toBe(true);

		aggregator.failNext("getTasks", rpcFailure(status.INTERNAL, "exploded"));
		const failed = await lifecycle.run(
			(channel) => channel.getTasks({ header: EMPTY_HEADER }),
			(error) => classifyRpcError(error),
		);

		expect(failed.ok).toBe(false);
		if (!failed.ok) {
			expect(failed.error).toBeInstanceOf(RpcError);
			expect(failed.error.context).toMatchObject({ status: "INTERNAL", details: "exploded" });
		}
		expect(aggregator.channels.every((c) => c.closed)).toBe(true);
	});

	it("returns the open failure when a fresh channel cannot be built", async () => {
		const { aggregator, lifecycle } = setup();
		aggregator.failOpen(new TransportConfigError("certificate is empty", "certificate"));

		const result = await lifecycle.run(
			async () => "unreachable",
			(error) => classifyRpcError(error),
		);

		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toBeInstanceOf(TransportConfigError);
	});

	it("serializes concurrent operations so a channel is never replaced mid-call", async () => {
		const { lifecycle } = setup();
		const order: string[] = [];
		let release: () => void = () => {};
		const gate = new Promise<void>((resolve) => {
			release = resolve;
		});

		const first = lifecycle.run(
			async (channel) => {
				order.push("first:start");
				await gate;
				order.push(`first:end:${channel.closed}`);
			},
			(error) => classifyRpcError(error),
		);
		const second = lifecycle.run(
			async () => {
				order.push("second:start");
			},
			(error) => classifyRpcError(error),
		);

		await Promise.resolve();
		release();
		await Promise.all([first, second]);

		expect(order).toEqual(["first:start", "first:end:false", "second:start"]);
	});

	it("keeps running operations after an earlier one failed", async () => {
		const { lifecycle } = setup();

		const failed = await lifecycle.run(
			async () => {
				throw new Error("first failed");
			},
			(error) => classifyRpcError(error),
		);
		const next = await lifecycle.run(
			async () => "second ran",
			(error) => classifyRpcError(error),
		);

		expect(failed.ok).toBe(false);
		expect(next).toEqual({ ok: true, value: "second ran" });
	});
});
