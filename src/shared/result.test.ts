import { describe, expect, it } from "vitest";
import { err, isErr, isOk, map, ok, unwrap } from "./result.js";

describe("Result", () => {
	describe("ok / err factories", () => {
		it("ok wraps a value", () => {
			const r = ok(42);
			expect(r.ok).toBe(true);
			if (r.ok) expect(r.value).toBe(42);
		});

		it("err wraps an error", () => {
			const r = err("handshake failed");
			expect(r.ok).toBe(false);
			if (!r.ok) expect(r.error).toBe("handshake failed");
		});
	});

	describe("isOk / isErr type guards", () => {
		it("correctly narrows ok result", () => {
			const r = ok("tasks");
			expect(isOk(r)).toBe(true);
			expect(isErr(r)).toBe(false);
		});

		it("correctly narrows err result", () => {
			const r = err(new Error("down"));
			expect(isOk(r)).toBe(false);
			expect(isErr(r)).toBe(true);
		});
	});

	describe("map", () => {
		it("transforms ok value", () => {
			expect(map(ok(3), (round) => round + 1)).toEqual({ ok: true, value: 4 });
		});

		it("passes through err unchanged", () => {
			const failure = err("no channel");
			expect(map(failure, (n: number) => n * 2)).toBe(failure);
		});
	});

	describe("unwrap", () => {
		it("returns ok value", () => {
			expect(unwrap(ok("collab-1"))).toBe("collab-1");
		});

		it("throws the error of an err result", () => {
			const failure = new Error("header mismatch");
			expect(() => unwrap(err(failure))).toThrow(failure);
		});

		it("wraps non-Error in Error", () => {
			expect(() => unwrap(err("plain text"))).toThrow(new Error("plain text"));
		});
	});
});
