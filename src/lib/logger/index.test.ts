import { describe, expect, it } from "vitest";
import { createLogger, createSilentLogger } from "./index.js";

function capture(level: "debug" | "info" | "warn" = "info", redactPaths?: readonly string[]) {
	const lines: string[] = [];
	const logger = createLogger({
		level,
		...(redactPaths !== undefined && { redactPaths }),
		destination: {
			write(msg: string) {
				lines.push(msg);
			},
		},
	});
	return { logger, lines };
}

function parse(line: string | undefined): Record<string, unknown> {
	const parsed: unknown = JSON.parse(line ?? "{}");
	return typeof parsed === "object" && parsed !== null ? { ...parsed } : {};
}

describe("Logger", () => {
	describe("createLogger", () => {
		it("returns a Logger with all standard methods", () => {
			const logger = createLogger({ level: "info" });

			expect(typeof logger.info).toBe("function");
			expect(typeof logger.warn).toBe("function");
			expect(typeof logger.error).toBe("function");
			expect(typeof logger.debug).toBe("function");
			expect(typeof logger.child).toBe("function");
		});

		it("child logger carries its bindings into every line", () => {
			const { logger, lines } = capture();
			logger.child({ component: "lifecycle" }).info({ target: "agg:1" }, "Connecting");

			expect(parse(lines[0])).toMatchObject({
				component: "lifecycle",
				target: "agg:1",
				msg: "Connecting",
			});
		});
	});

	describe("binary redaction", () => {
		it("replaces byte arrays with their length", () => {
			const { logger, lines } = capture();
			logger.info({ payload: new Uint8Array([1, 2, 3]) }, "frame");

			expect(parse(lines[0])).toMatchObject({ payload: "[3 bytes]" });
		});

		it("replaces Buffers with their length", () => {
			const { logger, lines } = capture();
			logger.info({ chunk: Buffer.from("abcd") }, "frame");

			expect(parse(lines[0])).toMatchObject({ chunk: "[4 bytes]" });
		});
	});

	describe("redact paths", () => {
		it("censors private key material by default", () => {
			const { logger, lines } = capture();
			logger.info({ privateKey: "test-key", target: "agg:1" }, "tls");

			expect(parse(lines[0])).toMatchObject({ privateKey: "[REDACTED]", target: "agg:1" });
		});

		it("censors configured paths in log output", () => {
			const { logger, lines } = capture("info", ["secret"]);
			logger.info({ secret: "test-secret", safe: "visible" }, "test");

			expect(parse(lines[0])).toMatchObject({ secret: "[REDACTED]", safe: "visible" });
		});
	});

	describe("log levels", () => {
		it("respects configured log level", () => {
			const { logger, lines } = capture("warn");

			logger.debug("should not appear");
			logger.info("should not appear either");
			logger.warn("should appear");

			expect(lines).toHaveLength(1);
			expect(parse(lines[0])).toMatchObject({ msg: "should appear" });
		});

		it("silent logger accepts calls without output", () => {
			const logger = createSilentLogger();
			expect(() => logger.error({ code: 14 }, "ignored")).not.toThrow();
		});
	});
});
