import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { credentials } from "@grpc/grpc-js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TransportConfigError } from "../shared/errors.js";
import { recordingTelemetry } from "../testing/telemetry.js";
import { GrpcChannelFactory, loadCredentialMaterial } from "./channel-factory.js";
import type { Channel, SecurityConfig } from "./types.js";

const ENDPOINT = { host: "127.0.0.1", port: 50051 };
const bytes = (text: string) => ({ bytes: new TextEncoder().encode(text) });

describe("loadCredentialMaterial", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "fedlink-creds-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("reads all three credentials from files", async () => {
		await writeFile(join(dir, "root.pem"), "root-material");
		await writeFile(join(dir, "col.crt"), "cert-material");
		await writeFile(join(dir, "col.key"), "key-material");

		const material = loadCredentialMaterial({
			tls: true,
			disableClientAuth: false,
			rootCertificate: { path: join(dir, "root.pem") },
			certificate: { path: join(dir, "col.crt") },
			privateKey: { path: join(dir, "col.key") },
		});

		expect(material.ok).toBe(true);
		if (material.ok) {
			expect(material.value.rootCertificate.toString()).toBe("root-material");
			expect(material.value.certificate?.toString()).toBe("cert-material");
			expect(material.value.privateKey?.toString()).toBe("key-material");
		}
	});

	it("accepts inline bytes", () => {
		const material = loadCredentialMaterial({
			tls: true,
			disableClientAuth: false,
			rootCertificate: bytes("root"),
			certificate: bytes("cert"),
			privateKey: bytes("key"),
		});

		expect(material.ok).toBe(true);
		if (material.ok) expect(material.value.privateKey?.toString()).toBe("key");
	});

	it("names the credential whose file cannot be read", () => {
		const missing = join(dir, "absent.key");
		const material = loadCredentialMaterial({
			tls: true,
			disableClientAuth: false,
			rootCertificate: bytes("root"),
			certificate: bytes("cert"),
			privateKey: { path: missing },
		});

		expect(material.ok).toBe(false);
		if (!material.ok) {
			expect(material.error).toBeInstanceOf(TransportConfigError);
			expect(material.error.credential).toBe("privateKey");
			expect(material.error.message).toBe(`Unable to read privateKey from ${missing}`);
		}
	});

	it("requires the root certificate in TLS mode", () => {
		const material = loadCredentialMaterial({ tls: true, disableClientAuth: true });

		expect(material.ok).toBe(false);
		if (!material.ok) {
			expect(material.error.message).toBe("rootCertificate is required when TLS is enabled");
		}
	});

	it("requires a certificate for mutual TLS", () => {
		const material = loadCredentialMaterial({
			tls: true,
			disableClientAuth: false,
			rootCertificate: bytes("root"),
			privateKey: bytes("key"),
		});

		expect(material.ok).toBe(false);
		if (!material.ok) expect(material.error.credential).toBe("certificate");
	});

	it("rejects empty inline material", () => {
		const material = loadCredentialMaterial({
			tls: true,
			disableClientAuth: true,
			rootCertificate: { bytes: new Uint8Array(0) },
		});

		expect(material.ok).toBe(false);
		if (!material.ok) expect(material.error.message).toBe("rootCertificate is empty");
	});

	it("skips client material when client auth is disabled", () => {
		const material = loadCredentialMaterial({
			tls: true,
			disableClientAuth: true,
			rootCertificate: bytes("root"),
			privateKey: { path: join(dir, "never-read.key") },
		});

		expect(material).toMatchObject({ ok: true, value: { certificate: null, privateKey: null } });
	});
});

describe("GrpcChannelFactory", () => {
	const opened: Channel[] = [];

	afterEach(() => {
		for (const channel of opened.splice(0)) channel.close();
		vi.restoreAllMocks();
	});

	function open(security: SecurityConfig) {
		const recording = recordingTelemetry();
		const result = new GrpcChannelFactory(recording.telemetry).open(ENDPOINT, security);
		if (result.ok) opened.push(result.value);
		return { result, ...recording };
	}

	it("opens a plaintext channel and announces it exactly once", () => {
		const { result, events, lines } = open({ tls: false, disableClientAuth: false });

		expect(result.ok).toBe(true);
		if (result.ok) expect(result.value.target).toBe("127.0.0.1:50051");
		expect(events["insecure-channel"]).toEqual([{ target: "127.0.0.1:50051" }]);
		expect(lines).toHaveLength(1);
		expect(lines[0]).toMatchObject({
			level: 40,
			msg: "gRPC is running on insecure channel with TLS disabled.",
		});
	});

	it("builds mutual TLS credentials from the loaded material", () => {
		const createSsl = vi
			.spyOn(credentials, "createSsl")
			.mockReturnValue(credentials.createInsecure());

		const { result, events } = open({
			tls: true,
			disableClientAuth: false,
			rootCertificate: bytes("root"),
			certificate: bytes("cert"),
			privateKey: bytes("key"),
		});

		expect(result.ok).toBe(true);
		expect(createSsl).toHaveBeenCalledWith(
			Buffer.from("root"),
			Buffer.from("key"),
			Buffer.from("cert"),
		);
		expect(events["insecure-channel"]).toEqual([]);
		expect(events["client-auth-disabled"]).toEqual([]);
	});

	it("warns when client authentication is disabled", () => {
		const createSsl = vi
			.spyOn(credentials, "createSsl")
			.mockReturnValue(credentials.createInsecure());

		const { result, events, lines } = open({
			tls: true,
			disableClientAuth: true,
			rootCertificate: bytes("root"),
		});

		expect(result.ok).toBe(true);
		expect(createSsl).toHaveBeenCalledWith(Buffer.from("root"), null, null);
		expect(events["client-auth-disabled"]).toEqual([{ target: "127.0.0.1:50051" }]);
		expect(lines[0]).toMatchObject({ level: 40, msg: "Client-side authentication is disabled." });
	});

	it("returns a TransportConfigError when material is missing", () => {
		const createSsl = vi.spyOn(credentials, "createSsl");

		const { result } = open({ tls: true, disableClientAuth: false, rootCertificate: bytes("root") });

		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.credential).toBe("privateKey");
		expect(createSsl).not.toHaveBeenCalled();
	});

	it("returns a TransportConfigError when gRPC rejects the material", () => {
		vi.spyOn(credentials, "createSsl").mockImplementation(() => {
			throw new Error("PEM routines::no start line");
		});

		const { result } = open({
			tls: true,
			disableClientAuth: false,
			rootCertificate: bytes("not a pem"),
			certificate: bytes("not a pem"),
			privateKey: bytes("not a pem"),
		});

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(TransportConfigError);
			expect(result.error.message).toBe("TLS credential material was rejected");
		}
	});
});
