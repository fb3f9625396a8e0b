/**
 * FederationError hierarchy — structured error classification.
 *
 * Every error has a category (retryable, non-retryable, fatal). The transport
 * layer reads the category and the gRPC status code to decide between
 * resending, surfacing to the caller, or escalating to the embedding process.
 */

import { status as GrpcStatus } from "@grpc/grpc-js";

/** Error severity categories that drive retry and escalation behavior. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing FederationError subclasses with optional cause chain. */
interface FederationErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for every client operation, with category-based retry semantics. */
export class FederationError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "FederationError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Configuration errors ─────────────────────────────────────────────

/** Fatal error for invalid or missing client configuration. */
export class ConfigError extends FederationError {
	constructor(message: string, context: Record<string, unknown> & FederationErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error raised at channel-open time when TLS credential material is missing or unreadable. */
export class TransportConfigError extends FederationError {
	readonly credential: string;

	constructor(
		message: string,
		credential: string,
		context: Record<string, unknown> & FederationErrorOptions = {},
	) {
		const { cause, ...rest } = context;
		super(
			message,
			"TRANSPORT_CONFIG_ERROR",
			ErrorCategory.Fatal,
			{ credential, ...rest },
			"Check the certificate and key paths in the client security settings",
		);
		this.name = "TransportConfigError";
		this.credential = credential;
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error when a response header disagrees with the identities this client expects. */
export class HeaderMismatchError extends FederationError {
	readonly field: string;
	readonly expected: string;
	readonly actual: string;

	constructor(field: string, expected: string, actual: string) {
		super(
			`Response header ${field} mismatch: expected "${expected}", got "${actual}"`,
			"HEADER_MISMATCH",
			ErrorCategory.Fatal,
			{ field, expected, actual },
		);
		this.name = "HeaderMismatchError";
		this.field = field;
		this.expected = expected;
		this.actual = actual;
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends FederationError {
	constructor(message: string, context: Record<string, unknown> & FederationErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Transport (gRPC status) errors ───────────────────────────────────

/** Human-readable name of a gRPC status code, e.g. `UNAVAILABLE`. */
export function statusName(code: number): string {
	return GrpcStatus[code] ?? String(code);
}

/** Shared shape of every error that carries a gRPC status. */
export abstract class RpcFailure extends FederationError {
	readonly statusCode: number;
	readonly details: string;

	protected constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		statusCode: number,
		details: string,
		context: Record<string, unknown> & FederationErrorOptions,
	) {
		const { cause, ...rest } = context;
		super(message, code, category, { status: statusName(statusCode), details, ...rest });
		this.statusCode = statusCode;
		this.details = details;
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable failure whose status is in the configured retryable set. */
export class TransientTransportError extends RpcFailure {
	constructor(
		statusCode: number,
		details: string,
		context: Record<string, unknown> & FederationErrorOptions = {},
	) {
		super(
			`Transient transport failure: ${statusName(statusCode)}`,
			"TRANSIENT_TRANSPORT",
			ErrorCategory.Retryable,
			statusCode,
			details,
			context,
		);
		this.name = "TransientTransportError";
	}
}

/** Non-retryable rejection of this client's credentials or identity. */
export class AuthenticationError extends RpcFailure {
	constructor(details: string, context: Record<string, unknown> & FederationErrorOptions = {}) {
		super(
			`Aggregator rejected client credentials: ${details}`,
			"AUTHENTICATION_FAILED",
			ErrorCategory.NonRetryable,
			GrpcStatus.UNAUTHENTICATED,
			details,
			context,
		);
		this.name = "AuthenticationError";
	}
}

/** Non-retryable gRPC failure outside the retryable set. */
export class RpcError extends RpcFailure {
	constructor(
		statusCode: number,
		details: string,
		context: Record<string, unknown> & FederationErrorOptions = {},
	) {
		super(
			`gRPC call failed: ${statusName(statusCode)}`,
			"RPC_ERROR",
			ErrorCategory.NonRetryable,
			statusCode,
			details,
			context,
		);
		this.name = "RpcError";
	}
}

/**
 * Any transport failure on an interactive call path (connectivity check and
 * administration). The embedding application decides whether to terminate.
 */
export class UnhandledTransportError extends RpcFailure {
	readonly operation: string;

	constructor(
		operation: string,
		statusCode: number,
		details: string,
		context: Record<string, unknown> & FederationErrorOptions = {},
	) {
		super(
			`gRPC Error: ${statusName(statusCode)}. Details: ${details}`,
			"UNHANDLED_TRANSPORT",
			ErrorCategory.Fatal,
			statusCode,
			details,
			{ operation, ...context },
		);
		this.name = "UnhandledTransportError";
		this.operation = operation;
	}
}

// ── Classification helpers ───────────────────────────────────────────

/** Structural view of a grpc-js `ServiceError`. */
export interface StatusCarrier {
	readonly code: number;
	readonly details: string;
}

/** True when the value looks like a failed gRPC call (numeric `code`). */
export function isStatusCarrier(error: unknown): error is Error & StatusCarrier {
	return (
		error instanceof Error &&
		"code" in error &&
		typeof error.code === "number" &&
		(!("details" in error) || typeof error.details === "string")
	);
}

/** Extract the gRPC status code from a raw `ServiceError` or an {@link RpcFailure}. */
export function rpcStatusOf(error: unknown): number | undefined {
	if (error instanceof RpcFailure) return error.statusCode;
	if (isStatusCarrier(error)) return error.code;
	return undefined;
}

/** Status detail text of a failed call, falling back to the error message. */
export function rpcDetailsOf(error: unknown): string {
	if (error instanceof RpcFailure) return error.details;
	if (!(error instanceof Error)) return String(error);
	if ("details" in error && typeof error.details === "string" && error.details.length > 0) {
		return error.details;
	}
	return error.message;
}

/**
 * Classify an unknown failure into the appropriate FederationError subtype.
 *
 * `UNAUTHENTICATED` always maps to {@link AuthenticationError}, whatever the
 * retryable set contains.
 */
export function classifyRpcError(
	error: unknown,
	retryableStatuses: readonly number[] = [GrpcStatus.UNAVAILABLE],
): FederationError {
	if (error instanceof FederationError) return error;
	if (isStatusCarrier(error)) {
		const details = rpcDetailsOf(error);
		if (error.code === GrpcStatus.UNAUTHENTICATED) {
			return new AuthenticationError(details, { cause: error });
		}
		if (retryableStatuses.includes(error.code)) {
			return new TransientTransportError(error.code, details, { cause: error });
		}
		return new RpcError(error.code, details, { cause: error });
	}
	if (error instanceof Error) {
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for AuthenticationError. */
export function isAuthenticationError(e: unknown): e is AuthenticationError {
	return e instanceof AuthenticationError;
}

/** Type guard for HeaderMismatchError. */
export function isHeaderMismatch(e: unknown): e is HeaderMismatchError {
	return e instanceof HeaderMismatchError;
}

/** Type guard for TransportConfigError. */
export function isTransportConfigError(e: unknown): e is TransportConfigError {
	return e instanceof TransportConfigError;
}

/** Type guard for UnhandledTransportError. */
export function isUnhandledTransportError(e: unknown): e is UnhandledTransportError {
	return e instanceof UnhandledTransportError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
