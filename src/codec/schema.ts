/**
 * Run-time loading of `proto/aggregator.proto`.
 *
 * proto-loader supplies the service definitions grpc-js dials; protobufjs
 * supplies raw message encoding for payloads framed by hand (the task
 * results stream). Both read the same file, once per process.
 */

import { fileURLToPath } from "node:url";
import {
	type AnyDefinition,
	type PackageDefinition,
	type ServiceDefinition,
	loadSync as loadPackageDefinition,
} from "@grpc/proto-loader";
import protobuf, { type Root, type Type } from "protobufjs";
import { SystemError } from "../shared/errors.js";

export const PROTO_PATH = fileURLToPath(new URL("../../proto/aggregator.proto", import.meta.url));

export const PROTO_PACKAGE = "fedlink.aggregator";

/** Options shared by proto-loader and the protobufjs conversions below. */
export const CONVERSION_OPTIONS = {
	longs: Number,
	enums: String,
	defaults: true,
	arrays: true,
	objects: true,
	oneofs: true,
} as const;

let packageDefinition: PackageDefinition | undefined;
let root: Root | undefined;

export function aggregatorPackageDefinition(): PackageDefinition {
	packageDefinition ??= loadPackageDefinition(PROTO_PATH, {
		keepCase: false,
		...CONVERSION_OPTIONS,
	});
	return packageDefinition;
}

export type AggregatorServiceName = "Aggregator" | "AggregatorAdmin";

function isServiceDefinition(definition: AnyDefinition | undefined): definition is ServiceDefinition {
	return definition !== undefined && !("format" in definition);
}

/** Method table of one service, shared by the client channel and in-process test servers. */
export function serviceDefinition(service: AggregatorServiceName): ServiceDefinition {
	const found = aggregatorPackageDefinition()[`${PROTO_PACKAGE}.${service}`];
	if (!isServiceDefinition(found)) {
		throw new SystemError(`Service ${service} is missing from the aggregator schema`);
	}
	return found;
}

function aggregatorRoot(): Root {
	root ??= protobuf.loadSync(PROTO_PATH);
	return root;
}

/** Looks up a message type of the aggregator package by its short name. */
export function messageType(name: string): Type {
	return aggregatorRoot().lookupType(`${PROTO_PACKAGE}.${name}`);
}

/** Encodes a camelCase plain object as the named message. */
export function encodeMessage(name: string, value: object): Uint8Array {
	const type = messageType(name);
	return type.encode(type.fromObject({ ...value })).finish();
}

/** Decodes bytes of the named message into a camelCase plain object. */
export function decodeMessage(name: string, bytes: Uint8Array): Record<string, unknown> {
	const type = messageType(name);
	return type.toObject(type.decode(bytes), CONVERSION_OPTIONS);
}
