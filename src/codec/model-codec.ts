/**
 * Model payload codecs.
 *
 * The aggregator ships a trained model as a `ModelProto` of named tensors
 * whose bytes went through a compression pipeline. The client treats the
 * pipeline as opaque behind {@link ModelCodec}; the bundled
 * {@link NoCompressionCodec} reads raw little-endian float32 values.
 */

import { ValidationError } from "../lib/validation/index.js";
import { type Result, err, ok } from "../shared/result.js";
import type { ModelProto, NamedTensor } from "./messages.js";

/** Turns one named tensor's bytes back into numbers. */
export interface ModelCodec {
	readonly name: string;
	decode(tensor: NamedTensor): Result<Float32Array, ValidationError>;
}

const FLOAT32_BYTES = 4;

export const NoCompressionCodec: ModelCodec = {
	name: "no-compression",
	decode(tensor: NamedTensor): Result<Float32Array, ValidationError> {
		const bytes = tensor.dataBytes;
		if (bytes.byteLength % FLOAT32_BYTES !== 0) {
			return err(
				new ValidationError(`Tensor ${tensor.name} is not a float32 array`, [
					{ path: ["dataBytes"], message: `${bytes.byteLength} bytes is not a multiple of 4` },
				]),
			);
		}
		const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
		const values = new Float32Array(bytes.byteLength / FLOAT32_BYTES);
		for (let i = 0; i < values.length; i++) {
			values[i] = view.getFloat32(i * FLOAT32_BYTES, true);
		}
		return ok(values);
	},
};

/** Encodes float32 values the way {@link NoCompressionCodec} reads them. */
export function float32ToBytes(values: ArrayLike<number>): Uint8Array {
	const bytes = new Uint8Array(values.length * FLOAT32_BYTES);
	const view = new DataView(bytes.buffer);
	for (let i = 0; i < values.length; i++) {
		view.setFloat32(i * FLOAT32_BYTES, values[i] ?? 0, true);
	}
	return bytes;
}

/** Decodes every tensor of a model into a name → values mapping. */
export function deconstructModel(
	model: ModelProto,
	codec: ModelCodec = NoCompressionCodec,
): Result<Record<string, Float32Array>, ValidationError> {
	const tensors: Record<string, Float32Array> = {};
	for (const tensor of model.tensors) {
		const decoded = codec.decode(tensor);
		if (!decoded.ok) return decoded;
		tensors[tensor.name] = decoded.value;
	}
	return ok(tensors);
}
