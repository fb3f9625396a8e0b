/**
 * Chunked framing for payloads larger than one gRPC message.
 *
 * A logical message is encoded once, split into `DataStream` frames of at
 * most `maxFrameBytes`, and concatenated back in order on the receiving side.
 */

import { ValidationError, validate, z } from "../lib/validation/index.js";
import { type Result, err, ok } from "../shared/result.js";
import {
	type DataStreamFrame,
	MessageHeaderSchema,
	NamedTensorSchema,
	type TaskResults,
} from "./messages.js";
import { decodeMessage, encodeMessage } from "./schema.js";

export const DEFAULT_MAX_FRAME_BYTES = 2 * 1024 * 1024;

/** Splits `payload` into frames of at most `maxFrameBytes`; an empty payload yields no frames. */
export function toDataStream(
	payload: Uint8Array,
	maxFrameBytes = DEFAULT_MAX_FRAME_BYTES,
): DataStreamFrame[] {
	if (!Number.isInteger(maxFrameBytes) || maxFrameBytes <= 0) {
		throw new RangeError(`maxFrameBytes must be a positive integer, got ${maxFrameBytes}`);
	}
	const frames: DataStreamFrame[] = [];
	for (let offset = 0; offset < payload.byteLength; offset += maxFrameBytes) {
		const npbytes = payload.subarray(offset, offset + maxFrameBytes);
		frames.push({ npbytes, size: npbytes.byteLength });
	}
	return frames;
}

/** Concatenates frames back into one payload, checking each frame's declared size. */
export function fromDataStream(
	frames: Iterable<DataStreamFrame>,
): Result<Uint8Array, ValidationError> {
	const chunks: Uint8Array[] = [];
	let total = 0;
	let index = 0;
	for (const frame of frames) {
		if (frame.size !== frame.npbytes.byteLength) {
			return err(
				new ValidationError("Data stream frame size mismatch", [
					{
						path: [index, "size"],
						message: `declared ${frame.size}, carried ${frame.npbytes.byteLength}`,
					},
				]),
			);
		}
		chunks.push(frame.npbytes);
		total += frame.size;
		index += 1;
	}
	if (total === 0) {
		return err(new ValidationError("Data stream carried no bytes", []));
	}
	const payload = new Uint8Array(total);
	let offset = 0;
	for (const chunk of chunks) {
		payload.set(chunk, offset);
		offset += chunk.byteLength;
	}
	return ok(payload);
}

// ── Task results ─────────────────────────────────────────────────────

const TaskResultsSchema: z.ZodType<TaskResults, z.ZodTypeDef, unknown> = z.object({
	header: MessageHeaderSchema,
	roundNumber: z.number().int(),
	taskName: z.string(),
	dataSize: z.number().int(),
	tensors: z.array(NamedTensorSchema),
});

/** Encodes task results and frames them for the `SendLocalTaskResults` stream. */
export function taskResultsToDataStream(
	results: TaskResults,
	maxFrameBytes = DEFAULT_MAX_FRAME_BYTES,
): DataStreamFrame[] {
	return toDataStream(encodeMessage("TaskResults", results), maxFrameBytes);
}

/** Reassembles a `SendLocalTaskResults` stream into the logical request it carried. */
export function taskResultsFromDataStream(
	frames: Iterable<DataStreamFrame>,
): Result<TaskResults, ValidationError> {
	const payload = fromDataStream(frames);
	if (!payload.ok) return payload;
	return validate(TaskResultsSchema, decodeMessage("TaskResults", payload.value), "TaskResults");
}
