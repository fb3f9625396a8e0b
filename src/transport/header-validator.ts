/**
 * HeaderValidator — stamps outgoing identity headers and checks incoming ones.
 *
 * Response invariants, checked in order, first failure wins:
 * receiver = caller, sender = aggregator, federation = federation,
 * common name = configured common name (or "").
 */

import type { MessageHeader } from "../codec/messages.js";
import { HeaderMismatchError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Identity, Telemetry } from "./types.js";

export type HeaderField = "receiver" | "sender" | "federationUuid" | "singleColCertCommonName";

export class HeaderValidator {
	private readonly identity: Identity;
	private readonly telemetry: Telemetry;

	constructor(identity: Identity, telemetry: Telemetry) {
		this.identity = identity;
		this.telemetry = telemetry;
	}

	/** Builds the header for a request sent by `caller`. */
	stamp(caller: string): MessageHeader {
		return {
			sender: caller,
			receiver: this.identity.aggregatorUuid,
			federationUuid: this.identity.federationUuid,
			singleColCertCommonName: this.identity.singleColCertCommonName ?? "",
		};
	}

	/** Checks a response header addressed to `caller`. */
	validate(header: MessageHeader, caller: string): Result<void, HeaderMismatchError> {
		const checks: ReadonlyArray<readonly [HeaderField, string, string]> = [
			["receiver", caller, header.receiver],
			["sender", this.identity.aggregatorUuid, header.sender],
			["federationUuid", this.identity.federationUuid, header.federationUuid],
			[
				"singleColCertCommonName",
				this.identity.singleColCertCommonName ?? "",
				header.singleColCertCommonName,
			],
		];

		for (const [field, expected, actual] of checks) {
			if (expected !== actual) {
				this.telemetry.logger.error(
					{ field, expected, actual },
					"Response header does not match expected identity",
				);
				this.telemetry.events.emit("header-mismatch", { field, expected, actual });
				return err(new HeaderMismatchError(field, expected, actual));
			}
		}
		return ok(undefined);
	}
}
