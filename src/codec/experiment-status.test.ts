import { describe, expect, it } from "vitest";
import { experimentStatusFromProto } from "./experiment-status.js";

describe("experimentStatusFromProto", () => {
	it("drops the routing header and keeps the status payload", () => {
		const status = experimentStatusFromProto({
			header: {
				sender: "aggregator-uuid",
				receiver: "admin",
				federationUuid: "federation-uuid",
				singleColCertCommonName: "",
			},
			experimentName: "demo-experiment",
			status: "IN_PROGRESS",
			roundNumber: 3,
			totalRounds: 10,
			collaborators: [
				{ label: "collab-1", commonName: "collab-1.example", state: "training" },
				{ label: "collab-2", commonName: "collab-2.example", state: "idle" },
			],
			stragglerCutoffSeconds: 120,
		});

		expect(status).toEqual({
			experimentName: "demo-experiment",
			status: "IN_PROGRESS",
			roundNumber: 3,
			totalRounds: 10,
			collaborators: [
				{ label: "collab-1", commonName: "collab-1.example", state: "training" },
				{ label: "collab-2", commonName: "collab-2.example", state: "idle" },
			],
			stragglerCutoffSeconds: 120,
		});
	});
});
