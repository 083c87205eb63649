import { describe, expect, it } from "vitest";

import { LIVE_SESSION_STATUSES } from "./live-session.dto";
import { canTransition, isTerminal } from "./live-session.lifecycle";
import { isParty, resolveRole } from "./live-session.roles";

describe("live session lifecycle", () => {
	it("allows only the documented moves", () => {
		const allowed = LIVE_SESSION_STATUSES.flatMap((from) =>
			LIVE_SESSION_STATUSES.filter((to) => canTransition(from, to)).map(
				(to) => `${from}->${to}`
			)
		);

		expect(allowed.sort()).toEqual(
			[
				"active->completed",
				"active->no_show",
				"scheduled->cancelled",
				"scheduled->waiting",
				"waiting->active",
				"waiting->cancelled",
			].sort()
		);
	});

	it("has no way out of a terminal state", () => {
		for (const status of ["completed", "cancelled", "no_show"] as const) {
			expect(isTerminal(status)).toBe(true);
			expect(LIVE_SESSION_STATUSES.filter((to) => canTransition(status, to))).toEqual([]);
		}
		expect(isTerminal("active")).toBe(false);
	});
});

describe("resolveRole", () => {
	const appointment = {
		studentId: "s",
		counselorId: "c",
		observerIds: ["o"],
	};

	it("maps each identity to its role on the appointment", () => {
		expect(resolveRole(appointment, "s")).toBe("student");
		expect(resolveRole(appointment, "c")).toBe("counselor");
		expect(resolveRole(appointment, "o")).toBe("observer");
		expect(resolveRole(appointment, "x")).toBe("none");
	});

	it("treats only student and counselor as parties", () => {
		expect(isParty("student")).toBe(true);
		expect(isParty("counselor")).toBe(true);
		expect(isParty("observer")).toBe(false);
		expect(isParty("none")).toBe(false);
	});
});
