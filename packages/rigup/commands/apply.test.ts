import { describe, expect, it } from "vitest"
import { formatSummary } from "@/commands/apply"
import type { ProvisionSummary } from "@/provision/types"

function summary(overrides: Partial<ProvisionSummary> = {}): ProvisionSummary {
	return {
		changed: 0,
		conflicts: 0,
		manifestPath: "/m.json",
		optionalFailures: 0,
		phases: [],
		planned: 0,
		present: 0,
		warnings: 0,
		...overrides,
	}
}

describe("formatSummary", () => {
	it("counts changes and present items", () => {
		expect(formatSummary(summary({ changed: 3, present: 7 }), false)).toEqual([
			"Made 3 change(s); 7 item(s) already in place.",
		])
	})

	it("counts planned actions in dry-run", () => {
		expect(formatSummary(summary({ changed: 0, planned: 4, present: 1 }), true)).toEqual([
			"Would make 4 change(s); 1 item(s) already in place.",
		])
	})

	it("adds a line for each kind of problem that occurred", () => {
		expect(
			formatSummary(summary({ conflicts: 1, optionalFailures: 2, warnings: 3 }), false),
		).toEqual([
			"Made 0 change(s); 0 item(s) already in place.",
			"2 optional package(s) unavailable.",
			"1 managed-source conflict(s) left as they were.",
			"3 warning(s).",
		])
	})
})
