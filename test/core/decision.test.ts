import { describe, expect, it } from "vitest";

import { computeExitCode, decisionOf } from "../../src/core/decision.js";
import { PolicyFailure } from "../../src/core/errors.js";
import type { LintReport } from "../../src/core/models.js";

const report = (failures: LintReport["failures"]): LintReport => ({
	outputs: [],
	declarations: 0,
	covered: 0,
	survivingMarkers: 0,
	exceptionsWritten: 0,
	failures,
});

describe("computeExitCode", () => {
	it("returns 0 for a clean run", () => {
		expect(computeExitCode({ fatal: false, reportedFailures: 0 })).toBe(0);
	});

	it("returns 1 for fatal errors or reported failures", () => {
		expect(computeExitCode({ fatal: true, reportedFailures: 0 })).toBe(1);
		expect(computeExitCode({ fatal: false, reportedFailures: 2 })).toBe(1);
	});

	it("derives the state from a report", () => {
		const failed = report([new PolicyFailure({ label: "all", output: "deny" })]);
		expect(decisionOf(failed)).toEqual({ fatal: false, reportedFailures: 1 });
		expect(computeExitCode(decisionOf(report([])))).toBe(0);
	});
});
