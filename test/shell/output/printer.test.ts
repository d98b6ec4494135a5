import { describe, expect, it } from "vitest";

import { UncoveredBranch } from "../../../src/core/errors.js";
import type { LintReport } from "../../../src/core/models.js";
import { summaryLine } from "../../../src/shell/output/printer.js";

const base: LintReport = {
	outputs: [{ fixture: "prod", dir: "/w/results/prod" }],
	declarations: 3,
	covered: 3,
	survivingMarkers: 3,
	exceptionsWritten: 0,
	failures: [],
};

describe("summaryLine", () => {
	it("reports a clean run", () => {
		expect(summaryLine(base)).toBe(
			"✅ No problems found; 3/3 branches covered across 1 fixture(s)",
		);
	});

	it("mentions written exceptions", () => {
		expect(summaryLine({ ...base, covered: 2, exceptionsWritten: 1 })).toBe(
			"✅ No problems found; 2/3 branches covered across 1 fixture(s), 1 exception(s) written",
		);
	});

	it("counts the problems of a failed run", () => {
		const failures = [new UncoveredBranch({ file: "t.yaml", line: 0, source: "{{ if .Values.a }}" })];
		expect(summaryLine({ ...base, covered: 2, failures })).toBe(
			"❌ 1 problem(s) found; 2/3 branches covered across 1 fixture(s)",
		);
	});
});
