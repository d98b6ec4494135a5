import { describe, expect, it } from "vitest";

import {
	ConfigError,
	ExceptionWriteFailure,
	InstrumentationError,
	ObserverFailure,
	PolicyFailure,
	RecursionFailure,
	RenderError,
	RenderFailed,
	ScanFailure,
	UncoveredBranch,
	WorkspaceError,
} from "../../../src/core/errors.js";
import { formatFailure, formatFatal } from "../../../src/core/format/failure.js";

describe("formatFailure", () => {
	it("shows uncovered branches with a 1-based line", () => {
		const failure = new UncoveredBranch({
			file: "templates/a.yaml",
			line: 4,
			source: "{{ if .Values.x }}",
		});
		expect(formatFailure(failure)).toBe(
			"Branch was not found in the rendered chart output:\n  templates/a.yaml:5\n  {{ if .Values.x }}",
		);
	});

	it("includes the policy output", () => {
		expect(formatFailure(new PolicyFailure({ label: "prod", output: "FAIL - x" }))).toBe(
			"Conftest failure (prod):\nFAIL - x",
		);
	});

	it("numbers recursion rules from 1", () => {
		const failure = new RecursionFailure({ fixture: "prod", rule: 0, detail: "no such file" });
		expect(formatFailure(failure)).toBe(
			'Recursion rule #1 failed for fixture "prod": no such file',
		);
	});

	it("formats the remaining kinds", () => {
		expect(formatFailure(new ScanFailure({ path: "/r/a.yaml", detail: "EACCES" }))).toBe(
			"Unable to scan /r/a.yaml for markers: EACCES",
		);
		expect(formatFailure(new ObserverFailure({ fixture: "dev", detail: "bad" }))).toBe(
			'Observer failed for fixture "dev": bad',
		);
		expect(
			formatFailure(new ExceptionWriteFailure({ path: "/c/a.yaml", detail: "EROFS" })),
		).toBe("Unable to write exceptions to /c/a.yaml: EROFS");
	});
});

describe("formatFatal", () => {
	it("formats setup errors", () => {
		expect(formatFatal(new ConfigError({ detail: "no fixtures" }))).toBe(
			"Invalid configuration: no fixtures",
		);
		expect(formatFatal(new WorkspaceError({ path: "/tmp/x", detail: "EEXIST" }))).toBe(
			"Workspace error at /tmp/x: EEXIST",
		);
		expect(formatFatal(new InstrumentationError({ path: "/tmp/x/a.yaml", detail: "EIO" }))).toBe(
			"Instrumenting /tmp/x/a.yaml failed: EIO",
		);
	});

	it("lists every failed render", () => {
		const error = new RenderFailed({
			failures: [
				new RenderError({ fixture: "a", output: "parse error" }),
				new RenderError({ fixture: "b", output: "missing value" }),
			],
		});
		expect(formatFatal(error)).toBe(
			'Rendering chart with fixture "a" failed:\nparse error\nRendering chart with fixture "b" failed:\nmissing value',
		);
	});
});
