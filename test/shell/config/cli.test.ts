// CHANGE: Unit tests for CLI argument parsing
// WHY: Ensure flags and positional arguments are parsed deterministically with strict typing

import { describe, expect, it } from "vitest";

import type { CLIOptions } from "../../../src/core/types/index.js";
import { parseCLIArgs } from "../../../src/shell/config/index.js";

/**
 * Safely set process.argv for the duration of a test and restore afterwards.
 */
function withArgv<T>(args: readonly string[], fn: () => T): T {
	const original = process.argv.slice();
	try {
		process.argv = [original[0] ?? "node", original[1] ?? "script.js", ...args];
		return fn();
	} finally {
		process.argv = original;
	}
}

describe("parseCLIArgs: defaults and positional", () => {
	it("returns defaults when no args provided", (): void => {
		const opts = withArgv([], () => parseCLIArgs());
		const expected: CLIOptions = {
			chartDir: ".",
			fixturesDirs: [],
			recurseConfigmaps: [],
			preserve: false,
			writeExceptions: false,
			noPreflight: false,
		};
		expect(opts).toEqual(expected);
		expect("policiesDir" in opts).toBe(false);
		expect("concurrency" in opts).toBe(false);
	});

	it("parses a positional as chartDir", (): void => {
		expect(parseCLIArgs(["charts/app"]).chartDir).toBe("charts/app");
	});

	it("ignores empty string arguments", (): void => {
		expect(parseCLIArgs(["", "charts/app"]).chartDir).toBe("charts/app");
	});
});

describe("parseCLIArgs: value flags", () => {
	it("collects repeated --fixtures-dir and --recurse-configmap", (): void => {
		const opts = parseCLIArgs([
			"--fixtures-dir",
			"ci",
			"--recurse-configmap",
			"app/templates/a.yaml",
			"--fixtures-dir",
			"fixtures",
			"--recurse-configmap",
			"app/templates/b.yaml",
		]);
		expect(opts.fixturesDirs).toEqual(["ci", "fixtures"]);
		expect(opts.recurseConfigmaps).toEqual(["app/templates/a.yaml", "app/templates/b.yaml"]);
	});

	it("parses --policies-dir and --concurrency", (): void => {
		const opts = parseCLIArgs(["charts/app", "--policies-dir", "rego", "--concurrency", "3"]);
		expect(opts.chartDir).toBe("charts/app");
		expect(opts.policiesDir).toBe("rego");
		expect(opts.concurrency).toBe(3);
	});

	it("keeps a non-numeric concurrency for validation to reject", (): void => {
		expect(parseCLIArgs(["--concurrency", "many"]).concurrency).toBeNaN();
	});

	it("ignores a value flag without a value", (): void => {
		expect(parseCLIArgs(["--policies-dir"]).policiesDir).toBeUndefined();
	});
});

describe("parseCLIArgs: boolean flags", () => {
	it("sets every boolean flag", (): void => {
		const opts = parseCLIArgs(["--preserve", "--write-exceptions", "--no-preflight"]);
		expect(opts.preserve).toBe(true);
		expect(opts.writeExceptions).toBe(true);
		expect(opts.noPreflight).toBe(true);
	});

	it("ignores unknown flags", (): void => {
		expect(parseCLIArgs(["--verbose", "chart"]).chartDir).toBe("chart");
	});
});
