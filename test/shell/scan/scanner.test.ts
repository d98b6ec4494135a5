import * as path from "node:path";

import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ScanFailure } from "../../../src/core/errors.js";
import { makeFailureCollector } from "../../../src/shell/run/context.js";
import { scanFile, scanMarkers } from "../../../src/shell/scan/scanner.js";
import { direct } from "../../utils/context.js";
import { createTempDir, type TempDir, writeTree } from "../../utils/tempChart.js";

describe("scanMarkers", () => {
	let temp: TempDir;

	beforeEach(() => {
		temp = createTempDir();
		writeTree(temp.dir, {
			"all/app/templates/a.yaml": "a: 1\n# branchtrace: t1\nscript: |\n  # branchtrace: t2\n",
			"partial/app/templates/a.yaml": "a: 1\n# branchtrace: t1\n",
			"partial/app/templates/NOTES.txt": "# branchtrace: t9\n",
		});
	});

	afterEach(() => {
		temp.cleanup();
	});

	it("reads the tokens of one file in order", async () => {
		const tokens = await Effect.runPromise(
			scanFile(path.join(temp.dir, "all/app/templates/a.yaml")),
		);
		expect(tokens).toEqual(["t1", "t2"]);
	});

	it("collapses tokens across outputs and only scans YAML files", async () => {
		const failures = await Effect.runPromise(makeFailureCollector());
		const surviving = await Effect.runPromise(
			scanMarkers({ ...direct, failures }, temp.dir),
		);

		expect([...surviving].sort()).toEqual(["t1", "t2"]);
		expect(await Effect.runPromise(failures.drain)).toEqual([]);
	});

	it("records an unreadable root and returns an empty set", async () => {
		const failures = await Effect.runPromise(makeFailureCollector());
		const missing = path.join(temp.dir, "missing");
		const surviving = await Effect.runPromise(scanMarkers({ ...direct, failures }, missing));

		expect(surviving.size).toBe(0);
		const recorded = await Effect.runPromise(failures.drain);
		expect(recorded).toHaveLength(1);
		expect(recorded[0]).toBeInstanceOf(ScanFailure);
	});
});
