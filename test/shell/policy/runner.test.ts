import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { PolicyFailure } from "../../../src/core/errors.js";
import type { PolicyEngine } from "../../../src/core/types/index.js";
import { conftestArgs } from "../../../src/shell/policy/conftest.js";
import { runPolicy } from "../../../src/shell/policy/runner.js";
import { type FailureCollector, makeFailureCollector } from "../../../src/shell/run/context.js";
import {
	makeFakePolicyEngine,
	makeMissingPolicyEngine,
	unusedRenderer,
} from "../../utils/fakeEngines.js";
import { createTempDir, type TempDir } from "../../utils/tempChart.js";

describe("conftestArgs", () => {
	it("passes the policy directory and the target", () => {
		expect(conftestArgs("/c/policies", "/w/results/prod")).toEqual([
			"test",
			"--policy",
			"/c/policies",
			"/w/results/prod",
		]);
	});
});

describe("runPolicy", () => {
	let temp: TempDir;
	let failures: FailureCollector;

	beforeEach(async () => {
		temp = createTempDir();
		failures = await Effect.runPromise(makeFailureCollector());
	});

	afterEach(() => {
		temp.cleanup();
	});

	const run = (policy: PolicyEngine, policiesDir: string): Promise<boolean> =>
		Effect.runPromise(
			runPolicy(
				{ engines: { renderer: unusedRenderer, policy }, failures },
				policiesDir,
				temp.dir,
				"prod",
			),
		);

	it("passes without recording anything", async () => {
		const policy = makeFakePolicyEngine();

		expect(await run(policy, "/c/policies")).toBe(true);
		expect(policy.calls).toEqual([{ policiesDir: "/c/policies", targetDir: temp.dir, files: [] }]);
		expect(await Effect.runPromise(failures.drain)).toEqual([]);
	});

	it("logs the engine output under the fixture label", async () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

		await run(makeFakePolicyEngine(), "/c/policies");

		expect(log).toHaveBeenCalledWith("✅ Conftest output (prod):\n0 file(s) passed\n");
	});

	it("records the engine output when the policies reject", async () => {
		expect(await run(makeFakePolicyEngine(), "/c/bad-policies")).toBe(false);
		expect(await Effect.runPromise(failures.drain)).toEqual([
			new PolicyFailure({ label: "prod", output: "FAIL - 0 file(s) denied\n" }),
		]);
	});

	it("records a spawn failure as a policy failure", async () => {
		expect(await run(makeMissingPolicyEngine(), "/c/policies")).toBe(false);
		expect(await Effect.runPromise(failures.drain)).toEqual([
			new PolicyFailure({ label: "prod", output: "conftest test: spawn conftest ENOENT" }),
		]);
	});
});
