// CHANGE: Evaluate one directory against one policy set and surface the output either way
// WHY: Policy tool output is diagnostic; a passing run is logged, a failing run becomes a reported failure
// PURITY: SHELL
// EFFECT: Effect<boolean, never>
// INVARIANT: Exactly one engine invocation per call; never fails the surrounding run
// COMPLEXITY: O(1) orchestration

import { Console, Effect } from "effect";

import { PolicyFailure } from "../../core/errors.js";
import { outputOrReason } from "../../core/types/index.js";
import type { RunContext } from "../run/context.js";

/**
 * Runs the policy engine for one directory.
 *
 * @param ctx - Run context (engines, failure collector)
 * @param policiesDir - Policy set
 * @param targetDir - Manifests to evaluate
 * @param label - Name shown with the output (fixture, or fixture + rule)
 * @returns true when the engine passed
 *
 * @pure false (spawns the policy engine, logs)
 * @effect Effect<boolean, never>
 */
export function runPolicy(
	ctx: Pick<RunContext, "engines" | "failures">,
	policiesDir: string,
	targetDir: string,
	label: string,
): Effect.Effect<boolean> {
	const engine = ctx.engines.policy;
	return engine.evaluate(policiesDir, targetDir).pipe(
		Effect.map((result) =>
			result.exitCode === 0
				? { passed: true, output: result.output }
				: {
						passed: false,
						output: outputOrReason(
							result.output,
							`${engine.name} exited with status ${result.exitCode}`,
						),
					},
		),
		Effect.catchAll((error) =>
			Effect.succeed({
				passed: false,
				output: `${error.command}: ${error.detail}`,
			}),
		),
		Effect.tap(({ passed, output }) =>
			passed
				? Console.log(`✅ Conftest output (${label}):\n${output}`)
				: ctx.failures.record(new PolicyFailure({ label, output })),
		),
		Effect.map(({ passed }) => passed),
	);
}
