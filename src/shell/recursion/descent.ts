// CHANGE: Recursive descent into manifests embedded in rendered output
// WHY: Embedded manifests are already rendered; they only need extraction and a nested policy pass
//      under the rule's own policy directory
// PURITY: SHELL
// EFFECT: Effect<void, never>
// INVARIANT: Empty extraction → no policy invocation; non-empty → exactly one, against the target directory
// COMPLEXITY: O(1) orchestration per (output, rule)

import { Console, Effect } from "effect";

import { RecursionFailure } from "../../core/errors.js";
import type { RenderedOutput } from "../../core/models.js";
import { type RecursionRule, toError } from "../../core/types/index.js";
import { path } from "../../utils/node-mods.js";
import { isEmptyDirectory } from "../fs/walk.js";
import { runPolicy } from "../policy/runner.js";
import type { RunContext } from "../run/context.js";
import { ensureDir } from "../workspace/workspace.js";

/**
 * Fresh target directory of one (rule, output) pair.
 *
 * @pure true
 */
export function recursionTargetDir(
	recursionsDir: string,
	ruleIndex: number,
	output: RenderedOutput,
): string {
	return path.join(recursionsDir, `rule-${ruleIndex}`, output.fixture);
}

/**
 * Applies one recursion rule to one rendered directory.
 *
 * @param ctx - Run context (workspace, engines, failure collector)
 * @param output - Rendered directory of one fixture
 * @param rule - Extraction function and finalized policy directory
 * @param ruleIndex - Position of the rule, used in labels and directory names
 *
 * @pure false (writes the target directory, spawns the policy engine)
 * @effect Effect<void, never> - extraction problems are recorded as RecursionFailure
 */
export function descend(
	ctx: Pick<RunContext, "workspace" | "engines" | "failures">,
	output: RenderedOutput,
	rule: RecursionRule,
	ruleIndex: number,
): Effect.Effect<void> {
	const targetDir = recursionTargetDir(ctx.workspace.recursionsDir, ruleIndex, output);
	const label = `${output.fixture} → recursion #${ruleIndex + 1}`;

	return Effect.gen(function* () {
		yield* ensureDir(targetDir).pipe(
			Effect.mapError((error) => new Error(error.detail)),
		);
		yield* Effect.suspend(() => rule.extract(output.dir, targetDir)).pipe(
			Effect.catchAllDefect((defect) => Effect.fail(toError(defect))),
		);

		if (yield* isEmptyDirectory(targetDir)) {
			yield* Console.log(`↪️  Nothing extracted for ${label}`);
			return;
		}
		yield* runPolicy(ctx, rule.policiesDir, targetDir, label);
	}).pipe(
		Effect.catchAll((error) =>
			ctx.failures.record(
				new RecursionFailure({
					fixture: output.fixture,
					rule: ruleIndex,
					detail: error.message,
				}),
			),
		),
	);
}
