// CHANGE: Uniform dispatch of post-render actions per rendered directory
// WHY: Policy checks, recursive descent and observers are independent of coverage and of each other;
//      every (output, action) pair is one unit of work on the run pool
// PURITY: SHELL
// EFFECT: Effect<void, never>
// INVARIANT: One action's failure never cancels another; all pairs complete before returning
// COMPLEXITY: O(|outputs| · |actions|) units of work

import { Effect } from "effect";
import { match } from "ts-pattern";

import { ObserverFailure } from "../../core/errors.js";
import type { RenderedOutput } from "../../core/models.js";
import {
	type FinalizedOptions,
	type PostRenderAction,
	toError,
} from "../../core/types/index.js";
import { runPolicy } from "../policy/runner.js";
import { descend } from "../recursion/descent.js";
import type { RunContext } from "../run/context.js";

/**
 * Actions configured for a run: the top-level policy check first, then rules, then observers.
 *
 * @pure true
 */
export function postRenderActions(
	options: FinalizedOptions,
): readonly PostRenderAction[] {
	return [
		{ _tag: "PolicyCheck", policiesDir: options.policiesDir },
		...options.recursions.map(
			(rule, index): PostRenderAction => ({ _tag: "RecursiveDescent", index, rule }),
		),
		...options.observers.map(
			(observe): PostRenderAction => ({ _tag: "Observer", observe }),
		),
	];
}

function observe(
	ctx: Pick<RunContext, "failures">,
	output: RenderedOutput,
	fn: (renderedDir: string) => Effect.Effect<void, Error>,
): Effect.Effect<void> {
	return Effect.suspend(() => fn(output.dir)).pipe(
		Effect.catchAllDefect((defect) => Effect.fail(toError(defect))),
		Effect.catchAll((error) =>
			ctx.failures.record(
				new ObserverFailure({ fixture: output.fixture, detail: error.message }),
			),
		),
	);
}

/**
 * Runs one action against one rendered directory.
 *
 * @pure false
 */
export function runAction(
	ctx: Pick<RunContext, "workspace" | "engines" | "failures">,
	output: RenderedOutput,
	action: PostRenderAction,
): Effect.Effect<void> {
	return match(action)
		.with({ _tag: "PolicyCheck" }, (a) =>
			runPolicy(ctx, a.policiesDir, output.dir, output.fixture).pipe(Effect.asVoid),
		)
		.with({ _tag: "RecursiveDescent" }, (a) => descend(ctx, output, a.rule, a.index))
		.with({ _tag: "Observer" }, (a) => observe(ctx, output, a.observe))
		.exhaustive();
}

/**
 * Submits every (output, action) pair to the run pool and waits for all of them.
 *
 * @param ctx - Run context
 * @param outputs - Rendered directories
 * @param actions - Actions, usually `postRenderActions(ctx.options)`
 *
 * @pure false
 * @effect Effect<void, never> - failures are recorded on ctx.failures
 */
export function runPostRenderActions(
	ctx: Pick<RunContext, "workspace" | "engines" | "failures" | "submit">,
	outputs: readonly RenderedOutput[],
	actions: readonly PostRenderAction[],
): Effect.Effect<void> {
	const units = outputs.flatMap((output) =>
		actions.map((action) => ctx.submit(runAction(ctx, output, action))),
	);
	return Effect.all(units, { concurrency: "unbounded", discard: true });
}
