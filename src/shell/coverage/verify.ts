// CHANGE: Coverage stage of a run: report every uncovered branch, or suppress them on request
// WHY: Every omission is independently actionable, so all of them are reported, never just the first
// PURITY: SHELL
// EFFECT: Effect<CoverageOutcome, never>
// INVARIANT: writeExceptions=false → |reported| = |uncovered|; writeExceptions=true → nothing reported
// COMPLEXITY: O(|registry|)

import { Console, Effect } from "effect";

import { coveragePercent, reconcile } from "../../core/coverage/reconcile.js";
import { UncoveredBranch } from "../../core/errors.js";
import type { CoverageSummary, DeclarationRegistry } from "../../core/models.js";
import type { RunContext } from "../run/context.js";
import { writeExceptions } from "./exceptions.js";

export interface CoverageOutcome {
	readonly summary: CoverageSummary;
	readonly exceptionsWritten: number;
}

/**
 * Reconciles the registry with the surviving markers.
 *
 * @param ctx - Run context; `options.writeExceptions` selects the mode
 * @param registry - Frozen registry
 * @param surviving - Tokens found in the rendered outputs
 *
 * @pure false (records failures or rewrites the original chart)
 */
export function verifyCoverage(
	ctx: Pick<RunContext, "options" | "submit" | "failures">,
	registry: DeclarationRegistry,
	surviving: ReadonlySet<string>,
): Effect.Effect<CoverageOutcome> {
	return Effect.gen(function* () {
		const summary = reconcile(registry, surviving);
		yield* Console.log(
			`📊 Branch coverage: ${summary.covered}/${summary.declarations} (${coveragePercent(summary)}%)`,
		);

		if (ctx.options.writeExceptions) {
			const exceptionsWritten = yield* writeExceptions(
				ctx,
				ctx.options.chartDir,
				summary.uncovered,
			);
			return { summary, exceptionsWritten };
		}

		yield* Effect.forEach(
			summary.uncovered,
			(declaration) => ctx.failures.record(new UncoveredBranch(declaration)),
			{ discard: true },
		);
		return { summary, exceptionsWritten: 0 };
	});
}
