// CHANGE: Pure decision function mapping a run outcome to an exit code
// WHY: Centralize termination logic in Functional Core; the BIN is the only place that exits
// FORMAT THEOREM: ∀s ∈ State: (s.fatal ∨ s.reportedFailures > 0) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { DecisionState, ExitCode, LintReport } from "./models.js";

/**
 * Computes process exit code from the run state.
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 *
 * @example
 * ```ts
 * computeExitCode({ fatal: false, reportedFailures: 2 }); // 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.fatal || s.reportedFailures > 0,
		(failed): ExitCode => (failed ? 1 : 0),
	);

/**
 * Decision state of a run that reached the report stage.
 *
 * @pure true
 */
export const decisionOf = (report: LintReport): DecisionState => ({
	fatal: false,
	reportedFailures: report.failures.length,
});
