// CHANGE: Print the outcome of a run
// WHY: The report is a value; printing it is the only console concern left after the pipeline finished
// PURITY: SHELL
// EFFECT: Effect<void, never>
// COMPLEXITY: O(|failures|)

import { Console, Effect } from "effect";

import type { FatalError } from "../../core/errors.js";
import { formatFailure, formatFatal } from "../../core/format/failure.js";
import type { LintReport } from "../../core/models.js";

/**
 * One-line summary of a report.
 *
 * @pure true
 */
export function summaryLine(report: LintReport): string {
	const coverage = `${report.covered}/${report.declarations} branches covered across ${report.outputs.length} fixture(s)`;
	if (report.failures.length > 0) {
		return `❌ ${report.failures.length} problem(s) found; ${coverage}`;
	}
	const exceptions =
		report.exceptionsWritten > 0
			? `, ${report.exceptionsWritten} exception(s) written`
			: "";
	return `✅ No problems found; ${coverage}${exceptions}`;
}

/**
 * Prints every reported failure followed by the summary.
 *
 * @pure false (console output)
 */
export function printReport(report: LintReport): Effect.Effect<void> {
	return Effect.gen(function* () {
		if (report.failures.length > 0) {
			yield* Console.error(`\n=== Failures (${report.failures.length}) ===`);
			for (const failure of report.failures) {
				yield* Console.error(`\n${formatFailure(failure)}`);
			}
		}
		yield* Console.log(`\n${summaryLine(report)}`);
	});
}

/**
 * Prints a problem that aborted the run.
 *
 * @pure false (console output)
 */
export function printFatal(error: FatalError): Effect.Effect<void> {
	return Console.error(`\n❌ ${formatFatal(error)}`);
}
