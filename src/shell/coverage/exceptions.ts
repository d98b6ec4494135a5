// CHANGE: Write suppression annotations for uncovered branches into the ORIGINAL chart
// WHY: Opt-in workflow that turns today's uncovered branches into explicit, reviewable exclusions
// PURITY: SHELL
// EFFECT: Effect<number, never>
// INVARIANT: Only uncovered declarations are touched; each file is read and written once
// COMPLEXITY: O(n) per file where n = lines in the file

import { Console, Effect } from "effect";

import { groupByFile } from "../../core/coverage/reconcile.js";
import { ExceptionWriteFailure } from "../../core/errors.js";
import { suppressContent } from "../../core/instrument/inject.js";
import type { Declaration } from "../../core/models.js";
import { toError } from "../../core/types/index.js";
import { fsPromises, path } from "../../utils/node-mods.js";
import type { RunContext } from "../run/context.js";

/**
 * Adds `# branchtrace:ignore` above the given lines of one file.
 *
 * @param file - Absolute path of the original template
 * @param lines - Zero-based declaration lines
 *
 * @pure false (rewrites the file)
 */
export function suppressFile(
	file: string,
	lines: readonly number[],
): Effect.Effect<void, Error> {
	return Effect.gen(function* () {
		const content = yield* Effect.tryPromise({
			try: () => fsPromises.readFile(file, "utf8"),
			catch: toError,
		});
		yield* Effect.tryPromise({
			try: () => fsPromises.writeFile(file, suppressContent(content, lines), "utf8"),
			catch: toError,
		});
	});
}

/**
 * Writes exceptions for every uncovered declaration, grouped by file.
 *
 * @param ctx - Run context (pool, failure collector)
 * @param chartDir - Original chart; declaration paths are relative to it
 * @param uncovered - Declarations without a surviving marker
 * @returns Number of exceptions written
 *
 * @pure false
 * @effect Effect<number, never> - write problems are recorded as ExceptionWriteFailure
 */
export function writeExceptions(
	ctx: Pick<RunContext, "submit" | "failures">,
	chartDir: string,
	uncovered: readonly Declaration[],
): Effect.Effect<number> {
	return Effect.forEach(
		groupByFile(uncovered),
		([relative, lines]) => {
			const file = path.join(chartDir, relative);
			return ctx.submit(suppressFile(file, lines)).pipe(
				Effect.tap(() =>
					Console.log(
						`✍️  Wrote ${lines.length} exception(s) to ${relative} (lines ${lines
							.map((l) => l + 1)
							.join(", ")})`,
					),
				),
				Effect.as(lines.length),
				Effect.catchAll((error) =>
					ctx.failures
						.record(new ExceptionWriteFailure({ path: file, detail: error.message }))
						.pipe(Effect.as(0)),
				),
			);
		},
		{ concurrency: "unbounded" },
	).pipe(Effect.map((counts) => counts.reduce((sum, n) => sum + n, 0)));
}
