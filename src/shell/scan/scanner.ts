// CHANGE: Stream rendered YAML files and collect surviving marker tokens
// WHY: Only prefix matching is needed, so lines are streamed rather than parsed as YAML
// PURITY: SHELL
// EFFECT: Effect<ReadonlySet<string>, never>
// INVARIANT: Never writes to scanned files; an unreadable file is reported and skipped
// COMPLEXITY: O(n) where n = total rendered lines

import { Console, Effect } from "effect";

import { ScanFailure } from "../../core/errors.js";
import { parseMarker } from "../../core/instrument/markers.js";
import { toError } from "../../core/types/index.js";
import { createInterface, fs } from "../../utils/node-mods.js";
import { listFiles } from "../fs/walk.js";
import type { RunContext } from "../run/context.js";

/**
 * Reads one file line by line and returns the tokens it carries.
 *
 * @pure false (reads the filesystem)
 * @effect Effect<ReadonlyArray<string>, Error>
 */
export function scanFile(file: string): Effect.Effect<readonly string[], Error> {
	return Effect.tryPromise({
		try: async () => {
			const tokens: string[] = [];
			const lines = createInterface({
				input: fs.createReadStream(file, { encoding: "utf8" }),
				crlfDelay: Number.POSITIVE_INFINITY,
			});
			for await (const line of lines) {
				const token = parseMarker(line);
				if (token !== null) {
					tokens.push(token);
				}
			}
			return tokens;
		},
		catch: toError,
	});
}

/**
 * Collects every marker token that survived rendering below `root`.
 *
 * @param ctx - Run context (pool, failure collector)
 * @param root - Results directory of the run
 * @returns Set of surviving tokens; duplicates across fixtures collapse
 *
 * @pure false
 * @effect Effect<ReadonlySet<string>, never> - scan problems are recorded as ScanFailure
 */
export function scanMarkers(
	ctx: Pick<RunContext, "submit" | "failures">,
	root: string,
): Effect.Effect<ReadonlySet<string>> {
	return Effect.gen(function* () {
		const files = yield* listFiles(root).pipe(
			Effect.catchAll((error) =>
				ctx.failures
					.record(new ScanFailure({ path: root, detail: error.message }))
					.pipe(Effect.as<readonly string[]>([])),
			),
		);

		const perFile = yield* Effect.forEach(
			files,
			(file) =>
				ctx.submit(
					scanFile(file).pipe(
						Effect.catchAll((error) =>
							ctx.failures
								.record(new ScanFailure({ path: file, detail: error.message }))
								.pipe(Effect.as<readonly string[]>([])),
						),
					),
				),
			{ concurrency: "unbounded" },
		);

		const surviving = new Set(perFile.flat());
		yield* Console.log(
			`🔎 Found ${surviving.size} distinct markers in ${files.length} rendered files`,
		);
		return surviving;
	});
}
