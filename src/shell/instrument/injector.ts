// CHANGE: Instrument every template of the chart copy and build the declaration registry
// WHY: Markers are the only link between a source branch and the rendered output
// PURITY: SHELL
// EFFECT: Effect<DeclarationRegistry, InstrumentationError>
// INVARIANT: |registry| = Σ_files |declarations(file)|; tokens are unique within the run
// COMPLEXITY: O(n) where n = total template lines; files processed in parallel on the run pool

import { Console, Effect, Ref } from "effect";
import { v4 as uuidv4 } from "uuid";

import { InstrumentationError } from "../../core/errors.js";
import { instrumentContent } from "../../core/instrument/inject.js";
import type { Declaration, DeclarationRegistry } from "../../core/models.js";
import { fsPromises, path } from "../../utils/node-mods.js";
import { listFiles } from "../fs/walk.js";
import type { RunContext } from "../run/context.js";

type RegistryEntry = readonly [string, Declaration];

function readTemplate(file: string): Effect.Effect<string, InstrumentationError> {
	return Effect.tryPromise({
		try: () => fsPromises.readFile(file, "utf8"),
		catch: (error) =>
			new InstrumentationError({ path: file, detail: String(error) }),
	});
}

function writeTemplate(
	file: string,
	content: string,
): Effect.Effect<void, InstrumentationError> {
	return Effect.tryPromise({
		try: () => fsPromises.writeFile(file, content, "utf8"),
		catch: (error) =>
			new InstrumentationError({ path: file, detail: String(error) }),
	});
}

/**
 * Appends the entries of one file to the registry in a single atomic update.
 *
 * @invariant fails instead of overwriting when a token is already registered
 */
function register(
	registry: Ref.Ref<ReadonlyMap<string, Declaration>>,
	file: string,
	entries: readonly RegistryEntry[],
): Effect.Effect<void, InstrumentationError> {
	return Ref.modify(
		registry,
		(current): readonly [string | null, ReadonlyMap<string, Declaration>] => {
			const next = new Map(current);
			for (const [token, declaration] of entries) {
				if (next.has(token)) {
					return [token, current];
				}
				next.set(token, declaration);
			}
			return [null, next];
		},
	).pipe(
		Effect.flatMap((duplicate) =>
			duplicate === null
				? Effect.void
				: Effect.fail(
						new InstrumentationError({
							path: file,
							detail: `duplicate marker token ${duplicate}`,
						}),
					),
		),
	);
}

/**
 * Instruments one file. File-local work needs no coordination; only the registry update does.
 */
function instrumentFile(
	root: string,
	file: string,
	registry: Ref.Ref<ReadonlyMap<string, Declaration>>,
	nextToken: () => string,
): Effect.Effect<void, InstrumentationError> {
	return Effect.gen(function* () {
		const original = yield* readTemplate(file);
		const { content, declarations } = instrumentContent(original, nextToken);
		if (declarations.length === 0) {
			return;
		}

		yield* writeTemplate(file, content);

		const relative = path.relative(root, file);
		yield* register(
			registry,
			file,
			declarations.map(
				(d): RegistryEntry => [
					d.token,
					{ file: relative, line: d.line, source: d.source },
				],
			),
		);
	});
}

/**
 * Injects a marker after every traced declaration below `root`.
 *
 * @param ctx - Run context (pool)
 * @param root - Private chart copy; rewritten in place
 * @param nextToken - Token generator, UUID v4 by default
 * @returns Frozen registry token → declaration
 *
 * @pure false (rewrites files)
 * @effect Effect<DeclarationRegistry, InstrumentationError>
 * @invariant the first read/write failure fails the run; files already written stay written
 */
export function injectMarkers(
	ctx: Pick<RunContext, "submit">,
	root: string,
	nextToken: () => string = () => uuidv4(),
): Effect.Effect<DeclarationRegistry, InstrumentationError> {
	return Effect.gen(function* () {
		const files = yield* listFiles(root).pipe(
			Effect.mapError(
				(error) => new InstrumentationError({ path: root, detail: error.message }),
			),
		);
		const registry = yield* Ref.make<ReadonlyMap<string, Declaration>>(
			new Map(),
		);

		yield* Effect.forEach(
			files,
			(file) => ctx.submit(instrumentFile(root, file, registry, nextToken)),
			{ concurrency: "unbounded", discard: true },
		);

		const frozen = yield* Ref.get(registry);
		yield* Console.log(
			`📌 Instrumented ${frozen.size} conditional branches in ${files.length} files`,
		);
		return frozen;
	});
}
