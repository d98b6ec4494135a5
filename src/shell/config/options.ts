// CHANGE: Finalize programmatic options into absolute, validated settings
// WHY: Every later stage relies on absolute paths and a positive pool size; setup errors must abort
//      before any work starts
// PURITY: SHELL (reads the filesystem and the environment snapshot it is given)
// EFFECT: Effect<FinalizedOptions, ConfigError>
// INVARIANT: Relative fixture/policy paths resolve against the chart directory, never the cwd
// COMPLEXITY: O(|fixturesDirs| + |recursions|)

import { Effect } from "effect";

import { ConfigError } from "../../core/errors.js";
import type {
	FinalizedOptions,
	LintOptions,
	RecursionRule,
} from "../../core/types/index.js";
import { fsPromises, os, path } from "../../utils/node-mods.js";

export const WRITE_EXCEPTIONS_ENV = "BRANCHTRACE_WRITE_EXCEPTIONS";
export const DEFAULT_FIXTURES_DIR = "fixtures";
export const DEFAULT_POLICIES_DIR = "policies";

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Default pool size: twice the available parallelism.
 *
 * @pure false (reads host parallelism)
 */
export function defaultConcurrency(): number {
	return os.availableParallelism() * 2;
}

/**
 * Resolves a path relative to the chart directory unless it is absolute.
 *
 * @pure true
 * @example chartRelPath("/charts/app", undefined, "fixtures") === "/charts/app/fixtures"
 */
export function chartRelPath(
	chartDir: string,
	value: string | undefined,
	fallback: string,
): string {
	const chosen = value === undefined || value.length === 0 ? fallback : value;
	return path.resolve(chartDir, chosen);
}

/**
 * Exception mode is on when requested explicitly or through the environment.
 *
 * @pure true
 */
export function writeExceptionsEnabled(
	requested: boolean | undefined,
	env: Environment,
): boolean {
	return requested === true || env[WRITE_EXCEPTIONS_ENV] === "true";
}

function validateConcurrency(
	value: number | undefined,
): Effect.Effect<number, ConfigError> {
	if (value === undefined) {
		return Effect.succeed(defaultConcurrency());
	}
	if (!Number.isInteger(value) || value < 1) {
		return Effect.fail(
			new ConfigError({ detail: `concurrency must be a positive integer, got ${value}` }),
		);
	}
	return Effect.succeed(value);
}

function requireDirectory(dir: string): Effect.Effect<void, ConfigError> {
	return Effect.tryPromise({
		try: () => fsPromises.stat(dir),
		catch: (error) =>
			new ConfigError({ detail: `chart directory ${dir}: ${String(error)}` }),
	}).pipe(
		Effect.filterOrFail(
			(stats) => stats.isDirectory(),
			() => new ConfigError({ detail: `chart directory ${dir} is not a directory` }),
		),
		Effect.asVoid,
	);
}

/**
 * Finalizes caller options.
 *
 * CHANGE: Recursion rules are finalized independently
 * WHY: A rule's policy directory defaults to the top-level *setting* (not its resolved value) and is
 *      resolved against the same chart, so nested passes never silently share the top-level policies
 *      unless configured that way
 *
 * @param input - Options as given by the caller
 * @param env - Environment snapshot (usually process.env)
 *
 * @pure false (stats the chart directory)
 * @effect Effect<FinalizedOptions, ConfigError>
 */
export function finalizeOptions(
	input: LintOptions,
	env: Environment,
): Effect.Effect<FinalizedOptions, ConfigError> {
	return Effect.gen(function* () {
		const chartDir = path.resolve(input.chartDir ?? ".");
		yield* requireDirectory(chartDir);
		const concurrency = yield* validateConcurrency(input.concurrency);

		const fixturesDirs =
			input.fixturesDirs === undefined || input.fixturesDirs.length === 0
				? [chartRelPath(chartDir, undefined, DEFAULT_FIXTURES_DIR)]
				: input.fixturesDirs.map((dir) =>
						chartRelPath(chartDir, dir, DEFAULT_FIXTURES_DIR),
					);

		const recursions = (input.recursions ?? []).map(
			(rule): RecursionRule => ({
				extract: rule.extract,
				policiesDir: chartRelPath(
					chartDir,
					rule.policiesDir ?? input.policiesDir,
					DEFAULT_POLICIES_DIR,
				),
			}),
		);

		return {
			chartDir,
			fixturesDirs,
			policiesDir: chartRelPath(chartDir, input.policiesDir, DEFAULT_POLICIES_DIR),
			concurrency,
			preserve: input.preserve === true,
			writeExceptions: writeExceptionsEnabled(input.writeExceptions, env),
			recursions,
			observers: input.observers ?? [],
		};
	});
}
