// CHANGE: Configuration type definitions for a tracing run
// WHY: Programmatic options, CLI options and finalized options have different guarantees; each gets a type
// PURITY: CORE
// INVARIANT: Finalized paths are absolute
// COMPLEXITY: O(1)

import type { Effect } from "effect";

/**
 * Extracts embedded manifests of one rendered directory into `targetDir`.
 *
 * @param renderedDir Output directory of one fixture
 * @param targetDir Fresh, empty directory owned by this call
 */
export type RecursionFn = (
	renderedDir: string,
	targetDir: string,
) => Effect.Effect<void, Error>;

/**
 * Called once per rendered directory; may run concurrently with other observers.
 */
export type ObserverFn = (renderedDir: string) => Effect.Effect<void, Error>;

/**
 * Recursion rule as declared by the caller.
 *
 * @property extract Extraction function
 * @property policiesDir Policy directory for the nested pass; defaults to the top-level setting
 */
export interface RecursionRuleInput {
	readonly extract: RecursionFn;
	readonly policiesDir?: string;
}

/**
 * Recursion rule whose options were finalized independently of the top level.
 */
export interface RecursionRule {
	readonly extract: RecursionFn;
	readonly policiesDir: string;
}

/**
 * Options accepted by `lint`.
 *
 * @property chartDir Chart to test (default: current directory)
 * @property fixturesDirs Values directories, relative to the chart unless absolute (default: ["fixtures"])
 * @property policiesDir Policy directory, relative to the chart unless absolute (default: "policies")
 * @property concurrency Size of the run's worker pool (default: 2 × available parallelism)
 * @property preserve Keep the temporary workspace and log its path
 * @property writeExceptions Suppress uncovered branches in the chart instead of reporting them
 */
export interface LintOptions {
	readonly chartDir?: string;
	readonly fixturesDirs?: readonly string[];
	readonly policiesDir?: string;
	readonly concurrency?: number;
	readonly preserve?: boolean;
	readonly writeExceptions?: boolean;
	readonly recursions?: readonly RecursionRuleInput[];
	readonly observers?: readonly ObserverFn[];
}

export interface FinalizedOptions {
	readonly chartDir: string;
	readonly fixturesDirs: readonly string[];
	readonly policiesDir: string;
	readonly concurrency: number;
	readonly preserve: boolean;
	readonly writeExceptions: boolean;
	readonly recursions: readonly RecursionRule[];
	readonly observers: readonly ObserverFn[];
}

/**
 * Options of the command line.
 *
 * @property recurseConfigmaps Manifest paths (relative to each rendered directory) of ConfigMaps to recurse into
 * @property noPreflight Skip the helm/conftest availability check
 */
export interface CLIOptions {
	readonly chartDir: string;
	readonly fixturesDirs: readonly string[];
	readonly policiesDir?: string;
	readonly concurrency?: number;
	readonly recurseConfigmaps: readonly string[];
	readonly preserve: boolean;
	readonly writeExceptions: boolean;
	readonly noPreflight: boolean;
}

/**
 * Rejection of a child process, carrying whatever it printed.
 */
export interface ExecFailure extends Error {
	readonly code?: number | string | null;
	readonly stdout?: string;
	readonly stderr?: string;
}
