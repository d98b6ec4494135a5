// CHANGE: Typed error ADT for the tracing pipeline using Effect.Data
// WHY: Fatal prerequisites (setup, instrumentation, render) and reported problems (coverage, policy,
//      recursion) need distinct, typed variants so the APP can decide what aborts the run
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Invalid configuration (missing chart, bad concurrency, ...).
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly detail: string;
}> {}

/**
 * Temporary workspace could not be created or populated.
 *
 * @pure true (Data class)
 */
export class WorkspaceError extends Data.TaggedError("WorkspaceError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Reading or rewriting a template of the private chart copy failed.
 *
 * @pure true (Data class)
 */
export class InstrumentationError extends Data.TaggedError(
	"InstrumentationError",
)<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * External process could not be spawned or was killed before exiting.
 *
 * @pure true (Data class)
 * @invariant command.length > 0
 */
export class ExecError extends Data.TaggedError("ExecError")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * One fixture failed to render.
 *
 * @pure true (Data class)
 */
export class RenderError extends Data.TaggedError("RenderError")<{
	readonly fixture: string;
	readonly output: string;
}> {}

/**
 * At least one fixture failed to render; all in-flight renders were allowed to finish.
 *
 * @pure true (Data class)
 * @invariant failures.length > 0
 */
export class RenderFailed extends Data.TaggedError("RenderFailed")<{
	readonly failures: readonly RenderError[];
}> {}

/**
 * A declaration whose marker survived in no rendered output.
 *
 * @pure true (Data class)
 */
export class UncoveredBranch extends Data.TaggedError("UncoveredBranch")<{
	readonly file: string;
	readonly line: number;
	readonly source: string;
}> {}

/**
 * Policy engine rejected one rendered directory.
 *
 * @pure true (Data class)
 */
export class PolicyFailure extends Data.TaggedError("PolicyFailure")<{
	readonly label: string;
	readonly output: string;
}> {}

/**
 * Extraction for one (output, rule) pair failed.
 *
 * @pure true (Data class)
 */
export class RecursionFailure extends Data.TaggedError("RecursionFailure")<{
	readonly fixture: string;
	readonly rule: number;
	readonly detail: string;
}> {}

/**
 * A rendered file could not be scanned for markers.
 *
 * @pure true (Data class)
 */
export class ScanFailure extends Data.TaggedError("ScanFailure")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * A caller-supplied observer failed for one rendered directory.
 *
 * @pure true (Data class)
 */
export class ObserverFailure extends Data.TaggedError("ObserverFailure")<{
	readonly fixture: string;
	readonly detail: string;
}> {}

/**
 * Suppression annotations could not be written back to the original chart.
 *
 * @pure true (Data class)
 */
export class ExceptionWriteFailure extends Data.TaggedError(
	"ExceptionWriteFailure",
)<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Problems that are collected and reported; the run continues past them.
 */
export type RunFailure =
	| UncoveredBranch
	| PolicyFailure
	| RecursionFailure
	| ScanFailure
	| ObserverFailure
	| ExceptionWriteFailure;

/**
 * Problems that abort the run.
 */
export type FatalError =
	| ConfigError
	| WorkspaceError
	| InstrumentationError
	| RenderFailed;
