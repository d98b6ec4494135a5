// CHANGE: Domain models for branch tracing (pure, immutable)
// WHY: Declarations, registries and reports cross every stage; CORE owns their shape
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

import type { RunFailure } from "./errors.js";

/**
 * Exit code for the linter process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * A conditional-branch opening found in a source template.
 *
 * @property file Path relative to the instrumented root
 * @property line Zero-based line number in the source file
 * @property source Trimmed text of the declaring line
 */
export interface Declaration {
	readonly file: string;
	readonly line: number;
	readonly source: string;
}

/**
 * Token → declaration. Frozen before rendering starts.
 */
export type DeclarationRegistry = ReadonlyMap<string, Declaration>;

/**
 * Values file driving one render.
 */
export interface Fixture {
	readonly name: string;
	readonly path: string;
}

/**
 * One rendered chart directory, produced from exactly one fixture.
 */
export interface RenderedOutput {
	readonly fixture: string;
	readonly dir: string;
}

/**
 * Result of the reconciler for one run.
 */
export interface CoverageSummary {
	readonly declarations: number;
	readonly covered: number;
	readonly uncovered: readonly Declaration[];
}

/**
 * Everything a caller needs to judge one run.
 *
 * @remarks
 * - `failures` holds the reported (non-fatal) problems; fatal problems fail the Effect instead
 * - `exceptionsWritten` > 0 only when exception mode was enabled
 */
export interface LintReport {
	readonly outputs: readonly RenderedOutput[];
	readonly declarations: number;
	readonly covered: number;
	readonly survivingMarkers: number;
	readonly exceptionsWritten: number;
	readonly failures: readonly RunFailure[];
}

/**
 * Minimal decision state for producing exit code from a run.
 *
 * @remarks
 * - @pure true
 * - @invariant state is immutable
 */
export interface DecisionState {
	readonly fatal: boolean;
	readonly reportedFailures: number;
}
