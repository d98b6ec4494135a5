// CHANGE: Engine seams for the external renderer and policy tool
// WHY: helm and conftest are opaque collaborators; tests swap in-process fakes behind the same interface
// PURITY: CORE (types only)
// INVARIANT: A process that ran (any exit status) yields CommandResult; only spawn failures are ExecError
// COMPLEXITY: O(1)

import type { Effect } from "effect";

import type { ExecError } from "../errors.js";

/**
 * Exit status and combined output (stdout, then stderr) of a finished process.
 */
export interface CommandResult {
	readonly exitCode: number;
	readonly output: string;
}

/**
 * Renders a chart with one values file into one output directory.
 */
export interface ChartRenderer {
	readonly name: string;
	readonly render: (
		chartDir: string,
		fixturePath: string,
		outputDir: string,
	) => Effect.Effect<CommandResult, ExecError>;
}

/**
 * Evaluates a policy set against a directory of manifests.
 */
export interface PolicyEngine {
	readonly name: string;
	readonly evaluate: (
		policiesDir: string,
		targetDir: string,
	) => Effect.Effect<CommandResult, ExecError>;
}

export interface Engines {
	readonly renderer: ChartRenderer;
	readonly policy: PolicyEngine;
}
