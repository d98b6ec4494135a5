// CHANGE: Public API entry point for library consumers
// WHY: Export the APP orchestration, the extraction helpers and the pure CORE utilities; keep SHELL internals private
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either Effects, pure functions or typed interfaces
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Runs instrumentation, rendering, coverage and policy checks for one chart.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { lint, recurseConfigmap } from "branchtrace";
 *
 * const report = await Effect.runPromise(
 *   lint({
 *     chartDir: "charts/app",
 *     fixturesDirs: ["ci/values"],
 *     recursions: [{ extract: recurseConfigmap("app/templates/bundle.yaml"), policiesDir: "bundle-policies" }],
 *   }),
 * );
 *
 * if (report.failures.length === 0) {
 *   console.log("✅ Every branch rendered, every policy passed");
 * }
 * ```
 */
export {
	defaultEngines,
	lint,
	lintOptionsFromCLI,
	runLinter,
	runLinterEffect,
} from "./app/runLinter.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// EXTENSION POINTS
// ═══════════════════════════════════════════════════════════════════════════════

export { recurseConfigmap } from "./shell/recursion/configmap.js";
export { helmRenderer } from "./shell/render/helm.js";
export { conftestEngine } from "./shell/policy/conftest.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	CoverageSummary,
	Declaration,
	DeclarationRegistry,
	ExitCode,
	Fixture,
	LintReport,
	RenderedOutput,
} from "./core/models.js";
export type {
	ChartRenderer,
	CLIOptions,
	CommandResult,
	Engines,
	LintOptions,
	ObserverFn,
	PolicyEngine,
	RecursionFn,
	RecursionRuleInput,
} from "./core/types/index.js";
export {
	ConfigError,
	ExceptionWriteFailure,
	ExecError,
	type FatalError,
	InstrumentationError,
	ObserverFailure,
	PolicyFailure,
	RecursionFailure,
	RenderError,
	RenderFailed,
	type RunFailure,
	ScanFailure,
	UncoveredBranch,
	WorkspaceError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE UTILITIES (Pure Functions)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	findIndentation,
	isDeclaration,
	isSuppressed,
	SUPPRESSION_ANNOTATION,
} from "./core/classify/line-classifier.js";
export { instrumentContent, suppressContent } from "./core/instrument/inject.js";
export { coveragePercent, reconcile } from "./core/coverage/reconcile.js";
export { computeExitCode } from "./core/decision.js";
export { formatFailure, formatFatal } from "./core/format/failure.js";
export { parseCLIArgs, WRITE_EXCEPTIONS_ENV } from "./shell/config/index.js";
