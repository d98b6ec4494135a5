// CHANGE: Render failures as line-anchored text
// WHY: Every reported problem must be actionable on its own (file + line + source where known)
// PURITY: CORE
// INVARIANT: Exhaustive over RunFailure and FatalError tags
// COMPLEXITY: O(|output|)

import { match } from "ts-pattern";

import type { FatalError, RunFailure } from "../errors.js";

export const UNCOVERED_BRANCH_MESSAGE =
	"Branch was not found in the rendered chart output";

/**
 * Formats a reported failure. Lines are shown 1-based.
 *
 * @pure true
 *
 * @example
 * ```ts
 * formatFailure(new UncoveredBranch({ file: "templates/a.yaml", line: 4, source: "{{ if .Values.x }}" }));
 * // "Branch was not found in the rendered chart output:\n  templates/a.yaml:5\n  {{ if .Values.x }}"
 * ```
 */
export function formatFailure(failure: RunFailure): string {
	return match(failure)
		.with(
			{ _tag: "UncoveredBranch" },
			(f) => `${UNCOVERED_BRANCH_MESSAGE}:\n  ${f.file}:${f.line + 1}\n  ${f.source}`,
		)
		.with(
			{ _tag: "PolicyFailure" },
			(f) => `Conftest failure (${f.label}):\n${f.output}`,
		)
		.with(
			{ _tag: "RecursionFailure" },
			(f) =>
				`Recursion rule #${f.rule + 1} failed for fixture "${f.fixture}": ${f.detail}`,
		)
		.with(
			{ _tag: "ScanFailure" },
			(f) => `Unable to scan ${f.path} for markers: ${f.detail}`,
		)
		.with(
			{ _tag: "ObserverFailure" },
			(f) => `Observer failed for fixture "${f.fixture}": ${f.detail}`,
		)
		.with(
			{ _tag: "ExceptionWriteFailure" },
			(f) => `Unable to write exceptions to ${f.path}: ${f.detail}`,
		)
		.exhaustive();
}

/**
 * Formats an error that aborted the run.
 *
 * @pure true
 */
export function formatFatal(error: FatalError): string {
	return match(error)
		.with({ _tag: "ConfigError" }, (e) => `Invalid configuration: ${e.detail}`)
		.with(
			{ _tag: "WorkspaceError" },
			(e) => `Workspace error at ${e.path}: ${e.detail}`,
		)
		.with(
			{ _tag: "InstrumentationError" },
			(e) => `Instrumenting ${e.path} failed: ${e.detail}`,
		)
		.with({ _tag: "RenderFailed" }, (e) =>
			e.failures
				.map(
					(f) => `Rendering chart with fixture "${f.fixture}" failed:\n${f.output}`,
				)
				.join("\n"),
		)
		.exhaustive();
}
