// CHANGE: Application layer orchestration of a tracing run
// WHY: APP composes the CORE decisions with the SHELL stages; the BIN is the only place that exits
// PURITY: APP (no process.exit here)
// EFFECT: Effect<LintReport, FatalError>
// INVARIANT: Fatal errors abort before post-render work; reported failures never abort sibling work
// COMPLEXITY: O(t + f·a) where t = templates, f = fixtures, a = post-render actions

import { Effect } from "effect";

import { computeExitCode, decisionOf } from "../core/decision.js";
import type { FatalError } from "../core/errors.js";
import type { ExitCode, LintReport } from "../core/models.js";
import type {
	CLIOptions,
	Engines,
	LintOptions,
} from "../core/types/index.js";
import { postRenderActions, runPostRenderActions } from "../shell/actions/post-render.js";
import { type Environment, finalizeOptions } from "../shell/config/index.js";
import { verifyCoverage } from "../shell/coverage/verify.js";
import { injectMarkers } from "../shell/instrument/injector.js";
import { printFatal, printReport } from "../shell/output/printer.js";
import { conftestEngine } from "../shell/policy/conftest.js";
import { recurseConfigmap } from "../shell/recursion/configmap.js";
import { discoverFixtures } from "../shell/render/fixtures.js";
import { helmRenderer } from "../shell/render/helm.js";
import { renderFixtures } from "../shell/render/orchestrator.js";
import { makeRunContext } from "../shell/run/context.js";
import { scanMarkers } from "../shell/scan/scanner.js";
import {
	checkDependencies,
	reportMissingDependencies,
} from "../shell/utils/dependencies.js";
import { copyChart, makeWorkspace } from "../shell/workspace/workspace.js";

export const defaultEngines: Engines = {
	renderer: helmRenderer,
	policy: conftestEngine,
};

/**
 * Runs the whole pipeline for one chart.
 *
 * Stages: finalize options → discover fixtures → copy chart → instrument → render every fixture → scan markers →
 * (coverage ∥ post-render actions). The temporary workspace is released when the Effect ends,
 * whichever way it ends.
 *
 * @param options - Caller options (see LintOptions)
 * @param engines - Renderer and policy engine (default: helm and conftest)
 * @param env - Environment snapshot, consulted for BRANCHTRACE_WRITE_EXCEPTIONS
 * @returns Report of the run; fatal problems fail the Effect instead
 *
 * @pure false
 * @effect Effect<LintReport, FatalError>
 *
 * @example
 * ```ts
 * const report = await Effect.runPromise(
 *   lint({ chartDir: "charts/app", recursions: [{ extract: recurseConfigmap("app/templates/cm.yaml") }] }),
 * );
 * ```
 */
export function lint(
	options: LintOptions,
	engines: Engines = defaultEngines,
	env: Environment = process.env,
): Effect.Effect<LintReport, FatalError> {
	return Effect.scoped(
		Effect.gen(function* () {
			const finalized = yield* finalizeOptions(options, env);
			const fixtures = yield* discoverFixtures(finalized.fixturesDirs);
			const workspace = yield* makeWorkspace(finalized.preserve);
			const ctx = yield* makeRunContext(finalized, engines, workspace);

			yield* copyChart(finalized.chartDir, workspace);
			const registry = yield* injectMarkers(ctx, workspace.chartDir);
			const outputs = yield* renderFixtures(ctx, fixtures);
			const surviving = yield* scanMarkers(ctx, workspace.resultsDir);

			const [coverage] = yield* Effect.all(
				[
					verifyCoverage(ctx, registry, surviving),
					runPostRenderActions(ctx, outputs, postRenderActions(finalized)),
				],
				{ concurrency: "unbounded" },
			);
			const failures = yield* ctx.failures.drain;

			return {
				outputs,
				declarations: coverage.summary.declarations,
				covered: coverage.summary.covered,
				survivingMarkers: surviving.size,
				exceptionsWritten: coverage.exceptionsWritten,
				failures,
			};
		}),
	);
}

/**
 * Maps command-line options onto LintOptions.
 *
 * @pure true
 */
export function lintOptionsFromCLI(cli: CLIOptions): LintOptions {
	return {
		chartDir: cli.chartDir,
		fixturesDirs: cli.fixturesDirs,
		preserve: cli.preserve,
		writeExceptions: cli.writeExceptions,
		recursions: cli.recurseConfigmaps.map((manifest) => ({
			extract: recurseConfigmap(manifest),
		})),
		...(cli.policiesDir === undefined ? {} : { policiesDir: cli.policiesDir }),
		...(cli.concurrency === undefined ? {} : { concurrency: cli.concurrency }),
	};
}

/**
 * Ensure helm and conftest are installed. Returns boolean success.
 *
 * @pure false (executes checks, console output)
 */
function haveCliDependencies(): Effect.Effect<boolean> {
	return Effect.gen(function* () {
		const depCheck = yield* checkDependencies();
		if (!depCheck.allAvailable) {
			yield* reportMissingDependencies(depCheck.missing);
			return false;
		}
		return true;
	});
}

/**
 * Command-line run: preflight, lint, print, decide.
 *
 * @param cliOptions - Parsed command line
 * @param engines - Renderer and policy engine (default: helm and conftest)
 * @returns Effect with ExitCode (0 | 1)
 *
 * @pure false
 * @invariant never fails; every problem ends as exit code 1
 */
export function runLinterEffect(
	cliOptions: CLIOptions,
	engines: Engines = defaultEngines,
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		if (!cliOptions.noPreflight && !(yield* haveCliDependencies())) {
			return computeExitCode({ fatal: true, reportedFailures: 0 });
		}

		return yield* lint(lintOptionsFromCLI(cliOptions), engines).pipe(
			Effect.tap(printReport),
			Effect.map((report) => computeExitCode(decisionOf(report))),
			Effect.catchAll((error) =>
				printFatal(error).pipe(
					Effect.as(computeExitCode({ fatal: true, reportedFailures: 0 })),
				),
			),
		);
	});
}

/**
 * Promise-based entry for the BIN layer.
 *
 * @pure false (delegates to APP orchestration), but does not call process.exit
 */
export function runLinter(cliOptions: CLIOptions): Promise<ExitCode> {
	return Effect.runPromise(runLinterEffect(cliOptions));
}
