// CHANGE: Scoped temporary workspace holding the chart copy, rendered results and recursion targets
// WHY: Instrumentation mutates files; it must only ever touch a private copy of the chart
// PURITY: SHELL
// EFFECT: Effect<Workspace, WorkspaceError, Scope>
// INVARIANT: Released exactly once; removed unless `preserve` is set
// COMPLEXITY: O(n) for the chart copy where n = bytes in the chart

import { Console, Effect, type Scope } from "effect";

import { WorkspaceError } from "../../core/errors.js";
import { fsPromises, os, path } from "../../utils/node-mods.js";

export interface Workspace {
	readonly root: string;
	readonly chartDir: string;
	readonly resultsDir: string;
	readonly recursionsDir: string;
}

function removeWorkspace(root: string, preserve: boolean): Effect.Effect<void> {
	if (preserve) {
		return Console.log(`📁 Preserving temporary directory: ${root}`);
	}
	return Effect.tryPromise({
		try: () => fsPromises.rm(root, { recursive: true, force: true }),
		catch: (error) => String(error),
	}).pipe(
		Effect.catchAll((detail) =>
			Console.error(`⚠️  Unable to clean up temporary directory ${root}: ${detail}`),
		),
	);
}

/**
 * Acquires a fresh temporary directory for one run.
 *
 * @param preserve - Log the directory instead of deleting it on release
 *
 * @pure false (creates directories)
 * @effect Effect<Workspace, WorkspaceError, Scope>
 */
export function makeWorkspace(
	preserve: boolean,
): Effect.Effect<Workspace, WorkspaceError, Scope.Scope> {
	const prefix = path.join(os.tmpdir(), "branchtrace-");
	return Effect.acquireRelease(
		Effect.tryPromise({
			try: () => fsPromises.mkdtemp(prefix),
			catch: (error) =>
				new WorkspaceError({ path: prefix, detail: String(error) }),
		}).pipe(
			Effect.map(
				(root): Workspace => ({
					root,
					chartDir: path.join(root, "chart"),
					resultsDir: path.join(root, "results"),
					recursionsDir: path.join(root, "recursions"),
				}),
			),
		),
		(workspace) => removeWorkspace(workspace.root, preserve),
	);
}

/**
 * Copies the caller's chart into the workspace.
 *
 * @pure false (copies files)
 * @postcondition workspace.chartDir mirrors sourceDir
 */
export function copyChart(
	sourceDir: string,
	workspace: Workspace,
): Effect.Effect<void, WorkspaceError> {
	return Effect.tryPromise({
		try: () => fsPromises.cp(sourceDir, workspace.chartDir, { recursive: true }),
		catch: (error) =>
			new WorkspaceError({
				path: workspace.chartDir,
				detail: `copying chart from ${sourceDir}: ${String(error)}`,
			}),
	});
}

/**
 * Creates (recursively) a directory inside the workspace.
 *
 * @pure false
 */
export function ensureDir(dir: string): Effect.Effect<void, WorkspaceError> {
	return Effect.tryPromise({
		try: () => fsPromises.mkdir(dir, { recursive: true }),
		catch: (error) => new WorkspaceError({ path: dir, detail: String(error) }),
	}).pipe(Effect.asVoid);
}
