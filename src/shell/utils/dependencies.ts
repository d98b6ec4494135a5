// CHANGE: Check that the external tools are installed before running
// WHY: A missing helm or conftest would otherwise surface as one render/policy failure per fixture
// PURITY: SHELL
// EFFECT: Effect<DependencyCheckResult, never>
// SOURCE: n/a

import { Console, Effect } from "effect";

import { runCommand } from "./exec.js";

/**
 * An external tool the run depends on.
 */
export interface Dependency {
	readonly name: string;
	readonly command: string;
	readonly versionArgs: readonly string[];
	readonly installCommand: string;
}

export const DEPENDENCIES: readonly Dependency[] = [
	{
		name: "Helm",
		command: "helm",
		versionArgs: ["version", "--short"],
		installCommand: "Visit https://helm.sh/docs/intro/install/",
	},
	{
		name: "Conftest",
		command: "conftest",
		versionArgs: ["--version"],
		installCommand: "Visit https://www.conftest.dev/install/",
	},
];

export interface DependencyCheckResult {
	readonly allAvailable: boolean;
	readonly missing: readonly Dependency[];
}

function isAvailable(dep: Dependency): Effect.Effect<boolean> {
	return runCommand(dep.command, dep.versionArgs).pipe(
		Effect.map((result) => result.exitCode === 0),
		Effect.catchAll(() => Effect.succeed(false)),
	);
}

/**
 * Checks every dependency concurrently.
 *
 * @param dependencies - Tools to check (default: helm and conftest)
 *
 * @pure false (spawns `<tool> --version`)
 */
export function checkDependencies(
	dependencies: readonly Dependency[] = DEPENDENCIES,
): Effect.Effect<DependencyCheckResult> {
	return Effect.forEach(
		dependencies,
		(dep) => isAvailable(dep).pipe(Effect.map((ok) => ({ dep, ok }))),
		{ concurrency: "unbounded" },
	).pipe(
		Effect.map((checks) => {
			const missing = checks.filter((c) => !c.ok).map((c) => c.dep);
			return { allAvailable: missing.length === 0, missing };
		}),
	);
}

/**
 * Prints the missing dependencies with install hints.
 *
 * @pure false (console output)
 */
export function reportMissingDependencies(
	missing: readonly Dependency[],
): Effect.Effect<void> {
	return Effect.gen(function* () {
		yield* Console.error("\n❌ Missing required dependencies:\n");
		for (const dep of missing) {
			yield* Console.error(`  • ${dep.name} (${dep.command})`);
			yield* Console.error(`    Check: ${[dep.command, ...dep.versionArgs].join(" ")}`);
			yield* Console.error(`    Install: ${dep.installCommand}\n`);
		}
		yield* Console.error("Please install the missing dependencies and try again.\n");
	});
}
