// CHANGE: Discover values fixtures and assign each its own output directory
// WHY: One fixture ↔ one render ↔ one output directory; names must not collide across fixture directories
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<Fixture>, ConfigError>
// INVARIANT: Only regular `*.yaml` files directly inside a fixture directory are fixtures
// COMPLEXITY: O(n log n) where n = entries in the fixture directories

import { Effect } from "effect";

import { ConfigError } from "../../core/errors.js";
import type { Fixture } from "../../core/models.js";
import { fsPromises, path } from "../../utils/node-mods.js";
import { TEMPLATE_EXTENSION } from "../fs/walk.js";

/**
 * Output directory name of a fixture.
 *
 * @param fileName - Fixture file name, e.g. "prod.yaml"
 * @param dirIndex - Position of its fixture directory
 * @param dirCount - Number of configured fixture directories
 *
 * @pure true
 * @example fixtureName("prod.yaml", 1, 2) === "1-prod"
 */
export function fixtureName(
	fileName: string,
	dirIndex: number,
	dirCount: number,
): string {
	const base = fileName.slice(0, -TEMPLATE_EXTENSION.length);
	return dirCount > 1 ? `${dirIndex}-${base}` : base;
}

function readFixtureDir(
	dir: string,
	dirIndex: number,
	dirCount: number,
): Effect.Effect<readonly Fixture[], ConfigError> {
	return Effect.tryPromise({
		try: () => fsPromises.readdir(dir, { withFileTypes: true }),
		catch: (error) =>
			new ConfigError({
				detail: `reading fixtures directory ${dir}: ${String(error)}`,
			}),
	}).pipe(
		Effect.map((entries) =>
			entries
				.filter((e) => e.isFile() && e.name.endsWith(TEMPLATE_EXTENSION))
				.map((e) => e.name)
				.sort()
				.map(
					(name): Fixture => ({
						name: fixtureName(name, dirIndex, dirCount),
						path: path.join(dir, name),
					}),
				),
		),
	);
}

/**
 * Lists the fixtures of every configured fixture directory.
 *
 * @pure false (reads directories)
 * @effect Effect<ReadonlyArray<Fixture>, ConfigError>
 * @postcondition result.length > 0
 */
export function discoverFixtures(
	dirs: readonly string[],
): Effect.Effect<readonly Fixture[], ConfigError> {
	return Effect.forEach(dirs, (dir, i) => readFixtureDir(dir, i, dirs.length)).pipe(
		Effect.map((perDir) => perDir.flat()),
		Effect.filterOrFail(
			(fixtures) => fixtures.length > 0,
			() =>
				new ConfigError({
					detail: `no ${TEMPLATE_EXTENSION} fixtures found in ${dirs.join(", ")}`,
				}),
		),
	);
}
