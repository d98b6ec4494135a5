// CHANGE: Snapshot every YAML file of a tree before any per-file work starts
// WHY: Fan-out tasks run over an immutable list; the walk itself is never mutated concurrently
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<string>, Error>
// INVARIANT: Paths are absolute and sorted lexicographically; directories are never returned
// COMPLEXITY: O(n) where n = entries in the tree

import { Effect } from "effect";

import { toError } from "../../core/types/index.js";
import { fsPromises, path } from "../../utils/node-mods.js";

export const TEMPLATE_EXTENSION = ".yaml";

function walkDirectory(
	absoluteDir: string,
	extension: string,
): Effect.Effect<readonly string[], Error> {
	return Effect.gen(function* () {
		const dirents = yield* Effect.tryPromise({
			try: () => fsPromises.readdir(absoluteDir, { withFileTypes: true }),
			catch: toError,
		});

		const files: string[] = [];
		const sorted = [...dirents].sort((a, b) => a.name.localeCompare(b.name));

		for (const dirent of sorted) {
			const absolutePath = path.join(absoluteDir, dirent.name);
			if (dirent.isDirectory()) {
				files.push(...(yield* walkDirectory(absolutePath, extension)));
				continue;
			}
			if (dirent.isFile() && dirent.name.endsWith(extension)) {
				files.push(absolutePath);
			}
		}

		return files;
	});
}

/**
 * Lists every file ending with `extension` below `root`, recursively.
 *
 * @param root - Directory to walk
 * @param extension - File suffix, ".yaml" by default
 * @returns Effect with absolute file paths
 *
 * @pure false (reads the filesystem)
 * @effect Effect<ReadonlyArray<string>, Error>
 */
export function listFiles(
	root: string,
	extension: string = TEMPLATE_EXTENSION,
): Effect.Effect<readonly string[], Error> {
	return walkDirectory(path.resolve(root), extension);
}

/**
 * Checks whether a directory holds no entries at all.
 *
 * @pure false (reads the filesystem)
 */
export function isEmptyDirectory(dir: string): Effect.Effect<boolean, Error> {
	return Effect.tryPromise({
		try: () => fsPromises.readdir(dir),
		catch: toError,
	}).pipe(Effect.map((entries) => entries.length === 0));
}
