// CHANGE: Test helper to create isolated temporary directories and chart copies
// WHY: Exception mode rewrites the original chart; tests must never touch the checked-in fixtures
// SOURCE: n/a

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Checked-in charts used by the shell and app tests.
 */
export const FIXTURE_CHARTS = fileURLToPath(
	new URL("../fixtures/charts", import.meta.url),
);

/**
 * Result of creating a temporary directory.
 *
 * Postconditions:
 * - dir exists and is empty unless populated by the creator
 * - cleanup() removes it recursively
 */
export interface TempDir {
	readonly dir: string;
	readonly cleanup: () => void;
}

/**
 * Create an empty temporary directory.
 *
 * @pure false (file system I/O)
 */
export function createTempDir(): TempDir {
	const dir = fs.mkdtempSync(path.join(os.tmpdir(), "branchtrace-test-"));
	return {
		dir,
		cleanup: (): void => {
			fs.rmSync(dir, { recursive: true, force: true });
		},
	};
}

/**
 * Copy a fixture chart into a fresh temporary directory.
 *
 * @param name Directory name under test/fixtures/charts
 * @returns TempDir whose `dir` is the chart root
 *
 * @example
 * const chart = copyFixtureChart("simple");
 * // ... run lint({ chartDir: chart.dir }) ...
 * chart.cleanup();
 */
export function copyFixtureChart(name: string): TempDir {
	const temp = createTempDir();
	const chartDir = path.join(temp.dir, name);
	fs.cpSync(path.join(FIXTURE_CHARTS, name), chartDir, { recursive: true });
	return { dir: chartDir, cleanup: temp.cleanup };
}

/**
 * Write files (relative path → content) below a directory, creating parents.
 *
 * @pure false (file system I/O)
 */
export function writeTree(
	root: string,
	files: Readonly<Record<string, string>>,
): void {
	for (const [relative, content] of Object.entries(files)) {
		const file = path.join(root, relative);
		fs.mkdirSync(path.dirname(file), { recursive: true });
		fs.writeFileSync(file, content, "utf8");
	}
}
