// CHANGE: Make main.ts a thin APP delegator
// WHY: main parses CLI options and delegates orchestration to app/runLinter
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without side effects
// COMPLEXITY: O(1)

import { runLinter } from "./app/runLinter.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs } from "./shell/config/index.js";

/**
 * Entry for programmatic usage of the command line (without terminating the process).
 *
 * @param args - Arguments without node and script (default: process.argv.slice(2))
 * @returns ExitCode (0 | 1)
 */
export async function main(
	args: readonly string[] = process.argv.slice(2),
): Promise<ExitCode> {
	return runLinter(parseCLIArgs(args));
}
