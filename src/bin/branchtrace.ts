#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode; BIN exits the process
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { runLinter } from "../app/runLinter.js";
import { parseCLIArgs } from "../shell/config/index.js";

/**
 * CLI entry point for branchtrace.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @invariant exit code is 0 when every branch is covered and every policy passed, otherwise 1
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		const cliOptions = parseCLIArgs();
		const code = await runLinter(cliOptions);
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
