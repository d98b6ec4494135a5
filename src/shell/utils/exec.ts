// CHANGE: Run an external tool and keep its exit status plus combined output
// WHY: helm and conftest signal failure through a non-zero exit, with the diagnostics on stdout/stderr;
//      both must reach the caller as a value, not as a thrown error
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<CommandResult, ExecError>
// INVARIANT: ∀ command: process ran → CommandResult; spawn failed → ExecError
// COMPLEXITY: O(n) space where n = output length

import { Effect } from "effect";

import { ExecError } from "../../core/errors.js";
import {
	type CommandResult,
	combineOutput,
	type ExecFailure,
	isExitedProcess,
	toError,
} from "../../core/types/index.js";
import { execFile, promisify } from "../../utils/node-mods.js";

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Quotes an argument for the replayable command line shown in logs.
 *
 * @pure true
 */
export function formatCommand(file: string, args: readonly string[]): string {
	return [file, ...args]
		.map((part) => (/^[\w./:=@-]+$/.test(part) ? part : JSON.stringify(part)))
		.join(" ");
}

/**
 * Executes `file` with `args` (no shell) and reports how it exited.
 *
 * @param file - Executable looked up on PATH
 * @param args - Arguments, passed verbatim
 * @returns Effect with exit status and stdout followed by stderr
 *
 * @pure false (executes external command)
 * @effect Effect<CommandResult, ExecError>
 */
export function runCommand(
	file: string,
	args: readonly string[],
): Effect.Effect<CommandResult, ExecError> {
	return Effect.tryPromise({
		try: () =>
			execFileAsync(file, [...args], {
				encoding: "utf8",
				maxBuffer: MAX_BUFFER,
			}),
		catch: (error): Error | ExecFailure => toError(error),
	}).pipe(
		Effect.map(
			({ stdout, stderr }): CommandResult => ({
				exitCode: 0,
				output: combineOutput(stdout, stderr),
			}),
		),
		Effect.catchAll((error) =>
			isExitedProcess(error)
				? Effect.succeed<CommandResult>({
						exitCode: error.code,
						output: combineOutput(error.stdout, error.stderr),
					})
				: Effect.fail(
						new ExecError({
							command: formatCommand(file, args),
							detail: error.message,
						}),
					),
		),
	);
}
