// CHANGE: Common exec error handling helpers
// WHY: helm and conftest report failures through a non-zero exit; the output lives on the error object
// PURITY: CORE
// SOURCE: n/a

import type { ExecFailure } from "./config.js";

/**
 * Checks that a rejected child process actually ran and exited with a status.
 *
 * @pure true
 * @invariant true → typeof error.code === "number"
 */
export function isExitedProcess(
	error: Error | ExecFailure,
): error is ExecFailure & { readonly code: number } {
	return "code" in error && typeof error.code === "number";
}

/**
 * Joins stdout and stderr of a finished process (stdout first).
 *
 * @pure true
 *
 * @example
 * ```ts
 * combineOutput("ok\n", ""); // "ok\n"
 * combineOutput("out\n", "err\n"); // "out\nerr\n"
 * ```
 */
export function combineOutput(
	stdout: string | undefined,
	stderr: string | undefined,
): string {
	return `${stdout ?? ""}${stderr ?? ""}`;
}

/**
 * Output of a failed process, or the error text when the process printed nothing.
 *
 * @pure true
 */
export function outputOrReason(output: string, reason: string): string {
	return output.trim().length === 0 ? reason : output;
}

/**
 * Normalizes a rejection value from a promise-based API.
 *
 * @pure true
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
