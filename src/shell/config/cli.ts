// CHANGE: Command-line parsing for branchtrace
// WHY: Keep the CLI surface a thin mapping onto LintOptions; a handler map keeps branching flat
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: Value flags consume the next token; unknown flags are ignored
// COMPLEXITY: O(n) where n = |args|

import type { CLIOptions } from "../../core/types/index.js";

interface ArgState {
	readonly chartDir: string;
	readonly fixturesDirs: readonly string[];
	readonly policiesDir: string | undefined;
	readonly concurrency: number | undefined;
	readonly recurseConfigmaps: readonly string[];
	readonly preserve: boolean;
	readonly writeExceptions: boolean;
	readonly noPreflight: boolean;
}

type ValueFlagHandler = (state: ArgState, value: string) => ArgState;

const valueHandlers: Readonly<Record<string, ValueFlagHandler>> = {
	"--fixtures-dir": (state, value) => ({
		...state,
		fixturesDirs: [...state.fixturesDirs, value],
	}),
	"--policies-dir": (state, value) => ({ ...state, policiesDir: value }),
	"--concurrency": (state, value) => ({
		...state,
		concurrency: Number.parseInt(value, 10),
	}),
	"--recurse-configmap": (state, value) => ({
		...state,
		recurseConfigmaps: [...state.recurseConfigmaps, value],
	}),
};

const booleanHandlers: Readonly<Record<string, (state: ArgState) => ArgState>> = {
	"--preserve": (state) => ({ ...state, preserve: true }),
	"--write-exceptions": (state) => ({ ...state, writeExceptions: true }),
	"--no-preflight": (state) => ({ ...state, noPreflight: true }),
};

/**
 * Applies one argument; returns the new state and whether the next token was consumed.
 */
function processArgument(
	arg: string,
	next: string | undefined,
	state: ArgState,
): { readonly state: ArgState; readonly skipNext: boolean } {
	const valueHandler: ValueFlagHandler | undefined = valueHandlers[arg];
	if (valueHandler !== undefined && next !== undefined) {
		return { state: valueHandler(state, next), skipNext: true };
	}

	const booleanHandler = booleanHandlers[arg];
	if (booleanHandler !== undefined) {
		return { state: booleanHandler(state), skipNext: false };
	}

	if (!arg.startsWith("--")) {
		return { state: { ...state, chartDir: arg }, skipNext: false };
	}

	return { state, skipNext: false };
}

/**
 * Parses command-line arguments.
 *
 * @param args - Arguments without node and script (default: process.argv.slice(2))
 * @returns CLI options
 *
 * @example
 * ```ts
 * // Command: branchtrace charts/app --fixtures-dir ci/values --concurrency 4
 * parseCLIArgs(["charts/app", "--fixtures-dir", "ci/values", "--concurrency", "4"]);
 * // { chartDir: "charts/app", fixturesDirs: ["ci/values"], concurrency: 4, ... }
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): CLIOptions {
	let state: ArgState = {
		chartDir: ".",
		fixturesDirs: [],
		policiesDir: undefined,
		concurrency: undefined,
		recurseConfigmaps: [],
		preserve: false,
		writeExceptions: false,
		noPreflight: false,
	};

	for (let i = 0; i < args.length; i++) {
		const arg = args.at(i) ?? "";
		if (arg.length === 0) continue;

		const result = processArgument(arg, args.at(i + 1), state);
		state = result.state;
		if (result.skipNext) {
			i++;
		}
	}

	// exactOptionalPropertyTypes: absent flags stay absent instead of `undefined`
	const { policiesDir, concurrency, ...rest } = state;
	return {
		...rest,
		...(policiesDir === undefined ? {} : { policiesDir }),
		...(concurrency === undefined ? {} : { concurrency }),
	};
}
