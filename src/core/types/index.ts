// CHANGE: Central export file for all type definitions
// WHY: Provides a single import point for all types used across modules
// SOURCE: n/a

export type {
	CLIOptions,
	ExecFailure,
	FinalizedOptions,
	LintOptions,
	ObserverFn,
	RecursionFn,
	RecursionRule,
	RecursionRuleInput,
} from "./config.js";
export type {
	ChartRenderer,
	CommandResult,
	Engines,
	PolicyEngine,
} from "./engines.js";
export {
	combineOutput,
	isExitedProcess,
	outputOrReason,
	toError,
} from "./exec-helpers.js";
export type { PostRenderAction } from "./actions.js";
