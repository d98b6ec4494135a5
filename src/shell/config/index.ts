// CHANGE: Central export file for the config module
// WHY: Provides a single import point for CLI parsing and option finalization
// SOURCE: n/a

export { parseCLIArgs } from "./cli.js";
export {
	chartRelPath,
	DEFAULT_FIXTURES_DIR,
	DEFAULT_POLICIES_DIR,
	defaultConcurrency,
	type Environment,
	finalizeOptions,
	WRITE_EXCEPTIONS_ENV,
	writeExceptionsEnabled,
} from "./options.js";
