// CHANGE: Default policy engine backed by `conftest test`
// WHY: conftest evaluates Rego policies against a directory of manifests; exit 0 means every policy passed
// PURITY: SHELL
// EFFECT: Effect<CommandResult, ExecError>
// COMPLEXITY: O(1) orchestration; cost is the conftest process

import { Console, Effect } from "effect";

import type { PolicyEngine } from "../../core/types/index.js";
import { formatCommand, runCommand } from "../utils/exec.js";

/**
 * @pure true
 */
export function conftestArgs(
	policiesDir: string,
	targetDir: string,
): readonly string[] {
	return ["test", "--policy", policiesDir, targetDir];
}

export const conftestEngine: PolicyEngine = {
	name: "conftest",
	evaluate: (policiesDir, targetDir) => {
		const args = conftestArgs(policiesDir, targetDir);
		return Console.log(`   ↳ Command: ${formatCommand("conftest", args)}`).pipe(
			Effect.zipRight(runCommand("conftest", args)),
		);
	},
};
