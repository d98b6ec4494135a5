// CHANGE: Default chart renderer backed by `helm template`
// WHY: helm writes one file per resource below --output-dir, preserving the chart's relative paths
// PURITY: SHELL
// EFFECT: Effect<CommandResult, ExecError>
// COMPLEXITY: O(1) orchestration; cost is the helm process

import { Console, Effect } from "effect";

import type { ChartRenderer } from "../../core/types/index.js";
import { formatCommand, runCommand } from "../utils/exec.js";

/**
 * Arguments of one helm render.
 *
 * @pure true
 */
export function helmTemplateArgs(
	chartDir: string,
	fixturePath: string,
	outputDir: string,
): readonly string[] {
	return ["template", "--output-dir", outputDir, "--values", fixturePath, chartDir];
}

export const helmRenderer: ChartRenderer = {
	name: "helm",
	render: (chartDir, fixturePath, outputDir) => {
		const args = helmTemplateArgs(chartDir, fixturePath, outputDir);
		return Console.log(`   ↳ Command: ${formatCommand("helm", args)}`).pipe(
			Effect.zipRight(runCommand("helm", args)),
		);
	},
};
