// CHANGE: Pure reconciliation of expected declarations against surviving markers
// WHY: Coverage is a set difference; keeping it pure lets the exception writer and the reporter share it
// FORMAT THEOREM: uncovered(R, S) = { R[t] | t ∈ keys(R) ∧ t ∉ S }
// PURITY: CORE
// INVARIANT: covered + |uncovered| = |R|
// COMPLEXITY: O(|R| log |R|) (sorting for deterministic reports)

import type {
	CoverageSummary,
	Declaration,
	DeclarationRegistry,
} from "../models.js";

/**
 * Orders declarations by file, then line.
 *
 * @pure true
 */
export function compareDeclarations(a: Declaration, b: Declaration): number {
	if (a.file !== b.file) {
		return a.file < b.file ? -1 : 1;
	}
	return a.line - b.line;
}

/**
 * Computes the coverage summary of one run.
 *
 * @param registry - Frozen declaration registry
 * @param surviving - Tokens found in any rendered output
 * @returns Summary with uncovered declarations sorted by file and line
 *
 * @pure true
 * @invariant tokens in `surviving` but absent from `registry` are ignored
 */
export function reconcile(
	registry: DeclarationRegistry,
	surviving: ReadonlySet<string>,
): CoverageSummary {
	const uncovered: Declaration[] = [];
	for (const [token, declaration] of registry) {
		if (!surviving.has(token)) {
			uncovered.push(declaration);
		}
	}
	uncovered.sort(compareDeclarations);

	return {
		declarations: registry.size,
		covered: registry.size - uncovered.length,
		uncovered,
	};
}

/**
 * Groups declarations by file, keeping the zero-based line numbers.
 *
 * @pure true
 * @complexity O(n)
 */
export function groupByFile(
	declarations: readonly Declaration[],
): ReadonlyMap<string, readonly number[]> {
	const byFile = new Map<string, number[]>();
	for (const declaration of declarations) {
		const lines = byFile.get(declaration.file) ?? [];
		lines.push(declaration.line);
		byFile.set(declaration.file, lines);
	}
	return byFile;
}

/**
 * Coverage ratio in percent, one decimal. An empty registry counts as fully covered.
 *
 * @pure true
 * @invariant result ∈ [0, 100]
 */
export function coveragePercent(summary: {
	readonly declarations: number;
	readonly covered: number;
}): number {
	if (summary.declarations === 0) {
		return 100;
	}
	return Math.round((summary.covered / summary.declarations) * 1000) / 10;
}
