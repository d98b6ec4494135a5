// CHANGE: Classify template lines without a YAML or Helm template parser
// WHY: No grammar understands both template control flow and YAML; a line-level heuristic is enough to find branch openings
// PURITY: CORE
// INVARIANT: Never reads lines[i] for i < 0 or i ≥ lines.length
// COMPLEXITY: O(n) per lookup where n = index of the candidate line

/**
 * Opening tag of a template conditional, with or without the `-` trim modifier.
 *
 * @remarks
 * `{{ else if` does not match: only the line that opens the branch is counted.
 */
export const CONDITIONAL_PATTERN = /\{\{-?\s*if/;

/**
 * Annotation that silences the branch on the same line or on the line below.
 */
export const SUPPRESSION_ANNOTATION = "branchtrace:ignore";

/**
 * Number of leading space characters (tabs are not indentation in YAML).
 *
 * @pure true
 * @complexity O(n) where n = |line|
 */
export function leadingSpaces(line: string): number {
	return line.length - line.replace(/^ +/, "").length;
}

/**
 * Checks whether a line carries the suppression annotation.
 *
 * @pure true
 */
export function isSuppressed(line: string | undefined): boolean {
	return line !== undefined && line.includes(SUPPRESSION_ANNOTATION);
}

/**
 * Decides whether `lines[index]` opens a conditional branch that must be traced.
 *
 * @param lines - Source lines of one template file
 * @param index - Zero-based candidate line
 * @returns true when the line opens an `if` and neither it nor the line above is suppressed
 *
 * @pure true
 * @invariant index ∉ [0, lines.length) → false
 * @complexity O(|line|)
 *
 * @example
 * ```ts
 * isDeclaration(["# branchtrace:ignore", "{{ if .Values.x }}"], 1); // false
 * isDeclaration(["{{- if .Values.x }}"], 0); // true
 * ```
 */
export function isDeclaration(lines: readonly string[], index: number): boolean {
	const line = lines[index];
	if (line === undefined || !CONDITIONAL_PATTERN.test(line)) {
		return false;
	}
	if (isSuppressed(line)) {
		return false;
	}
	return index === 0 || !isSuppressed(lines[index - 1]);
}

/**
 * Resolves the column at which a line inserted after `lines[start]` must be indented.
 *
 * CHANGE: Scan backwards for the nearest block scalar opener
 * WHY: A follower line indented less than the body of a `key: |` scalar would end the scalar
 *      and corrupt the rendered document; at body indentation it stays harmless scalar content
 * INVARIANT: result = indent(opener) + 2 if an opener exists in lines[0..start], else indent(lines[start])
 *
 * @pure true
 * @complexity O(start)
 *
 * @example
 * ```ts
 * findIndentation(["   foo: |", "# foobar", "  {{ if foo }}"], 2); // 5
 * ```
 */
export function findIndentation(lines: readonly string[], start: number): number {
	for (let i = start; i >= 0; i--) {
		const line = lines[i] ?? "";
		if (line.trim().endsWith("|")) {
			return leadingSpaces(line) + 2;
		}
	}
	return leadingSpaces(lines[start] ?? "");
}
